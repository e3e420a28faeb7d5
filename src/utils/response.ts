import { Response } from 'express';
import { ZodError } from 'zod';
import { logger, toError } from './logging';
import { isAppError } from './errors';
import { ApiResponse, ErrorDetails, PaginationParams } from '../types/response.types';

/**
 * Response Handler - shared JSON envelope for every endpoint
 */
export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  /**
   * Created Response (201)
   */
  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ErrorDetails,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, {
      statusCode,
      error,
      meta,
    });

    return res.status(statusCode).json(response);
  }

  static badRequest(
    res: Response,
    message: string = 'Bad request',
    details?: unknown
  ): Response {
    return this.error(res, message, 400, {
      code: 'BAD_REQUEST',
      details,
    });
  }

  static validationError(
    res: Response,
    errors: unknown[],
    message: string = 'Invalid request data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static unauthorized(
    res: Response,
    message: string = 'Authentication required'
  ): Response {
    return this.error(res, message, 401, {
      code: 'UNAUTHORIZED',
    });
  }

  static forbidden(
    res: Response,
    message: string = 'Access denied'
  ): Response {
    return this.error(res, message, 403, {
      code: 'FORBIDDEN',
    });
  }

  static notFound(
    res: Response,
    message: string = 'Not found'
  ): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  /**
   * Too Many Requests Response (429)
   */
  static tooManyRequests(
    res: Response,
    message: string = 'Too many requests',
    retryAfter?: number
  ): Response {
    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  static internalError(
    res: Response,
    message: string = 'Internal server error',
    error?: unknown
  ): Response {
    logger.error('[Internal Server Error]', {
      message,
      error: error instanceof Error ? error.stack : error,
    });

    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
    });
  }

  /**
   * Maps validation and domain errors to their response; anything else is a 500
   */
  static fromError(
    res: Response,
    error: unknown,
    fallbackMessage: string = 'Internal server error'
  ): Response {
    if (error instanceof ZodError) {
      return this.validationError(res, error.errors);
    }

    if (isAppError(error)) {
      return this.error(res, error.message, error.status, {
        code: error.code,
        ...(error.details && { details: error.details }),
      });
    }

    return this.internalError(res, fallbackMessage, toError(error));
  }

  static paginated<T>(
    res: Response,
    data: T[],
    pagination: {
      page: number;
      limit: number;
      total: number;
    },
    message: string = 'Success',
    meta?: Record<string, unknown>
  ): Response {
    const paginationParams: PaginationParams = {
      ...pagination,
      totalPages: Math.ceil(pagination.total / pagination.limit),
    };
    const response: ApiResponse<T[]> = {
      success: true,
      message,
      data,
      pagination: paginationParams,
      ...(meta && { meta }),
    };

    return res.status(200).json(response);
  }
}
