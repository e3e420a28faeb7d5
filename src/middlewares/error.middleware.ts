import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { isAppError } from '../utils/errors';
import { logger, toError } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

// PostgreSQL error codes that reach this handler unwrapped
const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

const pgErrorCode = (err: unknown): string | undefined => {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};

const isJsonSyntaxError = (err: unknown): boolean =>
  err instanceof SyntaxError && typeof err === 'object' && 'body' in err;

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const error = toError(err);

  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    params: req.params,
    query: req.query,
  });

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  if (isJsonSyntaxError(err)) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  if (isAppError(err)) {
    return ResponseHandler.fromError(res, err);
  }

  const code = pgErrorCode(err);
  if (code === PG_UNIQUE_VIOLATION) {
    return ResponseHandler.error(res, 'Resource already exists', 409, { code: 'CONFLICT' });
  }

  if (code === PG_FOREIGN_KEY_VIOLATION) {
    return ResponseHandler.error(res, 'Referenced record does not exist', 400, {
      code: 'FOREIGN_KEY_VIOLATION',
    });
  }

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
  });
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
