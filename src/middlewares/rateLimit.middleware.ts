import { Response, NextFunction } from 'express';
import { AuthRequest } from '../types/request.types';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

/**
 * Rate Limiting Store (in-memory, per process)
 */
interface RateLimitStore {
  [key: string]: {
    count: number;
    resetTime: number;
  };
}

const store: RateLimitStore = {};

/**
 * Clear expired entries periodically
 */
const sweeper = setInterval(() => {
  const now = Date.now();
  Object.keys(store).forEach((key) => {
    if (store[key].resetTime < now) {
      delete store[key];
    }
  });
}, 60000);
sweeper.unref();

/**
 * Authenticated users are limited per account, anonymous callers per IP
 */
const getClientId = (req: AuthRequest): string => {
  return req.user?.id || req.ip || 'unknown';
};

/**
 * Fixed-window rate limiting middleware
 */
export const rateLimit = (
  windowMs: number = 60 * 1000,
  maxRequests: number = 60,
  message?: string
) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    const clientId = getClientId(req);
    const now = Date.now();
    const key = `${req.baseUrl}${req.route?.path ?? req.path}:${clientId}`;

    let entry = store[key];

    if (!entry || entry.resetTime < now) {
      entry = {
        count: 0,
        resetTime: now + windowMs,
      };
      store[key] = entry;
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.originalUrl,
        count: entry.count,
        limit: maxRequests,
      });

      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};

/**
 * Predefined rate limiters
 */
export const rateLimiters = {
  // Status changes: 30 per minute per user
  transitions: rateLimit(60 * 1000, 30, 'Too many status changes. Please slow down.'),

  // General API traffic: 300 per minute per client
  general: rateLimit(60 * 1000, 300),
};
