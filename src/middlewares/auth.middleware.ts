import { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { USER_STATUS, UserRole } from '../constants';
import { appConfig } from '../connections/config/app.config';
import { Actor, AuthRequest } from '../types/request.types';
import { ResponseHandler } from '../utils/response';
import { AppError } from '../utils/errors';
import { UsersRepository } from '../modules/users/users.repository';

class AuthenticationError extends Error {}

const userIdFromToken = (token: string): string => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, appConfig.jwtSecret);
  } catch {
    throw new AuthenticationError('Invalid or expired token');
  }

  if (typeof decoded === 'string' || typeof decoded.userId !== 'string') {
    throw new AuthenticationError('Invalid token payload');
  }
  return decoded.userId;
};

const resolveActorFromToken = async (users: UsersRepository, token: string): Promise<Actor> => {
  const user = await users.findById(userIdFromToken(token));

  if (!user) {
    throw new AuthenticationError('User does not exist');
  }

  if (user.status !== USER_STATUS.ACTIVE) {
    throw new AuthenticationError('Account is not active');
  }

  return {
    id: user.id,
    email: user.email,
    role: user.role,
    is_superuser: user.is_superuser,
  };
};

/**
 * Bearer-token authentication; resolves the token's user through `users`
 */
export const authenticate = (users: UsersRepository) => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = req.headers.authorization?.split(' ')[1];

    if (!token) {
      return ResponseHandler.unauthorized(res, 'No token provided');
    }

    try {
      req.user = await resolveActorFromToken(users, token);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        return ResponseHandler.unauthorized(res, error.message);
      }
      return ResponseHandler.fromError(res, error, 'Authentication failed');
    }

    next();
  };
};

/**
 * Superusers pass every role check
 */
export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!req.user.is_superuser && !roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'Access denied');
    }

    next();
  };
};

/**
 * The authenticated actor of a request that went through `authenticate`
 */
export const currentActor = (req: AuthRequest): Actor => {
  if (!req.user) {
    throw new AppError(401, 'UNAUTHORIZED', 'Authentication required');
  }
  return req.user;
};
