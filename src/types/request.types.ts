import { Request } from 'express';
import { UserRole } from '../constants';

/**
 * The authenticated user acting on a request, as supplied by the identity provider
 */
export interface Actor {
  id: string; // UUID
  email?: string | null;
  role: UserRole;
  is_superuser: boolean;
}

/**
 * Auth Request - request carrying the authenticated actor
 */
export interface AuthRequest extends Request {
  user?: Actor;
}

export interface PaginationQuery {
  page?: number;
  limit?: number;
}
