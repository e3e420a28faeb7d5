import { OrderStatus } from '../constants';

/**
 * Base error carrying the HTTP status and machine-readable code the API answers with
 */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(status: number, code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

/**
 * Requested status is not reachable from the current one
 */
export class InvalidTransitionError extends AppError {
  constructor(
    readonly from: OrderStatus,
    readonly to: OrderStatus,
    message: string = `Cannot move order from ${from} to ${to}`,
    code: string = 'INVALID_TRANSITION'
  ) {
    super(409, code, message, { from, to });
  }
}

/**
 * Actor is not permitted to apply the transition
 */
export class UnauthorizedTransitionError extends AppError {
  constructor(readonly from: OrderStatus, readonly to: OrderStatus) {
    super(403, 'TRANSITION_NOT_ALLOWED', `You are not allowed to move this order from ${from} to ${to}`, { from, to });
  }
}

/**
 * Order changed between read and write
 */
export class ConcurrentModificationError extends AppError {
  constructor(orderId: number) {
    super(409, 'CONCURRENT_MODIFICATION', 'The order was modified by another request, please retry', { orderId });
  }
}

export class PersistenceFailureError extends AppError {
  constructor(message: string = 'The order store is unavailable', readonly reason?: unknown) {
    super(503, 'PERSISTENCE_FAILURE', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found') {
    super(404, 'NOT_FOUND', message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Access denied') {
    super(403, 'FORBIDDEN', message);
  }
}

/**
 * Order content can no longer be edited in its current status
 */
export class OrderLockedError extends AppError {
  constructor(status: OrderStatus, action: string) {
    super(409, 'ORDER_LOCKED', `Cannot ${action} an order in status ${status}`, { status });
  }
}

export class CatalogLookupError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(422, 'CATALOG_LOOKUP_FAILED', message, details);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'BAD_REQUEST', message, details);
  }
}
