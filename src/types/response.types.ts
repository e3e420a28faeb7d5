/**
 * Response Types shared by every module
 */

export interface ErrorDetails {
  code?: string;
  details?: unknown;
}

export interface PaginationParams {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ErrorDetails;
  pagination?: PaginationParams;
  meta?: Record<string, unknown>;
}

/**
 * A page of rows plus the total count of the unpaginated query
 */
export interface Page<T> {
  rows: T[];
  total: number;
  page: number;
  limit: number;
}
