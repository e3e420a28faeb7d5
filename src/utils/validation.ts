import { z } from 'zod';

// Shared validation schemas

export const idParamSchema = z.coerce.number().int().positive('Id must be a positive integer');

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100, 'Limit cannot exceed 100').default(10),
});

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

export const moneySchema = z.number().nonnegative().multipleOf(0.01, 'Amount must have at most 2 decimals');
