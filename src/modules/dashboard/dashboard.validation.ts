import { z } from 'zod';
import { ORDER_BUCKET } from '../../constants';
import { paginationSchema } from '../../utils/validation';

export const customerDashboardQuerySchema = paginationSchema.extend({
  bucket: z.nativeEnum(ORDER_BUCKET).optional(),
  customer_id: z.string().uuid().optional(),
});

export const queueQuerySchema = paginationSchema;
