import { z } from 'zod';
import { DELIVERY_TYPE, ORDER_BUCKET, ORDER_STATUS } from '../../constants';
import { isoDateSchema, moneySchema, paginationSchema } from '../../utils/validation';

// Validation schemas for the orders module
export const orderItemSchema = z.object({
  service_id: z.number().int().positive(),
  variant_id: z.number().int().positive().nullable().optional(),
  option_ids: z.array(z.number().int().positive()).optional(),
  quantity: z.number().int().positive('Quantity must be at least 1'),
  discount_amount: moneySchema.optional(),
  special_instructions: z.string().max(1000).nullable().optional(),
});

const deliveryDetailsShape = {
  delivery_type: z.nativeEnum(DELIVERY_TYPE).optional(),
  pickup_address: z.string().trim().min(1, 'Pickup address cannot be empty').nullable().optional(),
  delivery_address: z.string().trim().min(1, 'Delivery address cannot be empty').nullable().optional(),
  preferred_pickup_date: isoDateSchema.nullable().optional(),
  preferred_delivery_date: isoDateSchema.nullable().optional(),
  special_instructions: z.string().max(2000).nullable().optional(),
};

export const createOrderSchema = z.object({
  ...deliveryDetailsShape,
  status: z.enum([ORDER_STATUS.DRAFT, ORDER_STATUS.PENDING]).optional(),
  items: z.array(orderItemSchema).optional(),
});

export const updateOrderSchema = z
  .object(deliveryDetailsShape)
  .strict()
  .refine((data) => Object.keys(data).length > 0, {
    message: 'Provide at least one field to update',
  });

export const transitionSchema = z.object({
  status: z.nativeEnum(ORDER_STATUS),
  notes: z.string().max(2000).optional(),
});

export const listOrdersQuerySchema = paginationSchema.extend({
  bucket: z.nativeEnum(ORDER_BUCKET).optional(),
});
