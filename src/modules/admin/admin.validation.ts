import { z } from 'zod';
import { PAYMENT_STATUS } from '../../constants';
import { moneySchema } from '../../utils/validation';

// Validation schemas for admin order corrections
export const paymentStatusSchema = z.object({
  payment_status: z.nativeEnum(PAYMENT_STATUS),
});

export const discountSchema = z.object({
  discount_amount: moneySchema,
});

export const assignmentSchema = z
  .object({
    assigned_staff_id: z.string().uuid().nullable().optional(),
    delivery_person_id: z.string().uuid().nullable().optional(),
  })
  .refine((data) => data.assigned_staff_id !== undefined || data.delivery_person_id !== undefined, {
    message: 'Provide assigned_staff_id or delivery_person_id',
  });
