// Order Model - Based on migration 20251120_000004_create_orders_table

import { DeliveryType, OrderStatus, PaymentStatus } from '../../../constants';

export interface Order {
  id: number;
  order_number: string; // unique
  customer_id: string; // UUID - immutable
  status: OrderStatus; // default: 'draft'
  payment_status: PaymentStatus; // default: 'pending'
  delivery_type: DeliveryType; // default: 'pickup'
  pickup_address: string | null;
  delivery_address: string | null;
  preferred_pickup_date: string | null; // DATE (YYYY-MM-DD)
  preferred_delivery_date: string | null; // DATE (YYYY-MM-DD)
  subtotal: number; // DECIMAL(10, 2)
  tax_amount: number; // DECIMAL(10, 2)
  shipping_cost: number; // DECIMAL(10, 2)
  discount_amount: number; // DECIMAL(10, 2)
  total_amount: number; // DECIMAL(10, 2)
  assigned_staff_id: string | null; // UUID - press user
  delivery_person_id: string | null; // UUID - delivery user
  created_at: Date;
  updated_at: Date;
  confirmed_at: Date | null;
  scheduled_at: Date | null;
  out_for_pickup_at: Date | null;
  picked_up_at: Date | null;
  processing_started_at: Date | null;
  ready_at: Date | null;
  out_for_delivery_at: Date | null;
  completed_at: Date | null;
  cancelled_at: Date | null;
  cancellation_reason: string | null;
  special_instructions: string | null;
  internal_notes: string | null;
  version: number; // bumped on every write
}

export type OrderTimestampField =
  | 'confirmed_at'
  | 'scheduled_at'
  | 'out_for_pickup_at'
  | 'picked_up_at'
  | 'processing_started_at'
  | 'ready_at'
  | 'out_for_delivery_at'
  | 'completed_at'
  | 'cancelled_at';

export interface OrderTotals {
  subtotal: number;
  tax_amount: number;
  shipping_cost: number;
  discount_amount: number;
  total_amount: number;
}

export interface CreateOrderInput {
  order_number: string; // REQUIRED - unique
  customer_id: string; // REQUIRED
  status: OrderStatus; // 'draft' or 'pending'
  delivery_type: DeliveryType;
  pickup_address?: string | null;
  delivery_address?: string | null;
  preferred_pickup_date?: string | null;
  preferred_delivery_date?: string | null;
  special_instructions?: string | null;
}

/**
 * Fields written back when an order row is saved; status only ever changes through the workflow
 */
export type OrderChanges = Partial<
  Pick<
    Order,
    | 'status'
    | 'payment_status'
    | 'delivery_type'
    | 'pickup_address'
    | 'delivery_address'
    | 'preferred_pickup_date'
    | 'preferred_delivery_date'
    | 'assigned_staff_id'
    | 'delivery_person_id'
    | 'cancellation_reason'
    | 'special_instructions'
    | 'internal_notes'
    | OrderTimestampField
    | keyof OrderTotals
  >
>;
