// OrderItem Model - Based on migration 20251120_000005_create_order_items_table

export interface OrderItem {
  id: number;
  order_id: number;
  service_id: number;
  variant_id: number | null;
  option_ids: number[]; // snapshot of the selected options
  name: string; // snapshot of service (and variant) name
  quantity: number; // >= 1
  unit_price: number; // DECIMAL(10, 2) - snapshot at add time
  options_total: number; // DECIMAL(10, 2) - sum of option adjustments at add time
  discount_amount: number; // DECIMAL(10, 2) - default: 0
  total_price: number; // DECIMAL(10, 2) - max(0, unit_price * quantity + options_total - discount_amount)
  special_instructions: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateOrderItemInput {
  order_id: number;
  service_id: number;
  variant_id?: number | null;
  option_ids: number[];
  name: string;
  quantity: number;
  unit_price: number;
  options_total: number;
  discount_amount: number;
  total_price: number;
  special_instructions?: string | null;
}

export type OrderItemPricing = Pick<OrderItem, 'name' | 'unit_price' | 'options_total' | 'total_price'>;
