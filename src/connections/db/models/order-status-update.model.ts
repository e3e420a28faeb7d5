// OrderStatusUpdate Model - immutable audit record, one per accepted transition

import { OrderStatus } from '../../../constants';

export interface OrderStatusUpdate {
  id: number;
  order_id: number;
  from_status: OrderStatus;
  to_status: OrderStatus;
  changed_by: string | null; // UUID
  notes: string; // '' when none given
  timestamp: Date; // server-set
}

export interface CreateOrderStatusUpdateInput {
  order_id: number;
  from_status: OrderStatus;
  to_status: OrderStatus;
  changed_by: string;
  notes: string;
  timestamp: Date;
}
