import { OrderStatus } from '../../constants';
import {
  CreateOrderInput,
  CreateOrderItemInput,
  CreateOrderStatusUpdateInput,
  Order,
  OrderChanges,
  OrderItem,
  OrderItemPricing,
  OrderStatusUpdate,
} from '../../connections/db/models';
import { Page } from '../../types/response.types';

/**
 * Conjunction of filters over an order row; an empty criteria object matches every order
 */
export interface OrderCriteria {
  statuses?: readonly OrderStatus[];
  customerId?: string;
  assignedStaffId?: string;
  deliveryPersonId?: string;
}

/**
 * newest: created_at descending. workflow: position of the status in the workflow, then oldest first.
 */
export type OrderSort = 'newest' | 'workflow';

export interface OrderListQuery {
  // Disjunction of criteria; empty means unfiltered
  anyOf: readonly OrderCriteria[];
  sort: OrderSort;
  page: number;
  limit: number;
}

export interface StaffPerformanceRow {
  staff_id: string;
  staff_email: string | null;
  staff_name: string | null;
  completed_orders: number;
  avg_completion_seconds: number;
}

/**
 * Writes available inside one transaction. The order row stays locked until the transaction ends.
 */
export interface OrdersUnitOfWork {
  lockOrder(orderId: number): Promise<Order | null>;
  listItems(orderId: number): Promise<OrderItem[]>;
  nextOrderSequence(day: string): Promise<number>;
  insertOrder(input: CreateOrderInput): Promise<Order>;
  /**
   * Throws ConcurrentModificationError when the row's version is no longer `expectedVersion`
   */
  updateOrder(orderId: number, expectedVersion: number, changes: OrderChanges): Promise<Order>;
  deleteOrder(orderId: number): Promise<void>;
  insertItem(input: CreateOrderItemInput): Promise<OrderItem>;
  updateItemPricing(itemId: number, pricing: OrderItemPricing): Promise<OrderItem>;
  deleteItem(orderId: number, itemId: number): Promise<boolean>;
  insertStatusUpdate(input: CreateOrderStatusUpdateInput): Promise<OrderStatusUpdate>;
}

export interface OrdersRepository {
  findById(orderId: number): Promise<Order | null>;
  listItems(orderId: number): Promise<OrderItem[]>;
  /**
   * Newest first
   */
  listStatusUpdates(orderId: number): Promise<OrderStatusUpdate[]>;
  latestStatusUpdate(orderId: number): Promise<OrderStatusUpdate | null>;
  listOrders(query: OrderListQuery): Promise<Page<Order>>;
  countByStatus(): Promise<Partial<Record<OrderStatus, number>>>;
  staffPerformance(limit: number): Promise<StaffPerformanceRow[]>;
  /**
   * Runs `work` in a single transaction: everything it writes commits together or not at all
   */
  transaction<T>(work: (uow: OrdersUnitOfWork) => Promise<T>): Promise<T>;
}

/**
 * In-process evaluation of a criteria disjunction, with the same meaning as the SQL filter
 */
export const matchesOrderCriteria = (
  order: Pick<Order, 'status' | 'customer_id' | 'assigned_staff_id' | 'delivery_person_id'>,
  anyOf: readonly OrderCriteria[]
): boolean =>
  anyOf.length === 0 ||
  anyOf.some(
    (criteria) =>
      (criteria.statuses === undefined || criteria.statuses.includes(order.status)) &&
      (criteria.customerId === undefined || order.customer_id === criteria.customerId) &&
      (criteria.assignedStaffId === undefined || order.assigned_staff_id === criteria.assignedStaffId) &&
      (criteria.deliveryPersonId === undefined || order.delivery_person_id === criteria.deliveryPersonId)
  );
