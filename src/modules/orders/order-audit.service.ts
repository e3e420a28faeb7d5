import { CreateOrderStatusUpdateInput, OrderStatusUpdate } from '../../connections/db/models';
import { auditLog } from '../../utils/logging';
import { OrdersRepository, OrdersUnitOfWork } from './orders.repository';

/**
 * Append-only trail of accepted transitions
 */
export class OrderAuditService {
  constructor(private readonly orders: OrdersRepository) {}

  /**
   * Must run inside the transaction that changes the status so both commit together
   */
  async record(uow: OrdersUnitOfWork, input: CreateOrderStatusUpdateInput): Promise<OrderStatusUpdate> {
    return uow.insertStatusUpdate(input);
  }

  /**
   * [AUDIT] log line for a committed record
   */
  logCommitted(statusUpdate: OrderStatusUpdate): void {
    auditLog('Order status changed', {
      orderId: statusUpdate.order_id,
      from: statusUpdate.from_status,
      to: statusUpdate.to_status,
      changedBy: statusUpdate.changed_by,
      statusUpdateId: statusUpdate.id,
    });
  }

  list(orderId: number): Promise<OrderStatusUpdate[]> {
    return this.orders.listStatusUpdates(orderId);
  }

  latest(orderId: number): Promise<OrderStatusUpdate | null> {
    return this.orders.latestStatusUpdate(orderId);
  }
}
