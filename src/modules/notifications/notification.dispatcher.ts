import { DELIVERY_TYPE, ORDER_STATUS, OrderStatus } from '../../constants';
import { Order, OrderStatusUpdate } from '../../connections/db/models';
import { logger } from '../../utils/logging';

export type NotificationRole = 'customer' | 'assigned_staff' | 'delivery_person';

export interface NotificationRecipient {
  userId: string;
  as: NotificationRole;
}

export interface OrderStatusChangedEvent {
  order: Order;
  statusUpdate: OrderStatusUpdate;
}

/**
 * Told about every committed transition. Delivery is best effort: the caller logs and ignores failures.
 */
export interface NotificationDispatcher {
  orderStatusChanged(event: OrderStatusChangedEvent): void | Promise<void>;
}

// Customer-facing milestones
const CUSTOMER_NOTIFIED_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.CONFIRMED,
  ORDER_STATUS.PROCESSING,
  ORDER_STATUS.READY,
  ORDER_STATUS.OUT_FOR_DELIVERY,
  ORDER_STATUS.COMPLETED,
  ORDER_STATUS.CANCELLED,
];

/**
 * Who hears about `order` entering `status`
 */
export const notificationRecipients = (order: Order, status: OrderStatus): NotificationRecipient[] => {
  const recipients: NotificationRecipient[] = [];

  if (CUSTOMER_NOTIFIED_STATUSES.includes(status)) {
    recipients.push({ userId: order.customer_id, as: 'customer' });
  }

  if (status === ORDER_STATUS.SCHEDULED_FOR_PICKUP && order.assigned_staff_id) {
    recipients.push({ userId: order.assigned_staff_id, as: 'assigned_staff' });
  }

  if (status === ORDER_STATUS.READY && order.delivery_type === DELIVERY_TYPE.DELIVERY && order.delivery_person_id) {
    recipients.push({ userId: order.delivery_person_id, as: 'delivery_person' });
  }

  return recipients;
};

/**
 * Writes one log line per status change; stands in until a real channel (email, push) is wired up
 */
export class LoggingNotificationDispatcher implements NotificationDispatcher {
  orderStatusChanged({ order, statusUpdate }: OrderStatusChangedEvent): void {
    const recipients = notificationRecipients(order, statusUpdate.to_status);
    if (recipients.length === 0) {
      return;
    }

    logger.info('Order status notification', {
      orderId: order.id,
      orderNumber: order.order_number,
      from: statusUpdate.from_status,
      to: statusUpdate.to_status,
      changedBy: statusUpdate.changed_by,
      recipients,
    });
  }
}
