import { ORDER_BUCKET_STATUSES, ORDER_STATUS, OrderBucket, OrderStatus } from '../../constants';
import { OrderCriteria, OrderSort } from '../orders/orders.repository';

export interface QueueDefinition {
  anyOf: OrderCriteria[];
  sort: OrderSort;
}

/**
 * Orders waiting on press staff: to schedule, to process, or to hand over
 */
export const PRESS_QUEUE_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.CONFIRMED,
  ORDER_STATUS.PICKED_UP,
  ORDER_STATUS.PROCESSING,
  ORDER_STATUS.READY,
];

// Open to any delivery actor
export const DELIVERY_OPEN_STATUSES: readonly OrderStatus[] = [ORDER_STATUS.SCHEDULED_FOR_PICKUP, ORDER_STATUS.READY];

// Only for the delivery actor already on the order
export const DELIVERY_CLAIMED_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.OUT_FOR_PICKUP,
  ORDER_STATUS.OUT_FOR_DELIVERY,
];

export const customerQueue = (customerId: string | null, bucket?: OrderBucket): QueueDefinition => {
  const criteria: OrderCriteria = {};
  if (customerId !== null) {
    criteria.customerId = customerId;
  }
  if (bucket) {
    criteria.statuses = ORDER_BUCKET_STATUSES[bucket];
  }
  return { anyOf: [criteria], sort: 'newest' };
};

export const pressQueue = (): QueueDefinition => ({
  anyOf: [{ statuses: PRESS_QUEUE_STATUSES }],
  sort: 'workflow',
});

export const deliveryQueue = (deliveryPersonId: string): QueueDefinition => ({
  anyOf: [
    { statuses: DELIVERY_OPEN_STATUSES },
    { statuses: DELIVERY_CLAIMED_STATUSES, deliveryPersonId },
  ],
  sort: 'workflow',
});

export const adminQueue = (): QueueDefinition => ({ anyOf: [], sort: 'newest' });
