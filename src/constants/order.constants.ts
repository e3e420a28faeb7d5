/**
 * Order Status Constants
 */
export const ORDER_STATUS = {
  DRAFT: 'draft',
  PENDING: 'pending',
  CONFIRMED: 'confirmed',
  SCHEDULED_FOR_PICKUP: 'scheduled_for_pickup',
  OUT_FOR_PICKUP: 'out_for_pickup',
  PICKED_UP: 'picked_up',
  PROCESSING: 'processing',
  READY: 'ready',
  OUT_FOR_DELIVERY: 'out_for_delivery',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
  REFUNDED: 'refunded',
  FAILED: 'failed',
} as const;

export type OrderStatus = typeof ORDER_STATUS[keyof typeof ORDER_STATUS];

export const ORDER_STATUSES: readonly OrderStatus[] = Object.values(ORDER_STATUS);

export const isOrderStatus = (value: string): value is OrderStatus =>
  ORDER_STATUSES.some((status) => status === value);

/**
 * Workflow position of each status, used to sort work queues
 */
export const ORDER_STATUS_SEQUENCE: readonly OrderStatus[] = [
  ORDER_STATUS.DRAFT,
  ORDER_STATUS.PENDING,
  ORDER_STATUS.CONFIRMED,
  ORDER_STATUS.SCHEDULED_FOR_PICKUP,
  ORDER_STATUS.OUT_FOR_PICKUP,
  ORDER_STATUS.PICKED_UP,
  ORDER_STATUS.PROCESSING,
  ORDER_STATUS.READY,
  ORDER_STATUS.OUT_FOR_DELIVERY,
  ORDER_STATUS.COMPLETED,
  ORDER_STATUS.CANCELLED,
  ORDER_STATUS.REFUNDED,
  ORDER_STATUS.FAILED,
];

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.COMPLETED,
  ORDER_STATUS.CANCELLED,
  ORDER_STATUS.REFUNDED,
  ORDER_STATUS.FAILED,
];

/**
 * Allowed transitions: current status -> statuses it may move to
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  [ORDER_STATUS.DRAFT]: [ORDER_STATUS.CONFIRMED, ORDER_STATUS.PENDING, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.PENDING]: [ORDER_STATUS.CONFIRMED, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.CONFIRMED]: [ORDER_STATUS.SCHEDULED_FOR_PICKUP, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.SCHEDULED_FOR_PICKUP]: [ORDER_STATUS.OUT_FOR_PICKUP, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.OUT_FOR_PICKUP]: [ORDER_STATUS.PICKED_UP, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.PICKED_UP]: [ORDER_STATUS.PROCESSING, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.PROCESSING]: [ORDER_STATUS.READY, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.READY]: [ORDER_STATUS.OUT_FOR_DELIVERY, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.OUT_FOR_DELIVERY]: [ORDER_STATUS.COMPLETED, ORDER_STATUS.CANCELLED],
  [ORDER_STATUS.COMPLETED]: [],
  [ORDER_STATUS.CANCELLED]: [],
  [ORDER_STATUS.REFUNDED]: [],
  [ORDER_STATUS.FAILED]: [],
};

/**
 * Statuses in which items and delivery details may still be edited
 */
export const EDITABLE_ORDER_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.DRAFT,
  ORDER_STATUS.PENDING,
  ORDER_STATUS.CONFIRMED,
];

/**
 * Coarse status buckets shown on the customer dashboard
 */
export const ORDER_BUCKET = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  READY: 'ready',
  DONE: 'done',
} as const;

export type OrderBucket = typeof ORDER_BUCKET[keyof typeof ORDER_BUCKET];

export const ORDER_BUCKET_STATUSES: Readonly<Record<OrderBucket, readonly OrderStatus[]>> = {
  [ORDER_BUCKET.PENDING]: [ORDER_STATUS.PENDING, ORDER_STATUS.CONFIRMED, ORDER_STATUS.SCHEDULED_FOR_PICKUP],
  [ORDER_BUCKET.IN_PROGRESS]: [ORDER_STATUS.OUT_FOR_PICKUP, ORDER_STATUS.PICKED_UP, ORDER_STATUS.PROCESSING],
  [ORDER_BUCKET.READY]: [ORDER_STATUS.READY, ORDER_STATUS.OUT_FOR_DELIVERY],
  [ORDER_BUCKET.DONE]: [ORDER_STATUS.COMPLETED, ORDER_STATUS.CANCELLED, ORDER_STATUS.REFUNDED],
};

/**
 * Payment Status Constants
 */
export const PAYMENT_STATUS = {
  PENDING: 'pending',
  AUTHORIZED: 'authorized',
  PAID: 'paid',
  PARTIALLY_REFUNDED: 'partially_refunded',
  REFUNDED: 'refunded',
  VOIDED: 'voided',
  FAILED: 'failed',
} as const;

export type PaymentStatus = typeof PAYMENT_STATUS[keyof typeof PAYMENT_STATUS];

/**
 * Delivery Type Constants
 */
export const DELIVERY_TYPE = {
  PICKUP: 'pickup',
  DELIVERY: 'delivery',
} as const;

export type DeliveryType = typeof DELIVERY_TYPE[keyof typeof DELIVERY_TYPE];

/**
 * Order number: {YYMMDD}-{sequence within the day, zero padded}
 */
export const ORDER_NUMBER_SEQUENCE_DIGITS = 5;

export const formatOrderNumberDay = (date: Date): string => {
  const yy = String(date.getUTCFullYear() % 100).padStart(2, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${yy}${mm}${dd}`;
};

export const generateOrderNumber = (date: Date, sequence: number): string => {
  return `${formatOrderNumberDay(date)}-${String(sequence).padStart(ORDER_NUMBER_SEQUENCE_DIGITS, '0')}`;
};
