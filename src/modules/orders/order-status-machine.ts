import {
  ORDER_STATUS,
  ORDER_STATUS_SEQUENCE,
  ORDER_TRANSITIONS,
  OrderStatus,
  TERMINAL_ORDER_STATUSES,
  USER_ROLE,
} from '../../constants';
import { Order, OrderChanges, OrderTimestampField } from '../../connections/db/models';
import { Actor } from '../../types/request.types';

/**
 * Lifecycle timestamp stamped the first time an order enters each status
 */
export const LIFECYCLE_TIMESTAMPS: Readonly<Partial<Record<OrderStatus, OrderTimestampField>>> = {
  [ORDER_STATUS.CONFIRMED]: 'confirmed_at',
  [ORDER_STATUS.SCHEDULED_FOR_PICKUP]: 'scheduled_at',
  [ORDER_STATUS.OUT_FOR_PICKUP]: 'out_for_pickup_at',
  [ORDER_STATUS.PICKED_UP]: 'picked_up_at',
  [ORDER_STATUS.PROCESSING]: 'processing_started_at',
  [ORDER_STATUS.READY]: 'ready_at',
  [ORDER_STATUS.OUT_FOR_DELIVERY]: 'out_for_delivery_at',
  [ORDER_STATUS.COMPLETED]: 'completed_at',
  [ORDER_STATUS.CANCELLED]: 'cancelled_at',
};

/**
 * Statuses press staff move orders into
 */
export const PRESS_TARGET_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.SCHEDULED_FOR_PICKUP,
  ORDER_STATUS.PROCESSING,
  ORDER_STATUS.READY,
];

export const allowedNextStatuses = (from: OrderStatus): readonly OrderStatus[] => ORDER_TRANSITIONS[from];

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean =>
  ORDER_TRANSITIONS[from].includes(to);

export const isTerminalStatus = (status: OrderStatus): boolean => TERMINAL_ORDER_STATUSES.includes(status);

/**
 * Whether `status` is at or past `milestone` on the main line of the workflow.
 * Terminal statuses count as past every milestone.
 */
export const hasReached = (status: OrderStatus, milestone: OrderStatus): boolean =>
  ORDER_STATUS_SEQUENCE.indexOf(status) >= ORDER_STATUS_SEQUENCE.indexOf(milestone);

/**
 * Field changes that accepting `order -> to` by `actor` produces, excluding totals.
 * Existing timestamps, assignees and cancellation reasons are never overwritten.
 */
export const planTransition = (
  order: Order,
  to: OrderStatus,
  actor: Actor,
  notes: string,
  now: Date
): OrderChanges => {
  const changes: OrderChanges = { status: to };

  const timestampField = LIFECYCLE_TIMESTAMPS[to];
  if (timestampField && order[timestampField] === null) {
    changes[timestampField] = now;
  }

  if (PRESS_TARGET_STATUSES.includes(to) && actor.role === USER_ROLE.PRESS && order.assigned_staff_id === null) {
    changes.assigned_staff_id = actor.id;
  }

  if (to === ORDER_STATUS.OUT_FOR_PICKUP && actor.role === USER_ROLE.DELIVERY && order.delivery_person_id === null) {
    changes.delivery_person_id = actor.id;
  }

  if (to === ORDER_STATUS.CANCELLED && !order.cancellation_reason && notes.trim() !== '') {
    changes.cancellation_reason = notes.trim();
  }

  return changes;
};
