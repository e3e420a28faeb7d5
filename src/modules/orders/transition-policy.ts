import { ORDER_STATUS, OrderStatus, USER_ROLE } from '../../constants';
import { Order } from '../../connections/db/models';
import { Actor } from '../../types/request.types';
import { PRESS_TARGET_STATUSES, allowedNextStatuses } from './order-status-machine';

export { PRESS_TARGET_STATUSES };

type PolicyOrder = Pick<Order, 'status' | 'customer_id' | 'assigned_staff_id' | 'delivery_person_id'>;

const CUSTOMER_CANCELLABLE: readonly OrderStatus[] = [ORDER_STATUS.DRAFT, ORDER_STATUS.PENDING, ORDER_STATUS.CONFIRMED];
const CUSTOMER_CONFIRMABLE: readonly OrderStatus[] = [ORDER_STATUS.DRAFT, ORDER_STATUS.PENDING];

export const DELIVERY_TARGET_STATUSES: readonly OrderStatus[] = [
  ORDER_STATUS.OUT_FOR_PICKUP,
  ORDER_STATUS.PICKED_UP,
  ORDER_STATUS.OUT_FOR_DELIVERY,
  ORDER_STATUS.COMPLETED,
];

export const isAdmin = (actor: Actor): boolean => actor.is_superuser || actor.role === USER_ROLE.ADMIN;

/**
 * Whether `actor` may move `order` into `requested`. Reachability is checked separately by the state machine.
 */
export const mayTransition = (actor: Actor, order: PolicyOrder, requested: OrderStatus): boolean => {
  if (isAdmin(actor)) {
    return true;
  }

  switch (actor.role) {
    case USER_ROLE.CUSTOMER:
      if (order.customer_id !== actor.id) {
        return false;
      }
      return (
        (requested === ORDER_STATUS.CANCELLED && CUSTOMER_CANCELLABLE.includes(order.status)) ||
        (requested === ORDER_STATUS.CONFIRMED && CUSTOMER_CONFIRMABLE.includes(order.status))
      );

    case USER_ROLE.PRESS:
      // An unassigned order is claimed by the first press actor to act on it, see planTransition
      return (
        PRESS_TARGET_STATUSES.includes(requested) &&
        (order.assigned_staff_id === actor.id || order.assigned_staff_id === null)
      );

    case USER_ROLE.DELIVERY:
      // Only a pickup may be claimed; every later step belongs to the claimant
      return (
        DELIVERY_TARGET_STATUSES.includes(requested) &&
        (order.delivery_person_id === actor.id ||
          (order.delivery_person_id === null && requested === ORDER_STATUS.OUT_FOR_PICKUP))
      );

    default:
      return false;
  }
};

/**
 * Statuses the actor can move the order into right now
 */
export const allowedTransitionsFor = (actor: Actor, order: PolicyOrder): OrderStatus[] =>
  allowedNextStatuses(order.status).filter((status) => mayTransition(actor, order, status));

/**
 * Customers see their own orders; staff roles and admins see any order
 */
export const canViewOrder = (actor: Actor, order: Pick<Order, 'customer_id'>): boolean =>
  isAdmin(actor) || actor.role !== USER_ROLE.CUSTOMER || order.customer_id === actor.id;

/**
 * Editing items, delivery details and deleting drafts: the owning customer or an admin
 */
export const canManageOrder = (actor: Actor, order: Pick<Order, 'customer_id'>): boolean =>
  isAdmin(actor) || (actor.role === USER_ROLE.CUSTOMER && order.customer_id === actor.id);
