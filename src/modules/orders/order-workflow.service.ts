import { ORDER_STATUS, OrderStatus, PAYMENT_STATUS } from '../../constants';
import { OrderConfig, orderConfig } from '../../connections/config/app.config';
import { Order, OrderStatusUpdate } from '../../connections/db/models';
import { Actor } from '../../types/request.types';
import {
  ConcurrentModificationError,
  InvalidTransitionError,
  NotFoundError,
  UnauthorizedTransitionError,
} from '../../utils/errors';
import { logger, toError } from '../../utils/logging';
import { NotificationDispatcher } from '../notifications/notification.dispatcher';
import { OrderAuditService } from './order-audit.service';
import { canTransition, isTerminalStatus, planTransition } from './order-status-machine';
import { OrdersRepository } from './orders.repository';
import { calculateOrderTotals, totalsDiffer } from './pricing.service';
import { allowedTransitionsFor, mayTransition } from './transition-policy';

export interface TransitionResult {
  order: Order;
  statusUpdate: OrderStatusUpdate;
}

export interface OrderWorkflowOptions {
  config?: OrderConfig;
  clock?: () => Date;
}

/**
 * The only path through which an order's status changes
 */
export class OrderWorkflowService {
  private readonly config: OrderConfig;
  private readonly clock: () => Date;

  constructor(
    private readonly orders: OrdersRepository,
    private readonly audit: OrderAuditService,
    private readonly notifications: NotificationDispatcher,
    options: OrderWorkflowOptions = {}
  ) {
    this.config = options.config ?? orderConfig;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validates against a snapshot, then locks the row and writes the new status, side effects
   * and audit record in one transaction. A write that finds the row changed since the
   * snapshot fails with ConcurrentModificationError.
   */
  async applyTransition(orderId: number, requested: OrderStatus, actor: Actor, notes: string = ''): Promise<TransitionResult> {
    const snapshot = await this.orders.findById(orderId);
    if (!snapshot) {
      throw new NotFoundError(`Order ${orderId} not found`);
    }

    this.assertTransition(snapshot, requested, actor);

    const now = this.clock();
    const result = await this.orders.transaction(async (uow) => {
      const current = await uow.lockOrder(orderId);
      if (!current) {
        throw new NotFoundError(`Order ${orderId} not found`);
      }
      if (current.version !== snapshot.version) {
        throw new ConcurrentModificationError(orderId);
      }

      let changes = planTransition(current, requested, actor, notes, now);

      const items = await uow.listItems(orderId);
      const totals = calculateOrderTotals(
        { items, delivery_type: current.delivery_type, discount_amount: current.discount_amount },
        this.config
      );
      if (totalsDiffer(current, totals)) {
        changes = { ...changes, ...totals };
      }

      const order = await uow.updateOrder(orderId, current.version, changes);
      const statusUpdate = await this.audit.record(uow, {
        order_id: orderId,
        from_status: current.status,
        to_status: requested,
        changed_by: actor.id,
        notes: notes.trim(),
        timestamp: now,
      });

      return { order, statusUpdate };
    });

    this.audit.logCommitted(result.statusUpdate);
    this.dispatch(result);

    return result;
  }

  /**
   * applyTransition, re-run once from a fresh read when it lost a race
   */
  async transitionWithRetry(orderId: number, requested: OrderStatus, actor: Actor, notes: string = ''): Promise<TransitionResult> {
    try {
      return await this.applyTransition(orderId, requested, actor, notes);
    } catch (error) {
      if (!(error instanceof ConcurrentModificationError)) {
        throw error;
      }
      logger.warn('Order changed during transition, retrying', { orderId, requested, actorId: actor.id });
      return this.applyTransition(orderId, requested, actor, notes);
    }
  }

  /**
   * Statuses `actor` could move `order` into right now
   */
  allowedTransitions(actor: Actor, order: Order): OrderStatus[] {
    return allowedTransitionsFor(actor, order).filter((status) => !this.paymentBlocks(order, status));
  }

  private assertTransition(order: Order, requested: OrderStatus, actor: Actor): void {
    if (!canTransition(order.status, requested)) {
      const message = isTerminalStatus(order.status)
        ? `Order is ${order.status} and can no longer change status`
        : undefined;
      throw new InvalidTransitionError(order.status, requested, message);
    }

    if (!mayTransition(actor, order, requested)) {
      throw new UnauthorizedTransitionError(order.status, requested);
    }

    if (this.paymentBlocks(order, requested)) {
      throw new InvalidTransitionError(
        order.status,
        requested,
        'Order must be paid before it can be confirmed',
        'PAYMENT_REQUIRED'
      );
    }
  }

  private paymentBlocks(order: Order, requested: OrderStatus): boolean {
    return (
      requested === ORDER_STATUS.CONFIRMED &&
      this.config.requirePaymentForConfirmation &&
      order.payment_status !== PAYMENT_STATUS.PAID
    );
  }

  private dispatch({ order, statusUpdate }: TransitionResult): void {
    const onFailure = (error: unknown) => {
      const cause = toError(error);
      logger.error('Order status notification failed', {
        orderId: order.id,
        to: statusUpdate.to_status,
        error: cause.message,
        stack: cause.stack,
      });
    };

    try {
      const pending = this.notifications.orderStatusChanged({ order, statusUpdate });
      if (pending instanceof Promise) {
        pending.catch(onFailure);
      }
    } catch (error) {
      onFailure(error);
    }
  }
}
