import {
  DELIVERY_TYPE,
  DeliveryType,
  EDITABLE_ORDER_STATUSES,
  ORDER_STATUS,
  OrderStatus,
  PaymentStatus,
  USER_ROLE,
  USER_STATUS,
  UserRole,
  formatOrderNumberDay,
  generateOrderNumber,
} from '../../constants';
import { OrderConfig, orderConfig } from '../../connections/config/app.config';
import { Order, OrderChanges, OrderItem, OrderStatusUpdate } from '../../connections/db/models';
import { Actor } from '../../types/request.types';
import {
  BadRequestError,
  ForbiddenError,
  NotFoundError,
  OrderLockedError,
} from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { CatalogSelection, CatalogService } from '../catalog/catalog.service';
import { UsersRepository } from '../users/users.repository';
import { OrderAuditService } from './order-audit.service';
import { hasReached, isTerminalStatus } from './order-status-machine';
import { OrderWorkflowService } from './order-workflow.service';
import { OrdersRepository, OrdersUnitOfWork } from './orders.repository';
import { CatalogPrice, calculateItemTotal, calculateOrderTotals, totalsDiffer } from './pricing.service';
import { canManageOrder, canViewOrder, isAdmin } from './transition-policy';

export interface OrderItemRequest {
  service_id: number;
  variant_id?: number | null;
  option_ids?: number[];
  quantity: number;
  discount_amount?: number;
  special_instructions?: string | null;
}

export interface DeliveryDetails {
  delivery_type?: DeliveryType;
  pickup_address?: string | null;
  delivery_address?: string | null;
  preferred_pickup_date?: string | null;
  preferred_delivery_date?: string | null;
  special_instructions?: string | null;
}

export interface CreateOrderRequest extends DeliveryDetails {
  status?: typeof ORDER_STATUS.DRAFT | typeof ORDER_STATUS.PENDING;
  items?: OrderItemRequest[];
}

export interface AssignmentRequest {
  assigned_staff_id?: string | null;
  delivery_person_id?: string | null;
}

export interface OrderDetail {
  order: Order;
  items: OrderItem[];
  status_updates: OrderStatusUpdate[];
  allowed_transitions: OrderStatus[];
}

export interface OrdersServiceOptions {
  config?: OrderConfig;
  clock?: () => Date;
}

type PricedItem = { request: OrderItemRequest; price: CatalogPrice };

/**
 * Order content: creation, items, delivery details and the admin corrections.
 * Status changes go through OrderWorkflowService.
 */
export class OrdersService {
  private readonly config: OrderConfig;
  private readonly clock: () => Date;

  constructor(
    private readonly orders: OrdersRepository,
    private readonly catalog: CatalogService,
    private readonly users: UsersRepository,
    private readonly workflow: OrderWorkflowService,
    private readonly audit: OrderAuditService,
    options: OrdersServiceOptions = {}
  ) {
    this.config = options.config ?? orderConfig;
    this.clock = options.clock ?? (() => new Date());
  }

  async createOrder(actor: Actor, input: CreateOrderRequest): Promise<OrderDetail> {
    if (actor.role !== USER_ROLE.CUSTOMER) {
      throw new ForbiddenError('Only customers can place orders');
    }

    const details = this.resolveDeliveryDetails(null, input);
    const priced = await this.priceItems(actor, input.items ?? []);
    const now = this.clock();

    const order = await this.orders.transaction(async (uow) => {
      const sequence = await uow.nextOrderSequence(formatOrderNumberDay(now));
      const created = await uow.insertOrder({
        order_number: generateOrderNumber(now, sequence),
        customer_id: actor.id,
        status: input.status ?? ORDER_STATUS.DRAFT,
        delivery_type: details.delivery_type,
        pickup_address: details.pickup_address,
        delivery_address: details.delivery_address,
        preferred_pickup_date: details.preferred_pickup_date,
        preferred_delivery_date: details.preferred_delivery_date,
        special_instructions: details.special_instructions,
      });

      for (const item of priced) {
        await this.insertPricedItem(uow, created.id, item);
      }

      return this.saveTotals(uow, created, {});
    });

    auditLog('Order created', { orderId: order.id, orderNumber: order.order_number, customerId: actor.id });
    return this.getOrderDetail(actor, order.id);
  }

  /**
   * The order with its items, history and the transitions the actor may apply next
   */
  async getOrderDetail(actor: Actor, orderId: number): Promise<OrderDetail> {
    const order = await this.findVisibleOrder(actor, orderId);
    const [items, statusUpdates] = await Promise.all([
      this.orders.listItems(orderId),
      this.audit.list(orderId),
    ]);

    return {
      order,
      items,
      status_updates: statusUpdates,
      allowed_transitions: this.workflow.allowedTransitions(actor, order),
    };
  }

  async listStatusUpdates(actor: Actor, orderId: number): Promise<OrderStatusUpdate[]> {
    await this.findVisibleOrder(actor, orderId);
    return this.audit.list(orderId);
  }

  async updateDeliveryDetails(actor: Actor, orderId: number, input: DeliveryDetails): Promise<Order> {
    return this.mutateOrder(actor, orderId, 'edit', async (uow, order) => {
      const details = this.resolveDeliveryDetails(order, input);
      return this.saveTotals(uow, order, details);
    });
  }

  /**
   * Drafts are the only orders ever physically removed
   */
  async deleteDraft(actor: Actor, orderId: number): Promise<void> {
    await this.orders.transaction(async (uow) => {
      const order = await this.lockManagedOrder(uow, actor, orderId);
      if (order.status !== ORDER_STATUS.DRAFT) {
        throw new OrderLockedError(order.status, 'delete');
      }
      await uow.deleteOrder(orderId);
    });

    auditLog('Draft order deleted', { orderId, actorId: actor.id });
  }

  async addItem(actor: Actor, orderId: number, input: OrderItemRequest): Promise<OrderDetail> {
    const existing = await this.orders.findById(orderId);
    if (!existing) {
      throw new NotFoundError(`Order ${orderId} not found`);
    }
    if (!canManageOrder(actor, existing)) {
      throw new ForbiddenError('You cannot change this order');
    }

    const [item] = await this.priceItems(actor, [input]);

    await this.mutateOrder(actor, orderId, 'add items to', async (uow, order) => {
      await this.insertPricedItem(uow, orderId, item);
      return this.saveTotals(uow, order, {});
    });

    return this.getOrderDetail(actor, orderId);
  }

  async removeItem(actor: Actor, orderId: number, itemId: number): Promise<OrderDetail> {
    await this.mutateOrder(actor, orderId, 'remove items from', async (uow, order) => {
      const removed = await uow.deleteItem(orderId, itemId);
      if (!removed) {
        throw new NotFoundError(`Item ${itemId} not found on order ${orderId}`);
      }
      return this.saveTotals(uow, order, {});
    });

    return this.getOrderDetail(actor, orderId);
  }

  async setPaymentStatus(actor: Actor, orderId: number, paymentStatus: PaymentStatus): Promise<Order> {
    this.assertAdmin(actor);

    const order = await this.orders.transaction(async (uow) => {
      const current = await this.lockOrder(uow, orderId);
      return uow.updateOrder(orderId, current.version, { payment_status: paymentStatus });
    });

    auditLog('Payment status changed', { orderId, paymentStatus, actorId: actor.id });
    return order;
  }

  async setDiscount(actor: Actor, orderId: number, discountAmount: number): Promise<Order> {
    this.assertAdmin(actor);

    const order = await this.orders.transaction(async (uow) => {
      const current = await this.lockOrder(uow, orderId);
      if (isTerminalStatus(current.status)) {
        throw new OrderLockedError(current.status, 'discount');
      }
      return this.saveTotals(uow, current, { discount_amount: discountAmount });
    });

    auditLog('Order discount changed', { orderId, discountAmount, actorId: actor.id });
    return order;
  }

  /**
   * Press staff may be assigned from confirmation on, a delivery person from scheduling on
   */
  async assign(actor: Actor, orderId: number, input: AssignmentRequest): Promise<Order> {
    this.assertAdmin(actor);

    if (input.assigned_staff_id) {
      await this.assertAssignable(input.assigned_staff_id, USER_ROLE.PRESS);
    }
    if (input.delivery_person_id) {
      await this.assertAssignable(input.delivery_person_id, USER_ROLE.DELIVERY);
    }

    const order = await this.orders.transaction(async (uow) => {
      const current = await this.lockOrder(uow, orderId);
      if (isTerminalStatus(current.status)) {
        throw new OrderLockedError(current.status, 'reassign');
      }

      const changes: OrderChanges = {};
      if (input.assigned_staff_id !== undefined) {
        if (input.assigned_staff_id !== null && !hasReached(current.status, ORDER_STATUS.CONFIRMED)) {
          throw new BadRequestError('Press staff can only be assigned once the order is confirmed', {
            status: current.status,
          });
        }
        changes.assigned_staff_id = input.assigned_staff_id;
      }
      if (input.delivery_person_id !== undefined) {
        if (input.delivery_person_id !== null && !hasReached(current.status, ORDER_STATUS.SCHEDULED_FOR_PICKUP)) {
          throw new BadRequestError('A delivery person can only be assigned once pickup is scheduled', {
            status: current.status,
          });
        }
        changes.delivery_person_id = input.delivery_person_id;
      }

      return uow.updateOrder(orderId, current.version, changes);
    });

    auditLog('Order assignment changed', { orderId, ...input, actorId: actor.id });
    return order;
  }

  /**
   * Re-reads current catalog prices for every item and recomputes the totals
   */
  async reprice(actor: Actor, orderId: number): Promise<OrderDetail> {
    this.assertAdmin(actor);

    const items = await this.orders.listItems(orderId);
    const prices = new Map<number, CatalogPrice>();
    for (const item of items) {
      prices.set(
        item.id,
        await this.catalog.price(this.selectionOf(item), { includeInactive: true })
      );
    }

    await this.orders.transaction(async (uow) => {
      const current = await this.lockOrder(uow, orderId);
      if (!EDITABLE_ORDER_STATUSES.includes(current.status)) {
        throw new OrderLockedError(current.status, 'reprice');
      }

      for (const item of await uow.listItems(orderId)) {
        const price = prices.get(item.id);
        if (!price) {
          continue;
        }
        await uow.updateItemPricing(item.id, {
          ...price,
          total_price: calculateItemTotal({ ...price, quantity: item.quantity, discount_amount: item.discount_amount }),
        });
      }

      return this.saveTotals(uow, current, {});
    });

    auditLog('Order repriced', { orderId, actorId: actor.id, items: items.length });
    return this.getOrderDetail(actor, orderId);
  }

  private async findVisibleOrder(actor: Actor, orderId: number): Promise<Order> {
    const order = await this.orders.findById(orderId);
    if (!order) {
      throw new NotFoundError(`Order ${orderId} not found`);
    }
    if (!canViewOrder(actor, order)) {
      throw new ForbiddenError('You cannot view this order');
    }
    return order;
  }

  private async lockOrder(uow: OrdersUnitOfWork, orderId: number): Promise<Order> {
    const order = await uow.lockOrder(orderId);
    if (!order) {
      throw new NotFoundError(`Order ${orderId} not found`);
    }
    return order;
  }

  private async lockManagedOrder(uow: OrdersUnitOfWork, actor: Actor, orderId: number): Promise<Order> {
    const order = await this.lockOrder(uow, orderId);
    if (!canManageOrder(actor, order)) {
      throw new ForbiddenError('You cannot change this order');
    }
    return order;
  }

  /**
   * Locks an order the actor manages and runs `work` while it is still editable
   */
  private mutateOrder(
    actor: Actor,
    orderId: number,
    action: string,
    work: (uow: OrdersUnitOfWork, order: Order) => Promise<Order>
  ): Promise<Order> {
    return this.orders.transaction(async (uow) => {
      const order = await this.lockManagedOrder(uow, actor, orderId);
      if (!EDITABLE_ORDER_STATUSES.includes(order.status)) {
        throw new OrderLockedError(order.status, action);
      }
      return work(uow, order);
    });
  }

  /**
   * Writes `changes` and, when they differ from what is stored, the totals recomputed from the current items
   */
  private async saveTotals(uow: OrdersUnitOfWork, order: Order, changes: OrderChanges): Promise<Order> {
    const items = await uow.listItems(order.id);
    const totals = calculateOrderTotals(
      {
        items,
        delivery_type: changes.delivery_type ?? order.delivery_type,
        discount_amount: changes.discount_amount ?? order.discount_amount,
      },
      this.config
    );

    const next: OrderChanges = totalsDiffer(order, totals) ? { ...changes, ...totals } : changes;
    if (Object.keys(next).length === 0) {
      return order;
    }
    return uow.updateOrder(order.id, order.version, next);
  }

  private async priceItems(actor: Actor, requests: readonly OrderItemRequest[]): Promise<PricedItem[]> {
    const priced: PricedItem[] = [];
    for (const request of requests) {
      if ((request.discount_amount ?? 0) > 0 && !isAdmin(actor)) {
        throw new ForbiddenError('Only admins can discount items');
      }
      priced.push({ request, price: await this.catalog.price(this.selectionOf(request)) });
    }
    return priced;
  }

  private insertPricedItem(uow: OrdersUnitOfWork, orderId: number, { request, price }: PricedItem): Promise<OrderItem> {
    const discountAmount = request.discount_amount ?? 0;
    return uow.insertItem({
      order_id: orderId,
      service_id: request.service_id,
      variant_id: request.variant_id ?? null,
      option_ids: [...new Set(request.option_ids ?? [])],
      name: price.name,
      quantity: request.quantity,
      unit_price: price.unit_price,
      options_total: price.options_total,
      discount_amount: discountAmount,
      total_price: calculateItemTotal({ ...price, quantity: request.quantity, discount_amount: discountAmount }),
      special_instructions: request.special_instructions ?? null,
    });
  }

  private selectionOf(item: Pick<OrderItem, 'service_id'> & { variant_id?: number | null; option_ids?: number[] }): CatalogSelection {
    return {
      serviceId: item.service_id,
      variantId: item.variant_id ?? null,
      optionIds: item.option_ids ?? [],
    };
  }

  /**
   * Merges `input` over the stored details and checks the result is deliverable
   */
  private resolveDeliveryDetails(order: Order | null, input: DeliveryDetails): Required<DeliveryDetails> {
    const keep = (value: string | null | undefined, stored: string | null | undefined): string | null =>
      value !== undefined ? value : stored ?? null;

    const details: Required<DeliveryDetails> = {
      delivery_type: input.delivery_type ?? order?.delivery_type ?? DELIVERY_TYPE.PICKUP,
      pickup_address: keep(input.pickup_address, order?.pickup_address),
      delivery_address: keep(input.delivery_address, order?.delivery_address),
      preferred_pickup_date: keep(input.preferred_pickup_date, order?.preferred_pickup_date),
      preferred_delivery_date: keep(input.preferred_delivery_date, order?.preferred_delivery_date),
      special_instructions: keep(input.special_instructions, order?.special_instructions),
    };

    if (details.delivery_type === DELIVERY_TYPE.DELIVERY && !details.delivery_address) {
      throw new BadRequestError('A delivery address is required for delivery orders');
    }

    // ISO dates compare lexically
    if (
      details.preferred_pickup_date &&
      details.preferred_delivery_date &&
      details.preferred_delivery_date <= details.preferred_pickup_date
    ) {
      throw new BadRequestError('Delivery date must be after pickup date', {
        preferred_pickup_date: details.preferred_pickup_date,
        preferred_delivery_date: details.preferred_delivery_date,
      });
    }

    return details;
  }

  private assertAdmin(actor: Actor): void {
    if (!isAdmin(actor)) {
      throw new ForbiddenError('Admin access required');
    }
  }

  private async assertAssignable(userId: string, role: UserRole): Promise<void> {
    const user = await this.users.findById(userId);
    if (!user || user.role !== role || user.status !== USER_STATUS.ACTIVE) {
      throw new BadRequestError(`User ${userId} is not an active ${role} user`, { userId, role });
    }
  }
}
