import { ORDER_BUCKET, ORDER_BUCKET_STATUSES, ORDER_STATUS, OrderBucket, OrderStatus, USER_ROLE, UserRole } from '../../constants';
import { Order } from '../../connections/db/models';
import { Actor } from '../../types/request.types';
import { Page } from '../../types/response.types';
import { ForbiddenError } from '../../utils/errors';
import { OrdersRepository, StaffPerformanceRow } from '../orders/orders.repository';
import { isAdmin } from '../orders/transition-policy';
import { QueueDefinition, adminQueue, customerQueue, deliveryQueue, pressQueue } from './dashboard.queries';

export interface PageRequest {
  page: number;
  limit: number;
}

export interface CustomerQueueRequest extends PageRequest {
  bucket?: OrderBucket;
  // Admins only: narrow to one customer
  customerId?: string;
}

export type OrderCounts = Record<OrderBucket, number> & {
  draft: number;
  failed: number;
  total: number;
};

export interface AdminOverview {
  orders: Page<Order>;
  counts: OrderCounts;
  staff_performance: StaffPerformanceRow[];
}

export const STAFF_PERFORMANCE_LIMIT = 5;

/**
 * Read-only work queues per role
 */
export class DashboardService {
  constructor(private readonly orders: OrdersRepository) {}

  async customerQueue(actor: Actor, request: CustomerQueueRequest): Promise<Page<Order>> {
    if (isAdmin(actor)) {
      return this.list(customerQueue(request.customerId ?? null, request.bucket), request);
    }
    this.assertRole(actor, USER_ROLE.CUSTOMER);
    return this.list(customerQueue(actor.id, request.bucket), request);
  }

  async pressQueue(actor: Actor, request: PageRequest): Promise<Page<Order>> {
    this.assertRole(actor, USER_ROLE.PRESS);
    return this.list(pressQueue(), request);
  }

  async deliveryQueue(actor: Actor, request: PageRequest): Promise<Page<Order>> {
    this.assertRole(actor, USER_ROLE.DELIVERY);
    return this.list(deliveryQueue(actor.id), request);
  }

  async adminOverview(actor: Actor, request: PageRequest): Promise<AdminOverview> {
    this.assertRole(actor, USER_ROLE.ADMIN);

    const [orders, byStatus, staffPerformance] = await Promise.all([
      this.list(adminQueue(), request),
      this.orders.countByStatus(),
      this.orders.staffPerformance(STAFF_PERFORMANCE_LIMIT),
    ]);

    const count = (statuses: readonly OrderStatus[]) =>
      statuses.reduce((sum, status) => sum + (byStatus[status] ?? 0), 0);

    const counts: OrderCounts = {
      [ORDER_BUCKET.PENDING]: count(ORDER_BUCKET_STATUSES[ORDER_BUCKET.PENDING]),
      [ORDER_BUCKET.IN_PROGRESS]: count(ORDER_BUCKET_STATUSES[ORDER_BUCKET.IN_PROGRESS]),
      [ORDER_BUCKET.READY]: count(ORDER_BUCKET_STATUSES[ORDER_BUCKET.READY]),
      [ORDER_BUCKET.DONE]: count(ORDER_BUCKET_STATUSES[ORDER_BUCKET.DONE]),
      draft: byStatus[ORDER_STATUS.DRAFT] ?? 0,
      failed: byStatus[ORDER_STATUS.FAILED] ?? 0,
      total: Object.values(byStatus).reduce<number>((sum, value) => sum + (value ?? 0), 0),
    };

    return { orders, counts, staff_performance: staffPerformance };
  }

  /**
   * The queue GET /orders shows: whatever the actor's role works from
   */
  async queueFor(actor: Actor, request: CustomerQueueRequest): Promise<Page<Order>> {
    if (isAdmin(actor)) {
      return this.list(request.bucket ? customerQueue(null, request.bucket) : adminQueue(), request);
    }

    switch (actor.role) {
      case USER_ROLE.PRESS:
        return this.pressQueue(actor, request);
      case USER_ROLE.DELIVERY:
        return this.deliveryQueue(actor, request);
      default:
        return this.customerQueue(actor, request);
    }
  }

  private list(queue: QueueDefinition, { page, limit }: PageRequest): Promise<Page<Order>> {
    return this.orders.listOrders({ ...queue, page, limit });
  }

  private assertRole(actor: Actor, role: UserRole): void {
    if (!isAdmin(actor) && actor.role !== role) {
      throw new ForbiddenError(`The ${role} dashboard is not available to ${actor.role} users`);
    }
  }
}
