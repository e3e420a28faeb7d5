import { Pool, PoolClient } from 'pg';
import { ORDER_STATUS, ORDER_STATUS_SEQUENCE, OrderStatus, isOrderStatus } from '../../constants';
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
import { ConcurrentModificationError, PersistenceFailureError, isAppError } from '../../utils/errors';
import { logger, toError } from '../../utils/logging';
import { Page } from '../../types/response.types';
import {
  OrderCriteria,
  OrderListQuery,
  OrdersRepository,
  OrdersUnitOfWork,
  StaffPerformanceRow,
} from './orders.repository';

// DATE columns come back as text so they are not shifted by the server timezone
const ORDER_COLUMNS = `
  id, order_number, customer_id, status, payment_status, delivery_type,
  pickup_address, delivery_address,
  preferred_pickup_date::text AS preferred_pickup_date,
  preferred_delivery_date::text AS preferred_delivery_date,
  subtotal, tax_amount, shipping_cost, discount_amount, total_amount,
  assigned_staff_id, delivery_person_id,
  created_at, updated_at, confirmed_at, scheduled_at, out_for_pickup_at, picked_up_at,
  processing_started_at, ready_at, out_for_delivery_at, completed_at, cancelled_at,
  cancellation_reason, special_instructions, internal_notes, version
`;

const ITEM_COLUMNS = `
  id, order_id, service_id, variant_id, option_ids, name, quantity,
  unit_price, options_total, discount_amount, total_price, special_instructions,
  created_at, updated_at
`;

const STATUS_UPDATE_COLUMNS = 'id, order_id, from_status, to_status, changed_by, notes, timestamp';

// DECIMAL columns arrive as strings
type Decimal = string;

type OrderRow = Omit<Order, 'subtotal' | 'tax_amount' | 'shipping_cost' | 'discount_amount' | 'total_amount'> & {
  subtotal: Decimal;
  tax_amount: Decimal;
  shipping_cost: Decimal;
  discount_amount: Decimal;
  total_amount: Decimal;
};

type OrderItemRow = Omit<OrderItem, 'unit_price' | 'options_total' | 'discount_amount' | 'total_price'> & {
  unit_price: Decimal;
  options_total: Decimal;
  discount_amount: Decimal;
  total_price: Decimal;
};

type StaffPerformanceDbRow = {
  staff_id: string;
  staff_email: string | null;
  staff_name: string | null;
  completed_orders: number;
  avg_completion_seconds: number;
};

const toOrder = (row: OrderRow): Order => ({
  ...row,
  subtotal: parseFloat(row.subtotal),
  tax_amount: parseFloat(row.tax_amount),
  shipping_cost: parseFloat(row.shipping_cost),
  discount_amount: parseFloat(row.discount_amount),
  total_amount: parseFloat(row.total_amount),
});

const toOrderItem = (row: OrderItemRow): OrderItem => ({
  ...row,
  unit_price: parseFloat(row.unit_price),
  options_total: parseFloat(row.options_total),
  discount_amount: parseFloat(row.discount_amount),
  total_price: parseFloat(row.total_price),
});

/**
 * Columns an OrderChanges object may write, in the order they appear in the SET clause
 */
const ORDER_UPDATABLE_COLUMNS = [
  'status',
  'payment_status',
  'delivery_type',
  'pickup_address',
  'delivery_address',
  'preferred_pickup_date',
  'preferred_delivery_date',
  'assigned_staff_id',
  'delivery_person_id',
  'cancellation_reason',
  'special_instructions',
  'internal_notes',
  'confirmed_at',
  'scheduled_at',
  'out_for_pickup_at',
  'picked_up_at',
  'processing_started_at',
  'ready_at',
  'out_for_delivery_at',
  'completed_at',
  'cancelled_at',
  'subtotal',
  'tax_amount',
  'shipping_cost',
  'discount_amount',
  'total_amount',
] as const satisfies ReadonlyArray<keyof OrderChanges>;

const criteriaClause = (criteria: OrderCriteria, params: unknown[]): string => {
  const conditions: string[] = [];

  if (criteria.statuses !== undefined) {
    params.push([...criteria.statuses]);
    conditions.push(`status = ANY($${params.length}::text[])`);
  }
  if (criteria.customerId !== undefined) {
    params.push(criteria.customerId);
    conditions.push(`customer_id = $${params.length}`);
  }
  if (criteria.assignedStaffId !== undefined) {
    params.push(criteria.assignedStaffId);
    conditions.push(`assigned_staff_id = $${params.length}`);
  }
  if (criteria.deliveryPersonId !== undefined) {
    params.push(criteria.deliveryPersonId);
    conditions.push(`delivery_person_id = $${params.length}`);
  }

  return conditions.length > 0 ? `(${conditions.join(' AND ')})` : 'TRUE';
};

/**
 * WHERE clause for a disjunction of criteria; parameters are appended to `params`
 */
export const buildOrderFilter = (anyOf: readonly OrderCriteria[], params: unknown[]): string => {
  if (anyOf.length === 0) {
    return 'TRUE';
  }
  return anyOf.map((criteria) => criteriaClause(criteria, params)).join(' OR ');
};

/**
 * Store failures other than our own domain errors surface as PersistenceFailure
 */
const wrapStoreError = (error: unknown, operation: string): Error => {
  if (isAppError(error)) {
    return error;
  }
  const cause = toError(error);
  logger.error(`Order store failure during ${operation}`, { error: cause.message, stack: cause.stack });
  return new PersistenceFailureError(undefined, cause);
};

class PgOrdersUnitOfWork implements OrdersUnitOfWork {
  constructor(private readonly client: PoolClient) {}

  async lockOrder(orderId: number): Promise<Order | null> {
    const result = await this.client.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1 FOR UPDATE`,
      [orderId]
    );
    return result.rows.length > 0 ? toOrder(result.rows[0]) : null;
  }

  async listItems(orderId: number): Promise<OrderItem[]> {
    const result = await this.client.query<OrderItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM order_items WHERE order_id = $1 ORDER BY id ASC`,
      [orderId]
    );
    return result.rows.map(toOrderItem);
  }

  async nextOrderSequence(day: string): Promise<number> {
    const result = await this.client.query<{ last_value: number }>(
      `INSERT INTO order_number_counters (day, last_value)
       VALUES ($1, 1)
       ON CONFLICT (day) DO UPDATE SET last_value = order_number_counters.last_value + 1
       RETURNING last_value`,
      [day]
    );
    return result.rows[0].last_value;
  }

  async insertOrder(input: CreateOrderInput): Promise<Order> {
    const result = await this.client.query<OrderRow>(
      `INSERT INTO orders (order_number, customer_id, status, delivery_type, pickup_address, delivery_address,
         preferred_pickup_date, preferred_delivery_date, special_instructions)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${ORDER_COLUMNS}`,
      [
        input.order_number,
        input.customer_id,
        input.status,
        input.delivery_type,
        input.pickup_address ?? null,
        input.delivery_address ?? null,
        input.preferred_pickup_date ?? null,
        input.preferred_delivery_date ?? null,
        input.special_instructions ?? null,
      ]
    );
    return toOrder(result.rows[0]);
  }

  async updateOrder(orderId: number, expectedVersion: number, changes: OrderChanges): Promise<Order> {
    const params: unknown[] = [orderId, expectedVersion];
    const assignments: string[] = [];

    for (const column of ORDER_UPDATABLE_COLUMNS) {
      const value = changes[column];
      if (value !== undefined) {
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    const result = await this.client.query<OrderRow>(
      `UPDATE orders
       SET ${[...assignments, 'version = version + 1', 'updated_at = CURRENT_TIMESTAMP'].join(', ')}
       WHERE id = $1 AND version = $2
       RETURNING ${ORDER_COLUMNS}`,
      params
    );

    if (result.rows.length === 0) {
      throw new ConcurrentModificationError(orderId);
    }
    return toOrder(result.rows[0]);
  }

  async deleteOrder(orderId: number): Promise<void> {
    await this.client.query('DELETE FROM orders WHERE id = $1', [orderId]);
  }

  async insertItem(input: CreateOrderItemInput): Promise<OrderItem> {
    const result = await this.client.query<OrderItemRow>(
      `INSERT INTO order_items (order_id, service_id, variant_id, option_ids, name, quantity,
         unit_price, options_total, discount_amount, total_price, special_instructions)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       RETURNING ${ITEM_COLUMNS}`,
      [
        input.order_id,
        input.service_id,
        input.variant_id ?? null,
        input.option_ids,
        input.name,
        input.quantity,
        input.unit_price,
        input.options_total,
        input.discount_amount,
        input.total_price,
        input.special_instructions ?? null,
      ]
    );
    return toOrderItem(result.rows[0]);
  }

  async updateItemPricing(itemId: number, pricing: OrderItemPricing): Promise<OrderItem> {
    const result = await this.client.query<OrderItemRow>(
      `UPDATE order_items
       SET name = $2, unit_price = $3, options_total = $4, total_price = $5, updated_at = CURRENT_TIMESTAMP
       WHERE id = $1
       RETURNING ${ITEM_COLUMNS}`,
      [itemId, pricing.name, pricing.unit_price, pricing.options_total, pricing.total_price]
    );
    return toOrderItem(result.rows[0]);
  }

  async deleteItem(orderId: number, itemId: number): Promise<boolean> {
    const result = await this.client.query('DELETE FROM order_items WHERE id = $1 AND order_id = $2', [
      itemId,
      orderId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async insertStatusUpdate(input: CreateOrderStatusUpdateInput): Promise<OrderStatusUpdate> {
    const result = await this.client.query<OrderStatusUpdate>(
      `INSERT INTO order_status_updates (order_id, from_status, to_status, changed_by, notes, timestamp)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${STATUS_UPDATE_COLUMNS}`,
      [input.order_id, input.from_status, input.to_status, input.changed_by, input.notes, input.timestamp]
    );
    return result.rows[0];
  }
}

export class PgOrdersRepository implements OrdersRepository {
  constructor(private readonly pool: Pool) {}

  async findById(orderId: number): Promise<Order | null> {
    try {
      const result = await this.pool.query<OrderRow>(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`, [orderId]);
      return result.rows.length > 0 ? toOrder(result.rows[0]) : null;
    } catch (error) {
      throw wrapStoreError(error, 'findById');
    }
  }

  async listItems(orderId: number): Promise<OrderItem[]> {
    try {
      const result = await this.pool.query<OrderItemRow>(
        `SELECT ${ITEM_COLUMNS} FROM order_items WHERE order_id = $1 ORDER BY id ASC`,
        [orderId]
      );
      return result.rows.map(toOrderItem);
    } catch (error) {
      throw wrapStoreError(error, 'listItems');
    }
  }

  async listStatusUpdates(orderId: number): Promise<OrderStatusUpdate[]> {
    try {
      const result = await this.pool.query<OrderStatusUpdate>(
        `SELECT ${STATUS_UPDATE_COLUMNS} FROM order_status_updates
         WHERE order_id = $1
         ORDER BY timestamp DESC, id DESC`,
        [orderId]
      );
      return result.rows;
    } catch (error) {
      throw wrapStoreError(error, 'listStatusUpdates');
    }
  }

  async latestStatusUpdate(orderId: number): Promise<OrderStatusUpdate | null> {
    try {
      const result = await this.pool.query<OrderStatusUpdate>(
        `SELECT ${STATUS_UPDATE_COLUMNS} FROM order_status_updates
         WHERE order_id = $1
         ORDER BY timestamp DESC, id DESC
         LIMIT 1`,
        [orderId]
      );
      return result.rows[0] ?? null;
    } catch (error) {
      throw wrapStoreError(error, 'latestStatusUpdate');
    }
  }

  async listOrders(query: OrderListQuery): Promise<Page<Order>> {
    try {
      const params: unknown[] = [];
      const where = buildOrderFilter(query.anyOf, params);

      const countResult = await this.pool.query<{ total: number }>(
        `SELECT COUNT(*)::int AS total FROM orders WHERE ${where}`,
        params
      );

      const pageParams = [...params];
      let orderBy = 'created_at DESC, id DESC';
      if (query.sort === 'workflow') {
        pageParams.push([...ORDER_STATUS_SEQUENCE]);
        orderBy = `array_position($${pageParams.length}::text[], status::text), created_at ASC, id ASC`;
      }
      pageParams.push(query.limit, (query.page - 1) * query.limit);

      const result = await this.pool.query<OrderRow>(
        `SELECT ${ORDER_COLUMNS} FROM orders
         WHERE ${where}
         ORDER BY ${orderBy}
         LIMIT $${pageParams.length - 1} OFFSET $${pageParams.length}`,
        pageParams
      );

      return {
        rows: result.rows.map(toOrder),
        total: countResult.rows[0].total,
        page: query.page,
        limit: query.limit,
      };
    } catch (error) {
      throw wrapStoreError(error, 'listOrders');
    }
  }

  async countByStatus(): Promise<Partial<Record<OrderStatus, number>>> {
    try {
      const result = await this.pool.query<{ status: string; count: number }>(
        'SELECT status, COUNT(*)::int AS count FROM orders GROUP BY status'
      );
      const counts: Partial<Record<OrderStatus, number>> = {};
      for (const row of result.rows) {
        if (isOrderStatus(row.status)) {
          counts[row.status] = row.count;
        }
      }
      return counts;
    } catch (error) {
      throw wrapStoreError(error, 'countByStatus');
    }
  }

  async staffPerformance(limit: number): Promise<StaffPerformanceRow[]> {
    try {
      const result = await this.pool.query<StaffPerformanceDbRow>(
        `SELECT o.assigned_staff_id AS staff_id,
                u.email AS staff_email,
                u.full_name AS staff_name,
                COUNT(o.id)::int AS completed_orders,
                COALESCE(AVG(EXTRACT(EPOCH FROM (o.completed_at - o.created_at))), 0)::float8 AS avg_completion_seconds
         FROM orders o
         LEFT JOIN users u ON u.id = o.assigned_staff_id
         WHERE o.status = $1 AND o.completed_at IS NOT NULL AND o.assigned_staff_id IS NOT NULL
         GROUP BY o.assigned_staff_id, u.email, u.full_name
         ORDER BY completed_orders DESC, avg_completion_seconds ASC
         LIMIT $2`,
        [ORDER_STATUS.COMPLETED, limit]
      );
      return result.rows;
    } catch (error) {
      throw wrapStoreError(error, 'staffPerformance');
    }
  }

  async transaction<T>(work: (uow: OrdersUnitOfWork) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw wrapStoreError(error, 'connect');
    }

    try {
      await client.query('BEGIN');
      const result = await work(new PgOrdersUnitOfWork(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('Rollback failed', { error: toError(rollbackError).message });
      }
      throw wrapStoreError(error, 'transaction');
    } finally {
      client.release();
    }
  }
}
