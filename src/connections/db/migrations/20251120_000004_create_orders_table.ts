import { PoolClient } from 'pg';
import { Migration } from './types';

const ORDER_STATUS_CHECK = `'draft', 'pending', 'confirmed', 'scheduled_for_pickup', 'out_for_pickup',
  'picked_up', 'processing', 'ready', 'out_for_delivery', 'completed', 'cancelled', 'refunded', 'failed'`;

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        order_number VARCHAR(20) UNIQUE NOT NULL,
        customer_id UUID NOT NULL REFERENCES users(id) ON DELETE RESTRICT,
        status VARCHAR(30) NOT NULL DEFAULT 'draft' CHECK (status IN (${ORDER_STATUS_CHECK})),
        payment_status VARCHAR(30) NOT NULL DEFAULT 'pending',
        -- Delivery
        delivery_type VARCHAR(10) NOT NULL DEFAULT 'pickup' CHECK (delivery_type IN ('pickup', 'delivery')),
        pickup_address TEXT,
        delivery_address TEXT,
        preferred_pickup_date DATE,
        preferred_delivery_date DATE,
        -- Totals
        subtotal DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (subtotal >= 0),
        tax_amount DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (tax_amount >= 0),
        shipping_cost DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (shipping_cost >= 0),
        discount_amount DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (discount_amount >= 0),
        total_amount DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (total_amount >= 0),
        -- Assignment
        assigned_staff_id UUID REFERENCES users(id) ON DELETE SET NULL,
        delivery_person_id UUID REFERENCES users(id) ON DELETE SET NULL,
        -- Lifecycle timestamps
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        confirmed_at TIMESTAMPTZ,
        scheduled_at TIMESTAMPTZ,
        out_for_pickup_at TIMESTAMPTZ,
        picked_up_at TIMESTAMPTZ,
        processing_started_at TIMESTAMPTZ,
        ready_at TIMESTAMPTZ,
        out_for_delivery_at TIMESTAMPTZ,
        completed_at TIMESTAMPTZ,
        cancelled_at TIMESTAMPTZ,
        cancellation_reason TEXT,
        special_instructions TEXT,
        internal_notes TEXT,
        version INTEGER NOT NULL DEFAULT 1
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_customer ON orders(customer_id, created_at DESC)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_status ON orders(status, created_at)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_assigned_staff ON orders(assigned_staff_id) WHERE assigned_staff_id IS NOT NULL
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_delivery_person ON orders(delivery_person_id) WHERE delivery_person_id IS NOT NULL
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_delivery_person');
    await client.query('DROP INDEX IF EXISTS idx_orders_assigned_staff');
    await client.query('DROP INDEX IF EXISTS idx_orders_status');
    await client.query('DROP INDEX IF EXISTS idx_orders_customer');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
