import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_items (
        id SERIAL PRIMARY KEY,
        order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        service_id INTEGER NOT NULL REFERENCES services(id) ON DELETE RESTRICT,
        variant_id INTEGER REFERENCES service_variants(id) ON DELETE RESTRICT,
        option_ids INTEGER[] NOT NULL DEFAULT '{}',
        name VARCHAR(200) NOT NULL,
        quantity INTEGER NOT NULL CHECK (quantity >= 1),
        unit_price DECIMAL(10, 2) NOT NULL CHECK (unit_price >= 0),
        options_total DECIMAL(10, 2) NOT NULL DEFAULT 0,
        discount_amount DECIMAL(10, 2) NOT NULL DEFAULT 0 CHECK (discount_amount >= 0),
        total_price DECIMAL(10, 2) NOT NULL CHECK (total_price >= 0),
        special_instructions TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_order_items_order');
    await client.query('DROP TABLE IF EXISTS order_items CASCADE');
  },
};
