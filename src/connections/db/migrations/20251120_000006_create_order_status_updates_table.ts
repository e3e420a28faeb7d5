import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_status_updates (
        id SERIAL PRIMARY KEY,
        order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        from_status VARCHAR(30) NOT NULL,
        to_status VARCHAR(30) NOT NULL,
        changed_by UUID REFERENCES users(id) ON DELETE SET NULL,
        notes TEXT NOT NULL DEFAULT '',
        timestamp TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_order_status_updates_order ON order_status_updates(order_id, timestamp DESC)
    `);

    // Audit rows are append-only
    await client.query(`
      CREATE OR REPLACE FUNCTION reject_order_status_update_change() RETURNS trigger AS $$
      BEGIN
        RAISE EXCEPTION 'order_status_updates rows are immutable';
      END;
      $$ LANGUAGE plpgsql
    `);

    await client.query(`
      DROP TRIGGER IF EXISTS trg_order_status_updates_immutable ON order_status_updates
    `);

    await client.query(`
      CREATE TRIGGER trg_order_status_updates_immutable
      BEFORE UPDATE ON order_status_updates
      FOR EACH ROW EXECUTE FUNCTION reject_order_status_update_change()
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TRIGGER IF EXISTS trg_order_status_updates_immutable ON order_status_updates');
    await client.query('DROP FUNCTION IF EXISTS reject_order_status_update_change');
    await client.query('DROP TABLE IF EXISTS order_status_updates CASCADE');
  },
};
