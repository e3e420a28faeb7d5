import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    // One row per day; incremented with INSERT ... ON CONFLICT so concurrent creations never share a number
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_number_counters (
        day VARCHAR(6) PRIMARY KEY,
        last_value INTEGER NOT NULL
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS order_number_counters CASCADE');
  },
};
