import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE EXTENSION IF NOT EXISTS "uuid-ossp";
    `);

    await client.query(`
      DO $$ BEGIN
        CREATE TYPE user_status AS ENUM ('active', 'banned', 'deleted');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    // Accounts are provisioned by the identity service; this table mirrors role and status
    await client.query(`
      CREATE TABLE IF NOT EXISTS users (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        email VARCHAR(255) UNIQUE NOT NULL,
        full_name VARCHAR(255),
        role VARCHAR(20) NOT NULL DEFAULT 'customer'
          CHECK (role IN ('customer', 'press', 'delivery', 'admin')),
        is_superuser BOOLEAN NOT NULL DEFAULT FALSE,
        status user_status DEFAULT 'active',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_users_role_status ON users(role, status)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_users_role_status');
    await client.query('DROP TABLE IF EXISTS users CASCADE');
    await client.query('DROP TYPE IF EXISTS user_status CASCADE');
  },
};
