import { pool } from './connection';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { logger, toError } from '../../utils/logging';

const createMigrationsTable = async () => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (name: string): Promise<boolean> => {
  const result = await pool.query(
    'SELECT id FROM migrations WHERE name = $1',
    [name]
  );
  return result.rows.length > 0;
};

// Migration body and its bookkeeping row commit together
const runMigration = async (name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} executed successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} failed`, toError(error));
    throw error;
  } finally {
    client.release();
  }
};

const rollbackMigration = async (name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} rolled back successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} rollback failed`, toError(error));
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Run all pending migrations
 */
export const migrate = async (): Promise<void> => {
  logger.info('Starting database migrations...');
  await createMigrationsTable();
  logger.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(name)) {
      logger.info(`Migration ${name} already executed, skipping...`);
      continue;
    }

    await runMigration(name, migration);
  }

  logger.info('All migrations completed successfully!');
};

/**
 * Roll back the most recently executed migration
 */
export const rollback = async (): Promise<void> => {
  logger.info('Rolling back last migration...');
  await createMigrationsTable();

  const result = await pool.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(lastMigrationName, migrationInfo.migration);
  logger.info('Rollback completed successfully!');
};

if (require.main === module) {
  const command = process.argv[2] === 'rollback' ? rollback : migrate;

  command()
    .catch((error: unknown) => {
      logger.error('Migration error', toError(error));
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
