import { Pool } from 'pg';
import { Service, ServiceOption, ServiceVariant } from '../../connections/db/models';
import { PersistenceFailureError } from '../../utils/errors';
import { logger, toError } from '../../utils/logging';

/**
 * Read-only view of the service catalog
 */
export interface CatalogRepository {
  findService(serviceId: number): Promise<Service | null>;
  findVariant(variantId: number): Promise<ServiceVariant | null>;
  findOptions(optionIds: readonly number[]): Promise<ServiceOption[]>;
}

export class PgCatalogRepository implements CatalogRepository {
  constructor(private readonly pool: Pool) {}

  async findService(serviceId: number): Promise<Service | null> {
    const result = await this.run(() =>
      this.pool.query<Service>(
        'SELECT id, name, base_price::float8 AS base_price, is_active FROM services WHERE id = $1',
        [serviceId]
      )
    );
    return result.rows[0] ?? null;
  }

  async findVariant(variantId: number): Promise<ServiceVariant | null> {
    const result = await this.run(() =>
      this.pool.query<ServiceVariant>(
        `SELECT id, service_id, name, price_adjustment::float8 AS price_adjustment, is_active
         FROM service_variants WHERE id = $1`,
        [variantId]
      )
    );
    return result.rows[0] ?? null;
  }

  async findOptions(optionIds: readonly number[]): Promise<ServiceOption[]> {
    if (optionIds.length === 0) {
      return [];
    }
    const result = await this.run(() =>
      this.pool.query<ServiceOption>(
        `SELECT id, service_id, name, price_adjustment::float8 AS price_adjustment, is_active
         FROM service_options WHERE id = ANY($1::int[])
         ORDER BY id ASC`,
        [[...optionIds]]
      )
    );
    return result.rows;
  }

  private async run<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      const cause = toError(error);
      logger.error('Catalog lookup failed', { error: cause.message, stack: cause.stack });
      throw new PersistenceFailureError('The service catalog is unavailable', cause);
    }
  }
}
