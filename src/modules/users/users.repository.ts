import { Pool } from 'pg';
import { User } from '../../connections/db/models';
import { PersistenceFailureError } from '../../utils/errors';
import { logger, toError } from '../../utils/logging';

/**
 * Identity lookups. Accounts are managed elsewhere; this service only reads them.
 */
export interface UsersRepository {
  findById(userId: string): Promise<User | null>;
}

export class PgUsersRepository implements UsersRepository {
  constructor(private readonly pool: Pool) {}

  async findById(userId: string): Promise<User | null> {
    try {
      const result = await this.pool.query<User>(
        `SELECT id, email, full_name, role, is_superuser, status, created_at, updated_at
         FROM users WHERE id = $1`,
        [userId]
      );
      return result.rows[0] ?? null;
    } catch (error) {
      const cause = toError(error);
      logger.error('User lookup failed', { userId, error: cause.message });
      throw new PersistenceFailureError('The user directory is unavailable', cause);
    }
  }
}
