import type { Knex } from 'knex';
import db from './connection';
import { isDomainError, PersistenceError } from '../types/errors';

/**
 * Runs `work` inside one database transaction. The transaction commits when
 * `work` resolves and rolls back when it throws. Domain errors are rethrown
 * untouched; anything else is reported as a PersistenceError.
 */
export async function inTransaction<T>(
  work: (trx: Knex.Transaction) => Promise<T>,
  conn: Knex = db
): Promise<T> {
  try {
    return await conn.transaction(work);
  } catch (err) {
    if (isDomainError(err)) {
      throw err;
    }
    throw new PersistenceError('Storage operation failed and was rolled back', err);
  }
}
