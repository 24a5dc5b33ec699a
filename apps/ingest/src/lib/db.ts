// =====================================================
// PostgreSQL Pool
// =====================================================

import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { logger } from '../utils/logger';

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

// The parts of pg's Pool and PoolClient the store relies on
export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<TransactionClient>;
  end(): Promise<void>;
}

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });

  pool.on('error', (error) => {
    logger.error('[Database] Idle client error:', error);
  });

  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  db: Queryable,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return db.query<T>(text, params);
}

export async function withTransaction<T>(
  pool: ConnectionPool,
  fn: (client: TransactionClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Run `fn` behind a savepoint so a failure undoes only its own
 * statements and leaves the surrounding transaction open.
 */
export async function withSavepoint<T>(client: Queryable, name: string, fn: () => Promise<T>): Promise<T> {
  await client.query(`savepoint ${name}`);
  try {
    const result = await fn();
    await client.query(`release savepoint ${name}`);
    return result;
  } catch (error) {
    await client.query(`rollback to savepoint ${name}`);
    throw error;
  }
}
