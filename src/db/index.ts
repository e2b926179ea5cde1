/**
 * Cleanroom Database Layer
 *
 * PostgreSQL connection pool and utilities for the raw record tables.
 * All database reads go through this layer.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { getConfig } from '../config';

// Connection pool singleton
let pool: Pool | null = null;

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
}

/**
 * Get or create the database connection pool
 */
export function getPool(): Pool {
  if (!pool) {
    const config = getConfig();

    if (!config.databaseUrl) {
      throw new Error('DATABASE_URL is not set - Postgres record store unavailable');
    }

    pool = new Pool({
      connectionString: config.databaseUrl,
      max: config.dbPoolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
    });

    pool.on('error', (err) => {
      console.error('[DB] Unexpected pool error:', err);
    });

    console.log('[DB] Connection pool initialized');
  }
  return pool;
}

/**
 * Execute a query, on the given client or on a pooled connection
 */
export async function query<T extends QueryResultRow>(
  text: string,
  params: unknown[] = [],
  client?: PoolClient,
): Promise<QueryResult<T>> {
  const start = Date.now();

  try {
    const result = client
      ? await client.query<T>(text, params)
      : await getPool().query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > getConfig().slowQueryMs) {
      console.warn(`[DB] Slow query (${duration}ms):`, text.substring(0, 100));
    }

    return result;
  } catch (err) {
    console.error('[DB] Query error:', err);
    throw err;
  }
}

/**
 * Execute multiple queries in a transaction
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> {
  const client = await getPool().connect();

  const modes: string[] = [];
  if (options.isolationLevel) modes.push(`ISOLATION LEVEL ${options.isolationLevel}`);
  if (options.readOnly) modes.push('READ ONLY');

  try {
    await client.query(modes.length > 0 ? `BEGIN ${modes.join(' ')}` : 'BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Check database connectivity
 */
export async function healthCheck(): Promise<boolean> {
  try {
    const result = await query<{ ok: number }>('SELECT 1 as ok');
    return result.rows[0]?.ok === 1;
  } catch (err) {
    console.warn('[DB] Health check failed:', err instanceof Error ? err.message : err);
    return false;
  }
}

/**
 * Gracefully close the pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('[DB] Connection pool closed');
  }
}

// Export types for use in repositories
export type { Pool, PoolClient, QueryResult };
