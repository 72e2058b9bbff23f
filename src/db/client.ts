/**
 * Database Client Module
 *
 * Creates the PostgreSQL connection pool for one invocation and runs
 * transactions on a dedicated client from it.
 */

import { Pool, type PoolClient, type QueryResult } from 'pg';
import type { DatabaseConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { ConnectivityError, toError } from '../errors/index.js';

/**
 * Anything that can run a parameterized query: the pool or a checked-out client
 *
 * Rows come back untyped; repositories annotate them with the row
 * interfaces in ./types.ts.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

/**
 * Narrows a pool or pooled client to the query surface repositories use
 */
export function queryable(target: Pool | PoolClient): Queryable {
  if (target instanceof Pool) {
    return { query: (text, values) => target.query(text, values) };
  }
  return { query: (text, values) => target.query(text, values) };
}

/**
 * Where to connect; differs from the configured host when tunnelling
 */
export interface Endpoint {
  host: string;
  port: number;
}

/**
 * Opens a PostgreSQL connection pool and checks it can reach the server
 *
 * @throws ConnectivityError if the first round-trip fails
 */
export async function createPool(
  dbCfg: DatabaseConfig,
  endpoint: Endpoint,
  logger: Logger
): Promise<Pool> {
  const pool = new Pool({
    host: endpoint.host,
    port: endpoint.port,
    user: dbCfg.user,
    password: dbCfg.password,
    database: dbCfg.database,
    ssl: dbCfg.ssl,
    max: 2,
    connectionTimeoutMillis: dbCfg.connectionTimeoutMillis
  });

  // Log connection events for monitoring
  pool.on('connect', () => {
    logger.debug('Database client connected');
  });

  pool.on('error', (err: Error) => {
    logger.error({ err }, 'Database pool error');
  });

  try {
    await pool.query('SELECT 1');
  } catch (err) {
    const error = toError(err);
    await pool.end();
    throw new ConnectivityError(
      `Could not connect to database ${dbCfg.database} at ${endpoint.host}:${endpoint.port}: ${error.message}`,
      error
    );
  }

  logger.info({ database: dbCfg.database }, 'Connected to database');
  return pool;
}

/**
 * Runs `fn` inside a READ COMMITTED transaction on one pooled client
 *
 * Commits when `fn` resolves, rolls back and rethrows when it rejects.
 */
export async function withTransaction<T>(
  pool: Pool,
  logger: Logger,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN ISOLATION LEVEL READ COMMITTED');
    const result = await fn(queryable(client));
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
      logger.warn('Transaction rolled back');
    } catch (rollbackErr) {
      logger.error({ err: rollbackErr }, 'Rollback failed');
    }
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Gracefully closes all database connections
 */
export async function closePool(pool: Pool, logger: Logger): Promise<void> {
  await pool.end();
  logger.info('Database connections closed');
}
