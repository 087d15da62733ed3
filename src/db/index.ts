import pg from 'pg';
import { StoreError } from '../utils/errors.js';

const { Pool } = pg;

function createPool(): pg.Pool {
  return new Pool({
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    database: process.env.DB_NAME || 'hostkeeper',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    max: parseInt(process.env.DB_POOL_MAX || '10'),
  });
}

// Pool instance - can be reconfigured for testing
let pool: pg.Pool = createPool();

/**
 * Get the current database pool
 */
export function getPool(): pg.Pool {
  return pool;
}

/**
 * Set a custom pool (used for testing)
 */
export function setPool(customPool: pg.Pool): void {
  pool = customPool;
}

// Constraint violations surfaced to callers as rejected requests
const CONSTRAINT_VIOLATION_CODES = new Set(['23505', '23503', '23514', '23502']);

function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Convert pg constraint violations into StoreError, pass everything else through
 */
export function toStoreError(error: unknown): unknown {
  const code = getErrorCode(error);
  if (code && CONSTRAINT_VIOLATION_CODES.has(code)) {
    const message = error instanceof Error ? error.message : 'Constraint violation';
    return new StoreError(message, code, { cause: error });
  }
  return error;
}

/**
 * Run fn with a client checked out of the pool for one logical operation.
 * The client goes back to the pool on every exit path.
 */
export async function withClient<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } catch (error) {
    throw toStoreError(error);
  } finally {
    client.release();
  }
}

/**
 * Like withClient, wrapped in BEGIN/COMMIT with ROLLBACK on failure
 */
export async function withTransaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  return withClient(async (client) => {
    await client.query('BEGIN');
    try {
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  });
}
