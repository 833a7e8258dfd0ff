import { performance } from 'node:perf_hooks';

import type { Pool, PoolClient } from 'pg';

import { recordDbOperation, recordDbOperationError } from '../telemetry/metrics.js';

export function getSingleRow<T>(rows: T[]): T | null {
  const [row] = rows;
  return row ?? null;
}

/** SQLSTATE class 23 covers every integrity constraint violation. */
export function isIntegrityViolation(error: unknown): boolean {
  return typeof error === 'object'
    && error !== null
    && 'code' in error
    && typeof error.code === 'string'
    && error.code.startsWith('23');
}

/**
 * Borrows one pooled client for the duration of `callback` and always hands
 * it back, whether the callback resolves or throws.
 */
export async function withClient<T>(pool: Pool, operation: string, callback: (client: PoolClient) => Promise<T>): Promise<T> {
  const startedAt = performance.now();
  const client = await pool.connect();

  try {
    const result = await callback(client);
    recordDbOperation({ operation, success: 'true' }, performance.now() - startedAt);
    return result;
  } catch (error) {
    recordDbOperation({ operation, success: 'false' }, performance.now() - startedAt);
    recordDbOperationError({ operation });
    throw error;
  } finally {
    client.release();
  }
}

export async function withTransaction<T>(pool: Pool, operation: string, callback: (client: PoolClient) => Promise<T>): Promise<T> {
  return withClient(pool, operation, async (client) => {
    await client.query('BEGIN');

    try {
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  });
}
