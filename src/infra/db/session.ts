import type { Pool, PoolClient } from 'pg';

/**
 * The part of a pg Pool the request pipeline needs.
 */
export type ConnectionPool = Pick<Pool, 'connect'>;

export type Queryable = Pick<PoolClient, 'query'>;

/**
 * Check a client out of the pool for the duration of `work` and release it on
 * every exit path. Clients are never shared between callers.
 */
export async function withConnection<T>(
  pool: ConnectionPool,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
}
