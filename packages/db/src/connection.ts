import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';

const SLOW_QUERY_THRESHOLD_MS = 100;

export interface CreatePoolOptions {
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export function createPool(connectionString: string, options: CreatePoolOptions = {}): Pool {
  const poolConfig: PoolConfig = {
    connectionString,
    max: options.max ?? (process.env.NODE_ENV === 'production' ? 20 : 10),
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 2000,
  };

  const pool = new Pool(poolConfig);

  pool.on('error', (err) => {
    console.error('Unexpected error on idle client', err);
  });

  return pool;
}

/**
 * Run a query on the pool and warn when it is slow.
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  pool: Pool,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();
  const res = await pool.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > SLOW_QUERY_THRESHOLD_MS) {
    console.warn('Slow query detected', { text, duration, rows: res.rowCount });
  }

  return res;
}

export async function close(pool: Pool): Promise<void> {
  await pool.end();
}
