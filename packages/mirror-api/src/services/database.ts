import pg from 'pg';
import { getConfig, requireDatabaseUrl } from '../config.js';
const { Pool } = pg;

// Lazy-initialized connection pool
let pool: pg.Pool | null = null;

/**
 * host:port/database of a connection string, without credentials
 */
export function describeConnection(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    return `${url.hostname}${url.port ? `:${url.port}` : ''}${url.pathname}`;
  } catch {
    return '(unparseable DATABASE_URL)';
  }
}

function getPool(): pg.Pool {
  if (!pool) {
    const config = getConfig();
    const connectionString = requireDatabaseUrl(config);
    console.log(`[Database] Initializing pool for ${describeConnection(connectionString)}`);
    pool = new Pool({
      connectionString,
      ssl: config.DATABASE_SSL ? { rejectUnauthorized: false } : undefined,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    pool.on('error', (err) => {
      console.error('[Database] Unexpected error on idle client:', err);
    });
  }
  return pool;
}

/**
 * Row keys arrive snake_case (start_at, dataset_id); callers see camelCase
 */
export function camelizeRow<T>(row: Record<string, unknown>): T {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    result[key.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())] = value;
  }
  return result as T;
}

/**
 * Query surface shared by the pool and a transaction's client
 */
export interface Executor {
  query<T>(text: string, params?: unknown[]): Promise<T[]>;
  execute(text: string, params?: unknown[]): Promise<number>;
}

interface Queryable {
  query(text: string, params?: unknown[]): Promise<pg.QueryResult>;
}

function executorFor(target: () => Queryable): Executor {
  return {
    async query<T>(text: string, params?: unknown[]): Promise<T[]> {
      const result = await target().query(text, params);
      return result.rows.map((row) => camelizeRow<T>(row));
    },
    async execute(text: string, params?: unknown[]): Promise<number> {
      const result = await target().query(text, params);
      return result.rowCount ?? 0;
    },
  };
}

// Resolves the pool on first use, so importing this module needs no DATABASE_URL
export const poolExecutor: Executor = executorFor(getPool);

/**
 * Run callback on one client between BEGIN and COMMIT; any throw rolls back
 */
export async function transaction<T>(callback: (executor: Executor) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await callback(executorFor(() => client));
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('[Database] Rollback failed:', rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
}

// Health check - returns both status and error for proper logging
export async function checkHealth(): Promise<{ healthy: boolean; error?: string }> {
  try {
    await getPool().query('SELECT 1');
    return { healthy: true };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    return { healthy: false, error };
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
