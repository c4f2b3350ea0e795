import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool, PoolConfig } from 'pg';
import * as schema from './schema';
import { logger } from '../server/logger';

export type Database = NodePgDatabase<typeof schema>;

const log = logger.child({ service: 'db' });

let db: Database | null = null;
let pool: Pool | null = null;

/**
 * Initialize the database connection
 * @param config PostgreSQL connection string or pool config
 */
export function initDatabase(config: string | PoolConfig): Database {
  pool = new Pool(typeof config === 'string' ? { connectionString: config } : config);

  pool.on('error', (err) => {
    log.error('Pool error', { error: err.message });
  });

  db = drizzle(pool, { schema });
  return db;
}

/**
 * Get the database instance
 * @throws Error if database is not initialized
 */
export function getDb(): Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Close the database connection
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}

/**
 * Execute a health check query
 */
export async function healthCheck(): Promise<{ ok: boolean; latency: number }> {
  if (!pool) {
    return { ok: false, latency: -1 };
  }

  const start = Date.now();
  try {
    const client = await pool.connect();
    await client.query('SELECT 1');
    client.release();
    return { ok: true, latency: Date.now() - start };
  } catch (error) {
    log.warn('Health check failed', { error: error instanceof Error ? error.message : String(error) });
    return { ok: false, latency: Date.now() - start };
  }
}

export { schema };
export * from './schema';
