import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config } from '../config/env.js';
import { DB_CONFIG } from '../config/constants.js';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const { Pool } = pg;
const log = createLogger('DB');

// Create connection pool
const pool = new Pool({
  connectionString: config.databaseUrl,
  max: DB_CONFIG.POOL_SIZE,
  idleTimeoutMillis: DB_CONFIG.IDLE_TIMEOUT_MS,
  connectionTimeoutMillis: DB_CONFIG.CONNECTION_TIMEOUT_MS,
  ssl: config.isProd ? { rejectUnauthorized: false } : undefined,
});

pool.on('connect', () => {
  log.debug('New database connection established');
});

pool.on('error', (err) => {
  log.error({ err }, 'Database pool error');
});

// Create Drizzle instance with schema
export const db = drizzle(pool, { schema });

export type Database = typeof db;

// Export pool for raw queries if needed
export { pool };

// Export schema
export * from './schema.js';

/**
 * Test database connection
 */
export async function testConnection(): Promise<boolean> {
  try {
    const client = await pool.connect();
    await client.query('SELECT 1');
    client.release();
    log.info('Database connection successful');
    return true;
  } catch (error) {
    log.error({ err: error }, 'Database connection failed');
    return false;
  }
}

/**
 * Close database pool
 */
export async function closePool(): Promise<void> {
  await pool.end();
  log.info('Database pool closed');
}
