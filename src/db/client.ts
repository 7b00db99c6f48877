/**
 * Database Client Module
 * 
 * Creates and exports the PostgreSQL connection pools.
 * `db` is the single writer used by ingestion; `readDb` is a read-only pool
 * for the query surface, safe to use while an ingestion run is active.
 */

import { Pool, type PoolConfig } from 'pg';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';

const baseConfig: PoolConfig = {
  host: cfg.database.host,
  port: cfg.database.port,
  user: cfg.database.user,
  password: cfg.database.password,
  database: cfg.database.database,
  ssl: cfg.database.ssl,
  max: cfg.database.max,
  idleTimeoutMillis: cfg.database.idleTimeoutMillis,
  connectionTimeoutMillis: cfg.database.connectionTimeoutMillis
};

/**
 * Writer pool
 */
export const db = new Pool(baseConfig);

/**
 * Reader pool; every transaction it opens is read-only
 */
export const readDb = new Pool({
  ...baseConfig,
  options: '-c default_transaction_read_only=on'
});

// Log connection events for monitoring
db.on('connect', () => {
  logger.debug('Database client connected');
});

db.on('error', (err: Error) => {
  logger.error({ err }, 'Database pool error');
});

readDb.on('error', (err: Error) => {
  logger.error({ err }, 'Read-only database pool error');
});

/**
 * Gracefully closes all database connections
 */
export async function closeDatabase() {
  await Promise.all([db.end(), readDb.end()]);
  logger.info('Database connections closed');
}
