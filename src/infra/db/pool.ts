import pg from 'pg';
import type { TraceLogger } from '../logging/traceLogger.js';

const { Pool } = pg;

/**
 * Create the process-wide connection pool. Constructed once at startup and
 * passed to each repository; close it with `pool.end()` on shutdown.
 */
export function createPool(connectionString: string, logger: TraceLogger): pg.Pool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error:', err);
  });

  return pool;
}
