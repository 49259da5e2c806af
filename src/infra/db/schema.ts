import { readFile } from 'fs/promises';
import { join } from 'path';
import type pg from 'pg';
import type { TraceLogger } from '../logging/traceLogger.js';

const SCHEMA_FILE = join(process.cwd(), 'src/infra/db/schema.sql');

/**
 * Create tables, unique constraints and indexes if they do not exist yet.
 * Runs in one transaction at startup.
 */
export async function ensureSchema(
  pool: pg.Pool,
  logger: TraceLogger,
  schemaFile: string = SCHEMA_FILE
): Promise<void> {
  const sql = await readFile(schemaFile, 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('COMMIT');
    logger.info('Database schema ensured (users, votes, comments)');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
