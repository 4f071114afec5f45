import { promises as fs } from 'node:fs';
import path from 'node:path';

import { Pool, type PoolClient } from 'pg';

import { config } from '../config';
import { logger } from '../logger';

let pool: Pool | null = null;

export function getDb(): Pool {
  if (!pool) {
    if (!config.DATABASE_URL) {
      throw new Error('DATABASE_URL is not configured');
    }

    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: config.DATABASE_MAX_POOL
    });
  }

  return pool;
}

export async function withTransaction<T>(
  handler: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getDb().connect();

  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

const MIGRATIONS_TABLE = 'schema_migrations';

/**
 * Applies every `.sql` file in MIGRATIONS_DIR that is not yet recorded in
 * `schema_migrations`, in file-name order, one transaction per file.
 */
export async function runMigrations(): Promise<string[]> {
  const migrationsDir = config.MIGRATIONS_DIR;
  const files = await fs.readdir(migrationsDir);
  const sqlFiles = files.filter((file) => file.endsWith('.sql')).sort();

  if (sqlFiles.length === 0) {
    logger.info({ migrationsDir }, 'No SQL migrations found');
    return [];
  }

  await getDb().query(
    `CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
       name TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
     )`
  );
  const applied = await getDb().query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE}`);
  const done = new Set(applied.rows.map((row) => row.name));
  const pending = sqlFiles.filter((file) => !done.has(file));

  for (const file of pending) {
    const sql = await fs.readFile(path.join(migrationsDir, file), 'utf-8');

    logger.info({ migration: file }, 'Applying migration');
    try {
      await withTransaction(async (client) => {
        await client.query(sql);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
      });
    } catch (error) {
      logger.error({ err: error, migration: file }, 'Failed to apply migration');
      throw error;
    }
  }

  logger.info({ executed: pending.length, skipped: done.size }, 'Migrations up to date');
  return pending;
}
