import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';
import { createLogger } from './logger.js';

const log = createLogger('migrations');
const __dirname = path.dirname(fileURLToPath(import.meta.url));
// server/src -> server/migrations; dist -> server/migrations
const MIGRATIONS_DIR_CANDIDATES = [
  path.resolve(__dirname, '../migrations'),
  path.resolve(__dirname, '../server/migrations'),
];

async function findMigrationsDir(): Promise<string> {
  for (const candidate of MIGRATIONS_DIR_CANDIDATES) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // try the next location
    }
  }
  throw new Error(`No migrations directory found (looked in ${MIGRATIONS_DIR_CANDIDATES.join(', ')})`);
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrationIds(pool: Pool): Promise<Set<string>> {
  const result = await pool.query<{ id: string }>('SELECT id FROM schema_migrations');
  return new Set(result.rows.map((row) => row.id));
}

async function listMigrationFiles(migrationsDir: string): Promise<string[]> {
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.sql'))
    .map((entry) => entry.name)
    .sort();
}

async function applyMigration(pool: Pool, id: string, sql: string): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (id) VALUES ($1)', [id]);
    await client.query('COMMIT');
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      log.warn({ err: rollbackError, migration: id }, 'Rollback failed');
    }
    throw error;
  } finally {
    client.release();
  }
}

/** Applies every `*.sql` file not yet recorded in schema_migrations, in name order. */
export async function runMigrations(pool: Pool, options?: { migrationsDir?: string }): Promise<string[]> {
  const migrationsDir = options?.migrationsDir ?? (await findMigrationsDir());

  await ensureMigrationsTable(pool);

  const applied = await getAppliedMigrationIds(pool);
  const files = await listMigrationFiles(migrationsDir);
  const pending = files.filter((file) => !applied.has(file));

  if (pending.length === 0) {
    log.info('No pending migrations');
    return [];
  }

  for (const file of pending) {
    const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
    log.info({ migration: file }, 'Applying migration');
    await applyMigration(pool, file, sql);
  }

  log.info({ applied: pending.length }, 'Migrations complete');
  return pending;
}
