import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';
import { createLogger, type Logger } from './logger.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, '../migrations');

// Session-level advisory lock shared by the API server and the station loader
export const MIGRATION_LOCK_KEY = 72_410_901;

const MIGRATION_FILE_PATTERN = /^(\d{3})_[a-z0-9_]+\.sql$/;

export type MigrationFile = {
  id: string;
  sequence: number;
  sql: string;
  checksum: string;
};

export type AppliedMigration = {
  id: string;
  checksum: string | null;
};

export type MigrationPlan = {
  pending: MigrationFile[];
  /** Applied files whose contents no longer match what was run. */
  changed: string[];
};

export function migrationChecksum(sql: string): string {
  return crypto.createHash('sha256').update(sql.replace(/\r\n/g, '\n')).digest('hex');
}

export function parseMigrationFileName(name: string): number | null {
  const match = MIGRATION_FILE_PATTERN.exec(name);
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

/**
 * Read `NNN_description.sql` files in sequence order. Other `.sql` names are
 * reported and left out; duplicate sequence numbers are an error.
 */
export async function loadMigrationFiles(migrationsDir: string, log: Logger): Promise<MigrationFile[]> {
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files: MigrationFile[] = [];
  const seen = new Map<number, string>();

  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.endsWith('.sql')) continue;

    const sequence = parseMigrationFileName(entry.name);
    if (sequence === null) {
      log.warn({ file: entry.name }, 'Ignoring migration without a NNN_name.sql file name');
      continue;
    }
    const clash = seen.get(sequence);
    if (clash) {
      throw new Error(`Migrations ${clash} and ${entry.name} share sequence ${sequence}`);
    }
    seen.set(sequence, entry.name);

    const sql = await fs.readFile(path.join(migrationsDir, entry.name), 'utf8');
    files.push({ id: entry.name, sequence, sql, checksum: migrationChecksum(sql) });
  }

  return files.sort((a, b) => a.sequence - b.sequence);
}

export function planMigrations(files: readonly MigrationFile[], applied: readonly AppliedMigration[]): MigrationPlan {
  const appliedById = new Map(applied.map((migration) => [migration.id, migration]));
  const pending: MigrationFile[] = [];
  const changed: string[] = [];

  for (const file of files) {
    const previous = appliedById.get(file.id);
    if (!previous) {
      pending.push(file);
    } else if (previous.checksum !== null && previous.checksum !== file.checksum) {
      changed.push(file.id);
    }
  }

  return { pending, changed };
}

async function ensureMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      checksum TEXT,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function applyMigration(client: PoolClient, file: MigrationFile, log: Logger): Promise<void> {
  try {
    await client.query('BEGIN');
    await client.query(file.sql);
    await client.query('INSERT INTO schema_migrations (id, checksum) VALUES ($1, $2)', [file.id, file.checksum]);
    await client.query('COMMIT');
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      log.warn({ err: rollbackError, migration: file.id }, 'Rollback failed');
    }
    throw error;
  }
}

/**
 * Apply pending migrations, each in its own transaction, while holding the
 * migration lock. A changed applied file is logged, never re-run.
 */
export async function runMigrations(
  pool: Pool,
  options: { migrationsDir?: string; logger?: Logger } = {}
): Promise<number> {
  const log = options.logger ?? createLogger('migrations');
  const files = await loadMigrationFiles(options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR, log);

  const client = await pool.connect();
  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await ensureMigrationsTable(client);
      const applied = await client.query<AppliedMigration>('SELECT id, checksum FROM schema_migrations');
      const plan = planMigrations(files, applied.rows);

      for (const id of plan.changed) {
        log.warn({ migration: id }, `Applied migration ${id} has changed on disk`);
      }
      if (plan.pending.length === 0) {
        log.info({ known: files.length }, 'Schema up to date');
        return 0;
      }

      for (const file of plan.pending) {
        log.info({ migration: file.id }, `Applying migration ${file.id}`);
        await applyMigration(client, file, log);
      }
      log.info({ applied: plan.pending.length }, 'Migrations complete');
      return plan.pending.length;
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }
}
