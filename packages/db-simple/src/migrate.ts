/**
 * Simple file-based migration runner
 *
 * Applies every `*.sql` file in a directory, in name order, exactly once.
 * Each file runs in its own transaction together with its `_migrations` row.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DbConnection, DbLogger } from './connect.js';

const noopLogger: DbLogger = {
  info: () => {},
  error: () => {},
};

interface Migration {
  name: string;
  sql: string;
}

export interface MigrateOptions {
  logger?: DbLogger;
  /**
   * Prefix for the bookkeeping table, so several stores can share one
   * database without sharing migration history. Defaults to none.
   */
  tablePrefix?: string;
}

export interface MigrationResult {
  applied: string[];
  total: number;
}

function migrationsTable(prefix: string | undefined): string {
  const name = `${prefix ?? ''}_migrations`;
  if (!/^[A-Za-z0-9_]+$/.test(name)) {
    throw new Error(`Invalid migrations table prefix: ${prefix}`);
  }
  return name;
}

async function ensureMigrationsTable(db: DbConnection, table: string): Promise<void> {
  if (db.dbType === 'sqlite') {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at TEXT DEFAULT (datetime('now'))
      )
    `);
  } else {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id BIGSERIAL PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        applied_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }
}

async function getAppliedMigrations(db: DbConnection, table: string): Promise<Set<string>> {
  const rows = await db.query<{ name: string }>(`SELECT name FROM ${table} ORDER BY id`);
  return new Set(rows.map((r) => r.name));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read migration files from directory
 */
export function readMigrationFiles(migrationsDir: string): Migration[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  let files: string[];
  try {
    files = fs.readdirSync(migrationsDir);
  } catch (error) {
    throw new Error(`Failed to read migrations directory: ${migrationsDir}. Error: ${describe(error)}`);
  }

  const sqlFiles = files.filter((file) => file.endsWith('.sql')).sort();

  if (sqlFiles.length === 0) {
    throw new Error(`No .sql migration files found in: ${migrationsDir}`);
  }

  return sqlFiles.map((file) => {
    let sql: string;
    try {
      sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    } catch (error) {
      throw new Error(`Failed to read migration file: ${file}. Error: ${describe(error)}`);
    }
    if (sql.trim().length === 0) {
      throw new Error(`Migration file is empty: ${file}`);
    }
    return { name: file, sql };
  });
}

async function applyMigration(
  db: DbConnection,
  table: string,
  migration: Migration,
  logger: DbLogger
): Promise<void> {
  logger.info('Applying migration', { name: migration.name });

  await db.transaction(async (txDb) => {
    await txDb.exec(migration.sql);
    await txDb.exec(`INSERT INTO ${table} (name) VALUES (?)`, [migration.name]);
  });

  logger.info('Migration applied', { name: migration.name });
}

/**
 * Run pending migrations from a directory
 *
 * @example
 * const db = await connect('sqlite::memory:')
 * await runMigrations('./migrations', db)
 */
export async function runMigrations(
  migrationsDir: string,
  db: DbConnection,
  options: MigrateOptions = {}
): Promise<MigrationResult> {
  const logger = options.logger ?? noopLogger;
  const table = migrationsTable(options.tablePrefix);

  await ensureMigrationsTable(db, table);

  const applied = await getAppliedMigrations(db, table);
  const migrations = readMigrationFiles(migrationsDir);
  const pending = migrations.filter((m) => !applied.has(m.name));

  if (pending.length === 0) {
    logger.info('No pending migrations', { dir: migrationsDir });
    return { applied: [], total: migrations.length };
  }

  for (const migration of pending) {
    await applyMigration(db, table, migration, logger);
  }

  logger.info('All migrations applied', { total: migrations.length, applied: pending.length });
  return { applied: pending.map((m) => m.name), total: migrations.length };
}
