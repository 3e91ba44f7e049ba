/**
 * Database Migration Runner
 *
 * Applies migrations/NNN_description.sql in order, each in its own
 * transaction, and records the version in _schema_version.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

export interface MigrationFile {
  version: number;
  filename: string;
  sql: string;
}

/**
 * Get current schema version from database
 */
function getCurrentVersion(db: Database.Database): number {
  const table = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = '_schema_version'"
    )
    .get();
  if (!table) return 0;

  const row = db
    .prepare<[], { version: number | null }>(
      'SELECT MAX(version) as version FROM _schema_version'
    )
    .get();
  return row?.version ?? 0;
}

/**
 * Load all migration files from /migrations directory
 */
export function loadMigrations(dir = MIGRATIONS_DIR): MigrationFile[] {
  const files = readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  return files.map((filename) => {
    const match = filename.match(/^(\d+)_.+\.sql$/);
    if (!match) {
      throw new Error(
        `Invalid migration filename: ${filename}. Expected format: NNN_description.sql`
      );
    }

    const version = Number.parseInt(match[1], 10);
    const sql = readFileSync(join(dir, filename), 'utf-8');

    return { version, filename, sql };
  });
}

/**
 * Run all pending migrations
 */
export function runMigrations(
  db: Database.Database,
  options: { dir?: string; quiet?: boolean } = {}
): {
  applied: string[];
  currentVersion: number;
} {
  const currentVersion = getCurrentVersion(db);
  const migrations = loadMigrations(options.dir);
  if (migrations.length === 0) {
    throw new Error(`[db] No migrations found in ${options.dir ?? MIGRATIONS_DIR}`);
  }
  const pending = migrations.filter((m) => m.version > currentVersion);

  const applied: string[] = [];

  const apply = db.transaction((migration: MigrationFile) => {
    db.exec(migration.sql);
    db.prepare('INSERT INTO _schema_version (version) VALUES (?)').run(
      migration.version
    );
  });

  for (const migration of pending) {
    if (!options.quiet) {
      console.log(`[db] Applying migration: ${migration.filename}`);
    }
    apply(migration);
    applied.push(migration.filename);
  }

  const finalVersion = getCurrentVersion(db);

  if (applied.length > 0 && !options.quiet) {
    console.log(`[db] Migrations complete. Schema version: ${finalVersion}`);
  }

  return { applied, currentVersion: finalVersion };
}
