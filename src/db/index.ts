/**
 * Database Connection
 *
 * Singleton database connection with lazy initialization.
 * Location: <dataDir>/timeweave.db (default ~/.timeweave)
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import type { Repositories } from '../0_types.js';
import { runMigrations } from './migrate.js';
import {
  createSqliteBatchRepository,
  createSqliteChunkRepository,
  createSqliteLlmRequestRepository,
  createSqliteObservationRepository,
  createSqliteTimelineCardRepository,
} from './repositories/index.js';

export const DB_FILENAME = 'timeweave.db';

let db: Database.Database | null = null;
let dbPath: string | null = null;
let repositories: Repositories | null = null;

/**
 * Get database connection (internal)
 */
function _getDb(dataDir: string): Database.Database {
  if (db) return db;

  mkdirSync(dataDir, { recursive: true });
  dbPath = join(dataDir, DB_FILENAME);

  db = new Database(dbPath);

  // Configure pragmas for performance and safety
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  return db;
}

/**
 * Build the repository set over an open connection
 */
export function createRepositories(database: Database.Database): Repositories {
  return {
    chunks: createSqliteChunkRepository(database),
    batches: createSqliteBatchRepository(database),
    observations: createSqliteObservationRepository(database),
    cards: createSqliteTimelineCardRepository(database),
    llmRequests: createSqliteLlmRequestRepository(database),
    transaction: <T>(fn: () => T): T => database.transaction(fn)(),
  };
}

/**
 * Get all repositories, opening the database under `dataDir` on first use
 */
export function getRepositories(dataDir: string): Repositories {
  if (repositories) return repositories;
  repositories = createRepositories(_getDb(dataDir));
  return repositories;
}

/**
 * Create a fresh set of repositories for testing (using in-memory DB)
 */
export function createTestRepositories(): Repositories & {
  db: Database.Database;
  cleanup: () => void;
} {
  const testDb = new Database(':memory:');
  testDb.pragma('foreign_keys = ON');
  runMigrations(testDb, { quiet: true });

  return {
    ...createRepositories(testDb),
    db: testDb,
    cleanup: () => testDb.close(),
  };
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
    dbPath = null;
    repositories = null;
  }
}

/**
 * Path of the open database, if any
 */
export function getDbPath(): string | null {
  return dbPath;
}
