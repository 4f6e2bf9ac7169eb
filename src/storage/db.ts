/**
 * SQLite database connection for the vector index.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath } from '../config/pipeline-config.js';
import { loadConfig } from '../config/loader.js';
import { runMigrations } from './migrations.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

let db: Database.Database | null = null;
let customDb: Database.Database | null = null;

/**
 * Open (creating if needed) a database file and bring its schema up to date.
 * `:memory:` opens a private in-memory database.
 */
export function openDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === ':memory:';
  const resolvedPath = inMemory ? dbPath : resolvePath(dbPath);

  let database: Database.Database;
  try {
    if (!inMemory) {
      const dir = dirname(resolvedPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
    database = new Database(resolvedPath);
  } catch (error) {
    throw new StorageError(
      `Cannot open database ${resolvedPath}: ${errorMessage(error)}`,
      'DB_OPEN_FAILED',
      error,
    );
  }

  // WAL lets readers proceed while an ingest writes
  if (!inMemory) {
    database.pragma('journal_mode = WAL');
  }

  runMigrations(database);
  log.debug(`Opened ${resolvedPath}`);
  return database;
}

/**
 * Set a custom database instance (for testing).
 */
export function setDb(database: Database.Database): void {
  customDb = database;
}

/**
 * Clear the custom database so getDb() opens the configured one again.
 */
export function resetDb(): void {
  customDb = null;
}

/**
 * Get the shared database connection.
 *
 * Priority:
 * 1. Custom database set via setDb() (testing)
 * 2. Existing connection
 * 3. New connection to the given or configured path
 */
export function getDb(dbPath?: string): Database.Database {
  if (customDb) {
    return customDb;
  }
  if (db) {
    return db;
  }

  db = openDatabase(dbPath ?? loadConfig().storage.dbPath);
  return db;
}

/**
 * Close the shared database connection.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
