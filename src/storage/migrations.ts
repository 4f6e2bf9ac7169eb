/**
 * Schema creation and migrations for the index database.
 *
 * Each migration upgrades from one schema version to the next and records
 * the new version in `schema_version`.
 */

import type Database from 'better-sqlite3';

/** Latest schema version. */
export const SCHEMA_VERSION = 2;

/**
 * Run all pending migrations on the database.
 */
export function runMigrations(database: Database.Database): void {
  database.exec('CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)');
  const currentVersion = getSchemaVersion(database);

  if (currentVersion < 1) {
    migrateToV1(database);
  }
  if (currentVersion < 2) {
    migrateToV2(database);
  }
}

/**
 * v1: chunk table with payload and float32 vector, plus store metadata.
 */
function migrateToV1(database: Database.Database): void {
  database.transaction(() => {
    database.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        chunk_id TEXT PRIMARY KEY,
        topic TEXT NOT NULL,
        text TEXT NOT NULL,
        tokens INTEGER NOT NULL,
        embedding_model TEXT NOT NULL,
        url TEXT NOT NULL,
        title TEXT NOT NULL,
        section TEXT,
        ingested_at INTEGER NOT NULL,
        embedding BLOB NOT NULL
      )
    `);
    database.exec(`
      CREATE TABLE IF NOT EXISTS store_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )
    `);
    database.prepare('INSERT OR IGNORE INTO schema_version (version) VALUES (?)').run(1);
  })();
}

/**
 * v2: per-topic revision counter, bumped by every write to a topic so that
 * other connections can tell their cached rows are stale.
 */
function migrateToV2(database: Database.Database): void {
  database.transaction(() => {
    database.exec(`
      CREATE TABLE IF NOT EXISTS topic_revisions (
        topic TEXT PRIMARY KEY,
        revision INTEGER NOT NULL
      )
    `);
    database.prepare('INSERT OR IGNORE INTO schema_version (version) VALUES (?)').run(2);
  })();
}

/**
 * Get current schema version (0 for a fresh database).
 */
export function getSchemaVersion(database: Database.Database): number {
  const row = database
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get();
  return row?.version ?? 0;
}
