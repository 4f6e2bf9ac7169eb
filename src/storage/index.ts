/**
 * Storage layer exports.
 */

export { openDatabase, getDb, setDb, resetDb, closeDb } from './db.js';
export { runMigrations, getSchemaVersion, SCHEMA_VERSION } from './migrations.js';
export { VectorStore, DELETE_BATCH_SIZE, COUNT_CAP } from './vector-store.js';
export type { VectorStoreOptions } from './vector-store.js';
export type {
  IndexStore,
  IndexedItem,
  SearchHit,
  StoredChunk,
  TopicCount,
  TopicSummary,
} from './types.js';
