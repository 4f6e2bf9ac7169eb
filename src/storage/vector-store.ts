/**
 * Topic-scoped vector index with SQLite persistence.
 *
 * Rows hold the chunk payload and its embedding as a Float32 BLOB. Search is
 * exact: each topic's vectors are loaded into memory on first use and ranked
 * by cosine similarity by brute force.
 *
 * Every write bumps the topic's row in `topic_revisions`. A loaded topic is
 * reused only while its revision still matches, so writes made through
 * another store or another process are seen on the next search.
 *
 * ## Architecture
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────┐
 * │                        VectorStore                           │
 * │  ┌──────────────────────┐    ┌─────────────────────────────┐ │
 * │  │  Per-topic index     │    │    SQLite persistence       │ │
 * │  │  Map<topic, entries> │ ◄──┤  chunks (chunk_id, topic,   │ │
 * │  │  + revision          │    │   payload…, embedding)      │ │
 * │  └──────────────────────┘    │  topic_revisions            │ │
 * │                              │  store_meta (dimensions)    │ │
 * │                              └─────────────────────────────┘ │
 * └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * const store = new VectorStore({ db: openDatabase(':memory:'), dimensions: 384 });
 * await store.upsert('Linear algebra', items, vectors);
 * const hits = await store.search('Linear algebra', queryVector, 6);
 * ```
 *
 * Upsert is delete-then-insert by chunk id inside one transaction, so
 * re-ingesting unchanged text is idempotent and a chunk id never belongs
 * to two topics. Repeated ids within one batch keep the last item.
 *
 * @module storage/vector-store
 */

import type Database from 'better-sqlite3';
import { getDb } from './db.js';
import { runMigrations } from './migrations.js';
import type { IndexStore, IndexedItem, SearchHit, StoredChunk, TopicCount, TopicSummary } from './types.js';
import { InvalidInputError, StorageError, errorMessage } from '../utils/errors.js';
import { serializeEmbedding, deserializeEmbedding, toFloat32 } from '../utils/embedding-utils.js';
import { cosineSimilarity } from '../utils/vector-math.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-store');

/** Ids per DELETE … IN (…) statement. */
export const DELETE_BATCH_SIZE = 500;

/** Upper bound for countByTopic(). */
export const COUNT_CAP = 16_384;

interface ChunkRow {
  chunk_id: string;
  topic: string;
  text: string;
  tokens: number;
  embedding_model: string;
  url: string;
  title: string;
  section: string | null;
  ingested_at: number;
  embedding: Buffer;
}

interface IndexEntry {
  payload: StoredChunk;
  embedding: number[];
}

interface LoadedTopic {
  revision: number;
  entries: IndexEntry[];
}

export interface VectorStoreOptions {
  /** Database handle. Default: the shared connection from getDb(). */
  db?: Database.Database;
  /** Dimension of every stored vector. */
  dimensions: number;
}

function toPayload(row: ChunkRow): StoredChunk {
  return {
    chunkId: row.chunk_id,
    topic: row.topic,
    text: row.text,
    tokens: row.tokens,
    embeddingModel: row.embedding_model,
    url: row.url,
    title: row.title,
    section: row.section,
    ingestedAt: row.ingested_at,
  };
}

function byScoreThenId(a: SearchHit, b: SearchHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

/**
 * SQLite implementation of IndexStore.
 */
export class VectorStore implements IndexStore {
  readonly dimensions: number;
  private readonly db: Database.Database;
  private schemaReady = false;
  private indexReady = false;
  /** topic → loaded entries and the revision they were read at */
  private topics: Map<string, LoadedTopic> = new Map();

  constructor(options: VectorStoreOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions < 1) {
      throw new InvalidInputError(
        `dimensions must be a positive integer, got ${options.dimensions}`,
        'INVALID_DIMENSIONS',
      );
    }
    this.dimensions = options.dimensions;
    this.db = options.db ?? getDb();
  }

  /**
   * Create the tables if missing and pin the store's vector dimension.
   * Idempotent.
   */
  ensureSchema(): void {
    if (this.schemaReady) return;

    runMigrations(this.db);
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM store_meta WHERE key = ?')
      .get('dimensions');
    if (!row) {
      this.db
        .prepare('INSERT INTO store_meta (key, value) VALUES (?, ?)')
        .run('dimensions', String(this.dimensions));
      log.info(`Initialized index store`, { dimensions: this.dimensions });
    } else if (Number(row.value) !== this.dimensions) {
      throw new StorageError(
        `Index was created with ${row.value}-dimension vectors, but ${this.dimensions} were configured`,
        'DIMENSION_MISMATCH',
      );
    }
    this.schemaReady = true;
  }

  /**
   * Create the topic index. The similarity index is the in-memory per-topic
   * map, filled on first search. Idempotent.
   */
  ensureIndex(): void {
    if (this.indexReady) return;
    this.ensureSchema();
    this.db.exec('CREATE INDEX IF NOT EXISTS idx_chunks_topic ON chunks(topic)');
    this.indexReady = true;
  }

  async isIndexed(topic: string): Promise<boolean> {
    this.ensureIndex();
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM chunks WHERE topic = ? LIMIT 1')
      .get(topic);
    return row !== undefined;
  }

  /**
   * Replace rows by chunk id, then refresh the in-memory index of every topic
   * touched so the new rows are searchable when this resolves. When an id
   * repeats within the batch the last item wins.
   */
  async upsert(topic: string, items: IndexedItem[], vectors: number[][]): Promise<void> {
    if (items.length !== vectors.length) {
      throw new InvalidInputError(
        `items and vectors differ in length (${items.length} vs ${vectors.length})`,
        'LENGTH_MISMATCH',
      );
    }
    if (items.length === 0) return;
    for (const vector of vectors) {
      this.checkDimension(vector);
    }
    this.ensureIndex();

    const lastIndex = new Map<string, number>();
    items.forEach((item, i) => lastIndex.set(item.chunkId, i));
    const keep = [...lastIndex.values()].sort((a, b) => a - b);
    if (keep.length < items.length) {
      log.debug(`Dropped ${items.length - keep.length} repeated chunk ids`, { topic });
    }

    const ids = keep.map((i) => items[i].chunkId);
    const affected = new Set<string>([topic, ...this.topicsOf(ids)]);

    const insert = this.db.prepare(`
      INSERT INTO chunks (chunk_id, topic, text, tokens, embedding_model, url, title, section, ingested_at, embedding)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const replaceAll = this.db.transaction(() => {
      for (let i = 0; i < ids.length; i += DELETE_BATCH_SIZE) {
        const batch = ids.slice(i, i + DELETE_BATCH_SIZE);
        const placeholders = batch.map(() => '?').join(',');
        this.db.prepare(`DELETE FROM chunks WHERE chunk_id IN (${placeholders})`).run(...batch);
      }
      for (const i of keep) {
        const item = items[i];
        insert.run(
          item.chunkId,
          topic,
          item.text,
          item.tokens,
          item.embeddingModel,
          item.url,
          item.title,
          item.section,
          item.ingestedAt,
          serializeEmbedding(vectors[i]),
        );
      }
      for (const t of affected) {
        this.bumpRevision(t);
      }
    });

    try {
      replaceAll();
    } catch (error) {
      throw new StorageError(
        `Upsert of ${keep.length} chunks for "${topic}" failed: ${errorMessage(error)}`,
        'UPSERT_FAILED',
        error,
      );
    }

    for (const t of affected) {
      this.topics.delete(t);
      this.loadTopic(t);
    }
    log.debug(`Upserted ${keep.length} chunks`, { topic });
  }

  /**
   * Top-k rows of one topic by cosine similarity, highest first.
   * Equal scores are ordered by chunk id.
   */
  async search(topic: string, vector: number[], k: number): Promise<SearchHit[]> {
    this.checkDimension(vector);
    if (k <= 0) return [];
    this.ensureIndex();

    const query = toFloat32(vector);
    const hits: SearchHit[] = this.loadTopic(topic).entries.map(({ payload, embedding }) => ({
      ...payload,
      score: cosineSimilarity(query, embedding),
    }));

    hits.sort(byScoreThenId);
    return hits.slice(0, k);
  }

  /**
   * Delete every row for the topic. Returns the number of rows removed.
   */
  async purge(topic: string): Promise<number> {
    this.ensureIndex();
    const remove = this.db.transaction((name: string): number => {
      const result = this.db.prepare('DELETE FROM chunks WHERE topic = ?').run(name);
      if (result.changes > 0) {
        this.bumpRevision(name);
      }
      return result.changes;
    });
    const removed = remove(topic);
    this.topics.delete(topic);
    log.info(`Purged ${removed} chunks`, { topic });
    return removed;
  }

  /**
   * Count rows for a topic, stopping at COUNT_CAP.
   */
  async countByTopic(topic: string): Promise<TopicCount> {
    this.ensureIndex();
    const row = this.db
      .prepare<[string, number], { count: number }>(
        'SELECT COUNT(*) AS count FROM (SELECT 1 FROM chunks WHERE topic = ? LIMIT ?)',
      )
      .get(topic, COUNT_CAP);
    const count = row?.count ?? 0;
    return { count, capped: count >= COUNT_CAP };
  }

  async listTopics(): Promise<TopicSummary[]> {
    this.ensureIndex();
    return this.db
      .prepare<[], { topic: string; chunks: number; last_ingested_at: number }>(
        `SELECT topic, COUNT(*) AS chunks, MAX(ingested_at) AS last_ingested_at
         FROM chunks GROUP BY topic ORDER BY topic`,
      )
      .all()
      .map((row) => ({ topic: row.topic, chunks: row.chunks, lastIngestedAt: row.last_ingested_at }));
  }

  /**
   * Drop the in-memory index; the next search reloads from SQLite.
   */
  reset(): void {
    this.topics.clear();
  }

  private checkDimension(vector: number[]): void {
    if (vector.length !== this.dimensions) {
      throw new StorageError(
        `Expected ${this.dimensions}-dimension vector, got ${vector.length}`,
        'DIMENSION_MISMATCH',
      );
    }
  }

  /** Topics that currently own any of these chunk ids. */
  private topicsOf(ids: string[]): string[] {
    const found = new Set<string>();
    for (let i = 0; i < ids.length; i += DELETE_BATCH_SIZE) {
      const batch = ids.slice(i, i + DELETE_BATCH_SIZE);
      const placeholders = batch.map(() => '?').join(',');
      const rows = this.db
        .prepare<string[], { topic: string }>(
          `SELECT DISTINCT topic FROM chunks WHERE chunk_id IN (${placeholders})`,
        )
        .all(...batch);
      for (const row of rows) {
        found.add(row.topic);
      }
    }
    return [...found];
  }

  private revisionOf(topic: string): number {
    const row = this.db
      .prepare<[string], { revision: number }>('SELECT revision FROM topic_revisions WHERE topic = ?')
      .get(topic);
    return row?.revision ?? 0;
  }

  private bumpRevision(topic: string): void {
    this.db
      .prepare(
        `INSERT INTO topic_revisions (topic, revision) VALUES (?, 1)
         ON CONFLICT(topic) DO UPDATE SET revision = revision + 1`,
      )
      .run(topic);
  }

  /** The topic's rows, reloaded when another writer has changed them. */
  private loadTopic(topic: string): LoadedTopic {
    const cached = this.topics.get(topic);
    if (cached && cached.revision === this.revisionOf(topic)) return cached;

    // Revision and rows are read in one transaction so they agree.
    const read = this.db.transaction((name: string): LoadedTopic => {
      const revision = this.revisionOf(name);
      const rows = this.db
        .prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE topic = ?')
        .all(name);
      return {
        revision,
        entries: rows.map((row) => ({
          payload: toPayload(row),
          embedding: deserializeEmbedding(row.embedding),
        })),
      };
    });
    const loaded = read(topic);
    this.topics.set(topic, loaded);
    log.debug(`Loaded ${loaded.entries.length} vectors`, { topic, revision: loaded.revision });
    return loaded;
  }
}
