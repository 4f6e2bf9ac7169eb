/**
 * Types for the vector index store.
 *
 * @module storage/types
 */

import type { Chunk } from '../ingest/types.js';

/**
 * Payload stored with every vector.
 */
export interface StoredChunk {
  chunkId: string;
  topic: string;
  text: string;
  tokens: number;
  embeddingModel: string;
  url: string;
  /** Article title. */
  title: string;
  /** Section heading; null for the lead. */
  section: string | null;
  /** Unix seconds. */
  ingestedAt: number;
}

/**
 * A chunk plus the article-level fields upsert needs.
 */
export interface IndexedItem extends Chunk {
  /** Article title. */
  title: string;
  embeddingModel: string;
  ingestedAt: number;
}

/** Stored payload ranked by cosine similarity (higher is closer). */
export interface SearchHit extends StoredChunk {
  score: number;
}

export interface TopicCount {
  count: number;
  /** True when the count stopped at the bound. */
  capped: boolean;
}

export interface TopicSummary {
  topic: string;
  chunks: number;
  lastIngestedAt: number;
}

/**
 * Topic-scoped vector index. The retrieval service depends on this, not on
 * the SQLite implementation.
 */
export interface IndexStore {
  readonly dimensions: number;
  isIndexed(topic: string): Promise<boolean>;
  upsert(topic: string, items: IndexedItem[], vectors: number[][]): Promise<void>;
  search(topic: string, vector: number[], k: number): Promise<SearchHit[]>;
  purge(topic: string): Promise<number>;
  countByTopic(topic: string): Promise<TopicCount>;
  listTopics(): Promise<TopicSummary[]>;
}
