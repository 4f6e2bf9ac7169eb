/**
 * Public result and option types for retrieval.
 *
 * @module retrieval/types
 */

import type { TextEmbedder } from '../models/embedder.js';
import type { SourceProvider } from '../source/types.js';
import type { IndexStore } from '../storage/types.js';
import type { TokenCodec } from '../ingest/types.js';

/** Where a retrieved chunk came from. */
export interface ChunkSource {
  kind: 'wikipedia';
  url: string;
  /** Article title. */
  title: string;
  /** Section heading; null for the lead. */
  section: string | null;
}

/**
 * One passage returned by getChunks().
 */
export interface RetrievedChunk {
  topic: string;
  chunkId: string;
  text: string;
  /** Cosine similarity to the query. */
  score: number;
  tokens: number;
  embeddingModel: string;
  source: ChunkSource;
}

export interface GetChunksOptions {
  /** Free-text query; the topic itself is used when absent or blank. */
  query?: string;
  /** Number of results. Default: 6. */
  k?: number;
}

export interface IngestResult {
  topic: string;
  /** Canonical article title. */
  title: string;
  url: string;
  /** Sections left after cleaning. */
  sectionCount: number;
  chunkCount: number;
  durationMs: number;
  forced: boolean;
}

export interface RetrievalServiceOptions {
  store: IndexStore;
  embedder: TextEmbedder;
  source: SourceProvider;
  /** Default: 800 */
  chunkMaxTokens?: number;
  /** Default: 100 */
  chunkOverlap?: number;
  /** Default: 80 */
  minChars?: number;
  /** Tokenizer for chunking. Default: the embedding model's. */
  tokenizer?: TokenCodec;
  /** Current time in ms. Default: Date.now */
  clock?: () => number;
  /** k when getChunks() is called without one. Default: 6 */
  defaultK?: number;
}
