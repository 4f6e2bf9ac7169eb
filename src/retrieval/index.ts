/**
 * Retrieval exports and the composition root.
 */

import { Embedder } from '../models/embedder.js';
import { WikipediaSource } from '../source/wikipedia.js';
import { VectorStore } from '../storage/vector-store.js';
import { openDatabase } from '../storage/db.js';
import {
  assertValidConfig,
  loadValidatedConfig,
  resolveDimensions,
  type LoadConfigOptions,
} from '../config/loader.js';
import type { LecternConfig } from '../config/pipeline-config.js';
import { RetrievalService } from './retrieval-service.js';

export { RetrievalService, DEFAULT_CHUNK_MAX_TOKENS, DEFAULT_CHUNK_OVERLAP, DEFAULT_K } from './retrieval-service.js';
export { countChunks, previewChunks } from './diagnostics.js';
export type {
  ChunkSource,
  GetChunksOptions,
  IngestResult,
  RetrievalServiceOptions,
  RetrievedChunk,
} from './types.js';

/**
 * Build a service from configuration: SQLite store at `storage.dbPath`,
 * OpenAI embeddings client, Wikipedia source.
 *
 * Accepts a resolved config, or loader options to resolve one.
 */
export function createRetrievalService(config?: LecternConfig | LoadConfigOptions): RetrievalService {
  const resolved =
    config && 'embedding' in config ? assertValidConfig(config) : loadValidatedConfig(config);

  const embedder = new Embedder({ config: resolved.embedding });
  const store = new VectorStore({
    db: openDatabase(resolved.storage.dbPath),
    dimensions: resolveDimensions(resolved),
  });
  store.ensureSchema();
  store.ensureIndex();

  return new RetrievalService({
    store,
    embedder,
    source: new WikipediaSource(resolved.source),
    chunkMaxTokens: resolved.chunking.maxTokens,
    chunkOverlap: resolved.chunking.overlap,
    minChars: resolved.chunking.minChars,
    defaultK: resolved.retrieval.defaultK,
  });
}

