/**
 * Retrieval orchestrator.
 *
 * Pipeline on first request for a topic:
 *   fetch → clean → chunk → embed (one batch) → upsert
 * and on every request:
 *   embed query → topic-scoped vector search → RetrievedChunk[]
 */

import type { TextEmbedder } from '../models/embedder.js';
import type { SourceProvider } from '../source/types.js';
import type { IndexStore, IndexedItem, SearchHit } from '../storage/types.js';
import type { TokenCodec } from '../ingest/types.js';
import { cleanSections, DEFAULT_MIN_CHARS } from '../ingest/cleaner.js';
import { chunkSections } from '../ingest/chunker.js';
import { IngestionError, InvalidInputError, RetrievalError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type {
  GetChunksOptions,
  IngestResult,
  RetrievalServiceOptions,
  RetrievedChunk,
} from './types.js';

const log = createLogger('retrieval');

export const DEFAULT_CHUNK_MAX_TOKENS = 800;
export const DEFAULT_CHUNK_OVERLAP = 100;
export const DEFAULT_K = 6;

interface InflightIngest {
  forced: boolean;
  run: Promise<IngestResult>;
}

function requireTopic(topic: string): string {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new InvalidInputError('topic must be a non-empty string', 'EMPTY_TOPIC');
  }
  return trimmed;
}

export class RetrievalService {
  readonly store: IndexStore;
  readonly embedder: TextEmbedder;
  readonly source: SourceProvider;
  readonly chunkMaxTokens: number;
  readonly chunkOverlap: number;
  readonly minChars: number;
  readonly defaultK: number;
  private readonly tokenizer: TokenCodec | undefined;
  private readonly clock: () => number;
  /** topic → in-flight ingest */
  private readonly inflight = new Map<string, InflightIngest>();

  constructor(options: RetrievalServiceOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.source = options.source;
    this.chunkMaxTokens = options.chunkMaxTokens ?? DEFAULT_CHUNK_MAX_TOKENS;
    this.chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    this.minChars = options.minChars ?? DEFAULT_MIN_CHARS;
    this.defaultK = options.defaultK ?? DEFAULT_K;
    this.tokenizer = options.tokenizer;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Top-k chunks for a topic, ingesting it first when it is not indexed.
   * Results are ordered by descending score.
   */
  async getChunks(topic: string, options: GetChunksOptions = {}): Promise<RetrievedChunk[]> {
    const name = requireTopic(topic);
    const k = options.k ?? this.defaultK;
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidInputError(`k must be a positive integer, got ${k}`, 'INVALID_K');
    }

    try {
      await this.ensureIndexed(name);

      const query = options.query?.trim();
      const vector = await this.embedder.encodeOne(query ? query : name);
      const hits = await this.store.search(name, vector, k);
      log.debug(`Retrieved ${hits.length} chunks`, { topic: name, k });
      return hits.map((hit) => this.toRetrievedChunk(name, hit));
    } catch (error) {
      throw new RetrievalError(`get_chunks failed: ${errorMessage(error)}`, 'GET_CHUNKS_FAILED', error);
    }
  }

  async isIndexed(topic: string): Promise<boolean> {
    return this.store.isIndexed(topic.trim());
  }

  /**
   * Fetch and index the topic again, replacing chunks with the same ids.
   */
  async reingest(topic: string): Promise<IngestResult> {
    return this.ingest(requireTopic(topic), true);
  }

  /**
   * Remove a topic from the index. Returns the number of chunks removed.
   */
  async purge(topic: string): Promise<number> {
    return this.store.purge(topic.trim());
  }

  /**
   * fetch → clean → chunk → embed → upsert.
   *
   * Concurrent calls for the same topic share one run. A forced call that
   * finds an unforced run pending starts its own run once that one settles.
   */
  ingest(topic: string, force: boolean = false): Promise<IngestResult> {
    const name = requireTopic(topic);
    const pending = this.inflight.get(name);
    if (pending && (pending.forced || !force)) {
      log.debug(`Joining in-flight ingest`, { topic: name });
      return pending.run;
    }

    if (pending) {
      log.debug(`Queueing forced ingest behind in-flight run`, { topic: name });
      const queued = Promise.allSettled([pending.run]).then(() => this.runIngest(name, true));
      return this.track(name, true, queued);
    }
    return this.track(name, force, this.runIngest(name, force));
  }

  private track(topic: string, forced: boolean, work: Promise<IngestResult>): Promise<IngestResult> {
    const entry: InflightIngest = {
      forced,
      run: work.finally(() => {
        if (this.inflight.get(topic) === entry) {
          this.inflight.delete(topic);
        }
      }),
    };
    this.inflight.set(topic, entry);
    return entry.run;
  }

  private async ensureIndexed(topic: string): Promise<void> {
    if (await this.store.isIndexed(topic)) return;
    await this.ingest(topic, false);
  }

  private async runIngest(topic: string, force: boolean): Promise<IngestResult> {
    const start = this.clock();
    log.info(`${force ? 'Re-ingesting' : 'Ingesting'} topic`, { topic });

    const article = await this.source.fetch(topic);
    if (article.sections.length === 0) {
      throw new IngestionError(`No content sections fetched for topic "${topic}"`, 'NO_CONTENT');
    }

    const sections = cleanSections(article.sections, this.minChars);
    const chunks = await chunkSections(sections, {
      maxTokens: this.chunkMaxTokens,
      overlap: this.chunkOverlap,
      modelId: this.embedder.modelName,
      minChars: this.minChars,
      tokenizer: this.tokenizer,
    });
    if (chunks.length === 0) {
      throw new IngestionError(`No chunks produced after cleaning "${topic}"`, 'NO_CHUNKS');
    }

    const vectors = await this.embedder.encode(chunks.map((c) => c.text));
    const ingestedAt = Math.floor(this.clock() / 1000);
    const items: IndexedItem[] = chunks.map((chunk) => ({
      ...chunk,
      title: article.title,
      embeddingModel: this.embedder.modelName,
      ingestedAt,
    }));
    await this.store.upsert(topic, items, vectors);

    const result: IngestResult = {
      topic,
      title: article.title,
      url: article.url,
      sectionCount: sections.length,
      chunkCount: chunks.length,
      durationMs: this.clock() - start,
      forced: force,
    };
    log.info(`Indexed ${result.chunkCount} chunks from ${result.sectionCount} sections`, {
      topic,
      durationMs: result.durationMs,
    });
    return result;
  }

  private toRetrievedChunk(topic: string, hit: SearchHit): RetrievedChunk {
    return {
      topic,
      chunkId: hit.chunkId,
      text: hit.text,
      score: hit.score,
      tokens: hit.tokens,
      embeddingModel: hit.embeddingModel || this.embedder.modelName,
      source: {
        kind: this.source.kind,
        url: hit.url,
        title: hit.title,
        section: hit.section,
      },
    };
  }
}
