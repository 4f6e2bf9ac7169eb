/**
 * Embedding adapter around the OpenAI embeddings endpoint.
 *
 * Creates the client once (lazily, on first use) and exposes batched
 * encode()/encodeOne(). Inputs longer than the model's limit are cut with
 * the model's own tokenizer. L2 normalization is applied here so it does not
 * depend on what the endpoint returns. Batching never changes a text's vector.
 */

import OpenAI from 'openai';
import { getModel, outputDimensions, type ModelConfig } from './model-registry.js';
import { loadConfig } from '../config/loader.js';
import type { EmbeddingConfig } from '../config/pipeline-config.js';
import { loadTokenizer } from '../ingest/tokenizer.js';
import type { TokenCodec } from '../ingest/types.js';
import { ConfigError, EmbeddingError, errorMessage } from '../utils/errors.js';
import { l2NormalizeRows } from '../utils/vector-math.js';
import { toFloat32 } from '../utils/embedding-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedder');

/**
 * Anything that turns text into fixed-dimension vectors.
 * The retrieval service depends on this, not on the concrete Embedder.
 */
export interface TextEmbedder {
  /** Model name recorded on every stored chunk. */
  readonly modelName: string;
  /** Vector dimension. */
  readonly dimensions: number;
  /** Encode a batch of texts → one vector per text, same order. */
  encode(texts: string[]): Promise<number[][]>;
  /** Encode a single text. */
  encodeOne(text: string): Promise<number[]>;
}

/** Remote model: raw vectors for one request's worth of texts. */
export interface EmbeddingBackend {
  embed(texts: string[]): Promise<number[][]>;
}

export interface BackendOptions {
  apiKey: string;
  /** OpenAI-compatible endpoint; null for api.openai.com. */
  baseUrl: string | null;
  /** Output size to request; null sends no `dimensions` parameter. */
  dimensions: number | null;
  timeoutMs: number;
}

export type BackendFactory = (model: ModelConfig, options: BackendOptions) => EmbeddingBackend;

export interface EmbedderOptions {
  /** Model name or registry id. */
  model?: string;
  /** OpenAI-compatible endpoint; null for api.openai.com. */
  baseUrl?: string | null;
  /** Default: LECTERN_EMBEDDING_API_KEY, then OPENAI_API_KEY. */
  apiKey?: string;
  /** Output dimension; null keeps the model's native size. */
  dimensions?: number | null;
  batchSize?: number;
  /** null keeps the model's input limit. */
  maxSeqLength?: number | null;
  normalize?: boolean;
  timeoutMs?: number;
  /** Settings used for anything not given above. Default: loadConfig().embedding */
  config?: EmbeddingConfig;
  /** Client constructor. Default: the openai package. */
  backendFactory?: BackendFactory;
  /** Tokenizer used to truncate long inputs. Default: the model's encoding. */
  tokenizer?: TokenCodec;
}

/** Sent as the key to custom endpoints that take none. */
const UNUSED_API_KEY = 'unused';

function envKey(): string | undefined {
  for (const name of ['LECTERN_EMBEDDING_API_KEY', 'OPENAI_API_KEY']) {
    const value = process.env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Embeddings through the openai client. Rows come back in input order.
 */
export const createOpenAIBackend: BackendFactory = (model, { apiKey, baseUrl, dimensions, timeoutMs }) => {
  const client = new OpenAI({
    apiKey,
    baseURL: baseUrl ?? undefined,
    timeout: timeoutMs,
    maxRetries: 2,
  });

  return {
    async embed(texts: string[]): Promise<number[][]> {
      const response = await client.embeddings.create({
        model: model.id,
        input: texts,
        encoding_format: 'float',
        dimensions: dimensions ?? undefined,
      });
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    },
  };
};

export class Embedder implements TextEmbedder {
  readonly modelName: string;
  readonly model: ModelConfig;
  readonly dimensions: number;
  readonly baseUrl: string | null;
  readonly batchSize: number;
  readonly maxSeqLength: number;
  readonly normalize: boolean;
  readonly timeoutMs: number;
  private readonly apiKey: string | undefined;
  private readonly backendFactory: BackendFactory;
  private backend: EmbeddingBackend | null = null;
  private tokenizer: TokenCodec | null;

  /**
   * Settings resolve explicit options first, then `config` (defaults,
   * config files and LECTERN_EMBEDDING_* variables).
   */
  constructor(options: EmbedderOptions = {}) {
    const config = options.config ?? loadConfig().embedding;

    this.modelName = (options.model ?? config.model).trim();
    this.model = getModel(this.modelName);

    const requested = options.dimensions !== undefined ? options.dimensions : config.dimensions;
    const dimensions = outputDimensions(this.model, requested);
    if (dimensions === null) {
      throw new ConfigError(
        `${this.model.id} cannot produce ${requested}-dimension vectors`,
        'UNSUPPORTED_DIMENSIONS',
      );
    }
    this.dimensions = dimensions;

    this.baseUrl = options.baseUrl !== undefined ? options.baseUrl : config.baseUrl;

    const batchSize = options.batchSize ?? config.batchSize;
    this.batchSize = Number.isInteger(batchSize) && batchSize > 0 ? batchSize : 32;

    const maxSeqLength = options.maxSeqLength !== undefined ? options.maxSeqLength : config.maxSeqLength;
    this.maxSeqLength =
      maxSeqLength !== null && maxSeqLength > 0
        ? Math.min(maxSeqLength, this.model.maxSeqLength)
        : this.model.maxSeqLength;

    this.normalize = options.normalize ?? config.normalize;
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
    this.apiKey = options.apiKey ?? envKey();
    this.backendFactory = options.backendFactory ?? createOpenAIBackend;
    this.tokenizer = options.tokenizer ?? null;
  }

  async encode(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const backend = this.getBackend();
    const inputs = texts.map((text) => this.truncate(text));
    const rows: number[][] = [];

    // One request per batch
    for (let i = 0; i < inputs.length; i += this.batchSize) {
      const batch = inputs.slice(i, i + this.batchSize);

      let output: number[][];
      try {
        output = await backend.embed(batch);
      } catch (error) {
        if (error instanceof EmbeddingError) throw error;
        throw new EmbeddingError(`Encoding failed: ${errorMessage(error)}`, 'ENCODE_FAILED', error);
      }

      const widths = [...new Set(output.map((row) => row.length))];
      if (output.length !== batch.length || widths.some((w) => w !== this.dimensions)) {
        throw new EmbeddingError(
          `Expected ${batch.length} vectors of ${this.dimensions}, got ${output.length} of ${widths.join('/') || 0}`,
          'UNEXPECTED_OUTPUT',
        );
      }
      rows.push(...output);
    }

    log.debug(`Encoded ${texts.length} texts`, { batches: Math.ceil(texts.length / this.batchSize) });
    return this.normalize ? l2NormalizeRows(rows) : rows.map((row) => toFloat32(row));
  }

  async encodeOne(text: string): Promise<number[]> {
    const [vector] = await this.encode([text]);
    return vector;
  }

  private truncate(text: string): string {
    // Every token covers at least one UTF-8 byte.
    if (Buffer.byteLength(text, 'utf8') <= this.maxSeqLength) return text;

    if (!this.tokenizer) {
      this.tokenizer = loadTokenizer(this.model.id);
    }
    const ids = this.tokenizer.encode(text);
    if (ids.length <= this.maxSeqLength) return text;

    log.debug(`Truncated input from ${ids.length} to ${this.maxSeqLength} tokens`);
    return this.tokenizer.decode(ids.slice(0, this.maxSeqLength));
  }

  private getBackend(): EmbeddingBackend {
    if (this.backend) return this.backend;

    if (!this.apiKey && this.baseUrl === null) {
      throw new EmbeddingError(
        'No API key for the embeddings endpoint: set LECTERN_EMBEDDING_API_KEY or OPENAI_API_KEY',
        'NO_API_KEY',
      );
    }
    let backend: EmbeddingBackend;
    try {
      backend = this.backendFactory(this.model, {
        apiKey: this.apiKey ?? UNUSED_API_KEY,
        baseUrl: this.baseUrl,
        dimensions: this.dimensions === this.model.dims ? null : this.dimensions,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new EmbeddingError(
        `Failed to create client for ${this.model.id}: ${errorMessage(error)}`,
        'CLIENT_INIT_FAILED',
        error,
      );
    }
    log.info(`Using ${this.model.id} at ${this.baseUrl ?? 'api.openai.com'}`, { dimensions: this.dimensions });
    this.backend = backend;
    return backend;
  }
}
