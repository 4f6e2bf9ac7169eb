/**
 * Runtime configuration for the retrieval pipeline.
 */

/** Embedding model settings. */
export interface EmbeddingConfig {
  /** Model name or registry id (see models/model-registry.ts). */
  model: string;
  /**
   * OpenAI-compatible endpoint serving the model; null for api.openai.com.
   * Where the model runs (and on which device) is up to that server.
   */
  baseUrl: string | null;
  /** Output dimension; null keeps the model's native size. */
  dimensions: number | null;
  /** Texts per request. */
  batchSize: number;
  /** Truncation length override in tokens; null keeps the model limit. */
  maxSeqLength: number | null;
  /** L2-normalize output vectors (the store assumes unit length). */
  normalize: boolean;
  /** Per-request timeout. */
  timeoutMs: number;
}

/** Token windowing settings. */
export interface ChunkingConfig {
  /** Window size including the 2 reserved special tokens. */
  maxTokens: number;
  /** Tokens shared by consecutive windows. */
  overlap: number;
  /** Sections and windows shorter than this (in characters) are dropped. */
  minChars: number;
}

/** Vector index settings. */
export interface StorageConfig {
  /** SQLite file; '~' expands to the home directory, ':memory:' is accepted. */
  dbPath: string;
  /** Vector dimension; null takes the embedding output dimension. */
  dimensions: number | null;
}

/** Source provider settings. */
export interface SourceConfig {
  /** Encyclopedia language edition. */
  language: string;
  userAgent: string;
}

export interface RetrievalConfig {
  /** k used when a caller does not pass one. */
  defaultK: number;
}

/**
 * Complete pipeline configuration.
 */
export interface LecternConfig {
  embedding: EmbeddingConfig;
  chunking: ChunkingConfig;
  storage: StorageConfig;
  source: SourceConfig;
  retrieval: RetrievalConfig;
}

/**
 * Default configuration values.
 * Chunk sizes follow the retrieval service defaults (800 tokens, 100 overlap).
 */
export const DEFAULT_CONFIG: LecternConfig = {
  embedding: {
    model: 'text-embedding-3-small',
    baseUrl: null,
    dimensions: 384,
    batchSize: 32,
    maxSeqLength: null,
    normalize: true,
    timeoutMs: 30_000,
  },
  chunking: {
    maxTokens: 800,
    overlap: 100,
    minChars: 80,
  },
  storage: {
    dbPath: '~/.lectern/index.db',
    dimensions: null,
  },
  source: {
    language: 'en',
    userAgent: 'lectern/0.1 (topic retrieval pipeline)',
  },
  retrieval: {
    defaultK: 6,
  },
};

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}
