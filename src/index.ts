/**
 * Lectern
 *
 * Topic-scoped retrieval: fetch an encyclopedia article, clean and chunk it,
 * embed the chunks locally and answer top-k similarity queries.
 *
 * @packageDocumentation
 */

// Configuration
export { DEFAULT_CONFIG, resolvePath } from './config/pipeline-config.js';
export type {
  LecternConfig,
  EmbeddingConfig,
  ChunkingConfig,
  StorageConfig,
  SourceConfig,
  RetrievalConfig,
} from './config/pipeline-config.js';
export {
  loadConfig,
  loadValidatedConfig,
  assertValidConfig,
  validateConfig,
  mergeConfig,
  resolveDimensions,
  externalConfigSchema,
} from './config/loader.js';
export type { ExternalConfig, LoadConfigOptions } from './config/loader.js';

// Source
export * from './source/index.js';

// Ingestion
export * from './ingest/index.js';

// Embedding
export { Embedder, createOpenAIBackend } from './models/embedder.js';
export type {
  TextEmbedder,
  EmbedderOptions,
  EmbeddingBackend,
  BackendFactory,
  BackendOptions,
} from './models/embedder.js';
export {
  MODEL_REGISTRY,
  findModel,
  getModel,
  getAllModelIds,
  outputDimensions,
} from './models/model-registry.js';
export type { ModelConfig } from './models/model-registry.js';

// Storage
export * from './storage/index.js';

// Retrieval
export * from './retrieval/index.js';

// Utilities
export * from './utils/errors.js';
export type { Diagnostic } from './utils/diagnostic.js';
export { isOk } from './utils/diagnostic.js';
export { logger, createLogger, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
