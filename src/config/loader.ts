/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Explicit overrides (CLI flags, constructor options)
 * 2. Environment variables (LECTERN_*)
 * 3. Project config file (./lectern.config.json)
 * 4. User config file (~/.lectern/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { resolvePath, DEFAULT_CONFIG, type LecternConfig } from './pipeline-config.js';
import { findModel, getAllModelIds, outputDimensions } from '../models/model-registry.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** Shape of lectern.config.json. Unknown keys are ignored. */
export const externalConfigSchema = z
  .object({
    embedding: z
      .object({
        model: z.string(),
        baseUrl: z.string().url().nullable(),
        dimensions: z.number().int().nullable(),
        batchSize: z.number().int(),
        maxSeqLength: z.number().int().nullable(),
        normalize: z.boolean(),
        timeoutMs: z.number().int(),
      })
      .partial(),
    chunking: z
      .object({
        maxTokens: z.number().int(),
        overlap: z.number().int(),
        minChars: z.number().int(),
      })
      .partial(),
    storage: z
      .object({
        dbPath: z.string(),
        dimensions: z.number().int().nullable(),
      })
      .partial(),
    source: z
      .object({
        language: z.string(),
        userAgent: z.string(),
      })
      .partial(),
    retrieval: z
      .object({
        defaultK: z.number().int(),
      })
      .partial(),
  })
  .partial();

/** External config file structure */
export type ExternalConfig = z.infer<typeof externalConfigSchema>;

/**
 * Load config from a JSON file. Returns null when the file is missing or unusable.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }

  const parsed = externalConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Ignoring malformed config file ${path}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }
  return parsed.data;
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    log.warn(`Ignoring non-integer ${name}`, { value: raw });
    return undefined;
  }
  return value;
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw !== undefined && raw !== '' ? raw : undefined;
}

/**
 * Parse a boolean flag. Accepts 1/true/yes/y/on (case-insensitive); anything else is false.
 */
export function parseBooleanFlag(raw: string): boolean {
  return ['1', 'true', 'yes', 'y', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Load config from environment variables.
 * Variables are prefixed with LECTERN_ and use underscores for nesting.
 * Examples:
 *   LECTERN_EMBEDDING_MODEL=text-embedding-3-large
 *   LECTERN_CHUNKING_MAX_TOKENS=256
 *   LECTERN_STORAGE_DB_PATH=~/.lectern/index.db
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  // Embedding
  const model = envString('LECTERN_EMBEDDING_MODEL');
  if (model !== undefined) {
    config.embedding = { ...config.embedding, model };
  }
  const baseUrl = envString('LECTERN_EMBEDDING_BASE_URL');
  if (baseUrl !== undefined) {
    config.embedding = { ...config.embedding, baseUrl };
  }
  const embeddingDimensions = envInt('LECTERN_EMBEDDING_DIMENSIONS');
  if (embeddingDimensions !== undefined) {
    config.embedding = { ...config.embedding, dimensions: embeddingDimensions };
  }
  const batchSize = envInt('LECTERN_EMBEDDING_BATCH_SIZE');
  if (batchSize !== undefined) {
    config.embedding = { ...config.embedding, batchSize };
  }
  const maxSeqLength = envInt('LECTERN_EMBEDDING_MAX_SEQ_LENGTH');
  if (maxSeqLength !== undefined) {
    config.embedding = { ...config.embedding, maxSeqLength };
  }
  const normalize = envString('LECTERN_EMBEDDING_NORMALIZE');
  if (normalize !== undefined) {
    config.embedding = { ...config.embedding, normalize: parseBooleanFlag(normalize) };
  }
  const timeoutMs = envInt('LECTERN_EMBEDDING_TIMEOUT_MS');
  if (timeoutMs !== undefined) {
    config.embedding = { ...config.embedding, timeoutMs };
  }

  // Chunking
  const maxTokens = envInt('LECTERN_CHUNKING_MAX_TOKENS');
  if (maxTokens !== undefined) {
    config.chunking = { ...config.chunking, maxTokens };
  }
  const overlap = envInt('LECTERN_CHUNKING_OVERLAP');
  if (overlap !== undefined) {
    config.chunking = { ...config.chunking, overlap };
  }
  const minChars = envInt('LECTERN_CHUNKING_MIN_CHARS');
  if (minChars !== undefined) {
    config.chunking = { ...config.chunking, minChars };
  }

  // Storage
  const dbPath = envString('LECTERN_STORAGE_DB_PATH');
  if (dbPath !== undefined) {
    config.storage = { ...config.storage, dbPath };
  }
  const dimensions = envInt('LECTERN_STORAGE_DIMENSIONS');
  if (dimensions !== undefined) {
    config.storage = { ...config.storage, dimensions };
  }

  // Source
  const language = envString('LECTERN_SOURCE_LANGUAGE');
  if (language !== undefined) {
    config.source = { ...config.source, language };
  }
  const userAgent = envString('LECTERN_SOURCE_USER_AGENT');
  if (userAgent !== undefined) {
    config.source = { ...config.source, userAgent };
  }

  // Retrieval
  const defaultK = envInt('LECTERN_RETRIEVAL_DEFAULT_K');
  if (defaultK !== undefined) {
    config.retrieval = { ...config.retrieval, defaultK };
  }

  return config;
}

/**
 * Merge two configs section by section, with source overriding target.
 */
export function mergeConfig(target: LecternConfig, source: ExternalConfig): LecternConfig {
  return {
    embedding: { ...target.embedding, ...source.embedding },
    chunking: { ...target.chunking, ...source.chunking },
    storage: { ...target.storage, ...source.storage },
    source: { ...target.source, ...source.source },
    retrieval: { ...target.retrieval, ...source.retrieval },
  };
}

/**
 * Validate a resolved config. Returns one message per problem.
 */
export function validateConfig(config: LecternConfig): string[] {
  const errors: string[] = [];

  // Embedding
  const model = findModel(config.embedding.model);
  if (!model) {
    errors.push(
      `embedding.model "${config.embedding.model}" is not a known model (available: ${getAllModelIds().join(', ')})`,
    );
  }
  const outputDims = model ? outputDimensions(model, config.embedding.dimensions) : null;
  if (model && outputDims === null) {
    errors.push(`embedding.dimensions (${config.embedding.dimensions}) is not a size ${model.id} can produce`);
  }
  if (config.embedding.baseUrl !== null && !URL.canParse(config.embedding.baseUrl)) {
    errors.push('embedding.baseUrl must be an absolute URL (or null for api.openai.com)');
  }
  if (config.embedding.batchSize < 1) {
    errors.push('embedding.batchSize must be at least 1');
  }
  if (config.embedding.maxSeqLength !== null && config.embedding.maxSeqLength < 1) {
    errors.push('embedding.maxSeqLength must be positive (or null for the model limit)');
  }
  if (config.embedding.timeoutMs < 1) {
    errors.push('embedding.timeoutMs must be at least 1');
  }

  // Chunking
  if (config.chunking.maxTokens <= 8) {
    errors.push('chunking.maxTokens must be greater than 8');
  }
  if (config.chunking.overlap < 0) {
    errors.push('chunking.overlap must be >= 0');
  }
  if (config.chunking.minChars < 0) {
    errors.push('chunking.minChars must be >= 0');
  }

  // Storage
  if (config.storage.dbPath.trim() === '') {
    errors.push('storage.dbPath must not be empty');
  }
  if (config.storage.dimensions !== null) {
    if (config.storage.dimensions < 1) {
      errors.push('storage.dimensions must be positive (or null for the embedding dimension)');
    } else if (model && outputDims !== null && outputDims !== config.storage.dimensions) {
      errors.push(
        `storage.dimensions (${config.storage.dimensions}) does not match ${model.id} output (${outputDims})`,
      );
    }
  }

  // Source
  if (!/^[a-z][a-z-]*$/.test(config.source.language)) {
    errors.push('source.language must be a language edition code such as "en"');
  }

  // Retrieval
  if (config.retrieval.defaultK < 1) {
    errors.push('retrieval.defaultK must be at least 1');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Explicit overrides (highest priority) */
  overrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): LecternConfig {
  let config: LecternConfig = mergeConfig(DEFAULT_CONFIG, {});

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.lectern/config.json');
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfig = loadConfigFile(
      options.projectConfigPath ?? join(process.cwd(), 'lectern.config.json'),
    );
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  // 1. Explicit overrides
  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  return config;
}

/**
 * Load configuration and reject it when validation fails.
 */
export function loadValidatedConfig(options: LoadConfigOptions = {}): LecternConfig {
  return assertValidConfig(loadConfig(options));
}

/**
 * Throw ConfigError CONFIG_INVALID listing every problem, or return the config unchanged.
 */
export function assertValidConfig(config: LecternConfig): LecternConfig {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration:\n  - ${errors.join('\n  - ')}`, 'CONFIG_INVALID');
  }
  return config;
}

/**
 * Vector dimension the store should be created with.
 */
export function resolveDimensions(config: LecternConfig): number {
  if (config.storage.dimensions !== null) {
    return config.storage.dimensions;
  }
  const model = findModel(config.embedding.model);
  if (!model) {
    throw new ConfigError(`Unknown embedding model: ${config.embedding.model}`, 'UNKNOWN_MODEL');
  }
  const dims = outputDimensions(model, config.embedding.dimensions);
  if (dims === null) {
    throw new ConfigError(
      `${model.id} cannot produce ${config.embedding.dimensions}-dimension vectors`,
      'UNSUPPORTED_DIMENSIONS',
    );
  }
  return dims;
}
