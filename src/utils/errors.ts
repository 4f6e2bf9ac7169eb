/**
 * Standardized error types for Lectern.
 *
 * All errors extend from LecternError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { StorageError, IngestionError } from './errors.js';
 *
 * throw new StorageError('Vector dimension mismatch', 'DIMENSION_MISMATCH');
 *
 * try {
 *   await source.fetch(topic);
 * } catch (err) {
 *   throw new IngestionError('Topic ingestion failed', 'INGEST_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all Lectern errors.
 *
 * - `code`: Programmatic error identifier (e.g., 'SOURCE_NOT_FOUND')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'StorageError')
 */
export class LecternError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including the full cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    let cause: Error | undefined = this.cause;
    while (cause) {
      result += `\n  Caused by: ${cause.message}`;
      if (cause instanceof LecternError) {
        result += ` [${cause.code}]`;
        cause = cause.cause;
      } else {
        cause = undefined;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Caller supplied an argument the pipeline cannot act on. Raised before any I/O.
 *
 * Common codes:
 * - `EMPTY_TOPIC`: Topic is empty or whitespace-only
 * - `INVALID_K`: Result count is not a positive integer
 * - `INVALID_CHUNKING`: Chunk size or overlap out of range
 * - `LENGTH_MISMATCH`: Items and vectors differ in length
 */
export class InvalidInputError extends LecternError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Source Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the text source provider.
 *
 * Common codes:
 * - `SOURCE_NOT_FOUND`: No document exists for the topic
 * - `SOURCE_FETCH_FAILED`: Transport failure or unexpected response
 */
export class SourceError extends LecternError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors during topic ingestion.
 *
 * Common codes:
 * - `NO_CONTENT`: Source returned zero sections
 * - `NO_CHUNKS`: Cleaning and chunking left nothing to embed
 * - `INGEST_FAILED`: Any other failure in fetch → clean → chunk → embed → upsert
 */
export class IngestionError extends LecternError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Embedding Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the embedding model or tokenizer.
 *
 * Common codes:
 * - `NO_MODEL`: encode() called before the model could be loaded
 * - `MODEL_LOAD_FAILED`: Pipeline or tokenizer failed to load
 * - `UNEXPECTED_OUTPUT`: Model returned a tensor of the wrong shape or type
 */
export class EmbeddingError extends LecternError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the vector index store.
 *
 * Common codes:
 * - `DB_OPEN_FAILED`: Cannot open the database file
 * - `DIMENSION_MISMATCH`: Vector or schema dimension differs from the store's
 * - `UPSERT_FAILED`: Delete-then-insert transaction failed
 */
export class StorageError extends LecternError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The single failure surfaced by getChunks().
 *
 * Common codes:
 * - `GET_CHUNKS_FAILED`: Ingest, query embedding, or search failed
 */
export class RetrievalError extends LecternError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_PARSE_FAILED`: Failed to parse a config file
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `UNKNOWN_MODEL`: Embedding model id not in the registry
 */
export class ConfigError extends LecternError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a Lectern error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof LecternError && error.code === code;
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}

export function isIngestionError(error: unknown): error is IngestionError {
  return error instanceof IngestionError;
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a LecternError.
 *
 * If the error is already a LecternError, returns it unchanged.
 * Otherwise wraps it in a new LecternError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): LecternError {
  if (error instanceof LecternError) {
    return error;
  }

  return new LecternError(message ?? errorMessage(error), 'UNKNOWN', error);
}
