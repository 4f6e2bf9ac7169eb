/**
 * Types for the ingestion stage (clean → chunk).
 *
 * @module ingest/types
 */

/**
 * A token-bounded passage cut from one section.
 */
export interface Chunk {
  /** sha1 of `url|title|start|end`, hex. Stable across re-ingests of unchanged text. */
  chunkId: string;
  text: string;
  /** Window length plus the two reserved special tokens. */
  tokens: number;
  /** Section heading; null for the lead section. */
  section: string | null;
  url: string;
}

export interface ChunkerOptions {
  /** Window size including the reserved special tokens. Must be greater than 8. */
  maxTokens: number;
  /** Tokens shared by consecutive windows. */
  overlap: number;
  /** Embedding model whose tokenizer sizes the windows. */
  modelId: string;
  /** Windows decoding to fewer characters are dropped. Default: 80. */
  minChars?: number;
  /** Tokenizer to use instead of loading the model's. */
  tokenizer?: TokenCodec;
}

/**
 * Text ↔ token id conversion without special tokens.
 */
export interface TokenCodec {
  /** Token ids for `text`, no special tokens. */
  encode(text: string): number[];
  /** Text for `ids`, trimmed. */
  decode(ids: number[]): string;
}
