/**
 * Ingestion stage exports (clean → chunk).
 */

export { cleanText, cleanSections, DEFAULT_MIN_CHARS } from './cleaner.js';
export { chunkSections, windowTokenIds, makeChunkId, SPECIAL_TOKEN_RESERVE } from './chunker.js';
export type { TokenSpan } from './chunker.js';
export { loadTokenizer } from './tokenizer.js';
export type { Chunk, ChunkerOptions, TokenCodec } from './types.js';
