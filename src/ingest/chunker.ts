/**
 * Token-window chunking of cleaned sections.
 *
 * Each section is tokenized with the embedding model's tokenizer and cut into
 * overlapping windows. Two positions per window are reserved for special
 * tokens, so a chunk stays within `maxTokens` for models that add them.
 */

import { createHash } from 'node:crypto';
import type { Section } from '../source/types.js';
import type { Chunk, ChunkerOptions } from './types.js';
import { loadTokenizer } from './tokenizer.js';
import { DEFAULT_MIN_CHARS } from './cleaner.js';
import { InvalidInputError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('chunker');

/** Start and end markers. */
export const SPECIAL_TOKEN_RESERVE = 2;

/** Half-open token span. */
export type TokenSpan = [start: number, end: number];

/**
 * Overlapping `[start, end)` windows over `n` tokens.
 *
 * The last window always ends at `n`. An `overlap` at or above `size` still
 * advances by one token per window.
 */
export function windowTokenIds(n: number, size: number, overlap: number): TokenSpan[] {
  if (n <= 0) return [];
  if (size <= 0) return [[0, n]];

  const step = Math.max(size - overlap, 1);
  const spans: TokenSpan[] = [];
  let start = 0;
  while (start < n) {
    const end = Math.min(start + size, n);
    spans.push([start, end]);
    if (end === n) break;
    start += step;
  }
  return spans;
}

/**
 * Deterministic chunk id for a window of a section.
 */
export function makeChunkId(url: string, title: string | null, start: number, end: number): string {
  return createHash('sha1').update(`${url}|${title ?? ''}|${start}|${end}`).digest('hex');
}

/**
 * Cut sections into token windows.
 */
export async function chunkSections(sections: Section[], options: ChunkerOptions): Promise<Chunk[]> {
  const { maxTokens, overlap } = options;
  const minChars = options.minChars ?? DEFAULT_MIN_CHARS;

  if (!Number.isInteger(maxTokens) || maxTokens <= 8) {
    throw new InvalidInputError(`maxTokens must be an integer > 8, got ${maxTokens}`, 'INVALID_CHUNKING');
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidInputError(`overlap must be an integer >= 0, got ${overlap}`, 'INVALID_CHUNKING');
  }

  const tokenizer = options.tokenizer ?? loadTokenizer(options.modelId);
  const size = Math.max(maxTokens - SPECIAL_TOKEN_RESERVE, 1);
  const chunks: Chunk[] = [];

  for (const section of sections) {
    const raw = section.text;
    if (!raw || raw.length < minChars) continue;

    const ids = tokenizer.encode(raw);
    for (const [start, end] of windowTokenIds(ids.length, size, overlap)) {
      const window = ids.slice(start, end);
      const text = tokenizer.decode(window).trim();
      if (text.length < minChars) continue;

      chunks.push({
        chunkId: makeChunkId(section.url, section.title, start, end),
        text,
        tokens: window.length + SPECIAL_TOKEN_RESERVE,
        section: section.title,
        url: section.url,
      });
    }
  }

  log.debug(`Chunked ${sections.length} sections into ${chunks.length} chunks`, { maxTokens, overlap });
  return chunks;
}
