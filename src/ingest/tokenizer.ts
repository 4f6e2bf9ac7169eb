/**
 * Tokenizer access for the chunker and the embedder.
 *
 * Chunks are sized with the embedding model's own BPE encoding so a window
 * never silently overruns what the model will read. The encoding ranks ship
 * inside js-tiktoken, so loading needs no network.
 */

import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import { getModel } from '../models/model-registry.js';
import { EmbeddingError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { TokenCodec } from './types.js';

const log = createLogger('tokenizer');

export type { TokenCodec };

const codecs = new Map<TiktokenEncoding, TokenCodec>();

function toCodec(encoding: Tiktoken): TokenCodec {
  return {
    // Special-token text in an article is encoded as plain text.
    encode: (text) => encoding.encode(text, [], []),
    decode: (ids) => encoding.decode(ids).trim(),
  };
}

/**
 * The tokenizer (once per encoding) matching an embedding model name.
 */
export function loadTokenizer(modelName: string): TokenCodec {
  const model = getModel(modelName);
  const cached = codecs.get(model.encoding);
  if (cached) return cached;

  let codec: TokenCodec;
  try {
    codec = toCodec(getEncoding(model.encoding));
  } catch (error) {
    throw new EmbeddingError(
      `Failed to load tokenizer ${model.encoding}: ${errorMessage(error)}`,
      'MODEL_LOAD_FAILED',
      error,
    );
  }
  log.debug(`Loaded tokenizer ${model.encoding}`, { model: model.id });
  codecs.set(model.encoding, codec);
  return codec;
}
