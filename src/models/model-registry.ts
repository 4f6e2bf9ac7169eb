/**
 * Embedding models the pipeline knows how to size its index and chunks for.
 *
 * Each entry is a model served by the OpenAI embeddings endpoint (or an
 * OpenAI-compatible server) together with the BPE encoding its inputs are
 * counted in, so chunk windows and truncation use the model's own tokens.
 */

import type { TiktokenEncoding } from 'js-tiktoken';
import { ConfigError } from '../utils/errors.js';

export interface ModelConfig {
  /** Model name sent to the embeddings endpoint. */
  id: string;
  /** Other names the model is known by. */
  aliases: string[];
  /** Native output dimension. */
  dims: number;
  /** Accepts a smaller output dimension through the `dimensions` parameter. */
  shortenable: boolean;
  /** Input limit in tokens. */
  maxSeqLength: number;
  /** Tokenizer encoding of the model's inputs. */
  encoding: TiktokenEncoding;
  /** Notes about the model. */
  notes: string;
}

export const MODEL_REGISTRY: Record<string, ModelConfig> = {
  'text-embedding-3-small': {
    id: 'text-embedding-3-small',
    aliases: ['openai/text-embedding-3-small', '3-small'],
    dims: 1536,
    shortenable: true,
    maxSeqLength: 8191,
    encoding: 'cl100k_base',
    notes: 'Default. Requested at 384 dimensions unless configured otherwise.',
  },
  'text-embedding-3-large': {
    id: 'text-embedding-3-large',
    aliases: ['openai/text-embedding-3-large', '3-large'],
    dims: 3072,
    shortenable: true,
    maxSeqLength: 8191,
    encoding: 'cl100k_base',
    notes: 'Higher quality; shorten it to reuse an index built with another dimension.',
  },
  'text-embedding-ada-002': {
    id: 'text-embedding-ada-002',
    aliases: ['openai/text-embedding-ada-002', 'ada-002'],
    dims: 1536,
    shortenable: false,
    maxSeqLength: 8191,
    encoding: 'cl100k_base',
    notes: 'Legacy; always 1536 dimensions.',
  },
};

/**
 * Find a model by registry id or alias.
 */
export function findModel(name: string): ModelConfig | undefined {
  const key = name.trim();
  const direct = MODEL_REGISTRY[key];
  if (direct) return direct;
  return Object.values(MODEL_REGISTRY).find((m) => m.aliases.includes(key));
}

export function getModel(name: string): ModelConfig {
  const config = findModel(name);
  if (!config) {
    throw new ConfigError(
      `Unknown model: ${name}. Available: ${Object.keys(MODEL_REGISTRY).join(', ')}`,
      'UNKNOWN_MODEL',
    );
  }
  return config;
}

export function getAllModelIds(): string[] {
  return Object.keys(MODEL_REGISTRY);
}

/**
 * Output dimension for a model given an optional requested size.
 * Returns null when the model cannot produce that size.
 */
export function outputDimensions(model: ModelConfig, requested: number | null): number | null {
  if (requested === null || requested === model.dims) return model.dims;
  if (!model.shortenable || requested < 1 || requested > model.dims) return null;
  return requested;
}
