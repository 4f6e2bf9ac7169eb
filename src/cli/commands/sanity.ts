import type { Command } from '../types.js';
import { createRetrievalService } from '../../retrieval/index.js';
import type { RetrievedChunk } from '../../retrieval/types.js';
import { errorMessage } from '../../utils/errors.js';
import { flagValue, formatChunk, positiveIntFlag, usageError } from '../utils.js';

const REQUIRED_FIELDS = [
  'topic',
  'chunkId',
  'text',
  'score',
  'tokens',
  'embeddingModel',
  'source',
] as const satisfies ReadonlyArray<keyof RetrievedChunk>;

/**
 * End-to-end check of the live pipeline. Exit codes:
 * 1 retrieval error, 2 too few results, 3 missing fields, 4 empty text or url.
 */
export const sanityCommand: Command = {
  name: 'sanity',
  description: 'Run an end-to-end retrieval check',
  usage: 'lectern sanity [--topic <topic>] [--query <text>] [--k <n>]',
  handler: async (args) => {
    const topic = flagValue(args, '--topic') ?? 'Linear algebra';
    const query = flagValue(args, '--query') ?? 'eigenvalues';
    const k = positiveIntFlag(args, '--k', 4);
    if (k === null) {
      usageError('--k must be a positive integer', sanityCommand.usage);
    }

    console.log(`[sanity] Testing retrieval pipeline with topic="${topic}", query="${query}" …`);

    let chunks: RetrievedChunk[];
    try {
      chunks = await createRetrievalService().getChunks(topic, { query, k });
    } catch (error) {
      console.log(`[fail] retrieval error: ${errorMessage(error)}`);
      process.exit(1);
    }

    if (chunks.length < k) {
      console.log(`[fail] expected at least ${k} chunks, got ${chunks.length}`);
      process.exit(2);
    }

    for (const [i, chunk] of chunks.entries()) {
      const present = new Set(Object.keys(chunk));
      const missing = REQUIRED_FIELDS.filter((field) => !present.has(field));
      if (missing.length > 0) {
        console.log(`[fail] chunk ${i + 1} missing fields: ${missing.join(', ')}`);
        process.exit(3);
      }
      if (!chunk.text || !chunk.source.url) {
        console.log(`[fail] chunk ${i + 1} has empty text or url`);
        process.exit(4);
      }
    }

    chunks.forEach((chunk, i) => {
      for (const line of formatChunk(i + 1, chunk, 100)) {
        console.log(`  ${line}`);
      }
    });

    console.log('');
    console.log('ALL GOOD');
  },
};
