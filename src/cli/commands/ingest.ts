import type { Command } from '../types.js';
import { createRetrievalService } from '../../retrieval/index.js';
import { countChunks, previewChunks } from '../../retrieval/diagnostics.js';
import { isOk } from '../../utils/diagnostic.js';
import { formatChunk, hasFlag, positionals, positiveIntFlag, usageError } from '../utils.js';

export const ingestCommand: Command = {
  name: 'ingest',
  description: 'Fetch, chunk, embed and index a topic',
  usage: 'lectern ingest <topic> [--force] [--k <n>]',
  handler: async (args) => {
    const topic = positionals(args, ['--k']).join(' ').trim();
    if (!topic) {
      usageError('Topic required', ingestCommand.usage);
    }
    const k = positiveIntFlag(args, '--k', 3);
    if (k === null) {
      usageError('--k must be a positive integer', ingestCommand.usage);
    }
    const force = hasFlag(args, '--force');

    const service = createRetrievalService();
    const already = await service.isIndexed(topic);

    if (force || !already) {
      console.log(`${force && already ? 'Re-ingesting' : 'Ingesting'} topic: "${topic}" ...`);
      const result = await service.reingest(topic);
      console.log(
        `Indexed "${result.title}": ${result.chunkCount} chunks from ${result.sectionCount} sections in ${(result.durationMs / 1000).toFixed(1)}s`,
      );
    } else {
      console.log(`Topic "${topic}" already indexed. Skipping ingestion.`);
    }

    const count = await countChunks(service.store, topic);
    if (isOk(count)) {
      console.log(`Chunks for "${topic}": ${count.value.count}${count.value.capped ? '+' : ''}`);
    }

    console.log('');
    console.log('Preview (top-k):');
    const preview = await previewChunks(service, topic, k);
    if (isOk(preview)) {
      preview.value.forEach((chunk, i) => {
        for (const line of formatChunk(i + 1, chunk, 160)) {
          console.log(line);
        }
      });
    } else {
      console.log(`[warn] preview search failed: ${preview.reason}`);
    }

    console.log('');
    console.log('Done.');
  },
};
