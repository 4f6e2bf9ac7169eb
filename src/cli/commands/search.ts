import type { Command } from '../types.js';
import { createRetrievalService } from '../../retrieval/index.js';
import { flagValue, formatChunk, hasFlag, positionals, positiveIntFlag, usageError } from '../utils.js';

export const searchCommand: Command = {
  name: 'search',
  description: 'Retrieve the top-k chunks for a topic',
  usage: 'lectern search <topic> [--query <text>] [--k <n>] [--json]',
  handler: async (args) => {
    const topic = positionals(args, ['--query', '--k']).join(' ').trim();
    if (!topic) {
      usageError('Topic required', searchCommand.usage);
    }

    const service = createRetrievalService();
    const k = positiveIntFlag(args, '--k', service.defaultK);
    if (k === null) {
      usageError('--k must be a positive integer', searchCommand.usage);
    }

    const chunks = await service.getChunks(topic, { query: flagValue(args, '--query'), k });

    if (hasFlag(args, '--json')) {
      console.log(JSON.stringify(chunks, null, 2));
      return;
    }
    if (chunks.length === 0) {
      console.log('No results.');
      return;
    }
    chunks.forEach((chunk, i) => {
      const section = chunk.source.section ? ` § ${chunk.source.section}` : '';
      const [scoreLine, textLine] = formatChunk(i + 1, chunk, 160);
      console.log(`${scoreLine}${section}`);
      console.log(textLine);
    });
  },
};
