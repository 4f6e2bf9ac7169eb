import type { Command } from '../types.js';
import { createRetrievalService } from '../../retrieval/index.js';
import { positionals, usageError } from '../utils.js';

export const purgeCommand: Command = {
  name: 'purge',
  description: 'Remove a topic from the index',
  usage: 'lectern purge <topic>',
  handler: async (args) => {
    const topic = positionals(args).join(' ').trim();
    if (!topic) {
      usageError('Topic required', purgeCommand.usage);
    }
    const removed = await createRetrievalService().purge(topic);
    console.log(`Removed ${removed} chunks for "${topic}".`);
  },
};
