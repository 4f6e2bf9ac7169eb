import type { Command } from '../types.js';
import { createRetrievalService } from '../../retrieval/index.js';
import { loadConfig, resolveDimensions, validateConfig } from '../../config/loader.js';
import { openDatabase } from '../../storage/db.js';
import { VectorStore } from '../../storage/vector-store.js';
import { errorMessage } from '../../utils/errors.js';

export const statsCommand: Command = {
  name: 'stats',
  description: 'Show indexed topics and chunk counts',
  usage: 'lectern stats [--json]',
  handler: async (args) => {
    const topics = await createRetrievalService().store.listTopics();

    if (args.includes('--json')) {
      console.log(JSON.stringify(topics, null, 2));
      return;
    }

    const total = topics.reduce((sum, t) => sum + t.chunks, 0);
    console.log('Index Statistics:');
    console.log(`  Topics: ${topics.length}`);
    console.log(`  Chunks: ${total}`);
    for (const t of topics) {
      const when = new Date(t.lastIngestedAt * 1000).toISOString();
      console.log(`  - ${t.topic}: ${t.chunks} chunks (ingested ${when})`);
    }
  },
};

export const healthCommand: Command = {
  name: 'health',
  description: 'Check configuration, database and vector store',
  usage: 'lectern health',
  handler: async (_args) => {
    console.log('Health Check:');
    let healthy = true;

    const config = loadConfig();
    const errors = validateConfig(config);
    if (errors.length === 0) {
      console.log('  Config: OK');
    } else {
      healthy = false;
      console.log(`  Config: FAILED - ${errors.join('; ')}`);
    }

    try {
      const db = openDatabase(config.storage.dbPath);
      try {
        db.prepare('SELECT 1').get();
        console.log(`  Database: OK (${config.storage.dbPath})`);

        const store = new VectorStore({ db, dimensions: resolveDimensions(config) });
        const topics = await store.listTopics();
        console.log(`  Vector Store: OK (${topics.length} topics, ${store.dimensions} dims)`);
      } finally {
        db.close();
      }
    } catch (error) {
      healthy = false;
      console.log(`  Database/Vector Store: FAILED - ${errorMessage(error)}`);
    }

    console.log('');
    if (!healthy) {
      console.log('System has problems.');
      process.exit(1);
    }
    console.log('System ready.');
  },
};
