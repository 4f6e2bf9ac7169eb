/**
 * Best-effort diagnostics for the CLI: counts and previews that report
 * `unavailable` instead of throwing.
 */

import type { IndexStore, TopicCount } from '../storage/types.js';
import type { RetrievalService } from './retrieval-service.js';
import type { RetrievedChunk } from './types.js';
import { ok, unavailable, type Diagnostic } from '../utils/diagnostic.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('diagnostics');

/**
 * Bounded chunk count for a topic.
 */
export async function countChunks(store: IndexStore, topic: string): Promise<Diagnostic<TopicCount>> {
  try {
    return ok(await store.countByTopic(topic.trim()));
  } catch (error) {
    const reason = errorMessage(error);
    log.warn(`Count failed`, { topic, reason });
    return unavailable(reason);
  }
}

/**
 * Top-k chunks using the topic as the query.
 */
export async function previewChunks(
  service: RetrievalService,
  topic: string,
  k: number,
): Promise<Diagnostic<RetrievedChunk[]>> {
  try {
    return ok(await service.getChunks(topic, { query: topic, k }));
  } catch (error) {
    const reason = errorMessage(error);
    log.warn(`Preview search failed`, { topic, reason });
    return unavailable(reason);
  }
}
