/**
 * Tests for the purge command against an in-memory pipeline.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/retrieval/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/retrieval/index.js')>()),
  createRetrievalService: vi.fn(),
}));

import { createRetrievalService } from '../../../src/retrieval/index.js';
import { purgeCommand } from '../../../src/cli/commands/purge.js';
import { createTestPipeline, type TestPipeline } from '../../retrieval/fakes.js';
import { captureCli, type CliCapture } from '../helpers.js';

describe('purgeCommand', () => {
  let pipeline: TestPipeline;
  let cli: CliCapture;

  beforeEach(() => {
    pipeline = createTestPipeline();
    vi.mocked(createRetrievalService).mockReturnValue(pipeline.service);
    cli = captureCli();
  });

  afterEach(() => {
    pipeline.db.close();
    vi.restoreAllMocks();
  });

  it('reports how many chunks were removed', async () => {
    await pipeline.service.ingest('Linear algebra');

    await purgeCommand.handler(['Linear', 'algebra']);

    expect(cli.stdout()).toEqual(['Removed 2 chunks for "Linear algebra".']);
  });
});
