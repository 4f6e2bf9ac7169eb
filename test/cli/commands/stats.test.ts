/**
 * Tests for the stats command against an in-memory pipeline.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/retrieval/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/retrieval/index.js')>()),
  createRetrievalService: vi.fn(),
}));

import { createRetrievalService } from '../../../src/retrieval/index.js';
import { statsCommand } from '../../../src/cli/commands/stats.js';
import { createTestPipeline, type TestPipeline } from '../../retrieval/fakes.js';
import { captureCli, type CliCapture } from '../helpers.js';

describe('statsCommand', () => {
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

  it('lists topics with chunk counts', async () => {
    await pipeline.service.ingest('Linear algebra');

    await statsCommand.handler([]);

    expect(cli.stdout()).toEqual([
      'Index Statistics:',
      '  Topics: 1',
      '  Chunks: 2',
      '  - Linear algebra: 2 chunks (ingested 2023-11-14T22:13:20.000Z)',
    ]);
  });

  it('prints an empty index as JSON', async () => {
    await statsCommand.handler(['--json']);

    expect(cli.stdout()).toEqual(['[]']);
  });
});
