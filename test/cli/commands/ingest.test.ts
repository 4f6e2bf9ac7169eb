/**
 * Tests for the ingest command against an in-memory pipeline.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/retrieval/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/retrieval/index.js')>()),
  createRetrievalService: vi.fn(),
}));

import { createRetrievalService } from '../../../src/retrieval/index.js';
import { ingestCommand } from '../../../src/cli/commands/ingest.js';
import { createTestPipeline, type TestPipeline } from '../../retrieval/fakes.js';
import { captureCli, ExitCalled, type CliCapture } from '../helpers.js';

const PAGE = 'https://en.wikipedia.org/wiki/Linear_algebra';
const LEAD_LINES = [
  ` 1. score=0.7071  tokens= 10  url=${PAGE}`,
  '    linear algebra studies vectors and matrices over fields',
];
const EIGEN_TEXT_LINE = '    eigenvalues and eigenvectors describe the spectrum of matrices';

describe('ingestCommand', () => {
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

  it('ingests a new topic and previews it', async () => {
    await ingestCommand.handler(['Linear', 'algebra']);

    expect(cli.stdout()).toEqual([
      'Ingesting topic: "Linear algebra" ...',
      'Indexed "Linear algebra": 2 chunks from 2 sections in 0.0s',
      'Chunks for "Linear algebra": 2',
      '',
      'Preview (top-k):',
      ...LEAD_LINES,
      ` 2. score=0.0000  tokens= 10  url=${PAGE}#Eigenvalues`,
      EIGEN_TEXT_LINE,
      '',
      'Done.',
    ]);
  });

  it('skips an indexed topic unless forced', async () => {
    await pipeline.service.ingest('Linear algebra');

    await ingestCommand.handler(['Linear algebra', '--k', '1']);
    await ingestCommand.handler(['Linear algebra', '--force', '--k', '1']);

    const out = cli.stdout();
    expect(out[0]).toBe('Topic "Linear algebra" already indexed. Skipping ingestion.');
    expect(out).toContain('Re-ingesting topic: "Linear algebra" ...');
    expect(out.filter((line) => line === LEAD_LINES[0])).toHaveLength(2);
    expect(pipeline.source.fetch).toHaveBeenCalledTimes(2);
  });

  it('exits with 2 without a topic or with a bad --k', async () => {
    await expect(ingestCommand.handler([])).rejects.toBeInstanceOf(ExitCalled);
    await expect(ingestCommand.handler(['Linear algebra', '--k', '0'])).rejects.toBeInstanceOf(ExitCalled);

    expect(cli.stderr()).toEqual(['Error: Topic required', 'Error: --k must be a positive integer']);
    expect(cli.exit.mock.calls).toEqual([[2], [2]]);
  });
});
