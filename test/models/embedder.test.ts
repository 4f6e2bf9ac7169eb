/**
 * Tests for the embedding adapter, using an in-process backend.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Embedder, type BackendFactory, type BackendOptions } from '../../src/models/embedder.js';
import type { EmbeddingConfig } from '../../src/config/pipeline-config.js';
import { ConfigError, EmbeddingError } from '../../src/utils/errors.js';
import { norm } from '../../src/utils/vector-math.js';
import { wordCodec } from '../ingest/helpers.js';

const DIMS = 384;

const baseConfig: EmbeddingConfig = {
  model: 'text-embedding-3-small',
  baseUrl: null,
  dimensions: DIMS,
  batchSize: 2,
  maxSeqLength: null,
  normalize: true,
  timeoutMs: 1000,
};

/** Deterministic pseudo-embedding: depends only on the text. */
function rowFor(text: string): number[] {
  return Array.from({ length: DIMS }, (_, j) => ((text.length * 31 + j) % 13) - 6);
}

function fakeBackend(row: (text: string) => number[] = rowFor) {
  const clients: BackendOptions[] = [];
  const batches: string[][] = [];
  const factory: BackendFactory = (_model, options) => {
    clients.push(options);
    return {
      async embed(texts) {
        batches.push(texts);
        return texts.map(row);
      },
    };
  };
  return { factory, clients, batches };
}

describe('Embedder', () => {
  const savedKeys = {
    lectern: process.env.LECTERN_EMBEDDING_API_KEY,
    openai: process.env.OPENAI_API_KEY,
  };

  afterEach(() => {
    for (const [name, value] of [
      ['LECTERN_EMBEDDING_API_KEY', savedKeys.lectern],
      ['OPENAI_API_KEY', savedKeys.openai],
    ] as const) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  describe('configuration', () => {
    it('takes settings from config when no options are given', () => {
      const embedder = new Embedder({ config: baseConfig, apiKey: 'test-key' });

      expect(embedder.modelName).toBe('text-embedding-3-small');
      expect(embedder.model.id).toBe('text-embedding-3-small');
      expect(embedder.dimensions).toBe(384);
      expect(embedder.baseUrl).toBeNull();
      expect(embedder.batchSize).toBe(2);
      expect(embedder.maxSeqLength).toBe(8191);
      expect(embedder.normalize).toBe(true);
      expect(embedder.timeoutMs).toBe(1000);
    });

    it('prefers explicit options over config', () => {
      const embedder = new Embedder({
        config: baseConfig,
        model: '3-large',
        baseUrl: 'http://localhost:8080/v1',
        dimensions: null,
        batchSize: 8,
        maxSeqLength: 128,
        normalize: false,
        timeoutMs: 50,
      });

      expect(embedder.modelName).toBe('3-large');
      expect(embedder.dimensions).toBe(3072);
      expect(embedder.baseUrl).toBe('http://localhost:8080/v1');
      expect(embedder.batchSize).toBe(8);
      expect(embedder.maxSeqLength).toBe(128);
      expect(embedder.normalize).toBe(false);
      expect(embedder.timeoutMs).toBe(50);
    });

    it('caps the truncation length at the model limit', () => {
      expect(new Embedder({ config: { ...baseConfig, maxSeqLength: 100_000 } }).maxSeqLength).toBe(8191);
    });

    it('falls back to batch size 32 when the configured one is not positive', () => {
      const embedder = new Embedder({ config: { ...baseConfig, batchSize: 0 } });

      expect(embedder.batchSize).toBe(32);
    });

    it('rejects unknown models', () => {
      expect(() => new Embedder({ config: { ...baseConfig, model: 'no-such-model' } })).toThrow(
        ConfigError,
      );
    });

    it('rejects an output size the model cannot produce', () => {
      expect(() => new Embedder({ config: { ...baseConfig, model: 'ada-002' } })).toThrow(
        'text-embedding-ada-002 cannot produce 384-dimension vectors',
      );
    });
  });

  describe('client', () => {
    it('creates one client on first use with the resolved settings', async () => {
      const fake = fakeBackend();
      const embedder = new Embedder({ config: baseConfig, apiKey: 'test-key', backendFactory: fake.factory });

      expect(fake.clients).toHaveLength(0);
      await embedder.encodeOne('a');
      await embedder.encodeOne('b');

      expect(fake.clients).toEqual([{ apiKey: 'test-key', baseUrl: null, dimensions: 384, timeoutMs: 1000 }]);
    });

    it('requests no output size when the native one is wanted', async () => {
      const fake = fakeBackend(() => new Array<number>(1536).fill(1));
      const embedder = new Embedder({
        config: { ...baseConfig, dimensions: 1536 },
        apiKey: 'test-key',
        backendFactory: fake.factory,
      });

      await embedder.encodeOne('native');

      expect(fake.clients[0].dimensions).toBeNull();
    });

    it('reads the key from the environment', async () => {
      delete process.env.LECTERN_EMBEDDING_API_KEY;
      process.env.OPENAI_API_KEY = 'test-openai-key';
      const fake = fakeBackend();

      await new Embedder({ config: baseConfig, backendFactory: fake.factory }).encodeOne('a');
      process.env.LECTERN_EMBEDDING_API_KEY = 'test-lectern-key';
      await new Embedder({ config: baseConfig, backendFactory: fake.factory }).encodeOne('a');

      expect(fake.clients.map((c) => c.apiKey)).toEqual(['test-openai-key', 'test-lectern-key']);
    });

    it('fails with NO_API_KEY for the default endpoint without a key', async () => {
      delete process.env.LECTERN_EMBEDDING_API_KEY;
      delete process.env.OPENAI_API_KEY;
      const fake = fakeBackend();
      const embedder = new Embedder({ config: baseConfig, backendFactory: fake.factory });

      await expect(embedder.encodeOne('a')).rejects.toMatchObject({
        name: 'EmbeddingError',
        code: 'NO_API_KEY',
      });
      expect(fake.clients).toHaveLength(0);
    });

    it('allows a custom endpoint without a key', async () => {
      delete process.env.LECTERN_EMBEDDING_API_KEY;
      delete process.env.OPENAI_API_KEY;
      const fake = fakeBackend();
      const embedder = new Embedder({
        config: { ...baseConfig, baseUrl: 'http://localhost:11434/v1' },
        backendFactory: fake.factory,
      });

      await embedder.encodeOne('a');

      expect(fake.clients[0]).toMatchObject({ apiKey: 'unused', baseUrl: 'http://localhost:11434/v1' });
    });

    it('wraps client construction failures and retries on the next call', async () => {
      let attempts = 0;
      const fake = fakeBackend();
      const factory: BackendFactory = (model, options) => {
        attempts++;
        if (attempts === 1) {
          throw new Error('bad base URL');
        }
        return fake.factory(model, options);
      };
      const embedder = new Embedder({ config: baseConfig, apiKey: 'test-key', backendFactory: factory });

      await expect(embedder.encodeOne('a')).rejects.toMatchObject({
        code: 'CLIENT_INIT_FAILED',
        message: 'Failed to create client for text-embedding-3-small: bad base URL',
      });
      await embedder.encodeOne('a');

      expect(attempts).toBe(2);
    });
  });

  describe('encode', () => {
    it('returns an empty list without creating a client', async () => {
      const fake = fakeBackend();
      const embedder = new Embedder({ config: baseConfig, apiKey: 'test-key', backendFactory: fake.factory });

      expect(await embedder.encode([])).toEqual([]);
      expect(fake.clients).toHaveLength(0);
    });

    it('splits input into batches of batchSize', async () => {
      const fake = fakeBackend();
      const embedder = new Embedder({ config: baseConfig, apiKey: 'test-key', backendFactory: fake.factory });

      const vectors = await embedder.encode(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

      expect(vectors).toHaveLength(5);
      expect(fake.batches).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
    });

    it('returns unit-length rows when normalizing', async () => {
      const embedder = new Embedder({
        config: baseConfig,
        apiKey: 'test-key',
        backendFactory: fakeBackend(() => new Array<number>(DIMS).fill(1)).factory,
      });

      const [vector] = await embedder.encode(['uniform']);

      expect(vector).toHaveLength(DIMS);
      expect(vector[0]).toBeCloseTo(1 / Math.sqrt(DIMS), 6);
      expect(norm(vector)).toBeCloseTo(1, 5);
    });

    it('returns float32-rounded raw rows when not normalizing', async () => {
      const embedder = new Embedder({
        config: { ...baseConfig, normalize: false },
        apiKey: 'test-key',
        backendFactory: fakeBackend(() => new Array<number>(DIMS).fill(0.1)).factory,
      });

      const [vector] = await embedder.encode(['tenths']);

      expect(vector[0]).toBe(Math.fround(0.1));
      expect(vector[DIMS - 1]).toBe(Math.fround(0.1));
    });

    it('gives the same vector regardless of batch composition', async () => {
      const texts = ['alpha', 'beta gamma', 'delta epsilon zeta', 'eta'];
      const single = new Embedder({
        config: { ...baseConfig, batchSize: 1 },
        apiKey: 'test-key',
        backendFactory: fakeBackend().factory,
      });
      const batched = new Embedder({
        config: { ...baseConfig, batchSize: 32 },
        apiKey: 'test-key',
        backendFactory: fakeBackend().factory,
      });

      const one = await single.encode(texts);
      const all = await batched.encode(texts);

      expect(all).toEqual(one);
      expect(await batched.encodeOne('beta gamma')).toEqual(all[1]);
    });

    it('truncates inputs longer than maxSeqLength tokens', async () => {
      const fake = fakeBackend();
      const embedder = new Embedder({
        config: { ...baseConfig, maxSeqLength: 3 },
        apiKey: 'test-key',
        backendFactory: fake.factory,
        tokenizer: wordCodec(),
      });

      await embedder.encode(['one two three four five', 'short']);

      expect(fake.batches).toEqual([['one two three', 'short']]);
    });

    it('rejects output of the wrong shape', async () => {
      const embedder = new Embedder({
        config: baseConfig,
        apiKey: 'test-key',
        backendFactory: fakeBackend(() => [1, 2, 3]).factory,
      });

      await expect(embedder.encode(['short'])).rejects.toMatchObject({
        name: 'EmbeddingError',
        code: 'UNEXPECTED_OUTPUT',
        message: 'Expected 1 vectors of 384, got 1 of 3',
      });
    });

    it('rejects a response missing rows', async () => {
      const factory: BackendFactory = () => ({ embed: async () => [] });
      const embedder = new Embedder({ config: baseConfig, apiKey: 'test-key', backendFactory: factory });

      await expect(embedder.encode(['a', 'b'])).rejects.toMatchObject({
        code: 'UNEXPECTED_OUTPUT',
        message: 'Expected 2 vectors of 384, got 0 of 0',
      });
    });

    it('wraps request failures as ENCODE_FAILED', async () => {
      const factory: BackendFactory = () => ({
        embed: async () => {
          throw new Error('429 Rate limit reached');
        },
      });
      const embedder = new Embedder({ config: baseConfig, apiKey: 'test-key', backendFactory: factory });

      const error = await embedder.encode(['x']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({ code: 'ENCODE_FAILED', message: 'Encoding failed: 429 Rate limit reached' });
    });
  });
});
