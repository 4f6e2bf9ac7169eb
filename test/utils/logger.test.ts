/**
 * Tests for the logger.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  formatEntry,
  getLogLevel,
  logger,
  parseLogLevel,
  setJsonMode,
  setLogLevel,
  type LogLevel,
} from '../../src/utils/logger.js';

function captureStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('logger', () => {
  let previous: LogLevel;
  let write: ReturnType<typeof captureStderr>;

  beforeEach(() => {
    previous = getLogLevel();
    write = captureStderr();
  });

  afterEach(() => {
    setLogLevel(previous);
    setJsonMode(false);
    write.mockRestore();
  });

  describe('parseLogLevel', () => {
    it('accepts known levels in any case', () => {
      expect(parseLogLevel('DEBUG')).toBe('debug');
      expect(parseLogLevel(' warn ')).toBe('warn');
      expect(parseLogLevel('silent')).toBe('silent');
    });

    it('falls back for unknown or missing values', () => {
      expect(parseLogLevel(undefined)).toBe('info');
      expect(parseLogLevel('verbose', 'error')).toBe('error');
    });
  });

  describe('formatEntry', () => {
    const entry = {
      timestamp: '2024-03-01T12:34:56.789Z',
      level: 'warn' as const,
      message: 'Count failed',
      meta: { topic: 'Linear algebra', tries: 2 },
    };

    it('formats text lines with time, padded level and metadata', () => {
      expect(formatEntry(entry, false)).toBe(
        '[12:34:56] WARN  Count failed (topic=Linear algebra tries=2)',
      );
    });

    it('serializes object metadata as JSON', () => {
      expect(formatEntry({ ...entry, meta: { issues: ['a', 'b'] } }, false)).toBe(
        '[12:34:56] WARN  Count failed (issues=["a","b"])',
      );
    });

    it('omits empty metadata', () => {
      expect(formatEntry({ ...entry, level: 'info', meta: {} }, false)).toBe(
        '[12:34:56] INFO  Count failed',
      );
    });

    it('emits the entry as JSON in json mode', () => {
      expect(JSON.parse(formatEntry(entry, true))).toEqual(entry);
    });
  });

  describe('level filtering', () => {
    it('drops messages below the current level', () => {
      setLogLevel('warn');

      logger.info('hidden');
      logger.warn('shown');

      expect(write).toHaveBeenCalledTimes(1);
      expect(String(write.mock.calls[0][0])).toContain('WARN  shown');
    });

    it('writes nothing when silent', () => {
      setLogLevel('silent');

      logger.error('nope');

      expect(write).not.toHaveBeenCalled();
    });
  });

  describe('createLogger', () => {
    it('prefixes messages with the module name', () => {
      setLogLevel('debug');
      setJsonMode(true);

      createLogger('vector-store').debug('Loaded 3 vectors', { topic: 't' });

      const line = String(write.mock.calls[0][0]);
      expect(line.endsWith('\n')).toBe(true);
      const parsed: unknown = JSON.parse(line);
      expect(parsed).toMatchObject({
        level: 'debug',
        message: '[vector-store] Loaded 3 vectors',
        meta: { topic: 't' },
      });
    });
  });
});
