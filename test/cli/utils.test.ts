import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  flagValue,
  formatChunk,
  hasFlag,
  positionals,
  positiveIntFlag,
  shorten,
  usageError,
} from '../../src/cli/utils.js';
import { captureCli, ExitCalled } from './helpers.js';

describe('cli utils', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads flags and their values', () => {
    const args = ['Linear', 'algebra', '--query', 'eigen values', '--json'];

    expect(hasFlag(args, '--json')).toBe(true);
    expect(hasFlag(args, '--force')).toBe(false);
    expect(flagValue(args, '--query')).toBe('eigen values');
    expect(flagValue(['--query'], '--query')).toBeUndefined();
    expect(positionals(args, ['--query'])).toEqual(['Linear', 'algebra']);
  });

  const intCases: Array<{ args: string[]; expected: number | null }> = [
    { args: [], expected: 3 },
    { args: ['--k', '5'], expected: 5 },
    { args: ['--k'], expected: null },
    { args: ['--k', '0'], expected: null },
    { args: ['--k', '2.5'], expected: null },
    { args: ['--k', 'many'], expected: null },
  ];

  it.each(intCases)('positiveIntFlag($args) is $expected', ({ args, expected }) => {
    expect(positiveIntFlag(args, '--k', 3)).toBe(expected);
  });

  describe('shorten', () => {
    it('collapses whitespace when the text fits', () => {
      expect(shorten('  a\n  b\tc ', 10)).toBe('a b c');
    });

    it('cuts at a word boundary and appends the placeholder', () => {
      expect(shorten('alpha beta gamma delta', 14)).toBe('alpha beta …');
    });

    it('returns the bare placeholder when no word fits', () => {
      expect(shorten('supercalifragilistic', 5)).toBe('…');
    });
  });

  it('formats a chunk as a score line and a preview line', () => {
    const chunk = { score: 0.123456, tokens: 7, text: 'short   text', source: { url: 'https://example.org/x' } };

    expect(formatChunk(12, chunk, 50)).toEqual([
      '12. score=0.1235  tokens=  7  url=https://example.org/x',
      '    short text',
    ]);
  });

  it('prints a usage error and exits with 2', () => {
    const cli = captureCli();

    expect(() => usageError('Topic required', 'lectern purge <topic>')).toThrow(ExitCalled);
    expect(cli.stderr()).toEqual(['Error: Topic required']);
    expect(cli.stdout()).toEqual(['Usage: lectern purge <topic>']);
    expect(cli.exit).toHaveBeenCalledWith(2);
  });
});
