import { describe, it, expect } from 'vitest';
import { isOk, ok, unavailable } from '../../src/utils/diagnostic.js';

describe('diagnostic', () => {
  it('wraps a value as ok', () => {
    const d = ok(12);

    expect(d).toEqual({ status: 'ok', value: 12 });
    expect(isOk(d)).toBe(true);
  });

  it('carries the reason when unavailable', () => {
    const d = unavailable<number>('database is locked');

    expect(d).toEqual({ status: 'unavailable', reason: 'database is locked' });
    expect(isOk(d)).toBe(false);
  });
});
