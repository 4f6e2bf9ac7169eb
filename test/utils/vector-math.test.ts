import { describe, it, expect } from 'vitest';
import {
  cosineSimilarity,
  dot,
  l2Normalize,
  l2NormalizeRows,
  norm,
} from '../../src/utils/vector-math.js';

describe('vector-math', () => {
  it('computes dot product and norm', () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(norm([3, 4])).toBe(5);
  });

  describe('cosineSimilarity', () => {
    it('is 1 for parallel, 0 for orthogonal and -1 for opposite vectors', () => {
      expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
      expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
      expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
    });

    it('is 0 when either vector is zero', () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });
  });

  describe('l2Normalize', () => {
    it('scales to unit length with float32 values', () => {
      expect(l2Normalize([3, 4])).toEqual([Math.fround(0.6), Math.fround(0.8)]);
    });

    it('keeps a zero vector at zero', () => {
      expect(l2Normalize([0, 0, 0])).toEqual([0, 0, 0]);
    });

    it('normalizes each row independently', () => {
      expect(l2NormalizeRows([[2, 0], [0, -5]])).toEqual([
        [1, 0],
        [0, -1],
      ]);
    });
  });
});
