import { describe, it, expect } from 'vitest';
import { mean, quantile, sum } from './calculations';

describe('calculations', () => {
  describe('sum() / mean()', () => {
    it('sums and averages values', () => {
      expect(sum([1, 2, 3, 4])).toBe(10);
      expect(mean([1, 2, 3, 4])).toBe(2.5);
    });

    it('returns 0 for an empty input', () => {
      expect(sum([])).toBe(0);
      expect(mean([])).toBe(0);
    });
  });

  describe('quantile()', () => {
    const oneToHundred = Array.from({ length: 100 }, (_, i) => i + 1);

    it('interpolates p95 of 1..100 between 95 and 96', () => {
      // rank = 0.95 * 99 = 94.05 -> 95 + 0.05 * (96 - 95)
      expect(quantile(oneToHundred, 0.95)).toBeCloseTo(95.05, 9);
    });

    it('does not depend on input order', () => {
      const shuffled = [...oneToHundred].reverse();
      expect(quantile(shuffled, 0.95)).toBeCloseTo(95.05, 9);
    });

    it('returns exact order statistics at integral ranks', () => {
      expect(quantile([10, 20, 30], 0.5)).toBe(20);
      expect(quantile([10, 20, 30], 0)).toBe(10);
      expect(quantile([10, 20, 30], 1)).toBe(30);
    });

    it('returns the single value for a one-element sample', () => {
      expect(quantile([42], 0.95)).toBe(42);
    });

    it('returns NaN for an empty sample', () => {
      expect(quantile([], 0.95)).toBeNaN();
    });

    it('rejects quantiles outside [0, 1]', () => {
      expect(() => quantile([1, 2], 1.5)).toThrow('Quantile must be between 0 and 1');
    });
  });
});
