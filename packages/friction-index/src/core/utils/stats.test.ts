import { describe, it, expect } from 'vitest';
import { max, mean, median, min, pearson, quantile, sampleStd, sum } from './stats.js';

describe('stats', () => {
  describe('empty input', () => {
    it('returns 0 instead of NaN', () => {
      expect(sum([])).toBe(0);
      expect(mean([])).toBe(0);
      expect(median([])).toBe(0);
      expect(max([])).toBe(0);
      expect(min([])).toBe(0);
      expect(quantile([], 0.75)).toBe(0);
    });
  });

  describe('quantile', () => {
    it('returns the exact element when the position is whole', () => {
      expect(quantile([85, 20, 80, 40, 75], 0.75)).toBe(80);
      expect(quantile([9000, 50, 2525, 100, 5000], 0.5)).toBe(2525);
    });

    it('interpolates between neighbours', () => {
      expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
      expect(quantile([0, 10], 0.25)).toBe(2.5);
    });

    it('does not reorder its input', () => {
      const values = [3, 1, 2];
      quantile(values, 0.5);
      expect(values).toEqual([3, 1, 2]);
    });
  });

  describe('sampleStd', () => {
    it('uses the n - 1 denominator', () => {
      expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 12);
    });

    it('is 0 for fewer than two values', () => {
      expect(sampleStd([5])).toBe(0);
      expect(sampleStd([])).toBe(0);
    });
  });

  describe('pearson', () => {
    it('detects perfect positive and negative correlation', () => {
      expect(pearson([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
      expect(pearson([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 12);
    });

    it('is 0 when either side is constant', () => {
      expect(pearson([1, 1, 1], [1, 2, 3])).toBe(0);
      expect(pearson([1, 2, 3], [7, 7, 7])).toBe(0);
    });
  });
});
