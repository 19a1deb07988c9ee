/**
 * Unit tests for math helper utilities
 */

import { describe, it, expect } from 'vitest';
import { nearestRankPercentile, safeAverage, safeDivide } from '../../../src/utils/math-helpers.js';

describe('Math Helpers', () => {
  describe('safeAverage', () => {
    it('should return the default for an empty array', () => {
      expect(safeAverage([])).toBe(0);
      expect(safeAverage([], 100)).toBe(100);
    });

    it('should average the values', () => {
      expect(safeAverage([10, 20, 30])).toBe(20);
      expect(safeAverage([1.5, 2.5, 3.5])).toBe(2.5);
    });
  });

  describe('safeDivide', () => {
    it('should return the default for division by zero', () => {
      expect(safeDivide(10, 0)).toBe(0);
      expect(safeDivide(10, 0, -1)).toBe(-1);
    });

    it('should divide normally otherwise', () => {
      expect(safeDivide(3, 4)).toBe(0.75);
    });
  });

  describe('nearestRankPercentile', () => {
    const sorted = [10, 20, 30, 40];

    it('should return undefined for an empty array', () => {
      expect(nearestRankPercentile([], 0.5)).toBeUndefined();
    });

    it('should pick the value at rank ceil(p * n)', () => {
      expect(nearestRankPercentile(sorted, 0.5)).toBe(20);
      expect(nearestRankPercentile(sorted, 0.51)).toBe(30);
      expect(nearestRankPercentile(sorted, 0.75)).toBe(30);
    });

    it('should clamp to the minimum and maximum', () => {
      expect(nearestRankPercentile(sorted, 0)).toBe(10);
      expect(nearestRankPercentile(sorted, 1)).toBe(40);
    });
  });
});
