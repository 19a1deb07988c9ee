/**
 * Math Helper Utilities
 *
 * Order statistics and safe arithmetic over latency samples.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  const sum = values.reduce((acc, val) => acc + val, 0);
  return sum / values.length;
}

/**
 * Calculate safe division that guards against division by zero
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Nearest-rank percentile of an ascending array
 *
 * Returns the value at 1-based rank `ceil(p * n)`, clamped to `[1, n]`,
 * so `p = 0` yields the minimum and `p = 1` the maximum.
 *
 * @param sorted - Values sorted ascending (not modified)
 * @param p - Percentile in [0, 1]
 * @returns The selected value, or undefined for an empty array
 *
 * @example
 * ```typescript
 * nearestRankPercentile([10, 20, 30, 40], 0.5)   // => 20
 * nearestRankPercentile([10, 20, 30, 40], 0.51)  // => 30
 * nearestRankPercentile([10, 20, 30, 40], 1)     // => 40
 * ```
 */
export function nearestRankPercentile(sorted: readonly number[], p: number): number | undefined {
  if (sorted.length === 0) {
    return undefined;
  }

  const rank = Math.min(sorted.length, Math.max(1, Math.ceil(p * sorted.length)));
  return sorted[rank - 1];
}
