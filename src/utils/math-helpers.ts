/**
 * Math Helper Utilities
 *
 * Safe statistical operations. Every helper returns a default instead of
 * dividing by zero, so an empty benchmark still reports numbers.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

/**
 * Division that returns `defaultValue` when the denominator is 0
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

export function safeSum(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Nearest-rank percentile over an ascending array
 *
 * The index is `floor(p / 100 * n)` clamped to `[0, n - 1]`; there is no
 * interpolation between neighbours. `p = 0` yields the minimum and
 * `p = 100` the maximum.
 *
 * @param sorted - Values sorted ascending
 * @param p - Percentile in [0, 100]
 */
export function nearestRankPercentile(sorted: readonly number[], p: number, defaultValue = 0): number {
  if (sorted.length === 0) {
    return defaultValue;
  }

  const index = Math.floor((p / 100) * sorted.length);
  const clamped = Math.min(Math.max(index, 0), sorted.length - 1);
  return sorted[clamped] ?? defaultValue;
}

/**
 * Relative difference of `value` against `reference`, as a percentage
 *
 * @example
 * ```typescript
 * percentDifference(110, 100)   // => 10
 * percentDifference(5, 0)       // => 0
 * ```
 */
export function percentDifference(value: number, reference: number): number {
  return safeDivide(value - reference, reference) * 100;
}
