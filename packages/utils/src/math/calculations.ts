/**
 * Calculate the sum of an array of numbers
 */
export function sum(values: number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Calculate the mean (average) of an array of numbers
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/**
 * Quantile by linear interpolation between order statistics
 *
 * rank = q * (n - 1); the result interpolates between the values at
 * floor(rank) and ceil(rank) of the sorted input. Same definition as the
 * default method of common statistics packages.
 *
 * @param values - Unsorted sample
 * @param q - Quantile in [0, 1] (0.95 for p95)
 * @returns Interpolated value, or NaN for an empty sample
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return NaN;
  if (q < 0 || q > 1) {
    throw new Error(`Quantile must be between 0 and 1, got ${q}`);
  }

  const sorted = [...values].sort((a, b) => a - b);
  const rank = q * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const lower = sorted[lo] ?? NaN;
  const upper = sorted[hi] ?? NaN;
  if (lo === hi) return lower;

  return lower + (upper - lower) * (rank - lo);
}
