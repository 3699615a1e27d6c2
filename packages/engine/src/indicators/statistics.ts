/**
 * Window Statistics
 * =================
 * Plain numeric helpers shared by the indicators. Callers guarantee non-empty input.
 */

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) {
    sum += v;
  }
  return sum / values.length;
}

/**
 * Population standard deviation (divides by n, not n - 1)
 */
export function populationStdDev(values: readonly number[], mu: number = mean(values)): number {
  let squares = 0;
  for (const v of values) {
    const d = v - mu;
    squares += d * d;
  }
  return Math.sqrt(squares / values.length);
}

export function highest(values: readonly number[]): number {
  let max = -Infinity;
  for (const v of values) {
    if (v > max) max = v;
  }
  return max;
}

/**
 * Percentile by linear interpolation between order statistics.
 *
 * Sorts ascending, takes rank = p * (n - 1) and interpolates between the
 * neighbouring values. p = 0 gives the minimum, p = 1 the maximum.
 *
 * @param p - fraction in [0, 1]
 */
export function percentileLinear(values: readonly number[], p: number): number {
  if (p < 0 || p > 1) {
    throw new RangeError(`Percentile must be within [0, 1], got ${p}`);
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = p * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const lower = sorted[lo];
  const upper = sorted[hi];
  if (lower === undefined || upper === undefined) {
    throw new RangeError('Percentile of an empty window');
  }
  return lower + (upper - lower) * (rank - lo);
}
