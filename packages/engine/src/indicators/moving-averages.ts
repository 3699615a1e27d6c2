/**
 * Moving Average Indicators
 * =========================
 * SMA over the tail of a price series.
 */

/**
 * Calculate Simple Moving Average of the last `period` values
 *
 * @returns null when the series is shorter than the period
 */
export function calculateSMA(values: readonly number[], period: number): number | null {
  if (period < 1 || values.length < period) {
    return null;
  }

  let sum = 0;
  for (let i = values.length - period; i < values.length; i++) {
    sum += values[i];
  }
  return sum / period;
}
