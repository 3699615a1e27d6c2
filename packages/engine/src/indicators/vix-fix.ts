/**
 * Williams VIX Fix
 * ================
 * Volatility-exhaustion value: drawdown of the latest price from the highest
 * close of the lookback window, in percent. Signals when the value reaches the
 * Bollinger upper band or the percentile range high of its own recent history.
 */

import { InsufficientDataError, err, ok, type Result } from '@vixbot/core';
import { RingBuffer } from '../history/ring-buffer.js';
import { highest, mean, percentileLinear, populationStdDev } from './statistics.js';

export interface VixFixParams {
  /** Lookback for the highest close (pd) */
  lookbackPeriod: number;
  /** Bollinger window over indicator values (bbl) */
  bollingerLength: number;
  /** Standard deviations above the mid line (mult) */
  bollingerMultiplier: number;
  /** Window for the percentile threshold (lb) */
  percentileLookback: number;
  /** Percentile as a fraction, e.g. 0.85 */
  highPercentile: number;
}

export interface IndicatorSnapshot {
  value: number;
  highestClose: number;
  midLine?: number;
  stdDev?: number;
  upperBand?: number;
  percentileRangeHigh?: number;
  signal: boolean;
}

/**
 * Pure VIX Fix calculation.
 *
 * `priorValues` is the indicator history before this sample; the new value is
 * appended to it before the band windows are taken, so both bands include the
 * current reading. Band comparisons are inclusive.
 */
export function calculateVixFix(
  priceWindow: readonly number[],
  priorValues: readonly number[],
  params: VixFixParams
): Result<IndicatorSnapshot, InsufficientDataError> {
  const pd = params.lookbackPeriod;
  if (priceWindow.length < pd) {
    return err(new InsufficientDataError(pd, priceWindow.length, { source: 'VixFix' }));
  }

  const window = priceWindow.slice(priceWindow.length - pd);
  const highestClose = highest(window);
  const currentLow = window[window.length - 1];

  if (highestClose === 0) {
    return ok({ value: 0, highestClose: 0, signal: false });
  }

  const value = ((highestClose - currentLow) / highestClose) * 100;
  const values = [...priorValues, value];
  const snapshot: IndicatorSnapshot = { value, highestClose, signal: false };

  if (values.length >= params.bollingerLength) {
    const bandWindow = values.slice(values.length - params.bollingerLength);
    const midLine = mean(bandWindow);
    const stdDev = populationStdDev(bandWindow, midLine);
    snapshot.midLine = midLine;
    snapshot.stdDev = stdDev;
    snapshot.upperBand = midLine + params.bollingerMultiplier * stdDev;
  }

  if (values.length >= params.percentileLookback) {
    const rangeWindow = values.slice(values.length - params.percentileLookback);
    snapshot.percentileRangeHigh = percentileLinear(rangeWindow, params.highPercentile);
  }

  snapshot.signal =
    (snapshot.upperBand !== undefined && value >= snapshot.upperBand) ||
    (snapshot.percentileRangeHigh !== undefined && value >= snapshot.percentileRangeHigh);

  return ok(snapshot);
}

/**
 * Stateful wrapper that owns the indicator history.
 */
export class VolatilityIndicatorEngine {
  private readonly history: RingBuffer<number>;

  constructor(
    private readonly params: VixFixParams,
    historyCapacity: number = Math.max(
      2 * params.lookbackPeriod,
      2 * params.bollingerLength,
      params.percentileLookback
    )
  ) {
    const required = Math.max(params.bollingerLength, params.percentileLookback);
    if (historyCapacity < required) {
      throw new RangeError(
        `Indicator history capacity ${historyCapacity} cannot hold a ${required}-value band window`
      );
    }
    this.history = new RingBuffer<number>(historyCapacity);
  }

  /**
   * Compute the snapshot for the latest price and record its value.
   * On InsufficientData, or a zero highest close, nothing is recorded.
   */
  compute(priceWindow: readonly number[]): Result<IndicatorSnapshot, InsufficientDataError> {
    const result = calculateVixFix(priceWindow, this.history.toArray(), this.params);
    if (result.ok && result.value.highestClose > 0) {
      this.history.push(result.value.value);
    }
    return result;
  }

  get historyLength(): number {
    return this.history.length;
  }

  values(): number[] {
    return this.history.toArray();
  }

  reset(): void {
    this.history.clear();
  }
}
