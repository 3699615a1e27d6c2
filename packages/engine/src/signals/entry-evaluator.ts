/**
 * Entry Signal Evaluator
 *
 * A volatility spike only counts as an entry when price is already above its
 * medium-term SMA.
 */

import type { IndicatorSnapshot } from '../indicators/vix-fix.js';
import { calculateSMA } from '../indicators/moving-averages.js';
import type { PriceHistory } from '../history/price-history.js';

export const DEFAULT_SMA_PERIOD = 50;

export interface EntryEvaluation {
  enter: boolean;
  volatilitySignal: boolean;
  /** null while the history is shorter than the SMA period */
  sma: number | null;
  priceAboveTrend: boolean;
}

export function evaluateEntryDetailed(
  snapshot: Pick<IndicatorSnapshot, 'signal'>,
  priceHistory: PriceHistory,
  currentPrice: number,
  smaPeriod: number = DEFAULT_SMA_PERIOD
): EntryEvaluation {
  const sma = priceHistory.length >= smaPeriod ? calculateSMA(priceHistory.prices(smaPeriod), smaPeriod) : null;
  const priceAboveTrend = sma !== null && currentPrice > sma;

  return {
    enter: snapshot.signal && priceAboveTrend,
    volatilitySignal: snapshot.signal,
    sma,
    priceAboveTrend,
  };
}

export function evaluateEntry(
  snapshot: Pick<IndicatorSnapshot, 'signal'>,
  priceHistory: PriceHistory,
  currentPrice: number,
  smaPeriod: number = DEFAULT_SMA_PERIOD
): boolean {
  return evaluateEntryDetailed(snapshot, priceHistory, currentPrice, smaPeriod).enter;
}
