/**
 * Risk Sizer
 *
 * Scales the risk budget with the winning streak and turns it into a stop
 * distance as a fraction of portfolio value. Owns the streak and the tracked
 * portfolio value; both change only when a position closes.
 */

import { InvalidStateError, err, ok, type Result } from '@vixbot/core';
import type { StopPolicy } from '../config/schema.js';

export const DEFAULT_RISK_STEP_PER_WIN = 0.25;

export interface RiskSizerOptions {
  baseRiskAmount: number;
  maxRiskAmount: number;
  initialPortfolioValue: number;
  riskStepPerWin?: number;
}

export interface RiskState {
  consecutiveWins: number;
  baseRiskAmount: number;
  maxRiskAmount: number;
  portfolioValue: number;
}

export class RiskSizer {
  private readonly baseRiskAmount: number;
  private readonly maxRiskAmount: number;
  private readonly riskStepPerWin: number;
  private consecutiveWins = 0;
  private portfolioValue: number;

  constructor(options: RiskSizerOptions) {
    if (options.maxRiskAmount < options.baseRiskAmount) {
      throw new RangeError(
        `maxRiskAmount (${options.maxRiskAmount}) must be >= baseRiskAmount (${options.baseRiskAmount})`
      );
    }
    this.baseRiskAmount = options.baseRiskAmount;
    this.maxRiskAmount = options.maxRiskAmount;
    this.riskStepPerWin = options.riskStepPerWin ?? DEFAULT_RISK_STEP_PER_WIN;
    this.portfolioValue = options.initialPortfolioValue;
  }

  /**
   * base × (1 + step × wins), capped at the maximum. Negative streaks count as 0.
   */
  riskAmount(consecutiveWins: number = this.consecutiveWins): number {
    const wins = Math.max(0, Math.trunc(consecutiveWins));
    return Math.min(this.baseRiskAmount * (1 + this.riskStepPerWin * wins), this.maxRiskAmount);
  }

  stopLossDistancePct(
    consecutiveWins: number = this.consecutiveWins,
    portfolioValue: number = this.portfolioValue
  ): Result<number, InvalidStateError> {
    if (!Number.isFinite(portfolioValue) || portfolioValue <= 0) {
      return err(
        new InvalidStateError(`Portfolio value must be positive to size risk, got ${portfolioValue}`, {
          portfolioValue,
          consecutiveWins,
        })
      );
    }
    return ok(this.riskAmount(consecutiveWins) / portfolioValue);
  }

  /**
   * Stop price for an open long under the given policy.
   *
   * - fixedAtEntry: the current stop never moves
   * - tighteningOnly: move up to the risk-sized stop, never down
   * - recomputeEachTick: take the risk-sized stop as is, even if it is lower
   */
  nextStopLossPrice(
    position: { entryPrice: number; stopLossPrice: number },
    policy: StopPolicy
  ): Result<number, InvalidStateError> {
    if (policy === 'fixedAtEntry') {
      return ok(position.stopLossPrice);
    }

    const distance = this.stopLossDistancePct();
    if (!distance.ok) {
      return distance;
    }

    const candidate = position.entryPrice * (1 - distance.value);
    if (policy === 'tighteningOnly') {
      return ok(Math.max(position.stopLossPrice, candidate));
    }
    return ok(candidate);
  }

  /**
   * Apply a closed trade: a win extends the streak, a loss resets it.
   */
  recordOutcome(pnl: number, isWin: boolean): void {
    this.consecutiveWins = isWin ? this.consecutiveWins + 1 : 0;
    this.portfolioValue += pnl;
  }

  getConsecutiveWins(): number {
    return this.consecutiveWins;
  }

  getPortfolioValue(): number {
    return this.portfolioValue;
  }

  snapshot(): RiskState {
    return {
      consecutiveWins: this.consecutiveWins,
      baseRiskAmount: this.baseRiskAmount,
      maxRiskAmount: this.maxRiskAmount,
      portfolioValue: this.portfolioValue,
    };
  }
}
