/**
 * Strategy status reporting
 */

import { DateTime } from 'luxon';
import type { PositionState } from '@vixbot/core';
import type { StopPolicy } from '../config/schema.js';

export interface StrategyStatus {
  tradingPair: string;
  currentPrice: number | null;
  positionState: PositionState;
  entryPrice?: number;
  stopLossPrice?: number;
  profitTargetPrice?: number;
  openedAt?: number;
  unrealizedPnlPct?: number;
  consecutiveWins: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  totalRealizedPnl: number;
  portfolioValue: number;
  ticksProcessed: number;
  faultsReported: number;
  failedSubmissions: number;
}

export interface StatusSettings {
  orderAmount: number;
  profitTargetPct: number;
  initialStopLossPct: number;
  stopPolicy: StopPolicy;
}

const pct = (fraction: number): string => `${(fraction * 100).toFixed(2)}%`;

function formatTimestamp(ms: number): string {
  return DateTime.fromMillis(ms, { zone: 'utc' }).toISO() ?? String(ms);
}

/**
 * Multi-line status block for operators
 */
export function formatStatus(status: StrategyStatus, settings: StatusSettings): string {
  if (status.currentPrice === null) {
    return 'Market data not ready.';
  }

  const lines: string[] = [
    `Trading pair: ${status.tradingPair}`,
    `Current price: ${status.currentPrice.toFixed(2)}`,
    `Base order amount: ${settings.orderAmount}`,
    '',
    'Strategy Settings:',
    `Profit target: ${pct(settings.profitTargetPct)}`,
    `Stop loss: ${pct(settings.initialStopLossPct)}`,
    `Stop policy: ${settings.stopPolicy}`,
    `Consecutive wins: ${status.consecutiveWins}`,
    '',
  ];

  if (
    status.positionState === 'LONG' &&
    status.entryPrice !== undefined &&
    status.profitTargetPrice !== undefined &&
    status.stopLossPrice !== undefined
  ) {
    lines.push(
      'Current Position:',
      `Entry price: ${status.entryPrice.toFixed(2)}`,
      `Profit target: ${status.profitTargetPrice.toFixed(2)}`,
      `Stop loss: ${status.stopLossPrice.toFixed(2)}`
    );
    if (status.openedAt !== undefined) {
      lines.push(`Opened at: ${formatTimestamp(status.openedAt)}`);
    }
    lines.push(`Unrealized PnL: ${(status.unrealizedPnlPct ?? 0).toFixed(2)}%`);
  } else {
    lines.push('No active position');
  }

  lines.push(
    '',
    'Performance:',
    `Trades: ${status.totalTrades} (${status.winningTrades} won, ${status.losingTrades} lost)`,
    `Win rate: ${pct(status.winRate)}`,
    `Realized PnL: ${status.totalRealizedPnl.toFixed(4)}`,
    `Portfolio value: ${status.portfolioValue.toFixed(2)}`
  );

  return lines.join('\n');
}
