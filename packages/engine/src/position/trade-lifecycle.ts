/**
 * TradeLifecycle - Helpers for entry, exit and stop levels of a long position
 */

/**
 * Calculate stop loss price
 */
export function calculateStopLoss(entryPrice: number, stopLossPct: number): number {
  return entryPrice * (1 - stopLossPct);
}

/**
 * Calculate profit target price
 */
export function calculateProfitTarget(entryPrice: number, profitTargetPct: number): number {
  return entryPrice * (1 + profitTargetPct);
}

/**
 * Check if profit target is hit
 */
export function checkProfitTarget(currentPrice: number, profitTargetPrice: number): boolean {
  return currentPrice >= profitTargetPrice;
}

/**
 * Check if stop loss is hit
 */
export function checkStopLoss(currentPrice: number, stopLossPrice: number): boolean {
  return currentPrice <= stopLossPrice;
}

/**
 * Realized PnL of a long closed at `exitPrice`
 */
export function calculateRealizedPnl(entryPrice: number, exitPrice: number, amount: number): number {
  return (exitPrice - entryPrice) * amount;
}

/**
 * Unrealized PnL in percent of entry
 */
export function calculatePnlPercent(entryPrice: number, currentPrice: number): number {
  if (entryPrice <= 0) return 0;
  return ((currentPrice - entryPrice) / entryPrice) * 100;
}
