/**
 * Performance Tracker
 *
 * Realized PnL and trade counts. Only `recordTrade` mutates.
 */

export interface PerformanceStats {
  totalRealizedPnl: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
}

export interface PerformanceSnapshot extends PerformanceStats {
  /** winningTrades / totalTrades, 0 before the first trade */
  winRate: number;
  averagePnl: number;
  bestTrade: number | null;
  worstTrade: number | null;
  lastTradePnl: number | null;
}

export class PerformanceTracker {
  private stats: PerformanceStats = {
    totalRealizedPnl: 0,
    totalTrades: 0,
    winningTrades: 0,
    losingTrades: 0,
  };
  private bestTrade: number | null = null;
  private worstTrade: number | null = null;
  private lastTradePnl: number | null = null;

  recordTrade(pnl: number, isWin: boolean): void {
    this.stats = {
      totalRealizedPnl: this.stats.totalRealizedPnl + pnl,
      totalTrades: this.stats.totalTrades + 1,
      winningTrades: this.stats.winningTrades + (isWin ? 1 : 0),
      losingTrades: this.stats.losingTrades + (isWin ? 0 : 1),
    };
    this.bestTrade = this.bestTrade === null ? pnl : Math.max(this.bestTrade, pnl);
    this.worstTrade = this.worstTrade === null ? pnl : Math.min(this.worstTrade, pnl);
    this.lastTradePnl = pnl;
  }

  snapshot(): PerformanceSnapshot {
    const { totalTrades, winningTrades, totalRealizedPnl } = this.stats;
    return {
      ...this.stats,
      winRate: totalTrades > 0 ? winningTrades / totalTrades : 0,
      averagePnl: totalTrades > 0 ? totalRealizedPnl / totalTrades : 0,
      bestTrade: this.bestTrade,
      worstTrade: this.worstTrade,
      lastTradePnl: this.lastTradePnl,
    };
  }
}
