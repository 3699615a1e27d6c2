/**
 * @vixbot/engine
 *
 * Volatility-exhaustion scalping engine: one long position per trading pair,
 * entries on Williams VIX Fix spikes above the trend, exits on a profit target
 * or a risk-sized stop.
 */

export * from './config/index.js';

export { RingBuffer } from './history/ring-buffer.js';
export { PriceHistory, validatePriceSample } from './history/price-history.js';

export { mean, populationStdDev, highest, percentileLinear } from './indicators/statistics.js';
export { calculateSMA } from './indicators/moving-averages.js';
export {
  calculateVixFix,
  VolatilityIndicatorEngine,
  type VixFixParams,
  type IndicatorSnapshot,
} from './indicators/vix-fix.js';

export {
  evaluateEntry,
  evaluateEntryDetailed,
  DEFAULT_SMA_PERIOD,
  type EntryEvaluation,
} from './signals/entry-evaluator.js';

export {
  RiskSizer,
  DEFAULT_RISK_STEP_PER_WIN,
  type RiskSizerOptions,
  type RiskState,
} from './risk/risk-sizer.js';

export * from './position/trade-lifecycle.js';
export {
  PositionStateMachine,
  type Position,
  type ClosedTrade,
  type OpenParams,
  type PositionStateMachineOptions,
} from './position/position-state-machine.js';

export {
  PerformanceTracker,
  type PerformanceStats,
  type PerformanceSnapshot,
} from './performance/performance-tracker.js';

export { FillLedger, type DrainResult } from './controller/fill-ledger.js';
export { formatStatus, type StrategyStatus, type StatusSettings } from './controller/status.js';
export {
  StrategyController,
  type StrategyControllerDeps,
  type TickOutcome,
  type SkipReason,
} from './controller/strategy-controller.js';

export {
  StrategyRunner,
  DEFAULT_TICK_INTERVAL_MS,
  type StrategyRunnerOptions,
} from './runner/strategy-runner.js';
export { DryRunExecutor, type DryRunExecutorOptions } from './execution/dry-run-executor.js';

export { createStrategyEngine, type CreateEngineOptions, type StrategyEngine } from './create-engine.js';
export { logger } from './logger.js';
