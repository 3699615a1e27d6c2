/**
 * Strategy Controller
 * ===================
 * Per-tick orchestration of the volatility-exhaustion strategy:
 *
 *   drain fills → readiness → sample → history → indicator
 *     FLAT: trend filter → risk gate → open → BUY
 *     LONG: stop update → exit check → close → SELL
 *
 * Every step runs behind a fault boundary. A failing step is reported and
 * aborts only itself; nothing escapes `tick()`. Intents are submitted as soon
 * as the position moves, before logging or listeners run.
 *
 * Events:
 * - `orderSubmitted` ({ intent, orderId })
 * - `orderFailed` ({ intent, error })
 * - `fill` ({ fill, intent })  intent is undefined for fills of unknown orders
 * - `trade` (ClosedTrade)
 */

import { EventEmitter } from 'events';
import {
  classifyFault,
  type EngineFault,
  type ExecutionPort,
  type FillNotification,
  type LoggerPort,
  type MarketDataPort,
  type OrderIntent,
  type PositionState,
  type PriceSample,
  type SubmissionResult,
} from '@vixbot/core';
import { LogHelpers, errorMessage } from '@vixbot/utils';
import type { EngineConfig } from '../config/schema.js';
import { PriceHistory, validatePriceSample } from '../history/price-history.js';
import { VolatilityIndicatorEngine, type IndicatorSnapshot } from '../indicators/vix-fix.js';
import { evaluateEntryDetailed, type EntryEvaluation } from '../signals/entry-evaluator.js';
import { RiskSizer } from '../risk/risk-sizer.js';
import { PositionStateMachine, type ClosedTrade } from '../position/position-state-machine.js';
import { calculatePnlPercent } from '../position/trade-lifecycle.js';
import { PerformanceTracker, type PerformanceSnapshot } from '../performance/performance-tracker.js';
import { FillLedger } from './fill-ledger.js';
import { OpenOrders } from './open-orders.js';
import { formatStatus, type StrategyStatus } from './status.js';

export interface StrategyControllerDeps {
  marketData: MarketDataPort;
  execution: ExecutionPort;
  logger: LoggerPort;
  /** Accepted orders remembered while awaiting their fill (default 1000) */
  maxTrackedOrders?: number;
}

export type SkipReason = 'marketNotReady' | 'dataQuality';

export type TickOutcome =
  | {
      status: 'skipped';
      reason: SkipReason;
      faults: EngineFault[];
    }
  | {
      status: 'processed';
      sample: PriceSample;
      positionState: PositionState;
      snapshot: IndicatorSnapshot | null;
      entry: EntryEvaluation | null;
      intents: OrderIntent[];
      closedTrade: ClosedTrade | null;
      faults: EngineFault[];
    };

interface TickScope {
  faults: EngineFault[];
  intents: OrderIntent[];
}

export class StrategyController extends EventEmitter {
  private readonly config: EngineConfig;
  private readonly marketData: MarketDataPort;
  private readonly execution: ExecutionPort;
  private readonly logger: LoggerPort;

  private readonly priceHistory: PriceHistory;
  private readonly indicator: VolatilityIndicatorEngine;
  private readonly riskSizer: RiskSizer;
  private readonly positions: PositionStateMachine;
  private readonly performance = new PerformanceTracker();
  private readonly fills = new FillLedger();
  private readonly openOrders: OpenOrders;
  private readonly inFlight = new Set<Promise<void>>();

  private currentPrice: number | null = null;
  private lastExitAt: number | null = null;
  private orderSequence = 0;
  private ticksProcessed = 0;
  private faultsReported = 0;
  private failedSubmissions = 0;

  constructor(config: EngineConfig, deps: StrategyControllerDeps) {
    super();
    this.config = config;
    this.marketData = deps.marketData;
    this.execution = deps.execution;
    this.logger = deps.logger;
    this.openOrders = new OpenOrders(deps.maxTrackedOrders);

    this.priceHistory = new PriceHistory(config.historyCapacity);
    this.indicator = new VolatilityIndicatorEngine(
      {
        lookbackPeriod: config.lookbackPeriod,
        bollingerLength: config.bollingerLength,
        bollingerMultiplier: config.bollingerMultiplier,
        percentileLookback: config.percentileLookback,
        highPercentile: config.highPercentile,
      },
      config.indicatorHistoryCapacity
    );
    this.riskSizer = new RiskSizer({
      baseRiskAmount: config.baseRiskAmount,
      maxRiskAmount: config.maxRiskAmount,
      initialPortfolioValue: config.initialPortfolioValue,
      riskStepPerWin: config.riskStepPerWin,
    });
    this.positions = new PositionStateMachine({
      profitTargetPct: config.profitTargetPct,
      initialStopLossPct: config.initialStopLossPct,
      orderKind: config.orderKind,
    });
  }

  /**
   * Process one market observation. Never throws.
   */
  tick(): TickOutcome {
    const scope: TickScope = { faults: [], intents: [] };

    this.guard('fills', scope, () => this.processFills(scope));

    const ready = this.guard('readiness', scope, () => this.marketData.isReady());
    if (ready !== true) {
      this.logger.warn('Market data not ready, skipping tick', { tradingPair: this.config.tradingPair });
      return { status: 'skipped', reason: 'marketNotReady', faults: scope.faults };
    }

    const raw = this.guard('sample', scope, () => this.marketData.latestSample());
    const checked = validatePriceSample(raw);
    if (!checked.ok) {
      this.report(checked.error, scope);
      return { status: 'skipped', reason: 'dataQuality', faults: scope.faults };
    }
    const sample = checked.value;
    this.ticksProcessed++;

    this.priceHistory.push(sample);
    this.currentPrice = sample.price;

    const snapshot = this.guard('indicator', scope, () => this.computeIndicator()) ?? null;

    let entry: EntryEvaluation | null = null;
    let closedTrade: ClosedTrade | null = null;

    if (this.positions.state === 'FLAT') {
      entry = this.guard('entry', scope, () => this.maybeEnter(sample, snapshot, scope)) ?? null;
    } else {
      closedTrade = this.guard('exit', scope, () => this.manageOpenPosition(sample, scope)) ?? null;
    }

    return {
      status: 'processed',
      sample,
      positionState: this.positions.state,
      snapshot,
      entry,
      intents: scope.intents,
      closedTrade,
      faults: scope.faults,
    };
  }

  /**
   * Queue a fill; it is applied at the start of the next tick.
   */
  onFill(fill: FillNotification): void {
    this.fills.enqueue(fill);
  }

  /**
   * Wait for every submission started so far to settle
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  getStatus(): StrategyStatus {
    const perf = this.performance.snapshot();
    const position = this.positions.getPosition();

    const status: StrategyStatus = {
      tradingPair: this.config.tradingPair,
      currentPrice: this.currentPrice,
      positionState: this.positions.state,
      consecutiveWins: this.riskSizer.getConsecutiveWins(),
      totalTrades: perf.totalTrades,
      winningTrades: perf.winningTrades,
      losingTrades: perf.losingTrades,
      winRate: perf.winRate,
      totalRealizedPnl: perf.totalRealizedPnl,
      portfolioValue: this.riskSizer.getPortfolioValue(),
      ticksProcessed: this.ticksProcessed,
      faultsReported: this.faultsReported,
      failedSubmissions: this.failedSubmissions,
    };

    if (position) {
      status.entryPrice = position.entryPrice;
      status.stopLossPrice = position.stopLossPrice;
      status.profitTargetPrice = position.profitTargetPrice;
      status.openedAt = position.openedAt;
      if (this.currentPrice !== null) {
        status.unrealizedPnlPct = calculatePnlPercent(position.entryPrice, this.currentPrice);
      }
    }

    return status;
  }

  formatStatus(): string {
    return formatStatus(this.getStatus(), this.config);
  }

  getPerformance(): PerformanceSnapshot {
    return this.performance.snapshot();
  }

  // ---------------------------------------------------------------------------
  // Tick steps
  // ---------------------------------------------------------------------------

  private processFills(scope: TickScope): void {
    const { accepted, duplicates } = this.fills.drain();

    if (duplicates.length > 0) {
      this.logger.debug('Ignoring duplicate fills', {
        orderIds: duplicates.map((f) => f.orderId),
      });
    }

    // ids are already marked seen, so each fill gets its own boundary
    for (const fill of accepted) {
      this.guard('fill', scope, () => this.applyFill(fill));
    }
  }

  private applyFill(fill: FillNotification): void {
    const intent = this.openOrders.take(fill.orderId);

    if (!intent) {
      this.logger.warn('Fill for unknown order', { ...fill });
    } else {
      this.logger.info('Order filled', {
        orderId: fill.orderId,
        clientOrderId: intent.clientOrderId,
        side: fill.side,
        filledPrice: fill.filledPrice,
        filledAmount: fill.filledAmount,
        intendedPrice: intent.price,
      });
    }
    this.emit('fill', { fill, intent });
  }

  private computeIndicator(): IndicatorSnapshot | null {
    const result = this.indicator.compute(this.priceHistory.prices(this.config.lookbackPeriod));
    if (!result.ok) {
      // warm-up: no signal this tick
      this.logger.debug(result.error.message, { tradingPair: this.config.tradingPair });
      return null;
    }
    return result.value;
  }

  private maybeEnter(
    sample: PriceSample,
    snapshot: IndicatorSnapshot | null,
    scope: TickScope
  ): EntryEvaluation | null {
    if (this.isCoolingDown(sample.timestamp)) {
      this.logger.debug('Entry suppressed during cooldown', {
        lastExitAt: this.lastExitAt,
        cooldownMs: this.config.cooldownMs,
      });
      return null;
    }
    if (!snapshot) {
      return null;
    }

    const evaluation = evaluateEntryDetailed(
      snapshot,
      this.priceHistory,
      sample.price,
      this.config.smaPeriod
    );
    if (!evaluation.enter) {
      return evaluation;
    }

    const distance = this.riskSizer.stopLossDistancePct();
    if (!distance.ok) {
      this.report(distance.error, scope);
      return evaluation;
    }

    const opened = this.positions.open({
      price: sample.price,
      timestamp: sample.timestamp,
      amount: this.config.orderAmount,
      riskAmount: this.riskSizer.riskAmount(),
      clientOrderId: this.nextClientOrderId(),
    });
    if (!opened.ok) {
      this.report(opened.error, scope);
      return evaluation;
    }

    const { position, intent } = opened.value;
    scope.intents.push(intent);
    this.submit(intent);

    this.logger.info('Entered long', {
      tradingPair: this.config.tradingPair,
      entryPrice: position.entryPrice,
      amount: position.amount,
      profitTargetPrice: position.profitTargetPrice,
      stopLossPrice: position.stopLossPrice,
      vixFix: snapshot.value,
      sma: evaluation.sma,
    });
    return evaluation;
  }

  private manageOpenPosition(sample: PriceSample, scope: TickScope): ClosedTrade | null {
    const position = this.positions.getPosition();
    if (!position) {
      return null;
    }

    const nextStop = this.riskSizer.nextStopLossPrice(position, this.config.stopPolicy);
    if (!nextStop.ok) {
      this.report(nextStop.error, scope);
    } else if (nextStop.value !== position.stopLossPrice) {
      const updated = this.positions.updateStopLoss(nextStop.value);
      if (!updated.ok) {
        this.report(updated.error, scope);
      } else {
        this.logger.debug('Stop loss moved', {
          from: position.stopLossPrice,
          to: updated.value,
          policy: this.config.stopPolicy,
        });
      }
    }

    const reason = this.positions.checkExit(sample.price);
    if (!reason) {
      return null;
    }

    const trade = this.positions.close(sample.price, sample.timestamp, reason, this.nextClientOrderId());
    if (!trade) {
      return null;
    }

    this.performance.recordTrade(trade.pnl, trade.isWin);
    this.riskSizer.recordOutcome(trade.pnl, trade.isWin);
    this.lastExitAt = trade.closedAt;
    scope.intents.push(trade.intent);
    this.submit(trade.intent);

    this.logger.info('Exited long', {
      tradingPair: this.config.tradingPair,
      reason: trade.reason,
      entryPrice: trade.position.entryPrice,
      exitPrice: trade.exitPrice,
      pnl: trade.pnl,
      pnlPct: calculatePnlPercent(trade.position.entryPrice, trade.exitPrice),
      consecutiveWins: this.riskSizer.getConsecutiveWins(),
    });
    this.notify('trade', trade, scope);
    return trade;
  }

  // ---------------------------------------------------------------------------
  // Submission
  // ---------------------------------------------------------------------------

  /**
   * Hand the intent to the execution port without awaiting it. State has
   * already moved; a refused or failed submission is reported, not rolled back.
   */
  private submit(intent: OrderIntent): void {
    let submission: Promise<SubmissionResult>;
    try {
      submission = this.execution.submit(intent);
    } catch (error) {
      this.onSubmissionFailed(intent, errorMessage(error));
      return;
    }

    LogHelpers.orderIntent(this.logger, intent.side, intent.amount, intent.price, {
      tradingPair: this.config.tradingPair,
      clientOrderId: intent.clientOrderId,
      reason: intent.reason,
    });

    const tracked: Promise<void> = submission
      .then(
        (result) => {
          if (result.success) {
            this.onSubmitted(intent, result.orderId);
          } else {
            this.onSubmissionFailed(intent, result.error);
          }
        },
        (error: unknown) => this.onSubmissionFailed(intent, errorMessage(error))
      )
      .catch((error: unknown) => {
        this.logger.error('Submission bookkeeping failed', error, { clientOrderId: intent.clientOrderId });
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private onSubmitted(intent: OrderIntent, orderId: string): void {
    const forgotten = this.openOrders.track(orderId, intent);
    if (forgotten) {
      this.logger.debug('Forgetting unfilled order', { clientOrderId: forgotten.clientOrderId });
    }
    this.logger.debug('Order accepted', { orderId, clientOrderId: intent.clientOrderId });
    this.emit('orderSubmitted', { intent, orderId });
  }

  private onSubmissionFailed(intent: OrderIntent, error: string): void {
    this.failedSubmissions++;
    this.logger.error('Order submission failed', undefined, {
      clientOrderId: intent.clientOrderId,
      side: intent.side,
      price: intent.price,
      error,
    });
    this.emit('orderFailed', { intent, error });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private guard<T>(step: string, scope: TickScope, fn: () => T): T | undefined {
    try {
      return fn();
    } catch (error) {
      this.report(classifyFault(error, step), scope);
      return undefined;
    }
  }

  /**
   * Emit to listeners after state has moved; a throwing listener is reported
   * and does not undo the step.
   */
  private notify(event: string, payload: unknown, scope: TickScope): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      this.report(classifyFault(error, `${event} listener`), scope);
    }
  }

  private report(fault: EngineFault, scope: TickScope): void {
    this.faultsReported++;
    scope.faults.push(fault);

    const context = { kind: fault.kind, tradingPair: this.config.tradingPair, ...fault.context };
    if (fault.kind === 'InsufficientData') {
      this.logger.debug(fault.message, context);
    } else {
      this.logger.warn(fault.message, context);
    }
  }

  private isCoolingDown(now: number): boolean {
    return this.lastExitAt !== null && now - this.lastExitAt < this.config.cooldownMs;
  }

  private nextClientOrderId(): string {
    this.orderSequence++;
    return `${this.config.tradingPair}-${this.orderSequence}`;
  }
}
