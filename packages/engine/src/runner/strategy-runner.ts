/**
 * Strategy Runner
 *
 * Drives a StrategyController on a fixed interval. Ticks closer together than
 * `minTickIntervalMs` on the injected clock are dropped.
 *
 * Events:
 * - `tick` (TickOutcome)
 * - `fault` (EngineFault), once per fault reported during a tick
 */

import { EventEmitter } from 'events';
import { createSystemClock, type ClockPort, type LoggerPort } from '@vixbot/core';
import { LogHelpers } from '@vixbot/utils';
import type { StrategyController, TickOutcome } from '../controller/strategy-controller.js';
import { logger as engineLogger } from '../logger.js';

export const DEFAULT_TICK_INTERVAL_MS = 1_000;

export interface StrategyRunnerOptions {
  controller: StrategyController;
  clock?: ClockPort;
  logger?: LoggerPort;
  tickIntervalMs?: number;
  /** Ticks arriving sooner than this after the previous one are skipped (default 0) */
  minTickIntervalMs?: number;
  /** Tick durations at or above this are logged at warn (default 250) */
  slowTickMs?: number;
}

export class StrategyRunner extends EventEmitter {
  private readonly controller: StrategyController;
  private readonly clock: ClockPort;
  private readonly logger: LoggerPort;
  private readonly tickIntervalMs: number;
  private readonly minTickIntervalMs: number;
  private readonly slowTickMs: number;
  private intervalId: NodeJS.Timeout | null = null;
  private lastTickAt: number | null = null;

  constructor(options: StrategyRunnerOptions) {
    super();
    this.controller = options.controller;
    this.clock = options.clock ?? createSystemClock();
    this.logger = options.logger ?? engineLogger;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.minTickIntervalMs = options.minTickIntervalMs ?? 0;
    this.slowTickMs = options.slowTickMs ?? 250;
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.intervalId) {
      this.logger.warn('StrategyRunner already running');
      return;
    }

    this.intervalId = setInterval(() => this.safeRunOnce(), this.tickIntervalMs);
    this.logger.info('StrategyRunner started', {
      tickIntervalMs: this.tickIntervalMs,
      minTickIntervalMs: this.minTickIntervalMs,
    });
  }

  /**
   * Stop ticking and wait for submissions still in flight
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    await this.controller.flush();

    const perf = this.controller.getPerformance();
    this.logger.info('StrategyRunner stopped', {
      totalTrades: perf.totalTrades,
      winningTrades: perf.winningTrades,
      losingTrades: perf.losingTrades,
      totalRealizedPnl: perf.totalRealizedPnl,
    });
  }

  /**
   * Run a single tick now. Returns null when throttled.
   */
  runOnce(): TickOutcome | null {
    const now = this.clock.nowMs();
    if (this.lastTickAt !== null && now - this.lastTickAt < this.minTickIntervalMs) {
      this.logger.debug('Tick throttled', { sinceLastTickMs: now - this.lastTickAt });
      return null;
    }
    this.lastTickAt = now;

    const outcome = this.controller.tick();
    LogHelpers.performance(this.logger, 'tick', this.clock.nowMs() - now, this.slowTickMs, {
      status: outcome.status,
    });

    this.emit('tick', outcome);
    for (const fault of outcome.faults) {
      this.emit('fault', fault);
    }
    return outcome;
  }

  private safeRunOnce(): void {
    try {
      this.runOnce();
    } catch (error) {
      // only listeners can throw here; the controller contains its own faults
      this.logger.error('Tick listener failed', error);
    }
  }
}
