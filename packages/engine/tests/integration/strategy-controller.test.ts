/**
 * Strategy Controller Integration Tests
 * =====================================
 * Full ticks against in-process ports.
 *
 * Scenario config: lookback 2, Bollinger 2 × 1σ, SMA 3, order amount 1.
 * Prices 80 → 90 → 100 give indicator values [0, 0]: the upper band is 0,
 * the reading reaches it, and 100 sits above the SMA of 90, so the third
 * tick enters long at 100 (target ≈ 100.3, stop 99.5).
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { EngineFault, OrderIntent } from '@vixbot/core';
import { parseEngineConfig, type EngineConfigInput } from '../../src/config/index.js';
import { StrategyController, type TickOutcome } from '../../src/controller/strategy-controller.js';
import { DryRunExecutor } from '../../src/execution/dry-run-executor.js';
import { createRecordingLogger, RecordingExecution, ScriptedMarketData } from '../helpers/fakes.js';

const scenario: EngineConfigInput = {
  lookbackPeriod: 2,
  bollingerLength: 2,
  bollingerMultiplier: 1,
  percentileLookback: 100,
  smaPeriod: 3,
  orderAmount: 1,
};

describe('StrategyController', () => {
  let market: ScriptedMarketData;
  let execution: RecordingExecution;
  let logger: ReturnType<typeof createRecordingLogger>;

  const build = (overrides: EngineConfigInput = {}) =>
    new StrategyController(parseEngineConfig({ ...scenario, ...overrides }), {
      marketData: market,
      execution,
      logger,
    });

  /** one tick per price, one second apart starting at t = 1s */
  const feed = (controller: StrategyController, prices: number[], startMs = 1_000): TickOutcome[] =>
    prices.map((price, i) => {
      market.set(price, startMs + i * 1_000);
      return controller.tick();
    });

  beforeEach(() => {
    market = new ScriptedMarketData();
    execution = new RecordingExecution();
    logger = createRecordingLogger();
  });

  describe('entry', () => {
    it('should warm up without signals or faults', () => {
      const controller = build();
      const [first, second] = feed(controller, [80, 90]);

      expect(first).toMatchObject({ status: 'processed', snapshot: null, entry: null, faults: [] });
      expect(second.status).toBe('processed');
      expect(controller.getStatus().positionState).toBe('FLAT');
      expect(execution.intents).toHaveLength(0);
    });

    it('should enter long and emit a BUY intent', async () => {
      const controller = build();
      const outcomes = feed(controller, [80, 90, 100]);
      await controller.flush();

      const third = outcomes[2];
      expect(third.status).toBe('processed');
      if (third.status !== 'processed') return;

      expect(third.positionState).toBe('LONG');
      expect(third.entry).toEqual({ enter: true, volatilitySignal: true, sma: 90, priceAboveTrend: true });
      expect(third.intents).toEqual([
        {
          clientOrderId: 'BTC-USDT-1',
          side: 'BUY',
          amount: 1,
          price: 100,
          kind: 'LIMIT',
          reason: 'VolatilitySignal',
          timestamp: 3_000,
        },
      ]);
      expect(execution.intents).toEqual(third.intents);

      const status = controller.getStatus();
      expect(status.entryPrice).toBe(100);
      expect(status.stopLossPrice).toBeCloseTo(99.5, 10);
      expect(status.profitTargetPrice).toBeCloseTo(100.3, 10);
      expect(status.unrealizedPnlPct).toBe(0);
    });

    it('should not enter without a trend', () => {
      const controller = build();
      feed(controller, [100, 90, 80]);

      expect(controller.getStatus().positionState).toBe('FLAT');
      expect(execution.intents).toHaveLength(0);
    });
  });

  describe('exit', () => {
    it('should take profit and record a win', async () => {
      const controller = build();
      const outcomes = feed(controller, [80, 90, 100, 101]);
      await controller.flush();

      const exit = outcomes[3];
      expect(exit.status).toBe('processed');
      if (exit.status !== 'processed') return;

      expect(exit.positionState).toBe('FLAT');
      expect(exit.closedTrade?.reason).toBe('ProfitTarget');
      expect(exit.closedTrade?.pnl).toBe(1);
      expect(exit.intents).toEqual([
        {
          clientOrderId: 'BTC-USDT-2',
          side: 'SELL',
          amount: 1,
          price: 101,
          kind: 'LIMIT',
          reason: 'ProfitTarget',
          timestamp: 4_000,
        },
      ]);

      expect(controller.getStatus()).toMatchObject({
        positionState: 'FLAT',
        consecutiveWins: 1,
        totalTrades: 1,
        winningTrades: 1,
        losingTrades: 0,
        winRate: 1,
        totalRealizedPnl: 1,
        portfolioValue: 10_001,
      });
    });

    it('should take profit exactly at the target price', () => {
      const controller = build({ profitTargetPct: 0.003, initialStopLossPct: 0.005 });
      const outcomes = feed(controller, [80, 90, 100]);

      const status = controller.getStatus();
      expect(status.profitTargetPrice).toBeCloseTo(100.3, 10);
      expect(status.stopLossPrice).toBeCloseTo(99.5, 10);
      expect(status.consecutiveWins).toBe(0);
      expect(outcomes[2].status === 'processed' && outcomes[2].positionState).toBe('LONG');

      const exit = feed(controller, [100.3], 4_000)[0];
      expect(exit.status === 'processed' && exit.closedTrade?.reason).toBe('ProfitTarget');
      expect(controller.getStatus()).toMatchObject({ positionState: 'FLAT', consecutiveWins: 1, winningTrades: 1 });
      expect(controller.getStatus().totalRealizedPnl).toBeCloseTo(0.3, 10);
    });

    it('should stop out and reset the streak', () => {
      const controller = build();
      const outcomes = feed(controller, [80, 90, 100, 99]);

      const exit = outcomes[3];
      expect(exit.status === 'processed' && exit.closedTrade?.reason).toBe('StopLoss');
      expect(controller.getStatus()).toMatchObject({
        consecutiveWins: 0,
        totalTrades: 1,
        losingTrades: 1,
        totalRealizedPnl: -1,
        portfolioValue: 9_999,
      });
    });

    it('should hold while price stays between stop and target', () => {
      const controller = build();
      feed(controller, [80, 90, 100, 100.1]);

      expect(controller.getStatus().positionState).toBe('LONG');
      expect(execution.intents).toHaveLength(1);
    });

    it('should emit a trade event on close', () => {
      const controller = build();
      const onTrade = vi.fn();
      controller.on('trade', onTrade);

      feed(controller, [80, 90, 100, 101]);

      expect(onTrade).toHaveBeenCalledTimes(1);
      expect(onTrade.mock.calls[0][0]).toMatchObject({ reason: 'ProfitTarget', exitPrice: 101 });
    });

    it('should still send the SELL when a trade listener throws', async () => {
      const controller = build();
      controller.on('trade', () => {
        throw new Error('dashboard down');
      });

      const outcomes = feed(controller, [80, 90, 100, 101]);
      await controller.flush();

      const exit = outcomes[3];
      expect(exit.status).toBe('processed');
      if (exit.status !== 'processed') return;

      expect(exit.closedTrade?.reason).toBe('ProfitTarget');
      expect(exit.intents.map((i) => i.side)).toEqual(['SELL']);
      expect(exit.faults.map((f) => f.message)).toEqual(['Unexpected failure in trade listener: dashboard down']);
      expect(execution.intents.map((i) => i.side)).toEqual(['BUY', 'SELL']);
      expect(controller.getStatus()).toMatchObject({ positionState: 'FLAT', totalTrades: 1, faultsReported: 1 });
    });

    it('should send the BUY before logging the entry', () => {
      const controller = build();
      logger.info.mockImplementation((message: string) => {
        if (message === 'Entered long') throw new Error('log sink full');
      });

      const entry = feed(controller, [80, 90, 100])[2];

      expect(entry.status === 'processed' && entry.intents.map((i) => i.side)).toEqual(['BUY']);
      expect(execution.intents.map((i) => i.side)).toEqual(['BUY']);
      expect(controller.getStatus().positionState).toBe('LONG');
    });
  });

  describe('stop policies', () => {
    it('should keep the tighter initial stop under tighteningOnly', () => {
      const controller = build();
      feed(controller, [80, 90, 100, 100.1]);

      // risk-sized stop 98.5 is looser than 99.5
      expect(controller.getStatus().stopLossPrice).toBeCloseTo(99.5, 10);
    });

    it('should follow the risk-sized stop under recomputeEachTick', () => {
      const controller = build({ stopPolicy: 'recomputeEachTick' });
      feed(controller, [80, 90, 100, 100.1, 99]);

      const status = controller.getStatus();
      expect(status.positionState).toBe('LONG');
      expect(status.stopLossPrice).toBeCloseTo(98.5, 10);
    });

    it('should never move a fixedAtEntry stop', () => {
      const controller = build({ stopPolicy: 'fixedAtEntry' });
      feed(controller, [80, 90, 100, 100.1]);

      expect(controller.getStatus().stopLossPrice).toBeCloseTo(99.5, 10);
    });
  });

  describe('cooldown', () => {
    // stop-out at t = 4s; 101 then 102 re-arms the signal at t = 6s and 103 at t = 7s
    const prices = [80, 90, 100, 99, 101, 102, 103];

    it('should re-enter as soon as a signal appears without a cooldown', () => {
      const controller = build();
      feed(controller, prices.slice(0, 6));

      expect(controller.getStatus().positionState).toBe('LONG');
      expect(controller.getStatus().entryPrice).toBe(102);
    });

    it('should suppress entries until the cooldown has elapsed', () => {
      const controller = build({ cooldownMs: 2_500 });
      const outcomes = feed(controller, prices);

      const sixth = outcomes[5];
      expect(sixth.status === 'processed' && sixth.positionState).toBe('FLAT');
      expect(controller.getStatus().positionState).toBe('LONG');
      expect(controller.getStatus().entryPrice).toBe(103);
    });
  });

  describe('fault containment', () => {
    it('should skip the tick when the market is not ready', () => {
      const controller = build();
      market.ready = false;
      market.set(100, 1_000);

      expect(controller.tick()).toEqual({ status: 'skipped', reason: 'marketNotReady', faults: [] });
      expect(controller.getStatus().currentPrice).toBeNull();
      expect(controller.getStatus().ticksProcessed).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith('Market data not ready, skipping tick', {
        tradingPair: 'BTC-USDT',
      });
    });

    it('should skip a tick with an invalid price and leave the history untouched', () => {
      const controller = build();
      feed(controller, [80]);

      market.set(-5, 2_000);
      const outcome = controller.tick();

      expect(outcome.status).toBe('skipped');
      if (outcome.status === 'skipped') {
        expect(outcome.reason).toBe('dataQuality');
        expect(outcome.faults.map((f) => f.kind)).toEqual(['DataQuality']);
        expect(outcome.faults[0].message).toBe('Price must be positive, got -5');
      }
      expect(controller.getStatus().currentPrice).toBe(80);
      expect(controller.getStatus().faultsReported).toBe(1);
    });

    it('should contain a throwing market data source and keep running', () => {
      const controller = build();
      const spy = vi.spyOn(market, 'latestSample').mockImplementationOnce(() => {
        throw new Error('socket closed');
      });

      market.set(80, 1_000);
      const failed = controller.tick();

      expect(failed.faults.map((f: EngineFault) => f.message)).toEqual([
        'Unexpected failure in sample: socket closed',
        'Price sample missing',
      ]);
      expect(failed.faults.map((f) => f.kind)).toEqual(['InvalidState', 'DataQuality']);

      spy.mockRestore();
      const next = feed(controller, [90], 2_000)[0];
      expect(next.status).toBe('processed');
      expect(controller.getStatus().faultsReported).toBe(2);
    });

    it('should report a throwing readiness check as a fault and skip', () => {
      const controller = build();
      vi.spyOn(market, 'isReady').mockImplementation(() => {
        throw new Error('not connected');
      });

      const outcome = controller.tick();
      expect(outcome.status === 'skipped' && outcome.reason).toBe('marketNotReady');
      expect(outcome.faults[0].message).toBe('Unexpected failure in readiness: not connected');
    });
  });

  describe('submission', () => {
    it('should keep the position when a submission is refused', async () => {
      const controller = build();
      const onFailed = vi.fn();
      controller.on('orderFailed', onFailed);
      vi.spyOn(execution, 'submit').mockResolvedValue({ success: false, error: 'insufficient balance' });

      feed(controller, [80, 90, 100]);
      await controller.flush();

      expect(controller.getStatus().positionState).toBe('LONG');
      expect(controller.getStatus().failedSubmissions).toBe(1);
      expect(onFailed).toHaveBeenCalledTimes(1);
      expect(onFailed.mock.calls[0][0]).toMatchObject({ error: 'insufficient balance' });
      expect(logger.error).toHaveBeenCalledWith(
        'Order submission failed',
        undefined,
        expect.objectContaining({ clientOrderId: 'BTC-USDT-1', error: 'insufficient balance' })
      );
    });

    it('should count rejected and throwing submissions', async () => {
      const controller = build();
      const submit = vi
        .spyOn(execution, 'submit')
        .mockRejectedValueOnce(new Error('timeout'))
        .mockImplementationOnce(() => {
          throw new Error('connector gone');
        });

      feed(controller, [80, 90, 100, 101]);
      await controller.flush();

      expect(submit).toHaveBeenCalledTimes(2);
      expect(controller.getStatus().failedSubmissions).toBe(2);
      expect(controller.getStatus().totalTrades).toBe(1);
    });

    it('should announce accepted orders', async () => {
      const controller = build();
      const onSubmitted = vi.fn();
      controller.on('orderSubmitted', onSubmitted);

      feed(controller, [80, 90, 100]);
      await controller.flush();

      expect(onSubmitted).toHaveBeenCalledTimes(1);
      expect(onSubmitted.mock.calls[0][0]).toMatchObject({ orderId: 'ex-1' });
    });
  });

  describe('fills', () => {
    it('should apply fills on the next tick and ignore duplicates', async () => {
      const fills: Array<{ intent?: OrderIntent }> = [];
      const controller = build();
      controller.on('fill', (event: { intent?: OrderIntent }) => fills.push(event));

      feed(controller, [80, 90, 100]);
      await controller.flush();

      const fill = { orderId: 'ex-1', filledPrice: 100, filledAmount: 1, side: 'BUY' as const };
      controller.onFill(fill);
      controller.onFill(fill);
      expect(fills).toHaveLength(0);

      feed(controller, [100.1], 4_000);
      controller.onFill(fill);
      feed(controller, [100.1], 5_000);

      expect(fills).toHaveLength(1);
      expect(fills[0].intent?.clientOrderId).toBe('BTC-USDT-1');
      expect(logger.debug).toHaveBeenCalledWith('Ignoring duplicate fills', { orderIds: ['ex-1'] });
    });

    it('should keep applying fills after a fill listener throws', () => {
      const controller = build();
      const received: string[] = [];
      controller.on('fill', (event: { fill: { orderId: string } }) => {
        received.push(event.fill.orderId);
        if (received.length === 1) throw new Error('listener down');
      });

      controller.onFill({ orderId: 'a', filledPrice: 100, filledAmount: 1, side: 'BUY' });
      controller.onFill({ orderId: 'b', filledPrice: 100, filledAmount: 1, side: 'BUY' });
      const first = feed(controller, [80])[0];

      expect(received).toEqual(['a', 'b']);
      expect(first.faults.map((f) => f.message)).toEqual(['Unexpected failure in fill: listener down']);

      controller.onFill({ orderId: 'b', filledPrice: 100, filledAmount: 1, side: 'BUY' });
      feed(controller, [90], 2_000);
      expect(received).toEqual(['a', 'b']);
    });

    it('should forget the oldest unfilled order beyond the tracking limit', async () => {
      const controller = new StrategyController(parseEngineConfig(scenario), {
        marketData: market,
        execution,
        logger,
        maxTrackedOrders: 1,
      });
      const intents: Array<OrderIntent | undefined> = [];
      controller.on('fill', (event: { intent?: OrderIntent }) => intents.push(event.intent));

      feed(controller, [80, 90, 100, 101]);
      await controller.flush();

      controller.onFill({ orderId: 'ex-1', filledPrice: 100, filledAmount: 1, side: 'BUY' });
      controller.onFill({ orderId: 'ex-2', filledPrice: 101, filledAmount: 1, side: 'SELL' });
      feed(controller, [100], 5_000);

      expect(logger.debug).toHaveBeenCalledWith('Forgetting unfilled order', { clientOrderId: 'BTC-USDT-1' });
      expect(intents.map((i) => i?.clientOrderId)).toEqual([undefined, 'BTC-USDT-2']);
    });

    it('should log fills for orders it never submitted', () => {
      const controller = build();
      controller.onFill({ orderId: 'stray', filledPrice: 1, filledAmount: 1, side: 'SELL' });
      feed(controller, [80]);

      expect(logger.warn).toHaveBeenCalledWith(
        'Fill for unknown order',
        expect.objectContaining({ orderId: 'stray' })
      );
    });

    it('should run end to end with the dry-run executor', async () => {
      const received: OrderIntent[] = [];
      const dryRunLogger = createRecordingLogger();
      let controller: StrategyController | null = null;
      const dryRun = new DryRunExecutor({
        logger: dryRunLogger,
        onFill: (fill) => controller?.onFill(fill),
      });
      controller = new StrategyController(parseEngineConfig(scenario), {
        marketData: market,
        execution: dryRun,
        logger,
      });
      controller.on('fill', (event: { intent?: OrderIntent }) => {
        if (event.intent) received.push(event.intent);
      });

      feed(controller, [80, 90, 100]);
      await controller.flush();
      feed(controller, [101], 4_000);
      await controller.flush();
      // below the SMA: drains the SELL fill without re-entering
      feed(controller, [100], 5_000);

      expect(received.map((i) => i.side)).toEqual(['BUY', 'SELL']);
      expect(dryRun.getSubmitted().map((i) => i.clientOrderId)).toEqual(['BTC-USDT-1', 'BTC-USDT-2']);
    });
  });

  describe('status', () => {
    it('should format the open position', () => {
      const controller = build();
      feed(controller, [80, 90, 100]);

      const text = controller.formatStatus();
      expect(text).toContain('Entry price: 100.00');
      expect(text).toContain('Opened at: 1970-01-01T00:00:03.000Z');
      expect(text).toContain('Unrealized PnL: 0.00%');
    });

    it('should expose performance', () => {
      const controller = build();
      feed(controller, [80, 90, 100, 101]);
      expect(controller.getPerformance()).toMatchObject({ totalTrades: 1, lastTradePnl: 1 });
    });
  });
});
