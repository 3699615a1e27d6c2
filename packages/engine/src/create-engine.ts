/**
 * Composition root for a single trading pair
 */

import type { ClockPort, ExecutionPort, LoggerPort, MarketDataPort } from '@vixbot/core';
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from './config/index.js';
import { StrategyController } from './controller/strategy-controller.js';
import { StrategyRunner, type StrategyRunnerOptions } from './runner/strategy-runner.js';
import { logger as engineLogger } from './logger.js';

export interface CreateEngineOptions {
  marketData: MarketDataPort;
  execution: ExecutionPort;
  logger?: LoggerPort;
  clock?: ClockPort;
  runner?: Pick<StrategyRunnerOptions, 'tickIntervalMs' | 'minTickIntervalMs' | 'slowTickMs'>;
}

export interface StrategyEngine {
  config: EngineConfig;
  controller: StrategyController;
  runner: StrategyRunner;
}

export function createStrategyEngine(
  config: EngineConfig | EngineConfigInput,
  options: CreateEngineOptions
): StrategyEngine {
  const parsed = parseEngineConfig(config);
  const logger = options.logger ?? engineLogger;

  const controller = new StrategyController(parsed, {
    marketData: options.marketData,
    execution: options.execution,
    logger,
  });
  const runner = new StrategyRunner({
    controller,
    logger,
    clock: options.clock,
    ...options.runner,
  });

  return { config: parsed, controller, runner };
}
