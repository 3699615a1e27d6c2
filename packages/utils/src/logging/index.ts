/**
 * Package-aware logging
 * =====================
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@vixbot/utils';
 *
 * const logger = createPackageLogger('@vixbot/engine');
 * logger.info('Runner started', { tickIntervalMs: 1000 });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

/**
 * Package logger registry
 */
const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Get all registered package loggers
 */
export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}

/**
 * Anything with the leveled methods LogHelpers writes through
 */
export type HelperLogger = Pick<Logger, 'info' | 'warn' | 'debug'>;

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log an order intent leaving the engine
   */
  static orderIntent(
    logger: HelperLogger,
    side: string,
    amount: number,
    price: number,
    context?: LogContext
  ): void {
    logger.info('Order intent', { side, amount, price, ...context });
  }

  /**
   * Log an operation duration; slow operations are raised to warn
   */
  static performance(
    logger: HelperLogger,
    operation: string,
    durationMs: number,
    slowThresholdMs: number = 250,
    context?: LogContext
  ): void {
    const level = durationMs >= slowThresholdMs ? 'warn' : 'debug';
    logger[level]('Operation timing', { operation, durationMs, ...context });
  }
}
