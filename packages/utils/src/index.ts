/**
 * @vixbot/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

// Centralized logging system
export {
  logger,
  Logger,
  LogLevel,
  winstonLogger,
  createLogger,
  buildTransports,
  type LogContext,
  type LoggerConfig,
} from './logger.js';

// Package-aware logging
export { createPackageLogger, getPackageLoggers, LogHelpers } from './logging/index.js';
export type { HelperLogger } from './logging/index.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
