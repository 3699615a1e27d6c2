/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for logging and a helper for
 * prefixed strategy settings.
 */

import { ConfigurationError } from '../errors.js';
import type { LoggerConfig } from '../logger.js';

export type EnvSource = Record<string, string | undefined>;

/**
 * Load logger configuration from environment variables
 */
export function getLoggingConfig(env: EnvSource = process.env): LoggerConfig {
  const { LOG_LEVEL, NODE_ENV, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE } = env;

  return {
    level: LOG_LEVEL || (NODE_ENV === 'production' ? 'info' : 'debug'),
    enableConsole: LOG_CONSOLE !== 'false',
    enableFile: LOG_FILE !== 'false',
    logDir: LOG_DIR || 'logs',
    maxFiles: LOG_MAX_FILES || '14d',
    maxSize: LOG_MAX_SIZE || '20m',
  };
}

/**
 * Collect variables sharing a prefix, keyed by camelCase name.
 *
 * `VIX_LOOKBACK_PERIOD=22` with prefix `VIX_` becomes `{ lookbackPeriod: '22' }`.
 * Empty values are dropped so schema defaults apply.
 */
export function collectPrefixedEnv(prefix: string, env: EnvSource = process.env): Record<string, string> {
  if (!prefix) {
    throw new ConfigurationError('Environment prefix must not be empty', 'prefix');
  }

  const collected: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || value === undefined || value.trim() === '') {
      continue;
    }
    const camel = key
      .slice(prefix.length)
      .toLowerCase()
      .replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
    if (camel) {
      collected[camel] = value.trim();
    }
  }
  return collected;
}
