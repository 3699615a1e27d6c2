/**
 * Configuration Management
 * ========================
 * Validated, immutable strategy configuration.
 */

import 'dotenv/config';
import { ConfigurationError, collectPrefixedEnv, type EnvSource } from '@vixbot/utils';
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput } from './schema.js';

export * from './schema.js';

export const ENV_PREFIX = 'VIX_';

/**
 * Parse and validate a configuration object; unset fields take defaults.
 *
 * @throws ConfigurationError listing every failed field
 */
export function parseEngineConfig(
  input: EngineConfigInput | Record<string, string> = {}
): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');

    throw new ConfigurationError(
      `Configuration validation failed: ${errors}`,
      result.error.issues[0]?.path.join('.'),
      { errors: result.error.issues }
    );
  }

  return Object.freeze(result.data);
}

/**
 * Load configuration from `VIX_*` environment variables
 * (`VIX_LOOKBACK_PERIOD`, `VIX_PROFIT_TARGET_PCT`, `VIX_STOP_POLICY`, ...).
 */
export function loadEngineConfigFromEnv(env: EnvSource = process.env): EngineConfig {
  return parseEngineConfig(collectPrefixedEnv(ENV_PREFIX, env));
}
