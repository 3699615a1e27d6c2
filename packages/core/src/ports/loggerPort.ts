/**
 * Logger Port
 *
 * Minimal logging surface the engine depends on. `Logger` from @vixbot/utils
 * satisfies it; tests pass recording fakes.
 */

export type LogFields = Record<string, unknown>;

export interface LoggerPort {
  debug(message: string, context?: LogFields): void;
  info(message: string, context?: LogFields): void;
  warn(message: string, context?: LogFields): void;
  error(message: string, error?: unknown, context?: LogFields): void;
}
