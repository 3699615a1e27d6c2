/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, log rotation,
 * and context propagation.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import { getLoggingConfig } from './config/index.js';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace',
}

// Log context interface
export interface LogContext {
  tradingPair?: string;
  strategy?: string;
  tick?: number;
  orderId?: string;
  [key: string]: unknown;
}

// Logger configuration interface
export interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const isTestEnvironment = (): boolean =>
  process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// Default configuration
const defaultConfig: LoggerConfig = {
  ...getLoggingConfig(),
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
};

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

/**
 * Build the transport list for a configuration.
 * File transports are skipped under test to keep runs free of side effects.
 */
export function buildTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
        level: config.level,
        silent: isTestEnvironment() && process.env.LOG_IN_TESTS !== 'true',
      })
    );
  }

  if (config.enableFile && !isTestEnvironment()) {
    if (!fs.existsSync(config.logDir)) {
      fs.mkdirSync(config.logDir, { recursive: true });
    }

    // Error log file
    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: structuredFormat,
        maxSize: config.maxSize,
        maxFiles: config.maxFiles,
        zippedArchive: true,
      })
    );

    // Combined log file
    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        format: structuredFormat,
        maxSize: config.maxSize,
        maxFiles: config.maxFiles,
        zippedArchive: true,
      })
    );
  }

  return transports;
}

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'vixbot' },
  transports: buildTransports(defaultConfig),
  // Don't exit on handled exceptions
  exitOnError: false,
});

// Logger class with context support and package namespacing
class Logger {
  private context: LogContext = {};
  private readonly namespace: string;
  private readonly sink: winston.Logger;

  /**
   * Create a logger with a specific namespace (package name)
   */
  constructor(namespace: string = 'vixbot', sink: winston.Logger = winstonLogger) {
    this.namespace = namespace;
    this.sink = sink;
  }

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  /**
   * Merge context for a single log call, including namespace
   */
  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      this.sink.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error !== undefined) {
      this.sink.error(message, { ...logContext, error });
    } else {
      this.sink.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.sink.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    this.sink.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    this.sink.debug(message, this.mergeContext(context));
  }

  /**
   * Log trace message (most verbose)
   */
  trace(message: string, context?: LogContext): void {
    // Winston doesn't have trace level, use debug
    this.sink.debug(message, { ...this.mergeContext(context), level: 'trace' });
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace, this.sink);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

// Factory function to create package-specific loggers
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

// Export singleton instance (default logger)
export const logger = new Logger('vixbot');

export { Logger, winstonLogger };
