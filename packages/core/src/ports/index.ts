/**
 * Ports Barrel Export
 *
 * All port interfaces are exported from here.
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock, createManualClock } from './clockPort.js';
export type { MarketDataPort } from './marketDataPort.js';
export type { ExecutionPort, SubmissionResult } from './executionPort.js';
export type { LoggerPort, LogFields } from './loggerPort.js';
