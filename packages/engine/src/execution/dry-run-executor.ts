/**
 * Dry Run Executor
 *
 * Paper trading: accepts every intent, assigns a sequential order id and,
 * when a fill handler is set, reports a full fill at the intended price.
 */

import type {
  ExecutionPort,
  FillNotification,
  LoggerPort,
  OrderIntent,
  SubmissionResult,
} from '@vixbot/core';
import { logger as engineLogger } from '../logger.js';

export interface DryRunExecutorOptions {
  /** Receives a fill after each accepted submission */
  onFill?: (fill: FillNotification) => void;
  /** Prefix of generated order ids (default 'dry') */
  orderIdPrefix?: string;
  logger?: LoggerPort;
}

export class DryRunExecutor implements ExecutionPort {
  private readonly onFill?: (fill: FillNotification) => void;
  private readonly orderIdPrefix: string;
  private readonly logger: LoggerPort;
  private sequence = 0;
  private readonly submitted: OrderIntent[] = [];

  constructor(options: DryRunExecutorOptions = {}) {
    this.onFill = options.onFill;
    this.orderIdPrefix = options.orderIdPrefix ?? 'dry';
    this.logger = options.logger ?? engineLogger;
  }

  async submit(intent: OrderIntent): Promise<SubmissionResult> {
    this.sequence++;
    const orderId = `${this.orderIdPrefix}-${this.sequence}`;
    this.submitted.push({ ...intent });

    this.logger.info('DRY RUN: Simulating order', {
      orderId,
      clientOrderId: intent.clientOrderId,
      side: intent.side,
      amount: intent.amount,
      price: intent.price,
    });

    const onFill = this.onFill;
    if (onFill) {
      queueMicrotask(() =>
        onFill({
          orderId,
          filledPrice: intent.price,
          filledAmount: intent.amount,
          side: intent.side,
        })
      );
    }

    return { success: true, orderId };
  }

  /**
   * Copies of every intent received, in submission order
   */
  getSubmitted(): OrderIntent[] {
    return this.submitted.map((intent) => ({ ...intent }));
  }
}
