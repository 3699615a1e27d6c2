/**
 * Execution Port
 *
 * Port interface for order submission (exchange connector, paper trading, etc.).
 * Adapters implement this port to provide execution capabilities.
 */

import type { OrderIntent } from '../types.js';

/**
 * Submission outcome: an exchange order id, or the reason it was refused
 */
export type SubmissionResult =
  | { success: true; orderId: string }
  | { success: false; error: string };

/**
 * Execution Port Interface
 *
 * The engine fires intents and does not wait on the returned promise inside a tick.
 */
export interface ExecutionPort {
  submit(intent: OrderIntent): Promise<SubmissionResult>;
}
