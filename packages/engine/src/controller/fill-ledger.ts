/**
 * Fill Ledger
 *
 * Queues fill notifications until the next tick and drops repeats of an
 * order id already processed. Remembered ids are bounded; the oldest are
 * forgotten first.
 */

import type { FillNotification } from '@vixbot/core';
import { RingBuffer } from '../history/ring-buffer.js';

export const DEFAULT_REMEMBERED_FILLS = 1_000;

export interface DrainResult {
  accepted: FillNotification[];
  duplicates: FillNotification[];
}

export class FillLedger {
  private pending: FillNotification[] = [];
  private readonly seen = new Set<string>();
  private readonly order: RingBuffer<string>;

  constructor(rememberedFills: number = DEFAULT_REMEMBERED_FILLS) {
    this.order = new RingBuffer<string>(rememberedFills);
  }

  enqueue(fill: FillNotification): void {
    this.pending.push({ ...fill });
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  drain(): DrainResult {
    const batch = this.pending;
    this.pending = [];

    const accepted: FillNotification[] = [];
    const duplicates: FillNotification[] = [];
    for (const fill of batch) {
      if (this.seen.has(fill.orderId)) {
        duplicates.push(fill);
        continue;
      }
      this.remember(fill.orderId);
      accepted.push(fill);
    }
    return { accepted, duplicates };
  }

  hasProcessed(orderId: string): boolean {
    return this.seen.has(orderId);
  }

  private remember(orderId: string): void {
    const evicted = this.order.push(orderId);
    if (evicted !== undefined) {
      this.seen.delete(evicted);
    }
    this.seen.add(orderId);
  }
}
