/**
 * Price History
 * =============
 * Rolling window of accepted price samples, oldest evicted first.
 */

import {
  DataQualityError,
  InsufficientDataError,
  err,
  ok,
  type PriceSample,
  type Result,
} from '@vixbot/core';
import { RingBuffer } from './ring-buffer.js';

/**
 * Reject samples the engine must never see: missing, non-finite or non-positive.
 */
export function validatePriceSample(sample: PriceSample | null | undefined): Result<PriceSample, DataQualityError> {
  if (!sample) {
    return err(new DataQualityError('Price sample missing'));
  }
  if (!Number.isFinite(sample.timestamp)) {
    return err(new DataQualityError('Price sample timestamp is not finite', { timestamp: sample.timestamp }));
  }
  if (!Number.isFinite(sample.price) || sample.price <= 0) {
    return err(new DataQualityError(`Price must be positive, got ${sample.price}`, { price: sample.price }));
  }
  return ok(sample);
}

export class PriceHistory {
  private readonly buffer: RingBuffer<PriceSample>;

  constructor(capacity: number) {
    this.buffer = new RingBuffer<PriceSample>(capacity);
  }

  get length(): number {
    return this.buffer.length;
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  /**
   * Append a validated sample. Throws DataQualityError for invalid samples;
   * the controller validates first so this only fires on direct misuse.
   */
  push(sample: PriceSample): void {
    const checked = validatePriceSample(sample);
    if (!checked.ok) {
      throw checked.error;
    }
    this.buffer.push({ timestamp: sample.timestamp, price: sample.price });
  }

  /**
   * Most recent `n` samples in chronological order
   */
  window(n: number): Result<PriceSample[], InsufficientDataError> {
    if (!Number.isInteger(n) || n < 1 || n > this.buffer.length) {
      return err(new InsufficientDataError(n, this.buffer.length, { source: 'PriceHistory' }));
    }
    return ok(this.buffer.last(n).map((s) => ({ ...s })));
  }

  /**
   * Prices only, most recent `n` (all when omitted)
   */
  prices(n: number = this.buffer.length): number[] {
    return this.buffer.last(n).map((s) => s.price);
  }

  latest(): PriceSample | undefined {
    const last = this.buffer.latest();
    return last ? { ...last } : undefined;
  }

  clear(): void {
    this.buffer.clear();
  }
}
