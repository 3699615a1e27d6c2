/**
 * Open Orders
 *
 * Intents of accepted orders, keyed by exchange order id, until their fill
 * arrives. Bounded: once `capacity` ids have been tracked, the oldest is
 * forgotten, filled or not.
 */

import type { OrderIntent } from '@vixbot/core';
import { RingBuffer } from '../history/ring-buffer.js';

export const DEFAULT_TRACKED_ORDERS = 1_000;

export class OpenOrders {
  private readonly intents = new Map<string, OrderIntent>();
  private readonly order: RingBuffer<string>;

  constructor(capacity: number = DEFAULT_TRACKED_ORDERS) {
    this.order = new RingBuffer<string>(capacity);
  }

  get size(): number {
    return this.intents.size;
  }

  /**
   * Start tracking an order. Returns the intent of an unfilled order pushed out
   * to make room, if any.
   */
  track(orderId: string, intent: OrderIntent): OrderIntent | undefined {
    const evicted = this.order.push(orderId);
    this.intents.set(orderId, intent);
    if (evicted === undefined || evicted === orderId) {
      return undefined;
    }
    const dropped = this.intents.get(evicted);
    this.intents.delete(evicted);
    return dropped;
  }

  /**
   * Stop tracking an order and return its intent
   */
  take(orderId: string): OrderIntent | undefined {
    const intent = this.intents.get(orderId);
    this.intents.delete(orderId);
    return intent;
  }
}
