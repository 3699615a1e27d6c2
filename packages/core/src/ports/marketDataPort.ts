/**
 * Market Data Port
 *
 * Port interface for the price source that feeds one sample per tick.
 */

import type { PriceSample } from '../types.js';

export interface MarketDataPort {
  /**
   * Whether the connector is ready to quote (connected, order book synced)
   */
  isReady(): boolean;

  /**
   * Latest sample, or null when none is available
   */
  latestSample(): PriceSample | null;
}
