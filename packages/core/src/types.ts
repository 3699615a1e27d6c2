/**
 * Core Domain Types
 */

/**
 * One observation of the traded instrument's price.
 *
 * `timestamp` is milliseconds since epoch, as delivered by the market data source.
 */
export interface PriceSample {
  timestamp: number;
  price: number;
}

export type OrderSide = 'BUY' | 'SELL';

/**
 * Immediate order kinds; the engine never rests orders.
 */
export type OrderKind = 'LIMIT' | 'MARKET';

export type PositionState = 'FLAT' | 'LONG';

export type ExitReason = 'ProfitTarget' | 'StopLoss';

export type EntryReason = 'VolatilitySignal';

/**
 * Order intent emitted by the engine to an execution collaborator
 */
export interface OrderIntent {
  /** Engine-assigned id, unique per engine instance */
  clientOrderId: string;
  side: OrderSide;
  amount: number;
  price: number;
  kind: OrderKind;
  reason: EntryReason | ExitReason;
  timestamp: number;
}

/**
 * Fill reported back by the execution collaborator
 */
export interface FillNotification {
  orderId: string;
  filledPrice: number;
  filledAmount: number;
  side: OrderSide;
}
