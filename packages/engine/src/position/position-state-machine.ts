/**
 * Position State Machine
 * ======================
 * Owns the single position. FLAT → LONG on entry, LONG → FLAT on profit
 * target or stop loss, and round again for the life of the process.
 */

import {
  InvalidStateError,
  err,
  ok,
  type ExitReason,
  type OrderIntent,
  type OrderKind,
  type PositionState,
  type Result,
} from '@vixbot/core';
import {
  calculateProfitTarget,
  calculateRealizedPnl,
  calculateStopLoss,
  checkProfitTarget,
  checkStopLoss,
} from './trade-lifecycle.js';

export interface Position {
  entryPrice: number;
  amount: number;
  stopLossPrice: number;
  profitTargetPrice: number;
  openedAt: number;
  /** Risk budget in force when the position was opened */
  riskAmount: number;
}

export interface ClosedTrade {
  position: Position;
  exitPrice: number;
  closedAt: number;
  reason: ExitReason;
  pnl: number;
  isWin: boolean;
  intent: OrderIntent;
}

export interface PositionStateMachineOptions {
  profitTargetPct: number;
  initialStopLossPct: number;
  orderKind?: OrderKind;
}

export interface OpenParams {
  price: number;
  timestamp: number;
  amount: number;
  riskAmount: number;
  clientOrderId: string;
}

export class PositionStateMachine {
  private position: Position | null = null;
  private readonly profitTargetPct: number;
  private readonly initialStopLossPct: number;
  private readonly orderKind: OrderKind;

  constructor(options: PositionStateMachineOptions) {
    this.profitTargetPct = options.profitTargetPct;
    this.initialStopLossPct = options.initialStopLossPct;
    this.orderKind = options.orderKind ?? 'LIMIT';
  }

  get state(): PositionState {
    return this.position ? 'LONG' : 'FLAT';
  }

  /**
   * Copy of the open position, or null when flat
   */
  getPosition(): Position | null {
    return this.position ? { ...this.position } : null;
  }

  /**
   * FLAT → LONG. Rejected while a position is open.
   */
  open(params: OpenParams): Result<{ position: Position; intent: OrderIntent }, InvalidStateError> {
    if (this.position) {
      return err(
        new InvalidStateError('Entry rejected: a position is already open', {
          entryPrice: this.position.entryPrice,
          attemptedPrice: params.price,
        })
      );
    }
    if (!Number.isFinite(params.amount) || params.amount <= 0) {
      return err(new InvalidStateError(`Order amount must be positive, got ${params.amount}`));
    }

    const position: Position = {
      entryPrice: params.price,
      amount: params.amount,
      stopLossPrice: calculateStopLoss(params.price, this.initialStopLossPct),
      profitTargetPrice: calculateProfitTarget(params.price, this.profitTargetPct),
      openedAt: params.timestamp,
      riskAmount: params.riskAmount,
    };

    const intent: OrderIntent = {
      clientOrderId: params.clientOrderId,
      side: 'BUY',
      amount: params.amount,
      price: params.price,
      kind: this.orderKind,
      reason: 'VolatilitySignal',
      timestamp: params.timestamp,
    };

    this.position = position;
    return ok({ position: { ...position }, intent });
  }

  /**
   * Move the stop of the open position; no order is emitted.
   */
  updateStopLoss(stopLossPrice: number): Result<number, InvalidStateError> {
    if (!this.position) {
      return err(new InvalidStateError('No open position to update'));
    }
    if (!Number.isFinite(stopLossPrice)) {
      return err(new InvalidStateError(`Stop loss price must be finite, got ${stopLossPrice}`));
    }
    this.position.stopLossPrice = stopLossPrice;
    return ok(stopLossPrice);
  }

  /**
   * Exit condition at `price`. Profit target is checked before stop loss.
   */
  checkExit(price: number): ExitReason | null {
    if (!this.position) {
      return null;
    }
    if (checkProfitTarget(price, this.position.profitTargetPrice)) {
      return 'ProfitTarget';
    }
    if (checkStopLoss(price, this.position.stopLossPrice)) {
      return 'StopLoss';
    }
    return null;
  }

  /**
   * LONG → FLAT, selling the full amount. A no-op returning null when flat.
   */
  close(price: number, timestamp: number, reason: ExitReason, clientOrderId: string): ClosedTrade | null {
    const position = this.position;
    if (!position) {
      return null;
    }

    const trade: ClosedTrade = {
      position: { ...position },
      exitPrice: price,
      closedAt: timestamp,
      reason,
      pnl: calculateRealizedPnl(position.entryPrice, price, position.amount),
      isWin: reason === 'ProfitTarget',
      intent: {
        clientOrderId,
        side: 'SELL',
        amount: position.amount,
        price,
        kind: this.orderKind,
        reason,
        timestamp,
      },
    };

    this.position = null;
    return trade;
  }
}
