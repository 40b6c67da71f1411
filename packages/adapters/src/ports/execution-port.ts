/**
 * Execution Port - Interface for order execution
 *
 * - Adapters implement this port for venue-specific trading
 * - Immediate orders fill what they can at submission and cancel the rest
 */

import type { ResultAsync } from "neverthrow";

import type { InstrumentId, Ms, Price, Side, Volume } from "@pairs-arb/core";

/**
 * Order type
 *
 * - immediate: immediate-or-cancel
 * - resting: stays on the book until filled or cancelled
 */
export type OrderType = "immediate" | "resting";

/**
 * Submit order request
 */
export interface SubmitOrderRequest {
  clientOrderId: string;
  instrument: InstrumentId;
  side: Side;
  /** Limit price */
  price: Price;
  volume: Volume;
  orderType: OrderType;
}

/**
 * Order status after submission
 */
export type OrderStatus = "filled" | "partially_filled" | "unfilled" | "resting";

/**
 * Fill report for a submitted order
 */
export interface FillReport {
  clientOrderId: string;
  exchangeOrderId: string;
  instrument: InstrumentId;
  side: Side;
  requestedVolume: Volume;
  filledVolume: Volume;
  /** Volume-weighted fill price; absent when nothing filled */
  avgPrice?: Price;
  status: OrderStatus;
  ts: Ms;
}

/**
 * Cash and realized P&L as reported by the venue
 */
export interface CashAndPnl {
  cash: number;
  realizedPnl: number;
}

/**
 * Execution adapter errors
 */
export type ExecutionError =
  | { type: "network"; message: string }
  | { type: "not_connected"; message: string }
  | { type: "invalid_order"; message: string }
  | { type: "insufficient_balance"; message: string }
  | { type: "exchange_error"; message: string; code?: string }
  | { type: "unknown"; message: string };

/**
 * Transport-level failures: the venue could not be reached at all
 */
export const isTransportError = (error: ExecutionError): boolean =>
  error.type === "network" || error.type === "not_connected";

/**
 * Execution Port interface
 */
export interface ExecutionPort {
  /**
   * Submit an order
   */
  submitOrder(request: SubmitOrderRequest): ResultAsync<FillReport, ExecutionError>;

  /**
   * Cancel all resting orders for an instrument
   *
   * @returns number of orders cancelled
   */
  cancelAllResting(instrument: InstrumentId): ResultAsync<number, ExecutionError>;

  /**
   * Signed position per instrument (long > 0, short < 0)
   */
  getPositions(): ResultAsync<Record<InstrumentId, Volume>, ExecutionError>;

  /**
   * Cash balance and realized P&L
   */
  getCashAndPnl(): ResultAsync<CashAndPnl, ExecutionError>;
}
