/**
 * Market Data Port - Interface for top-of-book quotes
 *
 * - Adapters implement this port for venue-specific market data
 * - An empty book side is data (missing bestBid/bestAsk), not an error
 */

import type { Result, ResultAsync } from "neverthrow";

import type { InstrumentId, Quote } from "@pairs-arb/core";

/**
 * Market data adapter errors
 *
 * connection_failed is fatal for the decision loop.
 */
export type MarketDataError =
  | { type: "connection_failed"; message: string }
  | { type: "unknown_instrument"; message: string };

/**
 * Market Data Port interface
 */
export interface MarketDataPort {
  /**
   * Latest best bid / best ask for an instrument
   */
  getQuote(instrument: InstrumentId): Result<Quote, MarketDataError>;

  /**
   * Connect to the venue
   */
  connect(): ResultAsync<void, MarketDataError>;

  /**
   * Disconnect from the venue
   */
  disconnect(): ResultAsync<void, MarketDataError>;

  /**
   * Check if connected
   */
  isConnected(): boolean;
}
