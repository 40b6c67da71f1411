/**
 * Paper venue configuration types
 */

import type { InstrumentId, Ms, Price, Volume } from "@pairs-arb/core";

/**
 * One instrument listed on the paper venue
 */
export interface PaperInstrumentConfig {
  instrument: InstrumentId;
  /** Instrument price relative to the shared fair value */
  priceRatio: number;
  /** Distance from mid to each side of the book */
  halfSpread: Price;
  /** Volume quoted at each side of the top of book */
  depth: Volume;
}

/**
 * Paper venue configuration
 */
export interface PaperExchangeConfig {
  instruments: PaperInstrumentConfig[];
  initialFairValue: Price;
  initialCash: number;
  tickSize: Price;
  /** Per-step stdev of the shared fair value log return */
  volatility: number;
  /** Per-step stdev of each instrument's premium over fair value */
  divergence: number;
  /** Fraction of the premium removed each step (0..1) */
  meanReversion: number;
  seed: number;
  /** Signed holdings at start, booked at the initial mid */
  initialPositions?: Record<InstrumentId, Volume>;
  now?: () => Ms;
}

/**
 * Order stored on the paper book until cancelled
 */
export interface RestingOrder {
  clientOrderId: string;
  exchangeOrderId: string;
  instrument: InstrumentId;
  side: "buy" | "sell";
  price: Price;
  volume: Volume;
  createdAtMs: Ms;
}
