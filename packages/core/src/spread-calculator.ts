/**
 * Spread Calculator - Pure logic for the A/B spread and its statistics
 *
 * - mid = (best_bid + best_ask) / 2
 * - spread = mid_A / mid_B (ratio, so absolute price level does not bias bands)
 * - mean / standard deviation over a sample window
 *
 * This module is pure (no I/O, no throw).
 */

import type { Price, Quote, SpreadStatistics, StdevMode, TwoSidedQuote } from "./types";

/**
 * Check that both sides of the book are present
 */
export function isTwoSided(quote: Quote | undefined): quote is TwoSidedQuote {
  return quote !== undefined && quote.bestBid !== undefined && quote.bestAsk !== undefined;
}

/**
 * Calculate mid price
 */
export function calculateMid(quote: TwoSidedQuote): Price {
  return (quote.bestBid.price + quote.bestAsk.price) / 2;
}

/**
 * Calculate the spread ratio mid_A / mid_B
 *
 * @returns undefined when either book is one-sided or mid_B is not positive
 */
export function calculateSpread(quoteA: Quote, quoteB: Quote): number | undefined {
  if (!isTwoSided(quoteA) || !isTwoSided(quoteB)) {
    return undefined;
  }

  const midB = calculateMid(quoteB);
  if (midB <= 0) {
    return undefined;
  }

  return calculateMid(quoteA) / midB;
}

/**
 * Bid-ask width (ask - bid)
 */
export function calculateBidAskWidth(quote: TwoSidedQuote): number {
  return quote.bestAsk.price - quote.bestBid.price;
}

export function calculateMean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Standard deviation
 *
 * population: divide by n; sample: divide by n - 1 (0 when n < 2)
 */
export function calculateStdev(values: readonly number[], mode: StdevMode): number {
  const n = values.length;
  const divisor = mode === "sample" ? n - 1 : n;
  if (divisor <= 0) return 0;

  const mean = calculateMean(values);
  const sumSq = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return Math.sqrt(sumSq / divisor);
}

/**
 * Compute statistics over a spread window.
 *
 * Statistics are only ready once `capacity` samples have been collected.
 */
export function computeSpreadStatistics(
  values: readonly number[],
  capacity: number,
  mode: StdevMode,
): SpreadStatistics {
  const sampleCount = values.length;

  if (sampleCount < capacity) {
    return { ready: false, sampleCount, capacity };
  }

  return {
    ready: true,
    mean: calculateMean(values),
    stdev: calculateStdev(values, mode),
    sampleCount,
    capacity,
  };
}
