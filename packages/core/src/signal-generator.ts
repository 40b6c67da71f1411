/**
 * Signal Generator - Mean reversion signals on the A/B spread
 *
 * - FLAT: spread above upper entry band → OPEN_SHORT_PAIR, below lower → OPEN_LONG_PAIR
 * - LONG_PAIR: spread back at or above lower exit band → CLOSE_POSITION
 * - SHORT_PAIR: spread back at or below upper exit band → CLOSE_POSITION
 * - No pyramiding: OPEN only while FLAT, CLOSE only while in a position
 *
 * This module is pure (no I/O, no throw).
 */

import type { NoSignal, PositionState, Signal, SignalBands, SignalParams, SpreadStatistics } from "./types";

/**
 * Reason strings (stable, used in logs and tests)
 */
export const SIGNAL_REASONS = {
  statsNotReady: "stats_not_ready",
  aboveUpperEntry: "spread > upper_entry",
  belowLowerEntry: "spread < lower_entry",
  revertedToMean: "reverted_to_mean",
  withinBands: "within_bands",
  holding: "holding",
} as const;

function noSignal(reason: string): NoSignal {
  return { type: "NONE", reason, volume: 0 };
}

/**
 * Compute entry and exit bands.
 *
 * Centre is the rolling mean, or the configured parity spread when
 * meanAnchor is "parity". Width always comes from the rolling stdev.
 */
export function computeBands(mean: number, stdev: number, params: SignalParams): SignalBands {
  const centre = params.meanAnchor === "parity" ? params.paritySpread : mean;

  return {
    centre,
    upperEntry: centre + params.entryKStdev * stdev,
    lowerEntry: centre - params.entryKStdev * stdev,
    upperExit: centre + params.exitKStdev * stdev,
    lowerExit: centre - params.exitKStdev * stdev,
  };
}

/**
 * Evaluate the current spread against the bands
 *
 * @param spread - Current spread (mid_A / mid_B)
 * @param stats - Rolling statistics
 * @param position - Current position state (read from the ledger)
 * @param params - Signal parameters
 * @returns At most one signal
 */
export function evaluateSignal(
  spread: number,
  stats: SpreadStatistics,
  position: PositionState,
  params: SignalParams,
): Signal {
  if (!stats.ready) {
    return noSignal(SIGNAL_REASONS.statsNotReady);
  }

  const bands = computeBands(stats.mean, stats.stdev, params);

  switch (position.type) {
    case "FLAT": {
      if (spread > bands.upperEntry) {
        return {
          type: "OPEN_SHORT_PAIR",
          reason: SIGNAL_REASONS.aboveUpperEntry,
          volume: params.maxPositionSize,
          spread,
          threshold: bands.upperEntry,
        };
      }
      if (spread < bands.lowerEntry) {
        return {
          type: "OPEN_LONG_PAIR",
          reason: SIGNAL_REASONS.belowLowerEntry,
          volume: params.maxPositionSize,
          spread,
          threshold: bands.lowerEntry,
        };
      }
      return noSignal(SIGNAL_REASONS.withinBands);
    }

    case "LONG_PAIR": {
      if (spread >= bands.lowerExit) {
        return {
          type: "CLOSE_POSITION",
          reason: SIGNAL_REASONS.revertedToMean,
          volume: position.volume,
          spread,
          threshold: bands.lowerExit,
          closing: "LONG_PAIR",
        };
      }
      return noSignal(SIGNAL_REASONS.holding);
    }

    case "SHORT_PAIR": {
      if (spread <= bands.upperExit) {
        return {
          type: "CLOSE_POSITION",
          reason: SIGNAL_REASONS.revertedToMean,
          volume: position.volume,
          spread,
          threshold: bands.upperExit,
          closing: "SHORT_PAIR",
        };
      }
      return noSignal(SIGNAL_REASONS.holding);
    }
  }
}
