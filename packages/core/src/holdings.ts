/**
 * Holdings - Classification of signed A/B quantities
 *
 * (0, 0) → FLAT, (+, −) → LONG_PAIR, (−, +) → SHORT_PAIR, anything else → UNBALANCED.
 *
 * This module is pure (no I/O, no throw).
 */

import type { HoldingsClass, Volume } from "./types";

/**
 * Quantities at or below this magnitude are treated as zero
 */
const ZERO_EPSILON = 1e-9;

function sign(qty: Volume): -1 | 0 | 1 {
  if (Math.abs(qty) <= ZERO_EPSILON) return 0;
  return qty > 0 ? 1 : -1;
}

/**
 * Classify externally observed holdings.
 *
 * With a positive `deltaTolerance` an opposite-sign pair also has to be
 * size-matched (|qtyA + qtyB| <= tolerance) to count as a pair position.
 * The default of Infinity classifies on signs alone.
 */
export function classifyHoldings(qtyA: Volume, qtyB: Volume, deltaTolerance = Number.POSITIVE_INFINITY): HoldingsClass {
  const sa = sign(qtyA);
  const sb = sign(qtyB);

  if (sa === 0 && sb === 0) {
    return "FLAT";
  }

  if (sa !== 0 && sb !== 0 && sa !== sb && Math.abs(qtyA + qtyB) <= deltaTolerance) {
    return sa > 0 ? "LONG_PAIR" : "SHORT_PAIR";
  }

  return "UNBALANCED";
}

/**
 * Net directional exposure across the pair
 */
export function calculateDelta(qtyA: Volume, qtyB: Volume): Volume {
  return qtyA + qtyB;
}

export function isDeltaNeutral(qtyA: Volume, qtyB: Volume, deltaTolerance: number): boolean {
  return Math.abs(calculateDelta(qtyA, qtyB)) <= deltaTolerance;
}
