/**
 * Cost Basis - Average-cost booking of a single fill
 *
 * Adding to a holding blends the average cost. Reducing, closing or flipping
 * realizes P&L against it; a flip re-bases at the fill price.
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";

import type { Price, Side, Volume } from "./types";

export interface CostBasis {
  qty: Decimal;
  avgCost: Decimal;
}

export interface BookedFill {
  holding: CostBasis;
  /** Signed cash change: negative for a buy */
  cashDelta: Decimal;
  realizedPnl: Decimal;
}

export const emptyCostBasis = (): CostBasis => ({ qty: new Decimal(0), avgCost: new Decimal(0) });

/**
 * Book one fill against a holding
 */
export function bookFill(holding: CostBasis, side: Side, volume: Volume, price: Price): BookedFill {
  const fillPrice = new Decimal(price);
  const notional = fillPrice.mul(volume);
  const signed = new Decimal(side === "buy" ? volume : -volume);
  const cashDelta = side === "buy" ? notional.neg() : notional;

  const current = holding.qty;
  const next = current.plus(signed);

  if (current.isZero() || current.isPositive() === signed.isPositive()) {
    return {
      holding: { qty: next, avgCost: holding.avgCost.mul(current.abs()).plus(notional).div(next.abs()) },
      cashDelta,
      realizedPnl: new Decimal(0),
    };
  }

  const closing = Decimal.min(current.abs(), signed.abs());
  const direction = current.isPositive() ? 1 : -1;
  const realizedPnl = fillPrice.minus(holding.avgCost).mul(closing).mul(direction);

  let avgCost = holding.avgCost;
  if (next.isZero()) {
    avgCost = new Decimal(0);
  } else if (next.isPositive() !== current.isPositive()) {
    avgCost = fillPrice;
  }

  return { holding: { qty: next, avgCost }, cashDelta, realizedPnl };
}
