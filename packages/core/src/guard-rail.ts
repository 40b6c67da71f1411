/**
 * Guard Rail - Pre-trade validation of a signal against live market conditions
 *
 * Pessimistic: the first failing check aborts. Check order:
 * 1. Kill switch
 * 2. OPEN while in a position / while opens are frozen
 * 3. CLOSE while flat, empty book side
 * 4. Margin and per-instrument position limit (OPEN only)
 * 5. Resolve execution side, price and volume per leg
 * 6. Liquidity at the resolved level
 * 7. Bid-ask width (slippage)
 * 8. Threshold still crossed at execution prices
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { calculateBidAskWidth, calculateMid, isTwoSided } from "./spread-calculator";
import type {
  ActionableSignal,
  GuardRailParams,
  LedgerState,
  LegOrder,
  Quote,
  Rejection,
  TradeIntent,
  TwoSidedQuote,
  Volume,
} from "./types";

/**
 * Guard rail input
 */
export interface GuardRailInput {
  signal: ActionableSignal;
  /** Quotes re-read right before validation */
  quoteA: Quote;
  quoteB: Quote;
  ledger: LedgerState;
  params: GuardRailParams;
}

/**
 * Direction of the trade being validated
 */
type TradeDirection = "OPEN_LONG_PAIR" | "OPEN_SHORT_PAIR" | "CLOSE_LONG_PAIR" | "CLOSE_SHORT_PAIR";

/**
 * Machine-readable tag for a rejection, e.g. "volume_locked:B"
 */
export function rejectionTag(rejection: Rejection): string {
  switch (rejection.code) {
    case "no_market_data":
    case "position_limit":
    case "volume_locked":
    case "slippage_risk":
      return `${rejection.code}:${rejection.instrument}`;
    default:
      return rejection.code;
  }
}

/**
 * Resolve legs for a direction.
 *
 * Selling hits the best bid, buying lifts the best ask; the available volume
 * is whatever rests at that level.
 */
function resolveLegs(
  direction: TradeDirection,
  quoteA: TwoSidedQuote,
  quoteB: TwoSidedQuote,
  params: GuardRailParams,
  volumes: { a: Volume; b: Volume },
): { legs: [LegOrder, LegOrder]; availableA: Volume; availableB: Volume } {
  // Short A / long B when opening a short pair or unwinding a long pair
  const sellA = direction === "OPEN_SHORT_PAIR" || direction === "CLOSE_LONG_PAIR";

  const levelA = sellA ? quoteA.bestBid : quoteA.bestAsk;
  const levelB = sellA ? quoteB.bestAsk : quoteB.bestBid;

  return {
    legs: [
      { leg: "a", instrument: params.instruments.a, side: sellA ? "sell" : "buy", limitPrice: levelA.price, volume: volumes.a },
      { leg: "b", instrument: params.instruments.b, side: sellA ? "buy" : "sell", limitPrice: levelB.price, volume: volumes.b },
    ],
    availableA: levelA.volume,
    availableB: levelB.volume,
  };
}

/**
 * Check the execution spread still crosses the threshold that produced the signal
 */
function crossesThreshold(direction: TradeDirection, executionSpread: number, threshold: number, tolerance: number): boolean {
  switch (direction) {
    case "OPEN_SHORT_PAIR":
      return executionSpread > threshold - tolerance;
    case "OPEN_LONG_PAIR":
      return executionSpread < threshold + tolerance;
    case "CLOSE_SHORT_PAIR":
      return executionSpread <= threshold + tolerance;
    case "CLOSE_LONG_PAIR":
      return executionSpread >= threshold - tolerance;
  }
}

/**
 * Validate a signal and produce a trade intent
 *
 * @returns TradeIntent when every check passes, otherwise the first rejection
 */
export function validateSignal(input: GuardRailInput): Result<TradeIntent, Rejection> {
  const { signal, quoteA, quoteB, ledger, params } = input;
  const { a: instrumentA, b: instrumentB } = params.instruments;
  const isOpen = signal.type !== "CLOSE_POSITION";

  // ─────────────────────────────────────────────────────────────────────────
  // 1. Kill switch
  // ─────────────────────────────────────────────────────────────────────────
  if (ledger.tradingDisabled) {
    return err({ code: "trading_halted", message: "Trading is disabled; signal ignored" });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // 2-3. State checks
  // ─────────────────────────────────────────────────────────────────────────
  if (isOpen && ledger.position.type !== "FLAT") {
    return err({
      code: "already_in_position",
      message: `Already holding ${ledger.position.type}; redundant ${signal.type} ignored`,
    });
  }

  if (isOpen && ledger.openFrozen) {
    return err({
      code: "open_frozen",
      message: `Opening is frozen until holdings are confirmed balanced (${ledger.frozenReason ?? "unspecified"})`,
    });
  }

  if (!isOpen && ledger.position.type === "FLAT") {
    return err({ code: "no_position_to_close", message: "No position to close; redundant CLOSE_POSITION ignored" });
  }

  if (!isTwoSided(quoteA)) {
    return err({ code: "no_market_data", instrument: instrumentA, message: `Empty book side for ${instrumentA}` });
  }
  if (!isTwoSided(quoteB)) {
    return err({ code: "no_market_data", instrument: instrumentB, message: `Empty book side for ${instrumentB}` });
  }

  const direction: TradeDirection =
    signal.type === "CLOSE_POSITION" ?
      ledger.position.type === "LONG_PAIR" ?
        "CLOSE_LONG_PAIR"
      : "CLOSE_SHORT_PAIR"
    : signal.type;

  const volume = signal.volume;

  // ─────────────────────────────────────────────────────────────────────────
  // 4. Capital and position limits (opening only)
  // ─────────────────────────────────────────────────────────────────────────
  if (isOpen) {
    const required = volume * (calculateMid(quoteA) + calculateMid(quoteB)) * params.marginRate;
    if (required > ledger.cash) {
      return err({
        code: "insufficient_margin",
        required,
        available: ledger.cash,
        message: `Insufficient margin: need ${required.toFixed(2)}, have ${ledger.cash.toFixed(2)}`,
      });
    }

    const signA = direction === "OPEN_LONG_PAIR" ? 1 : -1;
    const nextA = ledger.qtyA + signA * volume;
    const nextB = ledger.qtyB - signA * volume;
    if (Math.abs(nextA) > params.positionLimit) {
      return err({
        code: "position_limit",
        instrument: instrumentA,
        message: `Position limit ${String(params.positionLimit)} would be breached on ${instrumentA} (${String(nextA)})`,
      });
    }
    if (Math.abs(nextB) > params.positionLimit) {
      return err({
        code: "position_limit",
        instrument: instrumentB,
        message: `Position limit ${String(params.positionLimit)} would be breached on ${instrumentB} (${String(nextB)})`,
      });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // 5. Resolve execution side, price and volume
  //    A close unwinds each leg by what is actually held
  // ─────────────────────────────────────────────────────────────────────────
  const legVolumes = isOpen ? { a: volume, b: volume } : { a: Math.abs(ledger.qtyA), b: Math.abs(ledger.qtyB) };
  const { legs, availableA, availableB } = resolveLegs(direction, quoteA, quoteB, params, legVolumes);

  // ─────────────────────────────────────────────────────────────────────────
  // 6. Liquidity at the resolved level
  // ─────────────────────────────────────────────────────────────────────────
  const requiredA = legVolumes.a * params.minLiquidityRatio;
  if (availableA < requiredA) {
    return err({
      code: "volume_locked",
      instrument: instrumentA,
      required: requiredA,
      available: availableA,
      message: `Volume locked for ${instrumentA}: need ${String(requiredA)}, only ${String(availableA)} available`,
    });
  }
  const requiredB = legVolumes.b * params.minLiquidityRatio;
  if (availableB < requiredB) {
    return err({
      code: "volume_locked",
      instrument: instrumentB,
      required: requiredB,
      available: availableB,
      message: `Volume locked for ${instrumentB}: need ${String(requiredB)}, only ${String(availableB)} available`,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // 7. Slippage (bid-ask width)
  // ─────────────────────────────────────────────────────────────────────────
  const widthA = calculateBidAskWidth(quoteA);
  if (widthA > params.maxBidAskWidth.a) {
    return err({
      code: "slippage_risk",
      instrument: instrumentA,
      width: widthA,
      maxWidth: params.maxBidAskWidth.a,
      message: `Slippage risk for ${instrumentA}: bid-ask width ${widthA.toFixed(4)} > ${String(params.maxBidAskWidth.a)}`,
    });
  }
  const widthB = calculateBidAskWidth(quoteB);
  if (widthB > params.maxBidAskWidth.b) {
    return err({
      code: "slippage_risk",
      instrument: instrumentB,
      width: widthB,
      maxWidth: params.maxBidAskWidth.b,
      message: `Slippage risk for ${instrumentB}: bid-ask width ${widthB.toFixed(4)} > ${String(params.maxBidAskWidth.b)}`,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // 8. Re-validate at execution prices
  // ─────────────────────────────────────────────────────────────────────────
  const [legA, legB] = legs;
  const executionSpread = legA.limitPrice / legB.limitPrice;
  if (!crossesThreshold(direction, executionSpread, signal.threshold, params.frontRunTolerance)) {
    return err({
      code: "stale_signal",
      executionSpread,
      threshold: signal.threshold,
      message: `Signal stale at execution prices: spread ${executionSpread.toFixed(6)} vs threshold ${signal.threshold.toFixed(6)}`,
    });
  }

  return ok({
    signalType: signal.type,
    reason: signal.reason,
    volume,
    executionSpread,
    legs,
  });
}
