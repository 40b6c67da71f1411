/**
 * Core Domain Types
 *
 * Pure type definitions for the pairs engine.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Instrument identifier as known to the venue (e.g. "STOCK_A") */
export type InstrumentId = string;

/** Price in quote currency */
export type Price = number;

/** Volume in lots */
export type Volume = number;

/** Milliseconds */
export type Ms = number;

/** Side of an order */
export type Side = "buy" | "sell";

/** Leg of the pair: A is the first instrument, B the second */
export type Leg = "a" | "b";

// ─────────────────────────────────────────────────────────────────────────────
// Market Data
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One price level at the top of the book
 */
export interface BookLevel {
  price: Price;
  volume: Volume;
}

/**
 * Best bid / best ask for one instrument.
 *
 * Either side may be missing when the book is empty on that side.
 */
export interface Quote {
  instrument: InstrumentId;
  bestBid?: BookLevel;
  bestAsk?: BookLevel;
  ts: Ms;
}

/**
 * A quote with both sides present
 */
export interface TwoSidedQuote extends Quote {
  bestBid: BookLevel;
  bestAsk: BookLevel;
}

// ─────────────────────────────────────────────────────────────────────────────
// Spread Statistics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Spread sample: mid_A / mid_B at a point in time
 */
export interface SpreadSample {
  ts: Ms;
  value: number;
}

/** Standard deviation flavour */
export type StdevMode = "population" | "sample";

/**
 * Statistics over the rolling spread buffer.
 *
 * mean/stdev only exist once the buffer has been filled to capacity.
 */
export type SpreadStatistics =
  | { ready: false; sampleCount: number; capacity: number }
  | { ready: true; mean: number; stdev: number; sampleCount: number; capacity: number };

// ─────────────────────────────────────────────────────────────────────────────
// Position State
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Position type
 *
 * - FLAT: no exposure
 * - LONG_PAIR: long A, short B
 * - SHORT_PAIR: short A, long B
 */
export type PositionType = "FLAT" | "LONG_PAIR" | "SHORT_PAIR";

export interface FlatPosition {
  type: "FLAT";
}

export interface OpenPosition {
  type: "LONG_PAIR" | "SHORT_PAIR";
  /** Pair volume (absolute quantity per leg) */
  volume: Volume;
  entrySpread: number;
  entryPrices: { a: Price; b: Price };
  openedAtMs: Ms;
}

export type PositionState = FlatPosition | OpenPosition;

/**
 * Classification of externally observed holdings
 */
export type HoldingsClass = PositionType | "UNBALANCED";

// ─────────────────────────────────────────────────────────────────────────────
// Signals
// ─────────────────────────────────────────────────────────────────────────────

export type SignalType = "OPEN_LONG_PAIR" | "OPEN_SHORT_PAIR" | "CLOSE_POSITION" | "NONE";

/**
 * Actionable signal.
 *
 * `threshold` is the band value the spread crossed; the guard rail re-checks
 * it at execution prices.
 */
export interface OpenSignal {
  type: "OPEN_LONG_PAIR" | "OPEN_SHORT_PAIR";
  reason: string;
  volume: Volume;
  spread: number;
  threshold: number;
}

export interface CloseSignal {
  type: "CLOSE_POSITION";
  reason: string;
  volume: Volume;
  spread: number;
  threshold: number;
  /** Position being closed */
  closing: "LONG_PAIR" | "SHORT_PAIR";
}

export interface NoSignal {
  type: "NONE";
  reason: string;
  volume: 0;
}

export type ActionableSignal = OpenSignal | CloseSignal;
export type Signal = ActionableSignal | NoSignal;

/**
 * Entry/exit bands around the centre
 */
export interface SignalBands {
  centre: number;
  upperEntry: number;
  lowerEntry: number;
  upperExit: number;
  lowerExit: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Trade Intent
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One leg of an approved pair trade
 */
export interface LegOrder {
  leg: Leg;
  instrument: InstrumentId;
  side: Side;
  limitPrice: Price;
  volume: Volume;
}

/**
 * Guard-rail approved order pair.
 *
 * Legs take opposite sides. An OPEN puts `volume` on each leg; a CLOSE
 * unwinds each leg by its held quantity, so the two may differ.
 */
export interface TradeIntent {
  signalType: ActionableSignal["type"];
  reason: string;
  volume: Volume;
  executionSpread: number;
  legs: [LegOrder, LegOrder];
}

// ─────────────────────────────────────────────────────────────────────────────
// Execution Outcome
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What one submitted order actually did
 */
export interface LegFill {
  leg: Leg;
  instrument: InstrumentId;
  side: Side;
  requestedVolume: Volume;
  filledVolume: Volume;
  /** Volume-weighted fill price; absent when nothing filled */
  avgPrice?: Price;
  /** Submission error, when the order never reached the book */
  error?: { type: string; message: string };
}

/**
 * Result of executing a trade intent
 *
 * - filled: both legs fell short of their request by the same volume
 *   (none, usually) and something filled
 * - missed: neither leg filled anything
 * - partial: leg shortfalls differ; delta exposure may remain
 */
export type ExecutionOutcome =
  | { type: "filled"; intent: TradeIntent; legs: [LegFill, LegFill]; volume: Volume }
  | { type: "missed"; intent: TradeIntent; legs: [LegFill, LegFill]; transportFailure: boolean }
  | {
      type: "partial";
      intent: TradeIntent;
      legs: [LegFill, LegFill];
      /** Order sent to reverse the excess on the over-filled leg */
      compensation?: LegFill;
      /** qtyA + qtyB change left over after compensation */
      residualDelta: Volume;
    };

// ─────────────────────────────────────────────────────────────────────────────
// Rejections
// ─────────────────────────────────────────────────────────────────────────────

export type Rejection =
  | { code: "trading_halted"; message: string }
  | { code: "open_frozen"; message: string }
  | { code: "already_in_position"; message: string }
  | { code: "no_position_to_close"; message: string }
  | { code: "no_market_data"; instrument: InstrumentId; message: string }
  | { code: "insufficient_margin"; required: number; available: number; message: string }
  | { code: "position_limit"; instrument: InstrumentId; message: string }
  | { code: "volume_locked"; instrument: InstrumentId; required: Volume; available: Volume; message: string }
  | { code: "slippage_risk"; instrument: InstrumentId; width: number; maxWidth: number; message: string }
  | { code: "stale_signal"; executionSpread: number; threshold: number; message: string };

export type RejectionCode = Rejection["code"];

// ─────────────────────────────────────────────────────────────────────────────
// Ledger View
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only view of the position ledger
 */
export interface LedgerState {
  qtyA: Volume;
  qtyB: Volume;
  cash: number;
  realizedPnl: number;
  position: PositionState;
  tradeCount: number;
  tradingDisabled: boolean;
  /** OPEN signals blocked until holdings are confirmed balanced */
  openFrozen: boolean;
  frozenReason?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Parameters
// ─────────────────────────────────────────────────────────────────────────────

/** What the bands are centred on */
export type MeanAnchor = "historical" | "parity";

export interface PairInstruments {
  a: InstrumentId;
  b: InstrumentId;
}

/**
 * Signal generator parameters
 */
export interface SignalParams {
  entryKStdev: number;
  exitKStdev: number;
  meanAnchor: MeanAnchor;
  /** Spread value used as centre when meanAnchor is "parity" */
  paritySpread: number;
  maxPositionSize: Volume;
}

/**
 * Guard rail parameters
 */
export interface GuardRailParams {
  instruments: PairInstruments;
  /** Maximum acceptable ask - bid per instrument */
  maxBidAskWidth: { a: number; b: number };
  /** Required available volume as a multiple of requested volume (>= 1) */
  minLiquidityRatio: number;
  /** Margin required per unit of notional */
  marginRate: number;
  /** Maximum absolute position per instrument */
  positionLimit: Volume;
  /** Spread movement allowed between signal and execution */
  frontRunTolerance: number;
}
