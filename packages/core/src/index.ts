/**
 * packages/core - Pure pairs-trading logic
 *
 * Spread statistics, signal generation, guard-rail validation, holdings
 * classification and average-cost booking. NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  InstrumentId,
  Price,
  Volume,
  Ms,
  Side,
  Leg,
  // Market data
  BookLevel,
  Quote,
  TwoSidedQuote,
  SpreadSample,
  StdevMode,
  SpreadStatistics,
  // Position
  PositionType,
  FlatPosition,
  OpenPosition,
  PositionState,
  HoldingsClass,
  LedgerState,
  // Signals
  SignalType,
  OpenSignal,
  CloseSignal,
  NoSignal,
  ActionableSignal,
  Signal,
  SignalBands,
  // Intents
  LegOrder,
  TradeIntent,
  LegFill,
  ExecutionOutcome,
  Rejection,
  RejectionCode,
  // Params
  MeanAnchor,
  PairInstruments,
  SignalParams,
  GuardRailParams,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Spread Calculator
// ─────────────────────────────────────────────────────────────────────────────
export {
  isTwoSided,
  calculateMid,
  calculateSpread,
  calculateBidAskWidth,
  calculateMean,
  calculateStdev,
  computeSpreadStatistics,
} from "./spread-calculator";

// ─────────────────────────────────────────────────────────────────────────────
// Signal Generator
// ─────────────────────────────────────────────────────────────────────────────
export { computeBands, evaluateSignal, SIGNAL_REASONS } from "./signal-generator";

// ─────────────────────────────────────────────────────────────────────────────
// Guard Rail
// ─────────────────────────────────────────────────────────────────────────────
export type { GuardRailInput } from "./guard-rail";
export { validateSignal, rejectionTag } from "./guard-rail";

// ─────────────────────────────────────────────────────────────────────────────
// Holdings
// ─────────────────────────────────────────────────────────────────────────────
export { classifyHoldings, calculateDelta, isDeltaNeutral } from "./holdings";

// ─────────────────────────────────────────────────────────────────────────────
// Cost Basis
// ─────────────────────────────────────────────────────────────────────────────
export type { CostBasis, BookedFill } from "./cost-basis";
export { bookFill, emptyCostBasis } from "./cost-basis";
