/**
 * Executor Services
 */

export { SpreadTracker } from "./spread-tracker";
export { PositionLedger, type HoldingsSnapshot, type LedgerError, type PositionLedgerOptions } from "./position-ledger";
export { PairedOrderExecutor, type PairedOrderExecutorDeps } from "./paired-order-executor";
