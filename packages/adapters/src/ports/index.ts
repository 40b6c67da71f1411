/**
 * Port interfaces for adapters
 *
 * - Defines venue-agnostic interfaces
 * - Adapters implement these ports
 */

export type { MarketDataError, MarketDataPort } from "./market-data-port";

export type {
  CashAndPnl,
  ExecutionError,
  ExecutionPort,
  FillReport,
  OrderStatus,
  OrderType,
  SubmitOrderRequest,
} from "./execution-port";
export { isTransportError } from "./execution-port";
