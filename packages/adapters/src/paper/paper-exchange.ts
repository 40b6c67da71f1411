/**
 * Paper Exchange - In-process venue implementing both ports
 *
 * - Immediate orders fill at the touch, up to the volume quoted there, and consume it
 * - Resting orders are stored until cancelled (no matching)
 * - Cash and average-cost realized P&L kept in decimal.js (core bookFill)
 * - advance() moves both books on a seeded random walk around a shared fair value
 */

import Decimal from "decimal.js";
import { err, errAsync, ok, okAsync, type Result, type ResultAsync } from "neverthrow";

import type { BookLevel, CostBasis, InstrumentId, Ms, Price, Quote, Side, Volume } from "@pairs-arb/core";
import { bookFill, emptyCostBasis } from "@pairs-arb/core";
import { createLogger } from "@pairs-arb/utils";

import type {
  CashAndPnl,
  ExecutionError,
  ExecutionPort,
  FillReport,
  OrderStatus,
  SubmitOrderRequest,
} from "../ports/execution-port";
import type { MarketDataError, MarketDataPort } from "../ports/market-data-port";
import { createSeededRandom, type RandomSource } from "./random";
import type { PaperExchangeConfig, PaperInstrumentConfig, RestingOrder } from "./types";

const log = createLogger("paper");

interface PaperBook {
  config: PaperInstrumentConfig;
  /** Deviation from fair value as a fraction (0 = on fair value) */
  premium: number;
  bestBid?: BookLevel;
  bestAsk?: BookLevel;
}

/**
 * Paper Exchange
 *
 * Implements MarketDataPort and ExecutionPort in memory
 */
export class PaperExchange implements MarketDataPort, ExecutionPort {
  private readonly config: PaperExchangeConfig;
  private readonly rng: RandomSource;
  private readonly now: () => Ms;

  private connected = false;
  private fairValue: Price;
  private books: Map<InstrumentId, PaperBook> = new Map();
  private holdings: Map<InstrumentId, CostBasis> = new Map();
  private cash: Decimal;
  private realizedPnl = new Decimal(0);
  private resting: Map<string, RestingOrder> = new Map();

  private orderIdCounter = 0;
  private pendingConnectFailures = 0;
  private pendingOrderErrors: Map<InstrumentId, ExecutionError[]> = new Map();

  constructor(config: PaperExchangeConfig) {
    this.config = config;
    this.rng = createSeededRandom(config.seed);
    this.now = config.now ?? Date.now;
    this.fairValue = config.initialFairValue;
    this.cash = new Decimal(config.initialCash);

    for (const instrumentConfig of config.instruments) {
      const book: PaperBook = { config: instrumentConfig, premium: 0 };
      this.requote(book);
      this.books.set(instrumentConfig.instrument, book);

      const initialQty = config.initialPositions?.[instrumentConfig.instrument] ?? 0;
      const initialMid =
        book.bestBid && book.bestAsk ?
          new Decimal(book.bestBid.price).plus(book.bestAsk.price).div(2)
        : new Decimal(this.fairValue);
      this.holdings.set(instrumentConfig.instrument, {
        qty: new Decimal(initialQty),
        avgCost: initialQty === 0 ? new Decimal(0) : initialMid,
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Connection
  // ───────────────────────────────────────────────────────────────────────────

  connect(): ResultAsync<void, MarketDataError> {
    if (this.pendingConnectFailures > 0) {
      this.pendingConnectFailures--;
      return errAsync({ type: "connection_failed", message: "Paper venue refused the connection" });
    }

    this.connected = true;
    log.info("Paper venue connected", { instruments: [...this.books.keys()] });
    return okAsync(undefined);
  }

  disconnect(): ResultAsync<void, MarketDataError> {
    this.connected = false;
    return okAsync(undefined);
  }

  isConnected(): boolean {
    return this.connected;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Market data
  // ───────────────────────────────────────────────────────────────────────────

  getQuote(instrument: InstrumentId): Result<Quote, MarketDataError> {
    if (!this.connected) {
      return err({ type: "connection_failed", message: "Paper venue is not connected" });
    }

    const book = this.books.get(instrument);
    if (!book) {
      return err({ type: "unknown_instrument", message: `Unknown instrument: ${instrument}` });
    }

    return ok({
      instrument,
      bestBid: book.bestBid ? { ...book.bestBid } : undefined,
      bestAsk: book.bestAsk ? { ...book.bestAsk } : undefined,
      ts: this.now(),
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────────

  submitOrder(request: SubmitOrderRequest): ResultAsync<FillReport, ExecutionError> {
    if (!this.connected) {
      return errAsync({ type: "not_connected", message: "Paper venue is not connected" });
    }

    const injected = this.pendingOrderErrors.get(request.instrument)?.shift();
    if (injected) {
      return errAsync(injected);
    }

    const book = this.books.get(request.instrument);
    if (!book) {
      return errAsync({ type: "invalid_order", message: `Unknown instrument: ${request.instrument}` });
    }

    if (!Number.isFinite(request.volume) || request.volume <= 0) {
      return errAsync({ type: "invalid_order", message: `Invalid volume: ${String(request.volume)}` });
    }
    if (!Number.isFinite(request.price) || request.price <= 0) {
      return errAsync({ type: "invalid_order", message: `Invalid price: ${String(request.price)}` });
    }

    const exchangeOrderId = this.generateOrderId();

    if (request.orderType === "resting") {
      this.resting.set(exchangeOrderId, {
        clientOrderId: request.clientOrderId,
        exchangeOrderId,
        instrument: request.instrument,
        side: request.side,
        price: request.price,
        volume: request.volume,
        createdAtMs: this.now(),
      });

      return okAsync({
        clientOrderId: request.clientOrderId,
        exchangeOrderId,
        instrument: request.instrument,
        side: request.side,
        requestedVolume: request.volume,
        filledVolume: 0,
        status: "resting",
        ts: this.now(),
      });
    }

    // Immediate: take the opposite side of the book if the limit crosses it
    const level = request.side === "buy" ? book.bestAsk : book.bestBid;
    const crosses =
      level !== undefined && (request.side === "buy" ? level.price <= request.price : level.price >= request.price);
    const filledVolume = crosses ? Math.min(request.volume, level.volume) : 0;

    let avgPrice: Price | undefined;
    if (level && filledVolume > 0) {
      avgPrice = level.price;
      this.recordFill(request.instrument, request.side, filledVolume, level.price);

      const remaining = level.volume - filledVolume;
      const nextLevel = remaining > 0 ? { price: level.price, volume: remaining } : undefined;
      if (request.side === "buy") {
        book.bestAsk = nextLevel;
      } else {
        book.bestBid = nextLevel;
      }
    }

    const status: OrderStatus =
      filledVolume === request.volume ? "filled"
      : filledVolume > 0 ? "partially_filled"
      : "unfilled";

    log.debug("Paper order", {
      clientOrderId: request.clientOrderId,
      instrument: request.instrument,
      side: request.side,
      price: request.price,
      volume: request.volume,
      filledVolume,
      status,
    });

    return okAsync({
      clientOrderId: request.clientOrderId,
      exchangeOrderId,
      instrument: request.instrument,
      side: request.side,
      requestedVolume: request.volume,
      filledVolume,
      avgPrice,
      status,
      ts: this.now(),
    });
  }

  cancelAllResting(instrument: InstrumentId): ResultAsync<number, ExecutionError> {
    if (!this.connected) {
      return errAsync({ type: "not_connected", message: "Paper venue is not connected" });
    }

    let cancelled = 0;
    for (const [id, order] of this.resting) {
      if (order.instrument === instrument) {
        this.resting.delete(id);
        cancelled++;
      }
    }
    return okAsync(cancelled);
  }

  getPositions(): ResultAsync<Record<InstrumentId, Volume>, ExecutionError> {
    if (!this.connected) {
      return errAsync({ type: "not_connected", message: "Paper venue is not connected" });
    }

    const positions: Record<InstrumentId, Volume> = {};
    for (const [instrument, holding] of this.holdings) {
      positions[instrument] = holding.qty.toNumber();
    }
    return okAsync(positions);
  }

  getCashAndPnl(): ResultAsync<CashAndPnl, ExecutionError> {
    if (!this.connected) {
      return errAsync({ type: "not_connected", message: "Paper venue is not connected" });
    }

    return okAsync({ cash: this.cash.toNumber(), realizedPnl: this.realizedPnl.toNumber() });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Simulation controls
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Move the books one random-walk step and restore full depth
   */
  advance(): void {
    this.fairValue *= Math.exp(this.config.volatility * this.rng.nextGaussian());

    for (const book of this.books.values()) {
      book.premium = book.premium * (1 - this.config.meanReversion) + this.config.divergence * this.rng.nextGaussian();
      this.requote(book);
    }
  }

  /**
   * Overwrite the top of book for an instrument (either side may be omitted)
   */
  setQuote(instrument: InstrumentId, levels: { bestBid?: BookLevel; bestAsk?: BookLevel }): void {
    const book = this.books.get(instrument);
    if (!book) return;

    book.bestBid = levels.bestBid ? { ...levels.bestBid } : undefined;
    book.bestAsk = levels.bestAsk ? { ...levels.bestAsk } : undefined;
  }

  /**
   * Make the next `count` connect() calls fail
   */
  failNextConnects(count: number): void {
    this.pendingConnectFailures = count;
  }

  /**
   * Make the next order on an instrument fail with the given error
   */
  failNextOrder(instrument: InstrumentId, error: ExecutionError): void {
    const queue = this.pendingOrderErrors.get(instrument) ?? [];
    queue.push(error);
    this.pendingOrderErrors.set(instrument, queue);
  }

  getRestingOrders(): RestingOrder[] {
    return [...this.resting.values()];
  }

  getFairValue(): Price {
    return this.fairValue;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private generateOrderId(): string {
    this.orderIdCounter++;
    return `paper_${String(this.orderIdCounter)}`;
  }

  private requote(book: PaperBook): void {
    const { priceRatio, halfSpread, depth } = book.config;
    const tick = new Decimal(this.config.tickSize);
    const mid = new Decimal(this.fairValue).mul(priceRatio).mul(1 + book.premium);

    const bid = mid.minus(halfSpread).div(tick).floor().mul(tick);
    let ask = mid.plus(halfSpread).div(tick).ceil().mul(tick);
    if (ask.lte(bid)) {
      ask = bid.plus(tick);
    }

    book.bestBid = { price: bid.toNumber(), volume: depth };
    book.bestAsk = { price: ask.toNumber(), volume: depth };
  }

  /**
   * Book a fill: cash, signed quantity, average cost and realized P&L
   */
  private recordFill(instrument: InstrumentId, side: Side, volume: Volume, price: Price): void {
    const booked = bookFill(this.holdings.get(instrument) ?? emptyCostBasis(), side, volume, price);
    this.cash = this.cash.plus(booked.cashDelta);
    this.realizedPnl = this.realizedPnl.plus(booked.realizedPnl);
    this.holdings.set(instrument, booked.holding);
  }
}
