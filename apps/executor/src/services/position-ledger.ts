/**
 * Position Ledger - Single writer of position state
 *
 * - Signed quantities per instrument, cash and realized P&L (decimal.js)
 * - Pair position lifecycle FLAT → LONG_PAIR / SHORT_PAIR → FLAT
 * - Kill switch and the OPEN freeze after a partial fill or an unbalanced start
 *
 * Other components only read LedgerState snapshots.
 */

import Decimal from "decimal.js";
import { err, ok, type Result } from "neverthrow";

import type {
  CostBasis,
  ExecutionOutcome,
  HoldingsClass,
  LedgerState,
  LegFill,
  Ms,
  PairInstruments,
  PositionState,
  Quote,
  Volume,
} from "@pairs-arb/core";
import {
  bookFill,
  calculateDelta,
  calculateMid,
  calculateSpread,
  classifyHoldings,
  emptyCostBasis,
  isTwoSided,
} from "@pairs-arb/core";
import { createLogger } from "@pairs-arb/utils";

const log = createLogger("ledger");

/**
 * Externally observed account state, read once at startup
 */
export interface HoldingsSnapshot {
  qtyA: Volume;
  qtyB: Volume;
  cash: number;
  realizedPnl: number;
  quoteA: Quote;
  quoteB: Quote;
  nowMs: Ms;
}

export type LedgerError =
  | { type: "no_market_data"; message: string }
  | { type: "unbalanced"; message: string; qtyA: Volume; qtyB: Volume };

export interface PositionLedgerOptions {
  instruments: PairInstruments;
  deltaTolerance: Volume;
  tradingDisabled?: boolean;
  initialCash?: number;
}

/**
 * Position Ledger
 */
export class PositionLedger {
  private readonly instruments: PairInstruments;
  private readonly deltaTolerance: Volume;

  private holdingA: CostBasis = emptyCostBasis();
  private holdingB: CostBasis = emptyCostBasis();
  private cash: Decimal;
  private realizedPnl = new Decimal(0);
  private position: PositionState = { type: "FLAT" };
  private tradeCount = 0;
  private tradingDisabled: boolean;
  private haltReason: string | undefined;
  private openFrozen = false;
  private frozenReason: string | undefined;

  constructor(options: PositionLedgerOptions) {
    this.instruments = options.instruments;
    this.deltaTolerance = options.deltaTolerance;
    this.tradingDisabled = options.tradingDisabled ?? false;
    this.cash = new Decimal(options.initialCash ?? 0);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Startup
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Adopt externally observed holdings
   *
   * Classified on signs alone. A held pair gets the live spread as its entry
   * spread and the current mids as entry prices, even when the two legs differ
   * in size. UNBALANCED holdings are recorded but not adopted as a position;
   * the caller decides whether to continue.
   */
  reconcile(snapshot: HoldingsSnapshot): Result<HoldingsClass, LedgerError> {
    const classification = classifyHoldings(snapshot.qtyA, snapshot.qtyB);
    const { quoteA, quoteB } = snapshot;

    const heldSomething = classification !== "FLAT";
    if (heldSomething && (!isTwoSided(quoteA) || !isTwoSided(quoteB))) {
      return err({
        type: "no_market_data",
        message: "Cannot price existing holdings: a book side is empty",
      });
    }

    const midA = isTwoSided(quoteA) ? calculateMid(quoteA) : 0;
    const midB = isTwoSided(quoteB) ? calculateMid(quoteB) : 0;

    this.holdingA = {
      qty: new Decimal(snapshot.qtyA),
      avgCost: snapshot.qtyA === 0 ? new Decimal(0) : new Decimal(midA),
    };
    this.holdingB = {
      qty: new Decimal(snapshot.qtyB),
      avgCost: snapshot.qtyB === 0 ? new Decimal(0) : new Decimal(midB),
    };
    this.cash = new Decimal(snapshot.cash);
    this.realizedPnl = new Decimal(snapshot.realizedPnl);

    if (classification === "LONG_PAIR" || classification === "SHORT_PAIR") {
      this.position = {
        type: classification,
        volume: Math.min(Math.abs(snapshot.qtyA), Math.abs(snapshot.qtyB)),
        entrySpread: calculateSpread(quoteA, quoteB) ?? midA / midB,
        entryPrices: { a: midA, b: midB },
        openedAtMs: snapshot.nowMs,
      };
    } else {
      this.position = { type: "FLAT" };
    }

    if (this.position.type !== "FLAT" && !this.isDeltaNeutral()) {
      log.warn("Adopted pair is not size-matched; CLOSE unwinds each leg in full", {
        qtyA: snapshot.qtyA,
        qtyB: snapshot.qtyB,
        delta: this.getDelta(),
      });
    }

    log.info("Holdings reconciled", {
      classification,
      qtyA: snapshot.qtyA,
      qtyB: snapshot.qtyB,
      cash: snapshot.cash,
    });

    return ok(classification);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Outcomes
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Apply an execution outcome
   *
   * - filled: quantities, cash and P&L updated; position re-derived from holdings
   * - partial: quantities updated; position re-derived from holdings; OPEN frozen unless delta was restored
   * - missed: no change
   */
  apply(outcome: ExecutionOutcome, nowMs: Ms): LedgerState {
    switch (outcome.type) {
      case "missed":
        return this.getState();

      case "filled": {
        for (const leg of outcome.legs) this.bookLegFill(leg);
        this.tradeCount++;
        this.derivePosition(nowMs, outcome.intent.signalType);

        if (!this.isDeltaNeutral()) {
          this.freezeOpens("delta_breach_after_fill");
          log.error("Delta outside tolerance after a filled pair", { delta: this.getDelta() });
        }

        log.info("Pair trade applied", {
          signalType: outcome.intent.signalType,
          volume: outcome.volume,
          position: this.position.type,
          qtyA: this.holdingA.qty.toNumber(),
          qtyB: this.holdingB.qty.toNumber(),
        });
        return this.getState();
      }

      case "partial": {
        for (const leg of outcome.legs) this.bookLegFill(leg);
        if (outcome.compensation) this.bookLegFill(outcome.compensation);
        this.tradeCount++;

        this.derivePosition(nowMs, outcome.intent.signalType);

        if (this.isDeltaNeutral()) {
          log.warn("Partial fill compensated; delta restored", {
            position: this.position.type,
            qtyA: this.holdingA.qty.toNumber(),
            qtyB: this.holdingB.qty.toNumber(),
          });
        } else {
          this.freezeOpens("partial_fill");
          log.error("Partial fill left a delta exposure; OPEN signals frozen", {
            delta: this.getDelta(),
            position: this.position.type,
            qtyA: this.holdingA.qty.toNumber(),
            qtyB: this.holdingB.qty.toNumber(),
          });
        }
        return this.getState();
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Operator controls
  // ───────────────────────────────────────────────────────────────────────────

  halt(reason: string): void {
    this.tradingDisabled = true;
    this.haltReason = reason;
    log.warn("Trading halted", { reason });
  }

  resume(): void {
    this.tradingDisabled = false;
    this.haltReason = undefined;
    log.info("Trading resumed");
  }

  freezeOpens(reason: string): void {
    this.openFrozen = true;
    this.frozenReason = reason;
  }

  /**
   * Re-classify holdings and lift the OPEN freeze if they are balanced
   *
   * @param observed - Quantities re-read from the venue (defaults to the ledger's own)
   */
  confirmBalanced(observed?: { qtyA: Volume; qtyB: Volume }, nowMs: Ms = Date.now()): Result<HoldingsClass, LedgerError> {
    if (observed) {
      this.holdingA = { ...this.holdingA, qty: new Decimal(observed.qtyA) };
      this.holdingB = { ...this.holdingB, qty: new Decimal(observed.qtyB) };
    }

    const qtyA = this.holdingA.qty.toNumber();
    const qtyB = this.holdingB.qty.toNumber();
    const classification = classifyHoldings(qtyA, qtyB, this.deltaTolerance);

    if (classification === "UNBALANCED") {
      return err({
        type: "unbalanced",
        message: `Holdings still unbalanced (A=${String(qtyA)}, B=${String(qtyB)})`,
        qtyA,
        qtyB,
      });
    }

    this.derivePosition(nowMs);
    this.openFrozen = false;
    this.frozenReason = undefined;
    log.info("Holdings confirmed balanced; OPEN signals resumed", { classification });
    return ok(classification);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────────

  getState(): LedgerState {
    return {
      qtyA: this.holdingA.qty.toNumber(),
      qtyB: this.holdingB.qty.toNumber(),
      cash: this.cash.toNumber(),
      realizedPnl: this.realizedPnl.toNumber(),
      position: this.position,
      tradeCount: this.tradeCount,
      tradingDisabled: this.tradingDisabled,
      openFrozen: this.openFrozen,
      frozenReason: this.frozenReason,
    };
  }

  hasPosition(): boolean {
    return this.position.type !== "FLAT";
  }

  getDelta(): Volume {
    return calculateDelta(this.holdingA.qty.toNumber(), this.holdingB.qty.toNumber());
  }

  getHaltReason(): string | undefined {
    return this.haltReason;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private isDeltaNeutral(): boolean {
    return Math.abs(this.getDelta()) <= this.deltaTolerance;
  }

  /**
   * Book one fill against average cost
   */
  private bookLegFill(fill: LegFill): void {
    if (fill.filledVolume <= 0 || fill.avgPrice === undefined) return;

    const isA = fill.instrument === this.instruments.a;
    if (!isA && fill.instrument !== this.instruments.b) {
      log.error("Fill for an instrument outside the pair ignored", { instrument: fill.instrument });
      return;
    }

    const booked = bookFill(isA ? this.holdingA : this.holdingB, fill.side, fill.filledVolume, fill.avgPrice);
    this.cash = this.cash.plus(booked.cashDelta);
    this.realizedPnl = this.realizedPnl.plus(booked.realizedPnl);
    if (isA) {
      this.holdingA = booked.holding;
    } else {
      this.holdingB = booked.holding;
    }
  }

  /**
   * Set the pair position from the current holdings
   *
   * Opposite-sign holdings are a pair whatever their sizes; anything else is
   * FLAT. An existing position keeps its opening time; a changed pair type
   * takes `nowMs`.
   */
  private derivePosition(nowMs: Ms, cause?: string): void {
    const qtyA = this.holdingA.qty.toNumber();
    const qtyB = this.holdingB.qty.toNumber();
    const classification = classifyHoldings(qtyA, qtyB);

    if (classification === "FLAT" || classification === "UNBALANCED") {
      if (this.position.type !== "FLAT") {
        log.info("Position closed", { cause: cause ?? "reconciled", realizedPnl: this.realizedPnl.toNumber() });
      }
      this.position = { type: "FLAT" };
      return;
    }

    const entryA = this.holdingA.avgCost.toNumber();
    const entryB = this.holdingB.avgCost.toNumber();
    const openedAtMs =
      this.position.type === classification ? this.position.openedAtMs : nowMs;

    this.position = {
      type: classification,
      volume: Math.min(Math.abs(qtyA), Math.abs(qtyB)),
      entrySpread: entryB > 0 ? entryA / entryB : 0,
      entryPrices: { a: entryA, b: entryB },
      openedAtMs,
    };
  }
}
