/**
 * Decision Cycle Unit Tests
 *
 * Full passes against the paper venue with hand-set books:
 * - Phase order for each outcome
 * - no_data / stats_not_ready / no_signal / rejected / executed
 * - Fatal transport errors
 */

import { beforeEach, describe, expect, test } from "vitest";

import { PaperExchange } from "@pairs-arb/adapters";
import type { GuardRailParams, SignalParams } from "@pairs-arb/core";

import { PairedOrderExecutor } from "../../src/services/paired-order-executor";
import { PositionLedger } from "../../src/services/position-ledger";
import { SpreadTracker } from "../../src/services/spread-tracker";
import { runCycle, summarizeReport, type DecisionCycleDeps, type ExecutorPhase } from "../../src/usecases/decision-cycle";

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const instruments = { a: "A", b: "B" };

const signalParams: SignalParams = {
  entryKStdev: 1,
  exitKStdev: 0.2,
  meanAnchor: "historical",
  paritySpread: 1,
  maxPositionSize: 10,
};

const guardRailParams: GuardRailParams = {
  instruments,
  maxBidAskWidth: { a: 1, b: 1 },
  minLiquidityRatio: 1,
  marginRate: 0.1,
  positionLimit: 100,
  frontRunTolerance: 0,
};

const createExchange = (): PaperExchange =>
  new PaperExchange({
    instruments: [
      { instrument: "A", priceRatio: 1, halfSpread: 0.05, depth: 100 },
      { instrument: "B", priceRatio: 1, halfSpread: 0.05, depth: 100 },
    ],
    initialFairValue: 100,
    initialCash: 100_000,
    tickSize: 0.01,
    volatility: 0,
    divergence: 0,
    meanReversion: 0,
    seed: 3,
    now: () => 1_000,
  });

describe("runCycle", () => {
  let exchange: PaperExchange;
  let ledger: PositionLedger;
  let phases: ExecutorPhase[];
  let deps: DecisionCycleDeps;

  /** Set A's touch; B always quotes 99.95 / 100.05 (mid 100) */
  const setBooks = (bidA: number, askA: number, volumeB = 100): void => {
    exchange.setQuote("A", {
      bestBid: { price: bidA, volume: 100 },
      bestAsk: { price: askA, volume: 100 },
    });
    exchange.setQuote("B", {
      bestBid: { price: 99.95, volume: 100 },
      bestAsk: { price: 100.05, volume: volumeB },
    });
  };

  /** Two cycles at spread 1.00 fill the 3-sample window up to the third cycle */
  const warmUp = async (): Promise<void> => {
    setBooks(99.95, 100.05);
    await runCycle(deps, 1);
    await runCycle(deps, 2);
    phases.length = 0;
  };

  beforeEach(async () => {
    exchange = createExchange();
    await exchange.connect();
    ledger = new PositionLedger({ instruments, deltaTolerance: 0, initialCash: 100_000 });
    phases = [];
    deps = {
      marketData: exchange,
      spreadTracker: new SpreadTracker(3),
      ledger,
      executor: new PairedOrderExecutor({
        executionPort: exchange,
        marketData: exchange,
        submission: "parallel",
        compensatePartialFills: true,
      }),
      config: { instruments, signal: signalParams, guardRail: guardRailParams },
      now: () => 1_000,
      onPhase: phase => phases.push(phase),
    };
  });

  test("one-sided book → no_data and no sample", async () => {
    exchange.setQuote("B", { bestBid: { price: 99.95, volume: 100 } });

    const result = await runCycle(deps, 1);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.outcome).toEqual({ type: "no_data", instrument: "B" });
    }
    expect(deps.spreadTracker.size()).toBe(0);
    expect(phases).toEqual(["READ", "IDLE"]);
  });

  test("warm-up → stats_not_ready", async () => {
    const result = await runCycle(deps, 1);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.outcome).toEqual({ type: "stats_not_ready", sampleCount: 1, capacity: 3 });
      expect(result.value.iteration).toBe(1);
      expect(result.value.mean).toBeUndefined();
    }
    expect(phases).toEqual(["READ", "DECIDE", "IDLE"]);
  });

  test("disconnected venue → transport_unavailable", async () => {
    await exchange.disconnect();

    const result = await runCycle(deps, 1);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("transport_unavailable");
    }
    expect(phases).toEqual(["READ", "IDLE"]);
  });

  test("spread inside the bands → no_signal", async () => {
    await warmUp();
    setBooks(99.95, 100.05);

    const result = await runCycle(deps, 3);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.outcome).toEqual({ type: "no_signal", reason: "within_bands" });
    }
    expect(phases).toEqual(["READ", "DECIDE", "IDLE"]);
  });

  test("spread above the upper entry band → executed OPEN_SHORT_PAIR", async () => {
    await warmUp();
    setBooks(100.95, 101.05);

    const result = await runCycle(deps, 3);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const report = result.value;
      expect(report.outcome.type).toBe("executed");
      if (report.outcome.type === "executed") {
        expect(report.outcome.signal.type).toBe("OPEN_SHORT_PAIR");
        expect(report.outcome.execution.type).toBe("filled");
      }
      expect(report.positions).toEqual({ a: -10, b: 10 });
      expect(report.delta).toBe(0);
      expect(report.positionState.type).toBe("SHORT_PAIR");
      expect(report.tradeCount).toBe(1);
      // Sold A at 100.95, bought B at 100.05
      expect(report.cash).toBe(100_009);
      expect(report.spread).toBeCloseTo(1.01, 10);
      expect(report.mean).toBeCloseTo(3.01 / 3, 10);
    }
    expect(phases).toEqual(["READ", "DECIDE", "VALIDATE", "EXECUTE", "APPLY", "IDLE"]);
  });

  test("reversion after opening → executed CLOSE_POSITION", async () => {
    await warmUp();
    setBooks(100.95, 101.05);
    await runCycle(deps, 3);
    setBooks(99.95, 100.05);

    const result = await runCycle(deps, 4);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const report = result.value;
      expect(report.outcome.type).toBe("executed");
      if (report.outcome.type === "executed") {
        expect(report.outcome.signal.type).toBe("CLOSE_POSITION");
      }
      expect(report.positionState).toEqual({ type: "FLAT" });
      expect(report.positions).toEqual({ a: 0, b: 0 });
      // A: short @100.95 covered @100.05 → +9; B: long @100.05 sold @99.95 → -1
      expect(report.pnl).toBe(8);
      expect(report.tradeCount).toBe(2);
    }
  });

  test("CLOSE filled on A only → position dropped, next cycle does not close again", async () => {
    deps.executor = new PairedOrderExecutor({
      executionPort: exchange,
      marketData: exchange,
      submission: "parallel",
      compensatePartialFills: false,
    });
    await warmUp();
    setBooks(100.95, 101.05);
    await runCycle(deps, 3);
    setBooks(99.95, 100.05);
    exchange.failNextOrder("B", { type: "exchange_error", message: "rejected" });

    const closing = await runCycle(deps, 4);

    expect(closing.isOk()).toBe(true);
    if (closing.isOk()) {
      const report = closing.value;
      expect(report.outcome.type).toBe("executed");
      if (report.outcome.type === "executed") {
        expect(report.outcome.execution.type).toBe("partial");
      }
      expect(report.positions).toEqual({ a: 0, b: 10 });
      expect(report.positionState).toEqual({ type: "FLAT" });
      expect(report.openFrozen).toBe(true);
    }

    setBooks(99.95, 100.05);
    phases.length = 0;

    const next = await runCycle(deps, 5);

    expect(next.isOk()).toBe(true);
    if (next.isOk()) {
      expect(next.value.outcome).toEqual({ type: "no_signal", reason: "within_bands" });
      expect(next.value.positions).toEqual({ a: 0, b: 10 });
    }
    expect(phases).toEqual(["READ", "DECIDE", "IDLE"]);
    const held = await exchange.getPositions();
    expect(held.isOk()).toBe(true);
    if (held.isOk()) {
      expect(held.value).toEqual({ A: 0, B: 10 });
    }
  });

  test("halted ledger → rejected trading_halted", async () => {
    await warmUp();
    ledger.halt("manual");
    setBooks(100.95, 101.05);

    const result = await runCycle(deps, 3);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.outcome.type).toBe("rejected");
      if (result.value.outcome.type === "rejected") {
        expect(result.value.outcome.tag).toBe("trading_halted");
      }
      expect(result.value.tradingDisabled).toBe(true);
      expect(result.value.positions).toEqual({ a: 0, b: 0 });
    }
    expect(phases).toEqual(["READ", "DECIDE", "VALIDATE", "IDLE"]);
  });

  test("thin book on B → rejected volume_locked:B", async () => {
    await warmUp();
    setBooks(100.95, 101.05, 5);

    const result = await runCycle(deps, 3);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.outcome.type).toBe("rejected");
      if (result.value.outcome.type === "rejected") {
        expect(result.value.outcome.tag).toBe("volume_locked:B");
      }
    }
  });

  test("transport failure on both legs → transport_unavailable, ledger untouched", async () => {
    await warmUp();
    setBooks(100.95, 101.05);
    exchange.failNextOrder("A", { type: "network", message: "socket closed" });
    exchange.failNextOrder("B", { type: "network", message: "socket closed" });

    const result = await runCycle(deps, 3);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("transport_unavailable");
    }
    expect(ledger.getState().tradeCount).toBe(0);
    expect(phases).toEqual(["READ", "DECIDE", "VALIDATE", "EXECUTE", "IDLE"]);
  });
});

describe("summarizeReport", () => {
  test("flattens the report into log fields", () => {
    const fields = summarizeReport({
      iteration: 7,
      nowMs: 1_000,
      positions: { a: -10, b: 10 },
      delta: 0,
      spread: 1.01,
      mean: 1,
      stdev: 0.005,
      positionState: { type: "SHORT_PAIR", volume: 10, entrySpread: 1.01, entryPrices: { a: 101, b: 100 }, openedAtMs: 1_000 },
      cash: 100_009,
      pnl: 8,
      tradeCount: 1,
      openFrozen: false,
      tradingDisabled: false,
      outcome: { type: "no_signal", reason: "holding" },
    });

    expect(fields).toEqual({
      iteration: 7,
      position: "SHORT_PAIR",
      qtyA: -10,
      qtyB: 10,
      delta: 0,
      pnl: "8.00",
      trades: 1,
      outcome: "no_signal",
      spread: "1.010000",
      mean: "1.000000",
      stdev: "0.005000",
    });
  });
});
