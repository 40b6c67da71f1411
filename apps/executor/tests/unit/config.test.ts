/**
 * Engine Configuration Unit Tests
 */

import { describe, expect, test } from "vitest";

import { buildEngineConfig } from "../../src/config";
import { createExecutorEnv } from "../../src/env";

describe("buildEngineConfig", () => {
  test("builds a frozen config from defaults alone", () => {
    const result = buildEngineConfig(createExecutorEnv({}));

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const config = result.value;
      expect(config.instruments).toEqual({ a: "STOCK_A", b: "STOCK_B" });
      expect(config.historyLength).toBe(100);
      expect(config.stdevMode).toBe("population");
      expect(config.signal).toEqual({
        entryKStdev: 2,
        exitKStdev: 0.2,
        meanAnchor: "historical",
        paritySpread: 1,
        maxPositionSize: 10,
      });
      expect(config.guardRail.maxBidAskWidth).toEqual({ a: 2, b: 2 });
      expect(config.legSubmission).toBe("parallel");
      expect(config.unbalancedPolicy).toBe("abort");
      expect(config.tradingDisabled).toBe(false);
      expect(config.paper.initialPositions).toBeUndefined();
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.guardRail.maxBidAskWidth)).toBe(true);
    }
  });

  test("coerces string variables", () => {
    const result = buildEngineConfig(
      createExecutorEnv({
        INSTRUMENT_A: "XAU_LDN",
        INSTRUMENT_B: "XAU_NY",
        HISTORY_LENGTH: "50",
        STDEV_MODE: "sample",
        TRADING_DISABLED: "true",
        COMPENSATE_PARTIAL_FILLS: "false",
        PAPER_INITIAL_POSITIONS: "50,30",
      }),
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.historyLength).toBe(50);
      expect(result.value.stdevMode).toBe("sample");
      expect(result.value.tradingDisabled).toBe(true);
      expect(result.value.compensatePartialFills).toBe(false);
      expect(result.value.paper.initialPositions).toEqual({ XAU_LDN: 50, XAU_NY: 30 });
    }
  });

  test("rejects identical instruments", () => {
    const result = buildEngineConfig(createExecutorEnv({ INSTRUMENT_A: "X", INSTRUMENT_B: "X" }));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("invalid_config");
      expect(result.error.message).toBe("Invalid engine configuration: INSTRUMENT_A and INSTRUMENT_B must differ");
    }
  });

  test("rejects an exit band at or beyond the entry band", () => {
    const result = buildEngineConfig(createExecutorEnv({ ENTRY_K_STDEV: "1", EXIT_K_STDEV: "1" }));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.issues).toEqual(["EXIT_K_STDEV must be below ENTRY_K_STDEV"]);
    }
  });

  test("rejects a trade size above the position limit", () => {
    const result = buildEngineConfig(createExecutorEnv({ MAX_POSITION_SIZE: "150", POSITION_LIMIT: "100" }));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.issues).toEqual(["MAX_POSITION_SIZE must not exceed POSITION_LIMIT"]);
    }
  });
});

describe("createExecutorEnv", () => {
  test("throws on an out-of-range variable", () => {
    expect(() => createExecutorEnv({ HISTORY_LENGTH: "0" })).toThrow();
  });

  test("throws on a malformed initial position list", () => {
    expect(() => createExecutorEnv({ PAPER_INITIAL_POSITIONS: "50" })).toThrow();
  });

  test("treats empty strings as unset", () => {
    expect(createExecutorEnv({ HISTORY_LENGTH: "" }).HISTORY_LENGTH).toBe(100);
  });
});
