/**
 * Spread Calculator Unit Tests
 */

import { describe, expect, test } from "vitest";

import type { Quote } from "../src/types";
import {
  calculateBidAskWidth,
  calculateMean,
  calculateMid,
  calculateSpread,
  calculateStdev,
  computeSpreadStatistics,
  isTwoSided,
} from "../src/spread-calculator";

const quote = (instrument: string, bid?: number, ask?: number): Quote => ({
  instrument,
  bestBid: bid !== undefined ? { price: bid, volume: 10 } : undefined,
  bestAsk: ask !== undefined ? { price: ask, volume: 10 } : undefined,
  ts: 1_000,
});

describe("isTwoSided", () => {
  test("should accept a quote with both sides", () => {
    expect(isTwoSided(quote("A", 99, 101))).toBe(true);
  });

  test("should reject a quote with an empty side", () => {
    expect(isTwoSided(quote("A", 99, undefined))).toBe(false);
    expect(isTwoSided(quote("A", undefined, 101))).toBe(false);
    expect(isTwoSided(undefined)).toBe(false);
  });
});

describe("calculateMid", () => {
  test("should average best bid and best ask", () => {
    const q = quote("A", 99, 101);
    if (!isTwoSided(q)) throw new Error("expected two-sided quote");
    expect(calculateMid(q)).toBe(100);
  });
});

describe("calculateSpread", () => {
  test("should return mid_A / mid_B", () => {
    // mid_A = 101, mid_B = 100
    const result = calculateSpread(quote("A", 100, 102), quote("B", 99, 101));
    expect(result).toBeCloseTo(1.01, 12);
  });

  test("should be positive for positive prices", () => {
    const result = calculateSpread(quote("A", 0.5, 0.7), quote("B", 250, 260));
    expect(result).toBeGreaterThan(0);
  });

  test("should return undefined when a book side is empty", () => {
    expect(calculateSpread(quote("A", 100, undefined), quote("B", 99, 101))).toBeUndefined();
    expect(calculateSpread(quote("A", 100, 102), quote("B", undefined, 101))).toBeUndefined();
  });

  test("should return undefined when mid_B is zero", () => {
    expect(calculateSpread(quote("A", 100, 102), quote("B", 0, 0))).toBeUndefined();
  });
});

describe("calculateBidAskWidth", () => {
  test("should return ask - bid", () => {
    const q = quote("A", 99.5, 100.25);
    if (!isTwoSided(q)) throw new Error("expected two-sided quote");
    expect(calculateBidAskWidth(q)).toBeCloseTo(0.75, 12);
  });
});

describe("calculateStdev", () => {
  const values = [1, 2, 3, 4];

  test("should compute the mean", () => {
    expect(calculateMean(values)).toBe(2.5);
    expect(calculateMean([])).toBe(0);
  });

  test("should compute population stdev", () => {
    // variance = 5 / 4 = 1.25
    expect(calculateStdev(values, "population")).toBeCloseTo(Math.sqrt(1.25), 12);
  });

  test("should compute sample stdev", () => {
    // variance = 5 / 3
    expect(calculateStdev(values, "sample")).toBeCloseTo(Math.sqrt(5 / 3), 12);
  });

  test("should return 0 when there are too few values", () => {
    expect(calculateStdev([], "population")).toBe(0);
    expect(calculateStdev([1.2], "sample")).toBe(0);
  });
});

describe("computeSpreadStatistics", () => {
  test("should not be ready below capacity", () => {
    const stats = computeSpreadStatistics([1, 1.01], 3, "population");
    expect(stats).toEqual({ ready: false, sampleCount: 2, capacity: 3 });
  });

  test("should be ready at capacity", () => {
    const stats = computeSpreadStatistics([1, 2, 3, 4], 4, "population");
    expect(stats.ready).toBe(true);
    if (!stats.ready) return;
    expect(stats.mean).toBe(2.5);
    expect(stats.stdev).toBeCloseTo(Math.sqrt(1.25), 12);
    expect(stats.sampleCount).toBe(4);
  });
});
