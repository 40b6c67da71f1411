/**
 * SpreadTracker Unit Tests
 *
 * - Warm-up until the window is full
 * - Population vs sample standard deviation
 * - FIFO eviction
 * - One-sided books record nothing
 */

import { describe, expect, test } from "vitest";

import type { Quote } from "@pairs-arb/core";

import { SpreadTracker } from "../../src/services/spread-tracker";

const createQuote = (instrument: string, bid: number | undefined, ask: number | undefined, ts = 1_000): Quote => ({
  instrument,
  bestBid: bid === undefined ? undefined : { price: bid, volume: 10 },
  bestAsk: ask === undefined ? undefined : { price: ask, volume: 10 },
  ts,
});

// mid_B is always 100, so the spread is mid_A / 100
const quoteB = (ts = 1_000): Quote => createQuote("B", 99, 101, ts);

/** Feed spreads 1.00, 1.02, 0.98 */
const feedThree = (tracker: SpreadTracker): void => {
  tracker.update(createQuote("A", 99, 101, 1_000), quoteB(1_000));
  tracker.update(createQuote("A", 101, 103, 2_000), quoteB(2_000));
  tracker.update(createQuote("A", 97, 99, 3_000), quoteB(3_000));
};

describe("SpreadTracker", () => {
  test("is not ready until the window is full", () => {
    const tracker = new SpreadTracker(3);

    const stats = tracker.update(createQuote("A", 99, 101), quoteB());

    expect(stats).toEqual({ ready: false, sampleCount: 1, capacity: 3 });
    expect(tracker.isReady()).toBe(false);
    expect(tracker.getLastSpread()).toBe(1);
  });

  test("computes mean and population stdev once full", () => {
    const tracker = new SpreadTracker(3);
    feedThree(tracker);

    const stats = tracker.getStatistics();
    expect(stats.ready).toBe(true);
    if (stats.ready) {
      expect(stats.mean).toBeCloseTo(1.0, 10);
      expect(stats.stdev).toBeCloseTo(Math.sqrt(0.0008 / 3), 10);
      expect(stats.sampleCount).toBe(3);
    }
    expect(tracker.getLastSpread()).toBeCloseTo(0.98, 10);
  });

  test("uses n - 1 in sample mode", () => {
    const tracker = new SpreadTracker(3, "sample");
    feedThree(tracker);

    const stats = tracker.getStatistics();
    expect(stats.ready).toBe(true);
    if (stats.ready) {
      expect(stats.stdev).toBeCloseTo(0.02, 10);
    }
  });

  test("evicts the oldest sample at capacity and stays ready", () => {
    const tracker = new SpreadTracker(3);
    feedThree(tracker);

    tracker.update(createQuote("A", 99, 101, 4_000), quoteB(4_000));

    expect(tracker.size()).toBe(3);
    expect(tracker.getSamples().map(s => s.ts)).toEqual([2_000, 3_000, 4_000]);
    expect(tracker.isReady()).toBe(true);
  });

  test("timestamps a sample with the later quote time by default", () => {
    const tracker = new SpreadTracker(3);

    tracker.update(createQuote("A", 99, 101, 1_500), quoteB(1_200));

    expect(tracker.getSamples()[0]?.ts).toBe(1_500);
  });

  test("ignores an update when a book side is empty", () => {
    const tracker = new SpreadTracker(3);
    tracker.update(createQuote("A", 99, 101), quoteB());

    const stats = tracker.update(createQuote("A", 101, 103), createQuote("B", 99, undefined));

    expect(stats).toEqual({ ready: false, sampleCount: 1, capacity: 3 });
    expect(tracker.size()).toBe(1);
    expect(tracker.getLastSpread()).toBe(1);
  });
});
