/**
 * Spread Tracker - Rolling window of mid_A / mid_B samples
 *
 * - One sample per update with both books two-sided
 * - FIFO eviction at capacity
 * - Ready once the window has filled, and stays ready
 */

import type { Ms, Quote, SpreadSample, SpreadStatistics, StdevMode } from "@pairs-arb/core";
import { calculateSpread, computeSpreadStatistics } from "@pairs-arb/core";

/**
 * Spread Tracker
 *
 * Owns the sample buffer. Statistics are recomputed on every accepted sample.
 */
export class SpreadTracker {
  private readonly capacity: number;
  private readonly stdevMode: StdevMode;

  private samples: SpreadSample[] = [];
  private statistics: SpreadStatistics;
  private lastSpread: number | undefined;

  constructor(capacity: number, stdevMode: StdevMode = "population") {
    this.capacity = capacity;
    this.stdevMode = stdevMode;
    this.statistics = { ready: false, sampleCount: 0, capacity };
  }

  /**
   * Record a new sample from the two quotes
   *
   * A one-sided book records nothing and returns the previous statistics.
   */
  update(quoteA: Quote, quoteB: Quote, nowMs: Ms = Math.max(quoteA.ts, quoteB.ts)): SpreadStatistics {
    const spread = calculateSpread(quoteA, quoteB);
    if (spread === undefined) {
      return this.statistics;
    }

    this.samples.push({ ts: nowMs, value: spread });
    if (this.samples.length > this.capacity) {
      this.samples.shift();
    }
    this.lastSpread = spread;

    this.statistics = computeSpreadStatistics(
      this.samples.map(s => s.value),
      this.capacity,
      this.stdevMode,
    );
    return this.statistics;
  }

  getStatistics(): SpreadStatistics {
    return this.statistics;
  }

  getLastSpread(): number | undefined {
    return this.lastSpread;
  }

  getSamples(): readonly SpreadSample[] {
    return this.samples;
  }

  size(): number {
    return this.samples.length;
  }

  isReady(): boolean {
    return this.statistics.ready;
  }
}
