/**
 * Executor Environment Configuration
 *
 * - Type-safe environment variables with Zod validation
 *
 * See .env.example for a template. Every variable has a default, so the
 * engine starts against the paper venue with no .env at all.
 */

import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const booleanString = z.enum(["true", "false"]).transform(value => value === "true");

/**
 * Server-side variables
 */
const server = {
  // =========================================================================
  // Logging
  // =========================================================================

  /**
   * Log level
   *
   * ERROR | WARN | LOG | INFO | DEBUG (default INFO)
   * DEBUG logs every cycle decision and every rejection.
   */
  LOG_LEVEL: z.enum(["ERROR", "WARN", "LOG", "INFO", "DEBUG"]).default("INFO"),

  // =========================================================================
  // Venue
  // =========================================================================

  /**
   * Venue identifier. Only the in-process paper venue ships with the engine.
   */
  EXCHANGE: z.enum(["paper"]).default("paper"),

  /** First instrument of the pair (A) */
  INSTRUMENT_A: z.string().min(1).default("STOCK_A"),

  /** Second instrument of the pair (B) */
  INSTRUMENT_B: z.string().min(1).default("STOCK_B"),

  // =========================================================================
  // Spread statistics and signals
  // =========================================================================

  /** Rolling window length N; signals start once N samples are collected */
  HISTORY_LENGTH: z.coerce.number().int().positive().default(100),

  /** population (divide by N) or sample (divide by N - 1) */
  STDEV_MODE: z.enum(["population", "sample"]).default("population"),

  /** Entry band width in standard deviations */
  ENTRY_K_STDEV: z.coerce.number().positive().default(2.0),

  /** Exit band width in standard deviations; must be below ENTRY_K_STDEV */
  EXIT_K_STDEV: z.coerce.number().nonnegative().default(0.2),

  /**
   * Band centre
   *
   * historical: rolling mean of the spread
   * parity: PARITY_SPREAD (bands keep the rolling stdev)
   */
  MEAN_ANCHOR: z.enum(["historical", "parity"]).default("historical"),

  /** Theoretical spread of two equivalent instruments */
  PARITY_SPREAD: z.coerce.number().positive().default(1.0),

  /** Pair volume per OPEN */
  MAX_POSITION_SIZE: z.coerce.number().positive().default(10),

  // =========================================================================
  // Guard rail
  // =========================================================================

  /** Maximum ask - bid tolerated on instrument A */
  MAX_BID_ASK_WIDTH_A: z.coerce.number().positive().default(2.0),

  /** Maximum ask - bid tolerated on instrument B */
  MAX_BID_ASK_WIDTH_B: z.coerce.number().positive().default(2.0),

  /** Required level volume as a multiple of the requested volume */
  MIN_LIQUIDITY_RATIO: z.coerce.number().min(1).default(1),

  /** Margin required per unit of notional on OPEN */
  MARGIN_RATE: z.coerce.number().nonnegative().default(0.1),

  /** Maximum absolute position per instrument */
  POSITION_LIMIT: z.coerce.number().positive().default(100),

  /** Spread movement accepted between signal and execution prices */
  FRONT_RUN_TOLERANCE: z.coerce.number().nonnegative().default(0),

  /** Kill switch: start with trading disabled */
  TRADING_DISABLED: booleanString.default(false),

  // =========================================================================
  // Execution and positions
  // =========================================================================

  /** parallel: both legs submitted together; sequential: A then B */
  LEG_SUBMISSION: z.enum(["parallel", "sequential"]).default("parallel"),

  /** Send a compensating order to flatten the excess after a partial fill */
  COMPENSATE_PARTIAL_FILLS: booleanString.default(true),

  /** Accepted |qtyA + qtyB| for holdings to count as delta neutral */
  DELTA_TOLERANCE: z.coerce.number().nonnegative().default(0),

  /**
   * What to do when holdings at startup are unbalanced
   *
   * abort: refuse to start
   * continue: run with OPEN signals frozen until holdings are confirmed balanced
   */
  UNBALANCED_POLICY: z.enum(["abort", "continue"]).default("abort"),

  // =========================================================================
  // Loop
  // =========================================================================

  /** Sleep after each decision cycle (ms) */
  CYCLE_SLEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(200),

  /** Log a status record every N cycles */
  STATUS_EVERY_CYCLES: z.coerce.number().int().positive().default(20),

  /** Connection attempts at startup */
  CONNECT_ATTEMPTS: z.coerce.number().int().positive().default(3),

  /** Delay between connection attempts (ms) */
  CONNECT_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),

  // =========================================================================
  // Paper venue
  // =========================================================================

  PAPER_SEED: z.coerce.number().int().default(1),
  PAPER_INITIAL_CASH: z.coerce.number().nonnegative().default(100_000),
  PAPER_FAIR_VALUE: z.coerce.number().positive().default(100),
  /** Price of B relative to A */
  PAPER_PRICE_RATIO_B: z.coerce.number().positive().default(1.0),
  PAPER_TICK_SIZE: z.coerce.number().positive().default(0.1),
  PAPER_HALF_SPREAD: z.coerce.number().positive().default(0.1),
  PAPER_DEPTH: z.coerce.number().positive().default(50),
  PAPER_VOLATILITY: z.coerce.number().nonnegative().default(0.0005),
  PAPER_DIVERGENCE: z.coerce.number().nonnegative().default(0.002),
  PAPER_MEAN_REVERSION: z.coerce.number().min(0).max(1).default(0.05),
  /** Signed starting holdings, e.g. "50,30" for A=+50, B=+30 */
  PAPER_INITIAL_POSITIONS: z
    .string()
    .regex(/^-?\d+(\.\d+)?,-?\d+(\.\d+)?$/, "Must be two comma-separated numbers")
    .optional(),
};

/**
 * t3-env (@t3-oss/env-core) validation of a raw environment
 *
 * Do not read `process.env` elsewhere; pass the result of this function around.
 */
export function createExecutorEnv(runtimeEnv: Record<string, string | undefined>) {
  return createEnv({
    server,
    runtimeEnv,
    emptyStringAsUndefined: true,
  });
}

export type Env = ReturnType<typeof createExecutorEnv>;
