/**
 * Engine Configuration
 *
 * Assembles the immutable EngineConfig from a validated env and checks the
 * cross-field rules a single variable cannot express.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

import type { PaperExchangeConfig } from "@pairs-arb/adapters";
import type { GuardRailParams, PairInstruments, SignalParams, StdevMode, Volume } from "@pairs-arb/core";

import type { Env } from "./env";

export type LegSubmissionMode = "parallel" | "sequential";
export type UnbalancedPolicy = "abort" | "continue";

export interface EngineConfig {
  instruments: PairInstruments;
  historyLength: number;
  stdevMode: StdevMode;
  signal: SignalParams;
  guardRail: GuardRailParams;
  deltaTolerance: Volume;
  tradingDisabled: boolean;
  compensatePartialFills: boolean;
  legSubmission: LegSubmissionMode;
  unbalancedPolicy: UnbalancedPolicy;
  cycleSleepIntervalMs: number;
  statusEveryCycles: number;
  connect: { attempts: number; retryDelayMs: number };
  paper: Omit<PaperExchangeConfig, "now">;
}

export type ConfigError = { type: "invalid_config"; message: string; issues: string[] };

/**
 * Cross-field rules
 */
const EngineConfigSchema = z
  .object({
    instruments: z.object({ a: z.string().min(1), b: z.string().min(1) }),
    signal: z.object({ entryKStdev: z.number().positive(), exitKStdev: z.number().nonnegative() }),
    guardRail: z.object({ minLiquidityRatio: z.number().min(1), positionLimit: z.number().positive() }),
    signalVolume: z.number().positive(),
  })
  .refine(data => data.instruments.a !== data.instruments.b, {
    message: "INSTRUMENT_A and INSTRUMENT_B must differ",
    path: ["instruments"],
  })
  .refine(data => data.signal.exitKStdev < data.signal.entryKStdev, {
    message: "EXIT_K_STDEV must be below ENTRY_K_STDEV",
    path: ["signal", "exitKStdev"],
  })
  .refine(data => data.signalVolume <= data.guardRail.positionLimit, {
    message: "MAX_POSITION_SIZE must not exceed POSITION_LIMIT",
    path: ["signalVolume"],
  });

function parseInitialPositions(raw: string | undefined, instruments: PairInstruments): Record<string, Volume> | undefined {
  if (raw === undefined) return undefined;
  const [a = "0", b = "0"] = raw.split(",");
  return { [instruments.a]: Number(a), [instruments.b]: Number(b) };
}

/**
 * Build the engine configuration
 *
 * @returns frozen config, or the list of violated rules
 */
export function buildEngineConfig(env: Env): Result<Readonly<EngineConfig>, ConfigError> {
  const instruments: PairInstruments = { a: env.INSTRUMENT_A, b: env.INSTRUMENT_B };

  const signal: SignalParams = {
    entryKStdev: env.ENTRY_K_STDEV,
    exitKStdev: env.EXIT_K_STDEV,
    meanAnchor: env.MEAN_ANCHOR,
    paritySpread: env.PARITY_SPREAD,
    maxPositionSize: env.MAX_POSITION_SIZE,
  };

  const guardRail: GuardRailParams = {
    instruments,
    maxBidAskWidth: { a: env.MAX_BID_ASK_WIDTH_A, b: env.MAX_BID_ASK_WIDTH_B },
    minLiquidityRatio: env.MIN_LIQUIDITY_RATIO,
    marginRate: env.MARGIN_RATE,
    positionLimit: env.POSITION_LIMIT,
    frontRunTolerance: env.FRONT_RUN_TOLERANCE,
  };

  const checked = EngineConfigSchema.safeParse({ instruments, signal, guardRail, signalVolume: signal.maxPositionSize });
  if (!checked.success) {
    const issues = checked.error.issues.map(issue => issue.message);
    return err({ type: "invalid_config", message: `Invalid engine configuration: ${issues.join("; ")}`, issues });
  }

  const config: EngineConfig = {
    instruments,
    historyLength: env.HISTORY_LENGTH,
    stdevMode: env.STDEV_MODE,
    signal,
    guardRail,
    deltaTolerance: env.DELTA_TOLERANCE,
    tradingDisabled: env.TRADING_DISABLED,
    compensatePartialFills: env.COMPENSATE_PARTIAL_FILLS,
    legSubmission: env.LEG_SUBMISSION,
    unbalancedPolicy: env.UNBALANCED_POLICY,
    cycleSleepIntervalMs: env.CYCLE_SLEEP_INTERVAL_MS,
    statusEveryCycles: env.STATUS_EVERY_CYCLES,
    connect: { attempts: env.CONNECT_ATTEMPTS, retryDelayMs: env.CONNECT_RETRY_DELAY_MS },
    paper: {
      instruments: [
        { instrument: instruments.a, priceRatio: 1, halfSpread: env.PAPER_HALF_SPREAD, depth: env.PAPER_DEPTH },
        {
          instrument: instruments.b,
          priceRatio: env.PAPER_PRICE_RATIO_B,
          halfSpread: env.PAPER_HALF_SPREAD,
          depth: env.PAPER_DEPTH,
        },
      ],
      initialFairValue: env.PAPER_FAIR_VALUE,
      initialCash: env.PAPER_INITIAL_CASH,
      tickSize: env.PAPER_TICK_SIZE,
      volatility: env.PAPER_VOLATILITY,
      divergence: env.PAPER_DIVERGENCE,
      meanReversion: env.PAPER_MEAN_REVERSION,
      seed: env.PAPER_SEED,
      initialPositions: parseInitialPositions(env.PAPER_INITIAL_POSITIONS, instruments),
    },
  };

  return ok(deepFreeze(config));
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
