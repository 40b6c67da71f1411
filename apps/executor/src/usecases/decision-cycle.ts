/**
 * Decision Cycle - One pass of the pairs engine
 *
 * READ → DECIDE → VALIDATE → EXECUTE → APPLY
 * - Empty book side: report no_data and stop the pass
 * - Quotes are re-read right before validation
 * - Transport failures surface as a CycleError (fatal)
 */

import { err, ok, type Result } from "neverthrow";

import type {
  ActionableSignal,
  ExecutionOutcome,
  InstrumentId,
  Ms,
  PositionState,
  Quote,
  Rejection,
  SpreadStatistics,
  TradeIntent,
  Volume,
} from "@pairs-arb/core";
import { evaluateSignal, isTwoSided, rejectionTag, validateSignal } from "@pairs-arb/core";
import type { MarketDataError, MarketDataPort } from "@pairs-arb/adapters";
import { createLogger } from "@pairs-arb/utils";

import type { EngineConfig } from "../config";
import type { PositionLedger } from "../services/position-ledger";
import type { SpreadTracker } from "../services/spread-tracker";

const log = createLogger("cycle");

export type ExecutorPhase = "IDLE" | "READ" | "DECIDE" | "VALIDATE" | "EXECUTE" | "APPLY";

/**
 * Anything that can turn an intent into an outcome
 */
export interface TradeExecutor {
  execute(intent: TradeIntent): Promise<ExecutionOutcome>;
}

export interface DecisionCycleDeps {
  marketData: MarketDataPort;
  spreadTracker: SpreadTracker;
  ledger: PositionLedger;
  executor: TradeExecutor;
  config: Pick<EngineConfig, "instruments" | "signal" | "guardRail">;
  now?: () => Ms;
  /**
   * Optional phase hook for observability.
   *
   * Must not throw or block.
   */
  onPhase?: (phase: ExecutorPhase) => void;
}

export type CycleOutcome =
  | { type: "no_data"; instrument: InstrumentId }
  | { type: "stats_not_ready"; sampleCount: number; capacity: number }
  | { type: "no_signal"; reason: string }
  | { type: "rejected"; signal: ActionableSignal; rejection: Rejection; tag: string }
  | { type: "executed"; signal: ActionableSignal; execution: ExecutionOutcome };

/**
 * Read-only status record of one cycle
 */
export interface CycleReport {
  iteration: number;
  nowMs: Ms;
  positions: { a: Volume; b: Volume };
  delta: Volume;
  spread?: number;
  mean?: number;
  stdev?: number;
  positionState: PositionState;
  cash: number;
  pnl: number;
  tradeCount: number;
  openFrozen: boolean;
  tradingDisabled: boolean;
  outcome: CycleOutcome;
}

export type CycleError =
  | { type: "transport_unavailable"; message: string }
  | { type: "unknown_instrument"; message: string };

function toCycleError(error: MarketDataError): CycleError {
  return error.type === "connection_failed" ?
      { type: "transport_unavailable", message: error.message }
    : { type: "unknown_instrument", message: error.message };
}

/**
 * Read both quotes; a venue error is fatal
 */
function readQuotes(deps: DecisionCycleDeps): Result<[Quote, Quote], CycleError> {
  const { a, b } = deps.config.instruments;
  return deps.marketData
    .getQuote(a)
    .andThen(quoteA => deps.marketData.getQuote(b).map((quoteB): [Quote, Quote] => [quoteA, quoteB]))
    .mapErr(toCycleError);
}

function buildReport(
  deps: DecisionCycleDeps,
  iteration: number,
  nowMs: Ms,
  stats: SpreadStatistics,
  outcome: CycleOutcome,
): CycleReport {
  const state = deps.ledger.getState();

  return {
    iteration,
    nowMs,
    positions: { a: state.qtyA, b: state.qtyB },
    delta: deps.ledger.getDelta(),
    spread: deps.spreadTracker.getLastSpread(),
    mean: stats.ready ? stats.mean : undefined,
    stdev: stats.ready ? stats.stdev : undefined,
    positionState: state.position,
    cash: state.cash,
    pnl: state.realizedPnl,
    tradeCount: state.tradeCount,
    openFrozen: state.openFrozen,
    tradingDisabled: state.tradingDisabled,
    outcome,
  };
}

/**
 * Execute one decision cycle
 */
export async function runCycle(deps: DecisionCycleDeps, iteration: number): Promise<Result<CycleReport, CycleError>> {
  const nowMs = (deps.now ?? Date.now)();
  const { spreadTracker, ledger, executor, config } = deps;

  const finish = (stats: SpreadStatistics, outcome: CycleOutcome): Result<CycleReport, CycleError> => {
    deps.onPhase?.("IDLE");
    return ok(buildReport(deps, iteration, nowMs, stats, outcome));
  };

  // ───────────────────────────────────────────────────────────────────────────
  // READ
  // ───────────────────────────────────────────────────────────────────────────
  deps.onPhase?.("READ");
  const quotes = readQuotes(deps);
  if (quotes.isErr()) {
    deps.onPhase?.("IDLE");
    return err(quotes.error);
  }
  const [quoteA, quoteB] = quotes.value;

  if (!isTwoSided(quoteA) || !isTwoSided(quoteB)) {
    const instrument = isTwoSided(quoteA) ? config.instruments.b : config.instruments.a;
    log.debug("No market data", { instrument });
    return finish(spreadTracker.getStatistics(), { type: "no_data", instrument });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // DECIDE
  // ───────────────────────────────────────────────────────────────────────────
  deps.onPhase?.("DECIDE");
  const stats = spreadTracker.update(quoteA, quoteB, nowMs);
  const spread = spreadTracker.getLastSpread();

  if (!stats.ready || spread === undefined) {
    return finish(stats, { type: "stats_not_ready", sampleCount: stats.sampleCount, capacity: stats.capacity });
  }

  const signal = evaluateSignal(spread, stats, ledger.getState().position, config.signal);
  if (signal.type === "NONE") {
    return finish(stats, { type: "no_signal", reason: signal.reason });
  }

  log.info("Signal", {
    type: signal.type,
    reason: signal.reason,
    spread: signal.spread,
    threshold: signal.threshold,
    volume: signal.volume,
  });

  // ───────────────────────────────────────────────────────────────────────────
  // VALIDATE
  // ───────────────────────────────────────────────────────────────────────────
  deps.onPhase?.("VALIDATE");
  const liveQuotes = readQuotes(deps);
  if (liveQuotes.isErr()) {
    deps.onPhase?.("IDLE");
    return err(liveQuotes.error);
  }
  const [liveA, liveB] = liveQuotes.value;

  const validation = validateSignal({
    signal,
    quoteA: liveA,
    quoteB: liveB,
    ledger: ledger.getState(),
    params: config.guardRail,
  });

  if (validation.isErr()) {
    const tag = rejectionTag(validation.error);
    log.info("Signal rejected", { tag, message: validation.error.message });
    return finish(stats, { type: "rejected", signal, rejection: validation.error, tag });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // EXECUTE
  // ───────────────────────────────────────────────────────────────────────────
  deps.onPhase?.("EXECUTE");
  const execution = await executor.execute(validation.value);

  if (execution.type === "missed" && execution.transportFailure) {
    deps.onPhase?.("IDLE");
    return err({ type: "transport_unavailable", message: "Every leg submission failed at the transport level" });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // APPLY
  // ───────────────────────────────────────────────────────────────────────────
  deps.onPhase?.("APPLY");
  ledger.apply(execution, nowMs);

  return finish(stats, { type: "executed", signal, execution });
}

/**
 * Flatten a report into log fields
 */
export function summarizeReport(report: CycleReport): Record<string, string | number | boolean> {
  const fields: Record<string, string | number | boolean> = {
    iteration: report.iteration,
    position: report.positionState.type,
    qtyA: report.positions.a,
    qtyB: report.positions.b,
    delta: report.delta,
    pnl: report.pnl.toFixed(2),
    trades: report.tradeCount,
    outcome: report.outcome.type,
  };

  if (report.spread !== undefined) fields.spread = report.spread.toFixed(6);
  if (report.mean !== undefined) fields.mean = report.mean.toFixed(6);
  if (report.stdev !== undefined) fields.stdev = report.stdev.toFixed(6);
  if (report.openFrozen) fields.openFrozen = true;
  if (report.tradingDisabled) fields.tradingDisabled = true;
  if (report.outcome.type === "rejected") fields.rejection = report.outcome.tag;
  if (report.outcome.type === "executed") fields.execution = report.outcome.execution.type;

  return fields;
}
