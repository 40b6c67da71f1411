/**
 * Executor Main Entry Point
 *
 * - Composition root for the pairs engine
 * - Startup reconciliation before the first cycle
 * - Fixed-period decision cycle loop (awaited, never overlapping)
 * - Graceful shutdown: cancel resting orders, final report, disconnect
 */

import { resolve } from "node:path";

import { config as loadDotenv } from "dotenv";

import { PaperExchange } from "@pairs-arb/adapters";
import { LogLevel, STOP, createPollingWorker, logger } from "@pairs-arb/utils";
import type { StopReason } from "@pairs-arb/utils";

import { buildEngineConfig } from "./config";
import type { EngineConfig } from "./config";
import { createExecutorEnv } from "./env";
import { PairedOrderExecutor, PositionLedger, SpreadTracker } from "./services";
import { runCycle, summarizeReport } from "./usecases/decision-cycle";
import type { CycleError, CycleReport } from "./usecases/decision-cycle";
import { reconcileAtStartup } from "./usecases/startup-reconciliation";

loadDotenv({ path: resolve(process.cwd(), ".env") });

/**
 * Cancel resting orders, log the final report and disconnect
 */
async function shutdown(
  venue: PaperExchange,
  engineConfig: Readonly<EngineConfig>,
  ledger: PositionLedger,
  iterations: number,
  reason: StopReason,
): Promise<void> {
  for (const instrument of [engineConfig.instruments.a, engineConfig.instruments.b]) {
    const cancelled = await venue.cancelAllResting(instrument);
    if (cancelled.isErr()) {
      logger.warn("Failed to cancel resting orders", { instrument, error: cancelled.error.message });
    } else if (cancelled.value > 0) {
      logger.info("Cancelled resting orders", { instrument, count: cancelled.value });
    }
  }

  const state = ledger.getState();
  logger.info("Final report", {
    reason,
    iterations,
    trades: state.tradeCount,
    position: state.position.type,
    qtyA: state.qtyA,
    qtyB: state.qtyB,
    delta: ledger.getDelta(),
    cash: state.cash.toFixed(2),
    realizedPnl: state.realizedPnl.toFixed(2),
  });

  const disconnected = await venue.disconnect();
  if (disconnected.isErr()) {
    logger.warn("Disconnect failed", { error: disconnected.error.message });
  }
}

/**
 * Main executor function
 */
async function main(): Promise<void> {
  const env = createExecutorEnv(process.env);
  logger.setLevel(LogLevel[env.LOG_LEVEL]);

  const configResult = buildEngineConfig(env);
  if (configResult.isErr()) {
    throw new Error(configResult.error.message);
  }
  const engineConfig = configResult.value;

  logger.info("Starting executor", {
    exchange: env.EXCHANGE,
    instrumentA: engineConfig.instruments.a,
    instrumentB: engineConfig.instruments.b,
    historyLength: engineConfig.historyLength,
    meanAnchor: engineConfig.signal.meanAnchor,
    tradingDisabled: engineConfig.tradingDisabled,
  });

  // Initialize adapters
  const venue = new PaperExchange({ ...engineConfig.paper });

  // Initialize services
  const ledger = new PositionLedger({
    instruments: engineConfig.instruments,
    deltaTolerance: engineConfig.deltaTolerance,
    tradingDisabled: engineConfig.tradingDisabled,
  });
  const spreadTracker = new SpreadTracker(engineConfig.historyLength, engineConfig.stdevMode);
  const executor = new PairedOrderExecutor({
    executionPort: venue,
    marketData: venue,
    submission: engineConfig.legSubmission,
    compensatePartialFills: engineConfig.compensatePartialFills,
  });

  // Startup reconciliation
  const startup = await reconcileAtStartup({
    marketData: venue,
    executionPort: venue,
    ledger,
    instruments: engineConfig.instruments,
    connect: engineConfig.connect,
    decideUnbalanced: () => engineConfig.unbalancedPolicy,
  });
  if (startup.isErr()) {
    throw new Error(`Startup failed: ${startup.error.message}`);
  }
  logger.info("Startup reconciled", { ...startup.value });

  const progress: { iteration: number; lastReport: CycleReport | null; fatal: CycleError | null } = {
    iteration: 0,
    lastReport: null,
    fatal: null,
  };

  const worker = createPollingWorker({
    name: "executor",
    intervalMs: engineConfig.cycleSleepIntervalMs,
    handleSignals: true,
    startupMetadata: {
      intervalMs: engineConfig.cycleSleepIntervalMs,
      legSubmission: engineConfig.legSubmission,
    },
    runOnce: async () => {
      // Paper books move once per cycle
      venue.advance();
      progress.iteration++;

      const result = await runCycle(
        { marketData: venue, spreadTracker, ledger, executor, config: engineConfig },
        progress.iteration,
      );

      if (result.isErr()) {
        progress.fatal = result.error;
        logger.error("Fatal cycle error", result.error);
        return STOP;
      }

      progress.lastReport = result.value;
      if (progress.iteration % engineConfig.statusEveryCycles === 0) {
        logger.info("Status", summarizeReport(result.value));
      } else {
        logger.debug("Cycle", summarizeReport(result.value));
      }
    },
    cleanup: reason => shutdown(venue, engineConfig, ledger, progress.iteration, reason),
  });

  const reason = await worker.done;

  if (progress.lastReport) {
    logger.info("Last cycle", summarizeReport(progress.lastReport));
  }

  if (progress.fatal !== null || reason === "iteration_failed") {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error("Executor failed", error);
  process.exit(1);
});
