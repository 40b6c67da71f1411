/**
 * Common worker pattern utilities
 *
 * Provides a fixed-period polling worker with graceful shutdown.
 * Each iteration is awaited before the sleep starts, so iterations never overlap.
 */

import { logger } from "./logger";

/**
 * Returned by `runOnce` to ask the worker to stop after the current iteration
 */
export const STOP = Symbol("worker.stop");

export type IterationResult = void | typeof STOP;

/**
 * Why the worker stopped
 */
export type StopReason = "requested" | "signal" | "iteration_requested" | "iteration_failed";

/**
 * Options for creating a polling worker
 */
export interface WorkerOptions {
  /**
   * Name of the worker (for logging)
   */
  name: string;

  /**
   * Sleep in milliseconds after each completed iteration
   */
  intervalMs: number;

  /**
   * Function to run on each iteration. Return STOP to end the loop.
   */
  runOnce: () => Promise<IterationResult>;

  /**
   * Optional cleanup function, run once after the loop ends
   */
  cleanup?: (reason: StopReason) => Promise<void> | void;

  /**
   * Optional metadata to log on startup
   */
  startupMetadata?: Record<string, unknown>;

  /**
   * Install SIGINT/SIGTERM handlers that stop the worker (default: false)
   */
  handleSignals?: boolean;

  /**
   * Stop the loop when `runOnce` rejects instead of logging and continuing (default: true)
   */
  stopOnError?: boolean;
}

export interface WorkerHandle {
  /**
   * Resolves once the loop has ended and cleanup has run
   */
  done: Promise<StopReason>;
  /**
   * Request a stop; the in-flight iteration completes first
   */
  stop: () => Promise<StopReason>;
  isRunning: () => boolean;
}

/**
 * Create and start a polling worker
 *
 * This function handles:
 * - Initial run
 * - Awaited iterations separated by `intervalMs`
 * - Graceful shutdown on stop() (and on SIGINT/SIGTERM when enabled)
 * - Error handling
 */
export function createPollingWorker(options: WorkerOptions): WorkerHandle {
  const { name, intervalMs, runOnce, cleanup, startupMetadata, handleSignals = false, stopOnError = true } = options;

  logger.info(`Starting ${name}`, startupMetadata ?? {});

  let running = true;
  let stopReason: StopReason | null = null;
  let wake: (() => void) | null = null;
  let sleepTimer: NodeJS.Timeout | null = null;

  const requestStop = (reason: StopReason): void => {
    if (stopReason !== null) return;
    stopReason = reason;
    // Cut the sleep short
    if (sleepTimer) clearTimeout(sleepTimer);
    wake?.();
  };

  const sleep = (ms: number): Promise<void> =>
    new Promise<void>(resolve => {
      wake = resolve;
      sleepTimer = setTimeout(resolve, ms);
    }).finally(() => {
      wake = null;
      sleepTimer = null;
    });

  const onSignal = (): void => {
    logger.info(`Shutting down ${name}...`);
    requestStop("signal");
  };

  if (handleSignals) {
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  }

  const loop = async (): Promise<StopReason> => {
    while (stopReason === null) {
      try {
        const result = await runOnce();
        if (result === STOP) {
          requestStop("iteration_requested");
          break;
        }
      } catch (error: unknown) {
        logger.error(`${name} iteration failed`, { error });
        if (stopOnError) {
          requestStop("iteration_failed");
          break;
        }
      }

      if (stopReason !== null) break;
      await sleep(intervalMs);
    }

    const reason = stopReason ?? "requested";

    if (handleSignals) {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    }

    try {
      if (cleanup) {
        await cleanup(reason);
      }
    } finally {
      running = false;
      logger.info(`${name} shutdown complete`, { reason });
    }

    return reason;
  };

  const done = loop();

  logger.info(`${name} running`);

  return {
    done,
    stop: () => {
      requestStop("requested");
      return done;
    },
    isRunning: () => running,
  };
}
