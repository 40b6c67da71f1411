/**
 * packages/utils - Shared runtime utilities
 */

export { LogLevel, logger, createLogger, parseLogLevel } from "./logger";
export type { Logger, LogRecord, LogSink } from "./logger";

export { createPollingWorker, STOP } from "./worker";
export type { IterationResult, StopReason, WorkerHandle, WorkerOptions } from "./worker";
