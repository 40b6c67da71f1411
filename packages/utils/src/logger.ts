/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level will be output
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  /** Component that emitted the record (e.g. "guard-rail") */
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  log: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

// Define log level priority (lower number = higher priority)
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const getTimestamp = () => {
  return new Date().toISOString();
};

/**
 * Parse a level name (case-insensitive)
 */
export const parseLogLevel = (value: string | undefined): LogLevel | undefined => {
  const upper = value?.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper);
};

let levelOverride: LogLevel | null = null;

const getCurrentLogLevel = (): LogLevel => {
  if (levelOverride) return levelOverride;

  // Default is INFO
  return parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
};

// Check if a log at the specified level should be output
const shouldLog = (level: LogLevel): boolean => {
  const currentLevel = getCurrentLogLevel();
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[currentLevel];
};

const colorize = (message: string, level: LogLevel): string => {
  const colors = {
    [LogLevel.ERROR]: "\x1b[31m", // Red
    [LogLevel.WARN]: "\x1b[33m", // Yellow
    [LogLevel.INFO]: "\x1b[36m", // Cyan
    [LogLevel.DEBUG]: "\x1b[32m", // Green
    [LogLevel.LOG]: null, // No color (standard)
  };

  const reset = "\x1b[0m";
  const color = colors[level];

  if (color === null) {
    return message; // No color for LOG
  }

  return `${color}${message}${reset}`;
};

const formatHeader = (level: LogLevel, scope: string | undefined): string => {
  const timestamp = `[${getTimestamp()}]`;
  const levelTag = `[${level}]`;
  const scopeTag = scope ? ` [${scope}]` : "";
  return colorize(`${timestamp} ${levelTag}${scopeTag}`, level);
};

let sink: LogSink | null = null;

const isFieldsObject = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value);

const stringify = (value: unknown): string =>
  typeof value === "string" ? value
  : value instanceof Error ? value.message
  : JSON.stringify(value);

function toFields(args: unknown[]): Record<string, string> | undefined {
  // Common case in this codebase: logger.info("msg", { ...fields })
  const maybeFields = args[1];
  if (isFieldsObject(maybeFields)) {
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(maybeFields)) {
      out[k] = stringify(v);
    }
    return Object.keys(out).length > 0 ? out : undefined;
  }
  return undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;

  const head = stringify(first);

  if (rest.length === 0) return head;

  // Avoid duplicating the common fields object in the message; store it in `fields`.
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;

  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringify).join(" ")}`.trim();
}

function emit(
  level: LogLevel,
  scope: string | undefined,
  args: unknown[],
  consoleFn: (...a: unknown[]) => void,
): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    scope,
    message: toMessage(args),
    fields: toFields(args),
  };

  if (sink) {
    sink.write(record);
    return;
  }

  const header = formatHeader(level, scope);
  consoleFn(header, ...args);
}

const bind = (scope: string | undefined): Logger => ({
  log: (...args: unknown[]) => {
    emit(LogLevel.LOG, scope, args, console.log);
  },
  info: (...args: unknown[]) => {
    emit(LogLevel.INFO, scope, args, console.info);
  },
  debug: (...args: unknown[]) => {
    emit(LogLevel.DEBUG, scope, args, console.log);
  },
  warn: (...args: unknown[]) => {
    emit(LogLevel.WARN, scope, args, console.warn);
  },
  error: (...args: unknown[]) => {
    emit(LogLevel.ERROR, scope, args, console.error);
  },
});

/**
 * Create a logger whose records carry a component scope
 */
export const createLogger = (scope: string): Logger => bind(scope);

export const logger = {
  ...bind(undefined),
  /**
   * Get the currently set log level
   */
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  /**
   * Get list of available log levels
   */
  getLevels: () => Object.values(LogLevel),
  /**
   * Pin the level regardless of `LOG_LEVEL` (pass null to follow the env again)
   */
  setLevel: (level: LogLevel | null) => {
    levelOverride = level;
  },
  /**
   * Route logs to a custom sink (e.g., tests or a file writer).
   *
   * When a sink is set, logs are sent to it instead of printing to console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
};
