/**
 * Log levels, controlled by the `LOG_LEVEL` environment variable.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level are emitted.
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
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const LEVEL_COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m", // Red
  [LogLevel.WARN]: "\x1b[33m", // Yellow
  [LogLevel.INFO]: "\x1b[36m", // Cyan
  [LogLevel.DEBUG]: "\x1b[32m", // Green
  [LogLevel.LOG]: null,
};

const RESET = "\x1b[0m";

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const upper = raw?.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper);
}

const getCurrentLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];
};

const formatHeader = (level: LogLevel): string => {
  const header = `[${new Date().toISOString()}] [${level}]`;
  const color = LEVEL_COLORS[level];
  if (color === null || process.env.NO_COLOR !== undefined) return header;
  return `${color}${header}${RESET}`;
};

let sink: LogSink | null = null;

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

function isFieldsObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

/**
 * Extract the structured fields object (logger.info("msg", { ...fields })).
 */
export function toFields(args: readonly unknown[]): Record<string, string> | undefined {
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(maybeFields)) {
    out[k] = stringify(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

/**
 * Build the message text; the fields object is kept out of it.
 */
export function toMessage(args: readonly unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;
  const head = stringify(first);

  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringify).join(" ")}`.trim();
}

function emit(level: LogLevel, args: unknown[], consoleFn: (...a: unknown[]) => void): void {
  if (!shouldLog(level)) return;

  if (sink) {
    let written = true;
    try {
      sink.write({
        tsMs: Date.now(),
        level,
        message: toMessage(args),
        fields: toFields(args),
      });
    } catch (error) {
      // Logging never throws into the caller; the record goes to the console instead
      written = false;
      console.error(formatHeader(LogLevel.ERROR), "log sink write failed:", stringify(error));
    }
    // Errors stay visible on the terminal even when routed to a sink
    if (written && level !== LogLevel.ERROR) return;
  }

  consoleFn(formatHeader(level), ...args);
}

export const logger = {
  log: (...args: unknown[]) => {
    emit(LogLevel.LOG, args, console.log);
  },
  info: (...args: unknown[]) => {
    emit(LogLevel.INFO, args, console.info);
  },
  debug: (...args: unknown[]) => {
    emit(LogLevel.DEBUG, args, console.log);
  },
  warn: (...args: unknown[]) => {
    emit(LogLevel.WARN, args, console.warn);
  },
  error: (...args: unknown[]) => {
    emit(LogLevel.ERROR, args, console.error);
  },
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: () => Object.values(LogLevel),
  /**
   * Route logs to a sink (e.g. the hedger's log file) instead of the console.
   * ERROR logs are still echoed to stderr.
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
