/**
 * Structured logging for schema and table operations
 *
 * Lines read `[timestamp] [LEVEL] [event] database/table message {details}`. The
 * threshold comes from `DELIMSTORE_LOG_LEVEL`, or `debug` when `DELIMSTORE_DEBUG`
 * is set, and is `info` otherwise. Lines go to the console unless a sink is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  database?: string;
  table?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/** Receives each entry at or above the threshold, with its formatted line */
export type LogSink = (entry: LogEntry, line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Threshold from the environment, read on every call so tests can flip it
 */
function levelFromEnv(): LogLevel {
  const configured = process.env.DELIMSTORE_LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.DELIMSTORE_DEBUG ? "debug" : "info";
}

/**
 * Render an entry as a single line
 * @example
 * formatLogEntry({ timestamp: "t", level: "warn", event: "x", table: "books" })
 * // "[t] [WARN] [x] /books"
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.database || entry.table) {
    parts.push(`${entry.database ?? ""}/${entry.table ?? ""}`);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }
  return parts.join(" ");
}

const consoleSink: LogSink = (entry, line) => {
  switch (entry.level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

type LogData = Omit<Partial<LogEntry>, "timestamp" | "level" | "event">;

class Logger {
  #enabled = true;
  #level: LogLevel | undefined;
  #sink: LogSink = consoleSink;

  /**
   * Log an event if logging is on and the level reaches the threshold
   */
  log(level: LogLevel, event: string, data?: LogData): void {
    if (!this.#enabled || LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };
    this.#sink(entry, formatLogEntry(entry));
  }

  debug(event: string, data?: LogData): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogData): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogData): void {
    this.log("error", event, data);
  }

  /** Current threshold */
  get level(): LogLevel {
    return this.#level ?? levelFromEnv();
  }

  /**
   * Fix the threshold; `undefined` goes back to the environment
   */
  setLevel(level: LogLevel | undefined): void {
    this.#level = level;
  }

  /**
   * Route entries somewhere other than the console; `undefined` restores it
   */
  setSink(sink: LogSink | undefined): void {
    this.#sink = sink ?? consoleSink;
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
