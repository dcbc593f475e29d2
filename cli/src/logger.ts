/**
 * Logger utility for Kadeu
 *
 * Provides structured logging with prefixes for different modules.
 * All logs include timestamps for debugging timing issues.
 *
 * Entries go through a replaceable sink. While the terminal is in raw mode the
 * adapter swaps in a buffering sink so log lines never land on the study screen.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

/**
 * Receives every log entry that passes the level filter.
 */
export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

/**
 * Formats a log entry for console output.
 */
export function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split("T")[1]?.slice(0, 12) ?? entry.timestamp;
  const prefix = `[${time}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}]`;
  return `${prefix} ${entry.message}`;
}

/**
 * Writes an entry to the console stream matching its level.
 */
export const consoleSink: LogSink = (entry) => {
  const formatted = formatLog(entry);
  const extra = entry.data !== undefined ? entry.data : "";

  switch (entry.level) {
    case "debug":
    case "info":
      console.log(formatted, extra);
      break;
    case "warn":
      console.warn(formatted, extra);
      break;
    case "error":
      console.error(formatted, extra);
      break;
  }
};

let activeSink: LogSink = consoleSink;

/**
 * Replaces the active sink and returns the previous one.
 */
export function setLogSink(sink: LogSink): LogSink {
  const previous = activeSink;
  activeSink = sink;
  return previous;
}

/**
 * A sink that holds entries in memory until they are flushed.
 */
export interface BufferedSink {
  sink: LogSink;
  /** Sends every held entry to `target` in arrival order and empties the buffer. */
  flush: (target: LogSink) => void;
  readonly size: number;
}

export function createBufferedSink(): BufferedSink {
  const entries: LogEntry[] = [];

  return {
    sink: (entry) => {
      entries.push(entry);
    },
    flush: (target) => {
      for (const entry of entries.splice(0, entries.length)) {
        target(entry);
      }
    },
    get size() {
      return entries.length;
    },
  };
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    if (level === "debug" && !process.env.DEBUG) {
      return;
    }

    activeSink({
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data,
    });
  };

  return {
    debug: (message: string, data?: unknown) => log("debug", message, data),
    info: (message: string, data?: unknown) => log("info", message, data),
    warn: (message: string, data?: unknown) => log("warn", message, data),
    error: (message: string, data?: unknown) => log("error", message, data),
  };
}

// Pre-created loggers for each module
export const sessionLog = createLogger("Session");
export const deckLog = createLogger("Deck");
export const terminalLog = createLogger("Terminal");
export const appLog = createLogger("App");
