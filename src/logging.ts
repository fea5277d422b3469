// =============================================================================
// Logging — Scoped structured log entries with a pluggable sink
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  event: string;
  data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggingOptions {
  /** Minimum level that reaches the sink (default: "warn") */
  level?: LogLevel;
  /** Custom sink (defaults to console) */
  sink?: LogSink;
}

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (entry) => {
  const line = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}] ${entry.scope} ${entry.event}`;
  if (entry.level === "error" || entry.level === "warn") {
    // eslint-disable-next-line no-console
    console.error(line, entry.data ?? "");
  } else {
    // eslint-disable-next-line no-console
    console.log(line, entry.data ?? "");
  }
};

let currentLevel: LogLevel = "warn";
let currentSink: LogSink = consoleSink;

export function configureLogging(options: LoggingOptions): void {
  if (options.level) currentLevel = options.level;
  if (options.sink) currentSink = options.sink;
}

export function resetLogging(): void {
  currentLevel = "warn";
  currentSink = consoleSink;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function createLogger(scope: string): Logger {
  function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    currentSink({ timestamp: Date.now(), level, scope, event, data });
  }

  return {
    debug: (event, data) => emit("debug", event, data),
    info: (event, data) => emit("info", event, data),
    warn: (event, data) => emit("warn", event, data),
    error: (event, data) => emit("error", event, data),
  };
}
