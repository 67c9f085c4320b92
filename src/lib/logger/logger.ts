import { getRuntimeConfig } from "../config/runtime";

import type { LogFormat, LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** `pretty` prints one readable line per entry, `json` one JSON object */
  format: LogFormat;
  /** Fields merged into the context of every entry */
  bindings?: Record<string, unknown>;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, threshold: LogLevel): boolean =>
  logLevels[level] >= logLevels[threshold];

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && Object.keys(context).length > 0 && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` ${entry.error.name}: ${entry.error.message}` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

const defaultLoggerConfig = (): LoggerConfig => {
  const runtime = getRuntimeConfig();
  return {
    level: runtime.logging.level,
    format: runtime.nodeEnv === "development" ? "pretty" : "json",
  };
};

const resolveLoggerConfig = (overrides: Partial<LoggerConfig>): LoggerConfig => {
  if (overrides.level !== undefined && overrides.format !== undefined) {
    return { level: overrides.level, format: overrides.format, bindings: overrides.bindings };
  }
  return { ...defaultLoggerConfig(), ...overrides };
};

/**
 * Creates a console logger. Level and format default to LOG_LEVEL and
 * NODE_ENV; pass `bindings` to tag every entry (e.g. with a stream URL).
 */
export const createLogger = (loggerConfig: Partial<LoggerConfig> = {}): Logger => {
  const { level, format, bindings } = resolveLoggerConfig(loggerConfig);

  const withBindings = (context?: Record<string, unknown>): Record<string, unknown> | undefined =>
    bindings ? { ...bindings, ...context } : context;

  const sinks: Record<LogLevel, (line: string) => void> = {
    debug: (line) => console.log(line),
    info: (line) => console.log(line),
    warn: (line) => console.warn(line),
    error: (line) => console.error(line),
  };

  const emit = (
    entryLevel: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void => {
    if (!shouldLog(entryLevel, level)) return;
    sinks[entryLevel](
      formatLog(createLogEntry(entryLevel, message, withBindings(context), error), format),
    );
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, error, context) => emit("error", message, context, error),
  };
};
