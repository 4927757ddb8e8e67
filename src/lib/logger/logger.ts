import { getConfig } from "../config";

import type { LogFormat, LogLevel } from "./schema";

export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  format?: LogFormat;
  /** Fields merged into the context of every entry. */
  bindings?: LogContext;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

// Amounts are bigints throughout; JSON.stringify throws on them.
const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === "bigint" ? value.toString() : value;

const readErrorCode = (error: Error): string | undefined => {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
};

const mergeContext = (bindings?: LogContext, context?: LogContext): LogContext | undefined => {
  if (!bindings) return context;
  if (!context) return bindings;
  return { ...bindings, ...context };
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error,
): LogEntry => {
  const code = error ? readErrorCode(error) : undefined;
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(code && { code }),
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
};

export const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    const context = entry.context ? ` ${JSON.stringify(entry.context, bigintReplacer)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
  }
  return JSON.stringify(entry, bigintReplacer);
};

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  /** Derive a logger whose entries always carry `bindings`. */
  child: (bindings: LogContext) => Logger;
}

const defaultFormat = (): LogFormat =>
  getConfig().server.nodeEnv === "development" ? "pretty" : "json";

export const createLogger = (
  loggerConfig: LoggerConfig = { level: getConfig().logging.level },
): Logger => {
  const format = loggerConfig.format ?? defaultFormat();
  const { level, bindings } = loggerConfig;

  const write = (entryLevel: LogLevel, message: string, context?: LogContext, error?: Error) => {
    if (!shouldLog(entryLevel, level)) return;
    const line = formatLog(
      createLogEntry(entryLevel, message, mergeContext(bindings, context), error),
      format,
    );
    if (entryLevel === "error") {
      console.error(line);
    } else if (entryLevel === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
    child: (childBindings) =>
      createLogger({
        level,
        format,
        bindings: mergeContext(bindings, childBindings),
      }),
  };
};

/** Normalise an unknown thrown value into an Error for logging. */
export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
