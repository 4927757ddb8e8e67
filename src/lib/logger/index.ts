export {
  createLogger,
  formatLog,
  toError,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
} from "./logger";

export type { LogFormat, LogLevel } from "./schema";
