/**
 * @file Logging Module
 * @description Main exports for the structured logging system
 */

export type {
  LogLevel,
  LogFormat,
  LogEntry,
  ErrorInfo,
  LoggerConfig,
  ILogger,
  ITransport,
  IFormatter,
  TimerHandle,
} from "./types";

export { LOG_LEVELS, isLogLevel } from "./types";

export { Logger } from "./logger";

export {
  createLogger,
  resolveLogLevel,
  DEFAULT_LOG_LEVEL,
  LOG_LEVEL_ENV,
  LOG_FORMAT_ENV,
  resolveLogFormat,
  type LoggerOptions,
} from "./logger-factory";

export { JsonFormatter, PrettyFormatter } from "./formatters";

export { ConsoleTransport, MemoryTransport, type ConsoleTransportOptions } from "./transports";
