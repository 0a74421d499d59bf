/**
 * @file Logging Types
 * @description Type definitions for the structured logging system
 */

/** Log severity levels */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Console line format */
export type LogFormat = "json" | "pretty";

/** Numeric priority for log levels (higher = more severe) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * A single log entry
 */
export interface LogEntry {
  level: LogLevel;

  /** ISO timestamp */
  timestamp: string;

  message: string;

  /** Component that produced this log, e.g. "module:os" */
  component?: string;

  metadata?: Record<string, unknown>;

  error?: ErrorInfo;

  /** Duration in ms (for timed operations) */
  durationMs?: number;
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  cause?: ErrorInfo;
}

export interface LoggerConfig {
  /** Minimum level to log */
  level: LogLevel;
  component?: string;
  includeStacks: boolean;
  transports: ITransport[];
}

export interface ILogger {
  trace(message: string, metadata?: Record<string, unknown>): void;
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void;
  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: { component?: string; metadata?: Record<string, unknown> }): ILogger;

  /** Start a timer that logs its duration at debug level on end */
  startTimer(label: string): TimerHandle;

  isLevelEnabled(level: LogLevel): boolean;
}

export interface ITransport {
  write(entry: LogEntry): void;
}

export interface IFormatter {
  format(entry: LogEntry): string;
}

export interface TimerHandle {
  end(metadata?: Record<string, unknown>): void;
  elapsed(): number;
}
