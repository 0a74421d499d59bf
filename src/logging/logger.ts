/**
 * @file Core Logger
 * @description Main Logger class implementation
 */

import {
  LOG_LEVELS,
  type ILogger,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type ErrorInfo,
  type TimerHandle,
} from "./types";

export class Logger implements ILogger {
  private config: LoggerConfig;
  private metadata: Record<string, unknown>;

  constructor(config: Partial<LoggerConfig> = {}, metadata: Record<string, unknown> = {}) {
    this.config = {
      level: config.level || "warn",
      component: config.component,
      includeStacks: config.includeStacks ?? true,
      transports: config.transports || [],
    };
    this.metadata = metadata;
  }

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.log("trace", message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log("debug", message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log("info", message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log("warn", message, undefined, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log("error", message, error, metadata);
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log("fatal", message, error, metadata);
  }

  child(context: { component?: string; metadata?: Record<string, unknown> }): ILogger {
    return new Logger(
      {
        ...this.config,
        component: context.component || this.config.component,
      },
      { ...this.metadata, ...context.metadata }
    );
  }

  startTimer(label: string): TimerHandle {
    const start = performance.now();
    return {
      end: (metadata?: Record<string, unknown>) => {
        this.log("debug", `${label} completed`, undefined, metadata, this.elapsedSince(start));
      },
      elapsed: () => this.elapsedSince(start),
    };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  private elapsedSince(start: number): number {
    return Math.round((performance.now() - start) * 1000) / 1000;
  }

  private log(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>,
    durationMs?: number
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const merged = { ...this.metadata, ...metadata };
    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      message,
      component: this.config.component,
      metadata: Object.keys(merged).length > 0 ? merged : undefined,
      error: error ? this.formatError(error) : undefined,
      durationMs,
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (e) {
        // transport failures never reach the caller
        process.stderr.write(`Transport error: ${String(e)}\n`);
      }
    }
  }

  private formatError(error: Error): ErrorInfo {
    const info: ErrorInfo = {
      name: error.name,
      message: error.message,
    };

    if (this.config.includeStacks && error.stack) {
      info.stack = error.stack;
    }

    if ("code" in error && typeof error.code === "string") {
      info.code = error.code;
    }

    if (error.cause instanceof Error) {
      info.cause = this.formatError(error.cause);
    }

    return info;
  }
}
