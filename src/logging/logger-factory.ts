/**
 * @file Logger Factory
 * @description Factory functions for creating configured loggers
 */

import { Logger } from "./logger";
import { ConsoleTransport } from "./transports/console";
import { isLogLevel, type ILogger, type LogFormat, type LogLevel, type ITransport } from "./types";

export const LOG_LEVEL_ENV = "PROMPTLINE_LOG_LEVEL";
export const LOG_FORMAT_ENV = "PROMPTLINE_LOG_FORMAT";

/** Level used when neither the environment nor the configuration sets one */
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Effective level: environment first, then configuration, then the default
 */
export function resolveLogLevel(
  configured?: LogLevel,
  env: Record<string, string | undefined> = process.env
): LogLevel {
  const envLevel = env[LOG_LEVEL_ENV]?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return configured ?? DEFAULT_LOG_LEVEL;
}

/**
 * Console line format: `json` when PROMPTLINE_LOG_FORMAT asks for it,
 * pretty otherwise
 */
export function resolveLogFormat(env: Record<string, string | undefined> = process.env): LogFormat {
  return env[LOG_FORMAT_ENV]?.toLowerCase() === "json" ? "json" : "pretty";
}

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  /** Write to stderr (default: true) */
  console?: boolean;
  format?: LogFormat;
  /** Color pretty output (default: NO_COLOR rules) */
  colors?: boolean;
  /** Extra transports, e.g. a MemoryTransport in tests */
  transports?: ITransport[];
}

export function createLogger(options: LoggerOptions = {}): ILogger {
  const level = options.level ?? resolveLogLevel();
  const transports: ITransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({ level, format: options.format, colors: options.colors }));
  }

  transports.push(...(options.transports ?? []));

  return new Logger({
    level,
    component: options.component,
    includeStacks: true,
    transports,
  });
}
