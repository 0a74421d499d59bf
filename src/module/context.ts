/**
 * Render context construction.
 *
 * @module module/context
 */

import { ConfigSchema, type Config } from "../config/schema";
import { shouldUseColors } from "../format/style";
import { createLogger, resolveLogFormat, resolveLogLevel, type ILogger } from "../logging";
import { createNodeOsReader } from "../os/reader";
import type { OsInfoReader } from "../os/types";
import type { Context } from "./types";

export interface ContextOptions {
  config?: Config;
  os?: OsInfoReader;
  logger?: ILogger;
  colors?: boolean;
  /** Environment for the log level, log format and color defaults */
  env?: Record<string, string | undefined>;
}

export function createContext(options: ContextOptions = {}): Context {
  const config = options.config ?? ConfigSchema.parse({});
  const env = options.env ?? process.env;
  const colors = options.colors ?? shouldUseColors(env);
  return {
    config,
    os: options.os ?? createNodeOsReader(),
    logger:
      options.logger ??
      createLogger({
        level: resolveLogLevel(config.logLevel, env),
        format: resolveLogFormat(env),
        colors,
      }),
    colors,
  };
}
