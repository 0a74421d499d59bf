/**
 * Output channels for CLI commands. stdout carries the prompt text only;
 * diagnostics go to stderr.
 */

import { ConfigFileError, ConfigValidationErrorAggregate, loadConfig, type Config } from "../config"

export interface CliIO {
  out(text: string): void
  err(text: string): void
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text)
  },
  err: (text) => {
    process.stderr.write(text)
  },
}

export interface ConfigArgs {
  configPath?: string
  env?: Record<string, string | undefined>
}

/**
 * Load the configuration, reporting load and validation errors on `io`.
 * Returns undefined when the configuration is unusable.
 */
export async function loadConfigOrReport(args: ConfigArgs, io: CliIO): Promise<Config | undefined> {
  try {
    const loaded = await loadConfig({ configPath: args.configPath, env: args.env })
    return loaded.config
  } catch (error) {
    if (error instanceof ConfigFileError || error instanceof ConfigValidationErrorAggregate) {
      io.err(`${error.message}\n`)
      return undefined
    }
    throw error
  }
}
