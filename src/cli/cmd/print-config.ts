import type { Argv } from "yargs"
import { cmd } from "./cmd"
import { isModuleName, serializeConfig } from "../../config"
import { loadConfigOrReport, processIO, type CliIO, type ConfigArgs } from "../io"

export interface PrintConfigArgs extends ConfigArgs {
  /** Only print this section */
  module?: string
}

/**
 * Print the effective configuration as JSON
 */
export async function printConfig(args: PrintConfigArgs, io: CliIO = processIO): Promise<number> {
  const config = await loadConfigOrReport(args, io)
  if (!config) return 1

  const serialized = serializeConfig(config)
  if (args.module === undefined) {
    io.out(JSON.stringify(serialized, null, 2) + "\n")
    return 0
  }

  if (!isModuleName(args.module)) {
    io.err(`Unknown module: ${args.module}\n`)
    return 1
  }

  io.out(JSON.stringify(serialized[args.module], null, 2) + "\n")
  return 0
}

export const PrintConfigCommand = cmd({
  command: "print-config [module]",
  describe: "print the effective configuration",
  builder: (yargs: Argv) =>
    yargs
      .positional("module", {
        describe: "only print this module's section",
        type: "string",
      })
      .option("config", {
        describe: "path to the configuration file",
        type: "string",
      }),
  handler: async (args) => {
    process.exitCode = await printConfig({ module: args.module, configPath: args.config })
  },
})
