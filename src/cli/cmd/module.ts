import type { Argv } from "yargs"
import { cmd } from "./cmd"
import { createContext, renderModule } from "../../module"
import type { OsInfoReader } from "../../os"
import type { ILogger } from "../../logging"
import { loadConfigOrReport, processIO, type CliIO, type ConfigArgs } from "../io"

export interface PrintModuleArgs extends ConfigArgs {
  name: string
  os?: OsInfoReader
  logger?: ILogger
  colors?: boolean
}

/**
 * Render one module to stdout. Resolves to the process exit code.
 */
export async function printModule(args: PrintModuleArgs, io: CliIO = processIO): Promise<number> {
  const config = await loadConfigOrReport(args, io)
  if (!config) return 1

  const context = createContext({ config, os: args.os, logger: args.logger, colors: args.colors, env: args.env })
  const outcome = renderModule(args.name, context)
  if (!outcome) {
    io.err(`Unknown module: ${args.name}\n`)
    return 1
  }

  if (outcome.state === "rendered") {
    io.out(outcome.output)
  }
  return 0
}

export const ModuleCommand = cmd({
  command: "module <name>",
  describe: "print a single prompt module",
  builder: (yargs: Argv) =>
    yargs
      .positional("name", {
        describe: "module to render, e.g. os",
        type: "string",
        demandOption: true,
      })
      .option("config", {
        describe: "path to the configuration file",
        type: "string",
      }),
  handler: async (args) => {
    process.exitCode = await printModule({ name: args.name, configPath: args.config })
  },
})
