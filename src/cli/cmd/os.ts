import type { Argv } from "yargs"
import { cmd } from "./cmd"
import { createNodeOsReader, describeOs, type OsInfoReader } from "../../os"
import { effectiveSymbolTable, resolveSymbol, symbolSources } from "../../symbols"
import { loadConfigOrReport, processIO, type CliIO, type ConfigArgs } from "../io"

export interface PrintOsArgs extends ConfigArgs {
  os?: OsInfoReader
}

/**
 * Print what the os module sees: the detected attributes and the symbol the
 * configuration resolves to
 */
export async function printOs(args: PrintOsArgs, io: CliIO = processIO): Promise<number> {
  const config = await loadConfigOrReport(args, io)
  if (!config) return 1

  const info = (args.os ?? createNodeOsReader()).read()
  const symbol = resolveSymbol(info.type, symbolSources(effectiveSymbolTable(config.os.symbols)))

  io.out(JSON.stringify({ ...describeOs(info), symbol }, null, 2) + "\n")
  return 0
}

export const OsCommand = cmd({
  command: "os",
  describe: "show the detected operating system",
  builder: (yargs: Argv) =>
    yargs.option("config", {
      describe: "path to the configuration file",
      type: "string",
    }),
  handler: async (args) => {
    process.exitCode = await printOs({ configPath: args.config })
  },
})
