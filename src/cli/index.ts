/**
 * Command line interface.
 *
 * ```bash
 * promptline module os
 * promptline print-config os
 * promptline os
 * ```
 *
 * @module cli
 */

import yargs from "yargs"
import { hideBin } from "yargs/helpers"
import { ModuleCommand } from "./cmd/module"
import { OsCommand } from "./cmd/os"
import { PrintConfigCommand } from "./cmd/print-config"

export { printModule, type PrintModuleArgs } from "./cmd/module"
export { printConfig, type PrintConfigArgs } from "./cmd/print-config"
export { printOs, type PrintOsArgs } from "./cmd/os"
export { processIO, type CliIO } from "./io"

export function createCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .scriptName("promptline")
    .command(ModuleCommand)
    .command(PrintConfigCommand)
    .command(OsCommand)
    .demandCommand(1, "Specify a command")
    .strict()
    .help()
}
