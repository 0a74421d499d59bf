/**
 * promptline
 *
 * Shell prompt modules with configurable, case-insensitive OS symbols.
 *
 * @example
 * ```typescript
 * import { createContext, loadConfig, moduleOutput } from "promptline";
 *
 * const { config } = await loadConfig();
 * const context = createContext({ config });
 * process.stdout.write(moduleOutput("os", context) ?? "");
 * ```
 */

export * from "./config";
export * from "./format";
export * from "./logging";
export * from "./module";
export * from "./os";
export * from "./symbols";
export { createCli, printModule, printConfig, printOs, processIO, type CliIO } from "./cli";
