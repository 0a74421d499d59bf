/**
 * Module Types
 *
 * A module renders one self-contained piece of the prompt. Rendering ends in
 * exactly one of three states:
 *
 * - `disabled`: the configuration turned the module off; nothing was computed
 * - `rendered`: the format evaluated; `output` may still be empty
 * - `failed`: the format string was invalid; the error was logged and the
 *   module contributes nothing
 *
 * @module module/types
 */

import type { Config } from "../config/schema";
import type { Segment, TemplateError } from "../format";
import type { ILogger } from "../logging";
import type { OsInfoReader } from "../os/types";

export interface Context {
  config: Config;
  os: OsInfoReader;
  logger: ILogger;
  /** Emit ANSI escape codes */
  colors: boolean;
}

export interface Module {
  name: string;
  segments: Segment[];
}

export type ModuleOutcome =
  | { state: "disabled" }
  | { state: "rendered"; module: Module; output: string }
  | { state: "failed"; error: TemplateError };

export type ModuleState = ModuleOutcome["state"];

/**
 * Builds a module, or returns undefined when the module is disabled.
 * Template problems are thrown as TemplateError and handled by the caller.
 */
export type ModuleRenderer = (context: Context) => Module | undefined;
