/**
 * Prompt modules.
 *
 * @module module
 */

export type { Context, Module, ModuleOutcome, ModuleRenderer, ModuleState } from "./types";
export { createContext, type ContextOptions } from "./context";
export { osModule } from "./os";
export { MODULES, renderModule, moduleOutput, renderPrompt, type ModuleRegistry } from "./registry";
