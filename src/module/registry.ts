/**
 * Module Registry
 *
 * Maps module names to renderers and runs them behind a boundary that turns
 * template errors into a logged warning and an empty contribution.
 *
 * @module module/registry
 */

import { renderSegments, TemplateError } from "../format";
import { osModule } from "./os";
import type { Context, ModuleOutcome, ModuleRenderer } from "./types";

export type ModuleRegistry = Readonly<Record<string, ModuleRenderer>>;

export const MODULES: ModuleRegistry = {
  os: osModule,
};

/**
 * Render one module. Returns undefined when no module has that name.
 */
export function renderModule(
  name: string,
  context: Context,
  modules: ModuleRegistry = MODULES
): ModuleOutcome | undefined {
  const renderer = Object.hasOwn(modules, name) ? modules[name] : undefined;
  if (!renderer) {
    context.logger.warn(`Unknown module \`${name}\``);
    return undefined;
  }

  const logger = context.logger.child({ component: `module:${name}` });
  const timer = logger.startTimer(`module ${name}`);

  try {
    const module = renderer({ ...context, logger });
    if (!module) {
      return { state: "disabled" };
    }
    const output = renderSegments(module.segments, { colors: context.colors });
    timer.end({ segments: module.segments.length });
    return { state: "rendered", module, output };
  } catch (error) {
    if (TemplateError.is(error)) {
      logger.warn(`Error in module \`${name}\`:\n${error.message}`, { code: error.code });
      return { state: "failed", error };
    }
    throw error;
  }
}

/**
 * Rendered output of a module, or undefined when it contributes nothing
 */
export function moduleOutput(
  name: string,
  context: Context,
  modules: ModuleRegistry = MODULES
): string | undefined {
  const outcome = renderModule(name, context, modules);
  return outcome?.state === "rendered" ? outcome.output : undefined;
}

/**
 * Concatenate the given modules in order. A module that is disabled, fails
 * or does not exist is skipped without affecting the rest.
 */
export function renderPrompt(
  names: readonly string[],
  context: Context,
  modules: ModuleRegistry = MODULES
): string {
  return names
    .map((name) => moduleOutput(name, context, modules) ?? "")
    .join("");
}
