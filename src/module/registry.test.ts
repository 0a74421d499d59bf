import { describe, it, expect } from "vitest";
import { parseConfig } from "../config/config";
import { StringFormatter, TemplateError } from "../format";
import { Logger, MemoryTransport } from "../logging";
import { OsInfo } from "../os/types";
import { createContext } from "./context";
import { MODULES, moduleOutput, renderModule, renderPrompt, type ModuleRegistry } from "./registry";

function setup() {
  const memory = new MemoryTransport();
  const context = createContext({
    config: parseConfig('{"os":{"disabled":false,"format":"$symbol"}}'),
    os: { read: () => OsInfo.withType("Linux") },
    logger: new Logger({ level: "warn", transports: [memory] }),
    colors: false,
  });
  return { context, memory };
}

const modules: ModuleRegistry = {
  ...MODULES,
  greeting: () => ({ name: "greeting", segments: [{ text: "hi " }] }),
  broken: () => ({ name: "broken", segments: StringFormatter.parse("[oops").format() }),
  off: () => undefined,
};

describe("module registry", () => {
  it("should concatenate modules in order", () => {
    const { context } = setup();
    expect(renderPrompt(["greeting", "os", "greeting"], context, modules)).toBe("hi 🐧 hi ");
  });

  it("should skip failed, disabled and unknown modules", () => {
    const { context, memory } = setup();
    expect(renderPrompt(["broken", "greeting", "off", "nope", "os"], context, modules)).toBe("hi 🐧 ");
    expect(memory.at("warn").map((entry) => entry.message)).toEqual([
      "Error in module `broken`:\nUnclosed '[' at column 1",
      "Unknown module `nope`",
    ]);
  });

  it("should report the state of each module", () => {
    const { context } = setup();
    expect(renderModule("off", context, modules)).toEqual({ state: "disabled" });
    expect(renderModule("greeting", context, modules)).toMatchObject({ state: "rendered", output: "hi " });
    expect(renderModule("nope", context, modules)).toBeUndefined();

    const failed = renderModule("broken", context, modules);
    expect(failed?.state).toBe("failed");
    expect(failed?.state === "failed" && failed.error).toBeInstanceOf(TemplateError);
  });

  it("should not treat object prototype keys as modules", () => {
    const { context } = setup();
    expect(renderModule("toString", context)).toBeUndefined();
  });

  it("should let other errors propagate", () => {
    const { context } = setup();
    const failing: ModuleRegistry = {
      crash: () => {
        throw new RangeError("boom");
      },
    };
    expect(() => renderModule("crash", context, failing)).toThrowError(RangeError);
  });

  it("should return output only for rendered modules", () => {
    const { context } = setup();
    expect(moduleOutput("os", context)).toBe("🐧 ");
    expect(moduleOutput("off", context, modules)).toBeUndefined();
  });
});
