import { describe, it, expect, vi } from "vitest";
import { parseConfig } from "../config/config";
import { Logger, MemoryTransport } from "../logging";
import { createNodeOsReader } from "../os/reader";
import { OsInfo, type OsInfoReader } from "../os/types";
import { createContext } from "./context";
import { osModule } from "./os";
import { renderModule } from "./registry";

function fixedReader(info: OsInfo): OsInfoReader {
  return { read: () => info };
}

function setup(config: string, info: OsInfo = OsInfo.unknown(), colors = true) {
  const memory = new MemoryTransport();
  const context = createContext({
    config: parseConfig(config),
    os: fixedReader(info),
    logger: new Logger({ level: "trace", transports: [memory] }),
    colors,
  });
  return { context, memory };
}

const ubuntu: OsInfo = {
  type: "Ubuntu",
  version: { kind: "semantic", major: 24, minor: 4, patch: 1 },
  bitness: "64-bit",
  codename: "noble",
  architecture: "x64",
};

describe("os module", () => {
  it("should render the unknown symbol in bold white", () => {
    const { context } = setup('{"os":{"disabled":false}}');
    expect(renderModule("os", context)).toMatchObject({
      state: "rendered",
      output: "\x1b[1;37m❓ \x1b[0m",
    });
  });

  it("should use an override for the detected family", () => {
    const { context } = setup('{"os":{"disabled":false,"symbols":{"Arch":"X"}}}', OsInfo.withType("Arch"));
    const module = osModule(context);
    expect(module?.segments).toEqual([{ text: "X", style: { bold: true, fg: { kind: "basic", code: 7 } } }]);
  });

  it("should match overrides regardless of case", () => {
    const { context } = setup('{"os":{"disabled":false,"symbols":{"MACOS":"M "}}}', OsInfo.withType("Macos"), false);
    expect(renderModule("os", context)).toMatchObject({ state: "rendered", output: "M " });
  });

  it("should keep built-in symbols for families without an override", () => {
    const { context } = setup('{"os":{"disabled":false,"symbols":{"Arch":"X"}}}', OsInfo.withType("Debian"), false);
    expect(renderModule("os", context)).toMatchObject({ output: "🌀 " });
  });

  it("should render an empty override as no symbol", () => {
    const { context } = setup('{"os":{"disabled":false,"symbols":{"Unknown":""}}}');
    expect(renderModule("os", context)).toMatchObject({ state: "rendered", output: "" });
  });

  it("should omit attributes that are unknown", () => {
    const { context } = setup('{"os":{"disabled":false,"format":"($bitness )$name"}}', OsInfo.unknown(), false);
    expect(renderModule("os", context)).toMatchObject({ output: "Unknown" });
  });

  it("should render every attribute that is known", () => {
    const { context } = setup(
      '{"os":{"disabled":false,"format":"$symbol($bitness )($codename )($edition )$name $type $version"}}',
      ubuntu,
      false
    );
    expect(renderModule("os", context)).toMatchObject({ output: "🎯 64-bit noble Ubuntu Ubuntu 24.4.1" });
  });

  it("should style unknown-OS attributes with the module style", () => {
    const format = "[$symbol($bitness )($codename )($edition )($name )($type )($version )]($style)";
    const { context } = setup(JSON.stringify({ os: { disabled: false, format } }));
    expect(renderModule("os", context)).toMatchObject({ output: "\x1b[1;37m❓ Unknown Unknown \x1b[0m" });
  });

  it("should render plain Linux when os-release names an object property", () => {
    const context = createContext({
      config: parseConfig('{"os":{"disabled":false,"format":"$symbol$name"}}'),
      os: createNodeOsReader({
        platform: () => "linux",
        arch: () => "x64",
        release: () => "6.1.0",
        version: () => "#1 SMP",
        readFile: (path) => (path === "/etc/os-release" ? "ID=constructor\n" : undefined),
      }),
      logger: new Logger({ transports: [] }),
      colors: false,
    });

    expect(renderModule("os", context)).toMatchObject({ state: "rendered", output: "🐧 Linux" });
  });

  it("should not read the OS when disabled", () => {
    const read = vi.fn(() => OsInfo.unknown());
    const context = createContext({
      config: parseConfig("{}"),
      os: { read },
      logger: new Logger({ transports: [] }),
      colors: true,
    });

    expect(renderModule("os", context)).toEqual({ state: "disabled" });
    expect(read).not.toHaveBeenCalled();
  });

  it("should read the OS once per render", () => {
    const read = vi.fn(() => OsInfo.unknown());
    const context = createContext({
      config: parseConfig('{"os":{"disabled":false,"format":"$symbol$name$type"}}'),
      os: { read },
      logger: new Logger({ transports: [] }),
      colors: false,
    });

    osModule(context);
    expect(read).toHaveBeenCalledTimes(1);
  });

  it("should log a warning for an invalid format", () => {
    const { context, memory } = setup('{"os":{"disabled":false,"format":"[$symbol"}}');
    const outcome = renderModule("os", context);

    expect(outcome?.state).toBe("failed");
    const warnings = memory.at("warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      component: "module:os",
      message: "Error in module `os`:\nUnclosed '[' at column 1",
      metadata: { code: "UNCLOSED_GROUP" },
    });
  });

  it("should log a warning for an unknown variable", () => {
    const { context, memory } = setup('{"os":{"disabled":false,"format":"$symbol $kernel"}}');
    expect(renderModule("os", context)?.state).toBe("failed");
    expect(memory.at("warn")[0].message).toBe("Error in module `os`:\nUnknown variable '$kernel'");
  });

  it("should log a warning for an invalid style", () => {
    const { context } = setup('{"os":{"disabled":false,"style":"bold glitter"}}');
    const outcome = renderModule("os", context);
    expect(outcome?.state === "failed" && outcome.error.code).toBe("INVALID_STYLE");
  });
});
