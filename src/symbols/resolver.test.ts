import { describe, it, expect } from "vitest";
import { OS_TYPES } from "../os/types";
import { resolveSymbol, symbolSources } from "./resolver";
import { buildSymbolTable, defaultSymbolTable, effectiveSymbolTable } from "./table";

function resolveWith(overrides: Record<string, string>, osType: string): string | undefined {
  return resolveSymbol(osType, symbolSources(effectiveSymbolTable(buildSymbolTable(Object.entries(overrides)))));
}

describe("resolveSymbol", () => {
  it("should resolve every OS type from the built-ins when nothing is overridden", () => {
    for (const type of OS_TYPES) {
      expect(resolveWith({}, type), type).toBeDefined();
    }
    expect(resolveWith({}, "Alpine")).toBe("🏔️ ");
    expect(resolveWith({}, "Arch")).toBe("🎗️ ");
    expect(resolveWith({}, "RedHatEnterprise")).toBe("🎩 ");
    expect(resolveWith({}, "Unknown")).toBe("❓ ");
  });

  it("should use an override for every OS type that has one", () => {
    const overrides = Object.fromEntries(OS_TYPES.map((type) => [type, `<${type}>`]));
    for (const type of OS_TYPES) {
      expect(resolveWith(overrides, type)).toBe(`<${type}>`);
    }
  });

  it("should fall back to the built-ins for types without an override", () => {
    const overrides = { Unknown: "", Arch: "Arch is the best!" };

    expect(resolveWith(overrides, "Arch")).toBe("Arch is the best!");
    expect(resolveWith(overrides, "Unknown")).toBe("");
    expect(resolveWith(overrides, "Debian")).toBe("🌀 ");
    expect(resolveWith(overrides, "Windows")).toBe("🪟 ");
  });

  it("should return the same symbol whatever casing the override key uses", () => {
    for (const key of ["Arch", "arch", "ARCH", "aRcH"]) {
      expect(resolveWith({ [key]: "X" }, "Arch")).toBe("X");
    }
  });

  it("should match whatever casing the identifier uses", () => {
    const sources = symbolSources(effectiveSymbolTable(buildSymbolTable([["macos", "M"]])));
    expect(resolveSymbol("Macos", sources)).toBe("M");
    expect(resolveSymbol("MACOS", sources)).toBe("M");
    expect(resolveSymbol("macos", sources)).toBe("M");
  });

  it("should treat an empty override as a symbol, not as a miss", () => {
    const sources = symbolSources(buildSymbolTable([["Unknown", ""]]));
    expect(resolveSymbol("Unknown", sources)).toBe("");
  });

  it("should return undefined when no source knows the identifier", () => {
    expect(resolveSymbol("Plan9", symbolSources(buildSymbolTable()))).toBeUndefined();
    expect(resolveSymbol("Arch", [])).toBeUndefined();
  });

  it("should try sources in order and accept lookup functions", () => {
    const calls: string[] = [];
    const systemWide = (key: string) => {
      calls.push(key);
      return key === "plan9" ? "9 " : undefined;
    };
    const sources = [buildSymbolTable([["Arch", "user"]]), systemWide, defaultSymbolTable()];

    expect(resolveSymbol("Arch", sources)).toBe("user");
    expect(calls).toEqual([]);

    expect(resolveSymbol("Plan9", sources)).toBe("9 ");
    expect(resolveSymbol("Debian", sources)).toBe("🌀 ");
    expect(calls).toEqual(["plan9", "debian"]);
  });

  it("should default the second source to the built-in table", () => {
    const [effective, defaults] = symbolSources(buildSymbolTable());
    expect(effective).toBeInstanceOf(Map);
    expect(defaults).toBe(defaultSymbolTable());
  });
});
