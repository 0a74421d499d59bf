import { describe, it, expect } from "vitest";
import { osDisplayName, osFamilies, osFamily } from "./catalog";
import { OS_TYPES } from "./types";

describe("os catalog", () => {
  it("should list every OS type exactly once", () => {
    const types = osFamilies().map((family) => family.type);
    expect(types).toEqual([...OS_TYPES]);
  });

  it("should give every family a name and a symbol", () => {
    for (const family of osFamilies()) {
      expect(family.name.length).toBeGreaterThan(0);
      expect(family.symbol.length).toBeGreaterThan(0);
    }
  });

  it("should look up a family by type", () => {
    expect(osFamily("Pop")).toEqual({ type: "Pop", name: "Pop!_OS", symbol: "🍭 " });
    expect(osDisplayName("RedHatEnterprise")).toBe("Red Hat Enterprise Linux");
  });
});
