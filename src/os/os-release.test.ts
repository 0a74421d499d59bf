import { describe, it, expect } from "vitest";
import { osTypeFromRelease, parseOsRelease, versionFromRelease } from "./os-release";
import { bitnessFromArch, formatVersion, parseVersion } from "./version";

describe("parseOsRelease", () => {
  it("should read quoted and unquoted values and skip comments", () => {
    const release = parseOsRelease([
      "# comment",
      "",
      'NAME="Linux Mint"',
      "ID=linuxmint",
      "VERSION_ID='21.3'",
      'PRETTY_NAME="Say \\"hi\\""',
      "not a pair",
    ].join("\n"));

    expect(release).toEqual({
      NAME: "Linux Mint",
      ID: "linuxmint",
      VERSION_ID: "21.3",
      PRETTY_NAME: 'Say "hi"',
    });
  });
});

describe("osTypeFromRelease", () => {
  it.each([
    ["alpine", "Alpine"],
    ["amzn", "Amazon"],
    ["linuxmint", "Mint"],
    ["ol", "OracleLinux"],
    ["opensuse-leap", "openSUSE"],
    ["opensuse-tumbleweed", "openSUSE"],
    ["rhel", "RedHatEnterprise"],
    ["sles", "SUSE"],
    ["pop", "Pop"],
  ] as const)("should map ID=%s to %s", (id, type) => {
    expect(osTypeFromRelease({ ID: id })).toBe(type);
  });

  it("should report Linux for unknown or missing ids", () => {
    expect(osTypeFromRelease({ ID: "void", ID_LIKE: "arch" })).toBe("Linux");
    expect(osTypeFromRelease({})).toBe("Linux");
  });

  it("should report Linux for ids that name object properties", () => {
    for (const id of ["constructor", "toString", "valueOf", "hasOwnProperty", "__proto__"]) {
      expect(osTypeFromRelease(parseOsRelease(`ID=${id}\n`))).toBe("Linux");
    }
  });
});

describe("versionFromRelease", () => {
  it("should prefer VERSION_ID", () => {
    expect(versionFromRelease("Debian", { VERSION_ID: "12" })).toEqual({ kind: "custom", value: "12" });
    expect(versionFromRelease("Alpine", { VERSION_ID: "3.19.1" })).toEqual({
      kind: "semantic",
      major: 3,
      minor: 19,
      patch: 1,
    });
  });

  it("should report a rolling version for rolling families", () => {
    expect(versionFromRelease("Arch", { BUILD_ID: "rolling" })).toEqual({ kind: "rolling" });
    expect(versionFromRelease("Manjaro", { BUILD_ID: "2024.03" })).toEqual({ kind: "rolling", codename: "2024.03" });
  });

  it("should report unknown otherwise", () => {
    expect(versionFromRelease("Debian", {})).toEqual({ kind: "unknown" });
  });
});

describe("versions", () => {
  it("should parse only x.y.z as semantic", () => {
    expect(parseVersion("1.2.3")).toEqual({ kind: "semantic", major: 1, minor: 2, patch: 3 });
    expect(parseVersion("22.04")).toEqual({ kind: "custom", value: "22.04" });
    expect(parseVersion("  ")).toEqual({ kind: "unknown" });
    expect(parseVersion(undefined)).toEqual({ kind: "unknown" });
  });

  it("should format each kind", () => {
    expect(formatVersion({ kind: "unknown" })).toBe("Unknown");
    expect(formatVersion({ kind: "custom", value: "sid" })).toBe("sid");
  });
});

describe("bitnessFromArch", () => {
  it("should classify Node architectures", () => {
    expect(bitnessFromArch("x64")).toBe("64-bit");
    expect(bitnessFromArch("arm64")).toBe("64-bit");
    expect(bitnessFromArch("ia32")).toBe("32-bit");
    expect(bitnessFromArch("wasm")).toBe("unknown");
    expect(bitnessFromArch(undefined)).toBe("unknown");
  });
});
