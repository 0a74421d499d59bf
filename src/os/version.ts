/**
 * Version and bitness helpers for the OS reader.
 *
 * @module os/version
 */

import type { Bitness, OsVersion } from "./types";

const SEMANTIC_VERSION = /^(\d+)\.(\d+)\.(\d+)$/;

/**
 * Parse a version string. Exactly `x.y.z` is semantic, anything else
 * non-empty is kept verbatim.
 */
export function parseVersion(value: string | undefined): OsVersion {
  const trimmed = value?.trim();
  if (!trimmed) {
    return { kind: "unknown" };
  }

  const match = SEMANTIC_VERSION.exec(trimmed);
  if (match) {
    return {
      kind: "semantic",
      major: Number(match[1]),
      minor: Number(match[2]),
      patch: Number(match[3]),
    };
  }

  return { kind: "custom", value: trimmed };
}

export function formatVersion(version: OsVersion): string {
  switch (version.kind) {
    case "semantic":
      return `${version.major}.${version.minor}.${version.patch}`;
    case "rolling":
      return version.codename ? `Rolling (${version.codename})` : "Rolling Release";
    case "custom":
      return version.value;
    case "unknown":
      return "Unknown";
  }
}

const ARCH_64 = new Set(["x64", "arm64", "ppc64", "s390x", "riscv64", "loong64", "mips64", "mips64el"]);
const ARCH_32 = new Set(["ia32", "x32", "arm", "mips", "mipsel", "ppc", "s390"]);

/**
 * Bitness of a Node.js architecture name (`os.arch()`)
 */
export function bitnessFromArch(arch: string | undefined): Bitness {
  if (!arch) return "unknown";
  if (ARCH_64.has(arch)) return "64-bit";
  if (ARCH_32.has(arch)) return "32-bit";
  return "unknown";
}
