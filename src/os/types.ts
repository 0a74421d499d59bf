/**
 * OS Types
 *
 * The fixed enumeration of operating system families the reader can report,
 * plus the raw attribute types it produces.
 *
 * @module os/types
 */

/**
 * Every OS family the reader can report. Spelling matches the identifiers
 * users write in their `symbols` table (lookups are case-insensitive).
 */
export const OS_TYPES = [
  "Alpine",
  "Amazon",
  "Android",
  "Arch",
  "CentOS",
  "Debian",
  "DragonFly",
  "Emscripten",
  "EndeavourOS",
  "Fedora",
  "FreeBSD",
  "Garuda",
  "Gentoo",
  "HardenedBSD",
  "Illumos",
  "Linux",
  "Macos",
  "Manjaro",
  "Mariner",
  "MidnightBSD",
  "Mint",
  "NetBSD",
  "NixOS",
  "OpenBSD",
  "openSUSE",
  "OracleLinux",
  "Pop",
  "Raspbian",
  "Redhat",
  "RedHatEnterprise",
  "Redox",
  "Solus",
  "SUSE",
  "Ubuntu",
  "Unknown",
  "Windows",
] as const;

export type OsType = (typeof OS_TYPES)[number];

export type Bitness = "32-bit" | "64-bit" | "unknown";

export type OsVersion =
  | { kind: "unknown" }
  | { kind: "semantic"; major: number; minor: number; patch: number }
  | { kind: "rolling"; codename?: string }
  | { kind: "custom"; value: string };

/** Raw description of the host, as produced by an {@link OsInfoReader} */
export interface OsInfo {
  type: OsType;
  version: OsVersion;
  bitness: Bitness;
  edition?: string;
  codename?: string;
  /** CPU architecture as reported by the runtime (x64, arm64, ...) */
  architecture?: string;
}

/** Source of the host description; called once per render */
export interface OsInfoReader {
  read(): OsInfo;
}

export const OsInfo = {
  /** Description with every attribute unknown */
  unknown(): OsInfo {
    return OsInfo.withType("Unknown");
  },

  /** Description of the given family with every other attribute unknown */
  withType(type: OsType): OsInfo {
    return {
      type,
      version: { kind: "unknown" },
      bitness: "unknown",
    };
  },
};
