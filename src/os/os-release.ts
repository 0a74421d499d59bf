/**
 * os-release parsing
 *
 * Reads the freedesktop `os-release` format (`KEY=value` lines, values
 * optionally quoted) and maps a distribution onto an {@link OsType}.
 *
 * @module os/os-release
 */

import type { OsType, OsVersion } from "./types";
import { parseVersion } from "./version";

export const OS_RELEASE_PATHS = ["/etc/os-release", "/usr/lib/os-release"];

export type OsRelease = Record<string, string>;

const LINE = /^([A-Z0-9_]+)=(.*)$/;

export function parseOsRelease(text: string): OsRelease {
  const result: OsRelease = {};

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const match = LINE.exec(line);
    if (!match) continue;

    result[match[1]] = unquote(match[2]);
  }

  return result;
}

function unquote(value: string): string {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length >= 2) {
    return value.slice(1, -1).replace(/\\(["'$`\\])/g, "$1");
  }
  return value;
}

const DISTRO_TYPES = new Map<string, OsType>([
  ["alpine", "Alpine"],
  ["amzn", "Amazon"],
  ["arch", "Arch"],
  ["archarm", "Arch"],
  ["centos", "CentOS"],
  ["debian", "Debian"],
  ["endeavouros", "EndeavourOS"],
  ["fedora", "Fedora"],
  ["garuda", "Garuda"],
  ["gentoo", "Gentoo"],
  ["linuxmint", "Mint"],
  ["manjaro", "Manjaro"],
  ["manjaro-arm", "Manjaro"],
  ["mariner", "Mariner"],
  ["nixos", "NixOS"],
  ["ol", "OracleLinux"],
  ["pop", "Pop"],
  ["raspbian", "Raspbian"],
  ["rhel", "RedHatEnterprise"],
  ["solus", "Solus"],
  ["sles", "SUSE"],
  ["sles_sap", "SUSE"],
  ["ubuntu", "Ubuntu"],
]);

const ROLLING = new Set<OsType>(["Arch", "EndeavourOS", "Garuda", "Gentoo", "Manjaro"]);

/**
 * Family of a distribution, from `ID` alone. `ID_LIKE` is not consulted:
 * a derivative without its own family reports plain Linux.
 */
export function osTypeFromRelease(release: OsRelease): OsType {
  const id = release.ID?.toLowerCase();
  if (!id) return "Linux";
  if (id.startsWith("opensuse")) return "openSUSE";
  return DISTRO_TYPES.get(id) ?? "Linux";
}

export function versionFromRelease(type: OsType, release: OsRelease): OsVersion {
  const version = parseVersion(release.VERSION_ID);
  if (version.kind !== "unknown") return version;

  if (ROLLING.has(type) || release.ID?.toLowerCase() === "opensuse-tumbleweed") {
    const build = release.BUILD_ID;
    return build && build !== "rolling" ? { kind: "rolling", codename: build } : { kind: "rolling" };
  }

  return version;
}
