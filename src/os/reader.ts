/**
 * Host OS Reader
 *
 * Detects the operating system of the current host. All system access goes
 * through a {@link SystemProbe} so the detection logic runs the same way
 * against a fake host in tests.
 *
 * @module os/reader
 */

import * as fs from "fs";
import * as os from "os";
import type { OsInfo, OsInfoReader, OsType } from "./types";
import { OS_RELEASE_PATHS, osTypeFromRelease, parseOsRelease, versionFromRelease } from "./os-release";
import { bitnessFromArch, parseVersion } from "./version";

export interface SystemProbe {
  platform(): string;
  arch(): string;
  release(): string;
  /** Descriptive kernel/OS version (`os.version()`) */
  version(): string;
  /** File contents, or undefined when the file cannot be read */
  readFile(path: string): string | undefined;
}

export const MACOS_VERSION_PLIST = "/System/Library/CoreServices/SystemVersion.plist";

const PLATFORM_TYPES = new Map<string, OsType>([
  ["darwin", "Macos"],
  ["win32", "Windows"],
  ["freebsd", "FreeBSD"],
  ["openbsd", "OpenBSD"],
  ["netbsd", "NetBSD"],
  ["sunos", "Illumos"],
  ["android", "Android"],
]);

export const nodeSystemProbe: SystemProbe = {
  platform: () => process.platform,
  arch: () => os.arch(),
  release: () => os.release(),
  version: () => os.version(),
  readFile(path) {
    try {
      return fs.readFileSync(path, "utf-8");
    } catch {
      return undefined;
    }
  },
};

export function createNodeOsReader(probe: SystemProbe = nodeSystemProbe): OsInfoReader {
  return {
    read: () => detectOs(probe),
  };
}

export function detectOs(probe: SystemProbe): OsInfo {
  const platform = probe.platform();
  const architecture = probe.arch();
  const bitness = bitnessFromArch(architecture);

  if (platform === "linux") {
    return { ...detectLinux(probe), bitness, architecture };
  }

  const type = PLATFORM_TYPES.get(platform) ?? "Unknown";

  switch (type) {
    case "Macos":
      return {
        type,
        version: parseVersion(readPlistString(probe.readFile(MACOS_VERSION_PLIST), "ProductVersion")),
        bitness,
        architecture,
      };
    case "Windows":
      return {
        type,
        version: parseVersion(probe.release()),
        edition: probe.version() || undefined,
        bitness,
        architecture,
      };
    case "Unknown":
      return { type, version: { kind: "unknown" }, bitness, architecture };
    default:
      return { type, version: parseVersion(probe.release()), bitness, architecture };
  }
}

function detectLinux(probe: SystemProbe): Pick<OsInfo, "type" | "version" | "edition" | "codename"> {
  for (const path of OS_RELEASE_PATHS) {
    const text = probe.readFile(path);
    if (text === undefined) continue;

    const release = parseOsRelease(text);
    const type = osTypeFromRelease(release);
    return {
      type,
      version: versionFromRelease(type, release),
      edition: release.VARIANT || undefined,
      codename: release.VERSION_CODENAME || undefined,
    };
  }

  return { type: "Linux", version: { kind: "unknown" } };
}

/**
 * Value of a `<key>` / `<string>` pair in an XML property list
 */
export function readPlistString(text: string | undefined, key: string): string | undefined {
  if (!text) return undefined;
  const pattern = new RegExp(`<key>${key}</key>\\s*<string>([^<]*)</string>`);
  return pattern.exec(text)?.[1];
}
