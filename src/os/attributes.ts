/**
 * OS Attributes
 *
 * Converts the reader's raw description into optional display strings.
 * Unknown bitness and unknown versions become absent values here, so
 * nothing downstream ever sees the sentinel.
 *
 * @module os/attributes
 */

import { osDisplayName } from "./catalog";
import type { OsInfo } from "./types";
import { formatVersion } from "./version";

export interface OsAttributes {
  bitness?: string;
  codename?: string;
  edition?: string;
  name?: string;
  type?: string;
  version?: string;
}

export type OsAttributeName = keyof OsAttributes;

export const OS_ATTRIBUTE_NAMES: readonly OsAttributeName[] = [
  "bitness",
  "codename",
  "edition",
  "name",
  "type",
  "version",
];

export function getBitness(info: OsInfo): string | undefined {
  return info.bitness === "unknown" ? undefined : info.bitness;
}

export function getCodename(info: OsInfo): string | undefined {
  return info.codename || undefined;
}

export function getEdition(info: OsInfo): string | undefined {
  return info.edition || undefined;
}

export function getName(info: OsInfo): string | undefined {
  return osDisplayName(info.type);
}

export function getType(info: OsInfo): string | undefined {
  return info.type;
}

export function getVersion(info: OsInfo): string | undefined {
  return info.version.kind === "unknown" ? undefined : formatVersion(info.version);
}

const ACCESSORS: Record<OsAttributeName, (info: OsInfo) => string | undefined> = {
  bitness: getBitness,
  codename: getCodename,
  edition: getEdition,
  name: getName,
  type: getType,
  version: getVersion,
};

export function getAttribute(info: OsInfo, name: OsAttributeName): string | undefined {
  return ACCESSORS[name](info);
}

export function describeOs(info: OsInfo): OsAttributes {
  const attributes: OsAttributes = {};
  for (const name of OS_ATTRIBUTE_NAMES) {
    const value = getAttribute(info, name);
    if (value !== undefined) attributes[name] = value;
  }
  return attributes;
}
