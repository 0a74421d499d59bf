/**
 * Operating system detection and description.
 *
 * @module os
 */

export {
  OS_TYPES,
  OsInfo,
  type OsType,
  type Bitness,
  type OsVersion,
  type OsInfoReader,
} from "./types";

export { osFamilies, osFamily, osDisplayName, OsFamilySchema, type OsFamily } from "./catalog";

export {
  OS_ATTRIBUTE_NAMES,
  describeOs,
  getAttribute,
  getBitness,
  getCodename,
  getEdition,
  getName,
  getType,
  getVersion,
  type OsAttributes,
  type OsAttributeName,
} from "./attributes";

export { parseVersion, formatVersion, bitnessFromArch } from "./version";
export { parseOsRelease, osTypeFromRelease, versionFromRelease, type OsRelease } from "./os-release";
export {
  createNodeOsReader,
  detectOs,
  nodeSystemProbe,
  readPlistString,
  MACOS_VERSION_PLIST,
  type SystemProbe,
} from "./reader";
