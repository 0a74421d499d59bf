/**
 * OS Family Catalog
 *
 * Display names and default symbols for every {@link OsType}, loaded from
 * `catalog.json` and validated on first use.
 *
 * @module os/catalog
 */

import { z } from "zod";
import catalogData from "./catalog.json";
import { OS_TYPES, type OsType } from "./types";

export const OsFamilySchema = z.object({
  type: z.enum(OS_TYPES),
  /** Human readable name, e.g. "Linux Mint" */
  name: z.string().min(1),
  /** Default symbol, usually a glyph followed by a space */
  symbol: z.string(),
}).strict();
export type OsFamily = z.infer<typeof OsFamilySchema>;

export const OsCatalogSchema = z.object({
  families: z.array(OsFamilySchema),
}).strict();

let families: readonly OsFamily[] | undefined;

/**
 * All known families in catalog order
 */
export function osFamilies(): readonly OsFamily[] {
  families ??= Object.freeze(OsCatalogSchema.parse(catalogData).families);
  return families;
}

/**
 * Catalog entry for a family; every member of OS_TYPES has one
 */
export function osFamily(type: OsType): OsFamily | undefined {
  return osFamilies().find((family) => family.type === type);
}

/**
 * Display name of a family, falling back to the identifier itself
 */
export function osDisplayName(type: OsType): string {
  return osFamily(type)?.name ?? type;
}
