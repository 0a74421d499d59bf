/**
 * Symbol Tables
 *
 * Ordered maps from a lowercase OS identifier to its display symbol. Keys are
 * normalized when a table is built, so `"Arch"`, `"ARCH"` and `"arch"` all
 * land on the same entry.
 *
 * @module symbols/table
 */

import { osFamilies } from "../os/catalog";

export type SymbolTable = ReadonlyMap<string, string>;

export function normalizeSymbolKey(key: string): string {
  return key.toLowerCase();
}

/**
 * Build a table from author-supplied pairs (`Object.entries` of a config
 * section, or any iterable of pairs). When two keys normalize to the same
 * identifier the later value wins and the entry keeps its first position.
 */
export function buildSymbolTable(entries: Iterable<readonly [string, string]> = []): SymbolTable {
  const table = new Map<string, string>();
  for (const [key, symbol] of entries) {
    table.set(normalizeSymbolKey(key), symbol);
  }
  return table;
}

/**
 * Apply overrides on top of a base table. Existing keys keep their position,
 * new keys are appended.
 */
export function mergeSymbolTables(base: SymbolTable, ...overrides: SymbolTable[]): SymbolTable {
  const merged = new Map(base);
  for (const table of overrides) {
    for (const [key, symbol] of table) {
      merged.set(normalizeSymbolKey(key), symbol);
    }
  }
  return merged;
}

let defaults: SymbolTable | undefined;

/**
 * Built-in symbols for every OS family, built once on first use
 */
export function defaultSymbolTable(): SymbolTable {
  defaults ??= buildSymbolTable(osFamilies().map((family) => [family.type, family.symbol] as const));
  return defaults;
}

/**
 * The table one render resolves against: the built-ins with the user's
 * overrides applied
 */
export function effectiveSymbolTable(overrides: SymbolTable): SymbolTable {
  return mergeSymbolTables(defaultSymbolTable(), overrides);
}

export function symbolTableToObject(table: SymbolTable): Record<string, string> {
  return Object.fromEntries(table);
}
