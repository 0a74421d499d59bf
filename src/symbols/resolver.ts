/**
 * Symbol Resolution
 *
 * Looks an OS identifier up in an ordered list of sources and stops at the
 * first source that has it. A source that maps the identifier to `""` is a
 * hit: an empty override means "show no symbol", not "use the default".
 *
 * @module symbols/resolver
 */

import { defaultSymbolTable, normalizeSymbolKey, type SymbolTable } from "./table";

/**
 * A lookup layer. Returns undefined when the layer has no entry for the
 * (already normalized) key.
 */
export type SymbolLookup = (key: string) => string | undefined;

export type SymbolSource = SymbolLookup | SymbolTable;

export function resolveSymbol(osIdentifier: string, sources: readonly SymbolSource[]): string | undefined {
  const key = normalizeSymbolKey(osIdentifier);
  for (const source of sources) {
    const symbol = lookup(source, key);
    if (symbol !== undefined) return symbol;
  }
  return undefined;
}

/**
 * The standard chain: the render's effective table, then the built-ins
 */
export function symbolSources(
  effective: SymbolTable,
  defaults: SymbolTable = defaultSymbolTable(),
): SymbolSource[] {
  return [effective, defaults];
}

function lookup(source: SymbolSource, key: string): string | undefined {
  return typeof source === "function" ? source(key) : source.get(key);
}
