/**
 * OS symbol tables and resolution.
 *
 * @module symbols
 */

export {
  buildSymbolTable,
  mergeSymbolTables,
  defaultSymbolTable,
  effectiveSymbolTable,
  normalizeSymbolKey,
  symbolTableToObject,
  type SymbolTable,
} from "./table";

export { resolveSymbol, symbolSources, type SymbolLookup, type SymbolSource } from "./resolver";
