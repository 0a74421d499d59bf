/**
 * The `os` module: a symbol for the host operating system plus its
 * bitness, codename, edition, name, type and version.
 *
 * @module module/os
 */

import { StringFormatter } from "../format";
import {
  getBitness,
  getCodename,
  getEdition,
  getName,
  getType,
  getVersion,
} from "../os/attributes";
import { effectiveSymbolTable, resolveSymbol, symbolSources } from "../symbols";
import type { Context, Module } from "./types";

export function osModule(context: Context): Module | undefined {
  const config = context.config.os;
  if (config.disabled) {
    return undefined;
  }

  const info = context.os.read();
  const sources = symbolSources(effectiveSymbolTable(config.symbols));

  const segments = StringFormatter.parse(config.format)
    .mapMeta({
      symbol: () => resolveSymbol(info.type, sources),
    })
    .mapStyle({
      style: () => config.style,
    })
    .map({
      bitness: () => getBitness(info),
      codename: () => getCodename(info),
      edition: () => getEdition(info),
      name: () => getName(info),
      type: () => getType(info),
      version: () => getVersion(info),
    })
    .format();

  return { name: "os", segments };
}
