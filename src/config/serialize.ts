/**
 * Plain-object view of a configuration, for `print-config`.
 *
 * @module config/serialize
 */

import { effectiveSymbolTable, symbolTableToObject } from '../symbols/table';
import type { Config, LogLevel } from './schema';

export interface SerializedConfig {
  logLevel?: LogLevel;
  os: {
    format: string;
    style: string;
    symbols: Record<string, string>;
    disabled: boolean;
  };
}

/**
 * JSON-ready copy of the configuration. Symbol tables are written as the
 * effective table: built-ins in catalog order with overrides applied.
 */
export function serializeConfig(config: Config): SerializedConfig {
  const os = {
    format: config.os.format,
    style: config.os.style,
    symbols: symbolTableToObject(effectiveSymbolTable(config.os.symbols)),
    disabled: config.os.disabled,
  };

  return config.logLevel ? { logLevel: config.logLevel, os } : { os };
}
