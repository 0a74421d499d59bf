/**
 * Configuration Loading
 *
 * Reads one JSONC file (comments and trailing commas allowed), validates it
 * strictly and fills in defaults. A file that does not parse or does not
 * validate is rejected as a whole; nothing is partially applied.
 *
 * Lookup order for the file:
 * 1. An explicit path (`--config`)
 * 2. PROMPTLINE_CONFIG
 * 3. $XDG_CONFIG_HOME/promptline/config.jsonc, else ~/.config/promptline/config.jsonc
 *
 * @module config/config
 */

import * as fs from 'fs/promises';
import { parse as parseJsonc, type ParseError as JsoncParseError, printParseErrorCode } from 'jsonc-parser';

import { validateConfig, type Config, type ConfigValidationError } from './schema';
import { getDefaultConfigPath } from './defaults';

// ============================================================================
// Types
// ============================================================================

export interface ConfigLoadOptions {
  /** Explicit config file; a missing explicit file is an error */
  configPath?: string;
  /** Custom environment variables */
  env?: Record<string, string | undefined>;
}

export interface LoadedConfig {
  /** The validated configuration with defaults applied */
  config: Config;
  /** The file that was read, if any */
  file?: string;
  /** Where the file was looked for */
  searched: string;
}

// ============================================================================
// Main API
// ============================================================================

/**
 * Load and validate the configuration file
 */
export async function loadConfig(options: ConfigLoadOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const filePath = options.configPath ?? getDefaultConfigPath(env);

  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error) && options.configPath === undefined) {
      return { config: parseConfig('{}'), searched: filePath };
    }
    throw new ConfigFileError(filePath, error instanceof Error ? error.message : String(error), { cause: error });
  }

  return { config: parseConfig(text, filePath), file: filePath, searched: filePath };
}

/**
 * Parse and validate configuration text
 */
export function parseConfig(text: string, filePath = '<inline>'): Config {
  const errors: JsoncParseError[] = [];
  // empty content (or comments only) parses to undefined
  const data: unknown = parseJsonc(text, errors, { allowTrailingComma: true, allowEmptyContent: true });

  if (errors.length > 0) {
    throw new ConfigFileError(filePath, `Invalid JSON:\n${formatJsoncErrors(text, errors)}`);
  }

  const validation = validateConfig(data === undefined ? {} : data);
  if (!validation.success) {
    throw new ConfigValidationErrorAggregate(validation.errors);
  }

  return validation.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Format JSONC parse errors for display
 */
function formatJsoncErrors(text: string, errors: JsoncParseError[]): string {
  const lines = text.split('\n');

  return errors.map(error => {
    const beforeOffset = text.substring(0, error.offset).split('\n');
    const line = beforeOffset.length;
    const column = beforeOffset[beforeOffset.length - 1].length + 1;
    const problemLine = lines[line - 1] || '';

    const errorMsg = `${printParseErrorCode(error.error)} at line ${line}, column ${column}`;
    const pointer = ' '.repeat(column + 9) + '^';

    return `${errorMsg}\n   Line ${line}: ${problemLine}\n${pointer}`;
  }).join('\n\n');
}

// ============================================================================
// Error Types
// ============================================================================

export class ConfigFileError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`Configuration error in ${filePath}: ${message}`, options);
    this.name = 'ConfigFileError';
  }
}

export class ConfigValidationErrorAggregate extends Error {
  constructor(public readonly errors: ConfigValidationError[]) {
    const messages = errors.map(e =>
      `  - ${e.path || '(root)'}: ${e.message}${e.suggestion ? ` (${e.suggestion})` : ''}`
    ).join('\n');
    super(`Configuration validation failed:\n${messages}`);
    this.name = 'ConfigValidationError';
  }
}
