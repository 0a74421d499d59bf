/**
 * Configuration Schema Definitions
 *
 * Zod-based validation schemas for the prompt configuration. Every object is
 * strict: unknown keys are errors, never silently dropped.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { buildSymbolTable } from '../symbols/table';
import { DEFAULT_OS_DISABLED, DEFAULT_OS_FORMAT, DEFAULT_OS_STYLE } from './defaults';

// ============================================================================
// Base Types
// ============================================================================

/**
 * Log level configuration
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * OS identifier → symbol. Keys are lowercased while parsing; when two keys
 * differ only in case, the one written later wins.
 */
export const SymbolsSchema = z
  .record(z.string(), z.string())
  .transform((symbols) => buildSymbolTable(Object.entries(symbols)));

// ============================================================================
// Module Configuration
// ============================================================================

/**
 * The `os` module
 */
export const OsConfigSchema = z.object({
  /** Format string, see the format module for the syntax */
  format: z.string().default(DEFAULT_OS_FORMAT),
  /** Style descriptor available to the format as `$style` */
  style: z.string().default(DEFAULT_OS_STYLE),
  /** Symbol overrides; OS families not listed keep their built-in symbol */
  symbols: SymbolsSchema.default({}),
  /** The module is off unless explicitly enabled */
  disabled: z.boolean().default(DEFAULT_OS_DISABLED),
}).strict();
export type OsConfig = z.output<typeof OsConfigSchema>;
export type OsConfigInput = z.input<typeof OsConfigSchema>;

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  /** JSON schema reference for editor support */
  $schema: z.string().optional(),
  /** Log threshold; PROMPTLINE_LOG_LEVEL takes precedence */
  logLevel: LogLevelSchema.optional(),
  os: OsConfigSchema.default({}),
}).strict();
export type Config = z.output<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/** Names of the configurable modules */
export const MODULE_NAMES = ['os'] as const;
export type ModuleName = (typeof MODULE_NAMES)[number];

export function isModuleName(name: string): name is ModuleName {
  return MODULE_NAMES.some((moduleName) => moduleName === name);
}

// ============================================================================
// Validation Helpers
// ============================================================================

export interface ConfigValidationError {
  path: string;
  message: string;
  code: string;
  suggestion?: string;
}

/**
 * Validate a configuration document
 */
export function validateConfig(data: unknown): {
  success: true;
  data: Config;
} | {
  success: false;
  errors: ConfigValidationError[];
} {
  const result = ConfigSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
    suggestion: getSuggestion(issue),
  }));

  return { success: false, errors };
}

/**
 * Get helpful suggestion for validation errors
 */
function getSuggestion(issue: z.ZodIssue): string | undefined {
  const path = issue.path.join('.');

  if (issue.code === 'invalid_type') {
    return `Expected ${issue.expected}, received ${issue.received}`;
  }

  if (issue.code === 'unrecognized_keys' && issue.keys.length > 0) {
    return `Unknown keys: ${issue.keys.join(', ')}. Check spelling or remove.`;
  }

  if (path.startsWith('os.symbols')) {
    return 'Symbols map an OS name such as "Arch" or "Macos" to a string';
  }

  return undefined;
}
