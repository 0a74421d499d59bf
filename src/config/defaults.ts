/**
 * Default Configuration Values
 *
 * @module config/defaults
 */

import * as os from 'os';
import * as path from 'path';

// ============================================================================
// Module Defaults
// ============================================================================

export const DEFAULT_OS_FORMAT = '[$symbol]($style)';
export const DEFAULT_OS_STYLE = 'bold white';
export const DEFAULT_OS_DISABLED = true;

// ============================================================================
// Config File Location
// ============================================================================

export const CONFIG_ENV_VAR = 'PROMPTLINE_CONFIG';
export const CONFIG_FILE_NAME = 'config.jsonc';
export const CONFIG_DIR_NAME = 'promptline';

/**
 * Global config directory (respects XDG_CONFIG_HOME)
 */
export function getGlobalConfigDir(env: Record<string, string | undefined> = process.env): string {
  const xdgConfig = env.XDG_CONFIG_HOME;
  if (xdgConfig) {
    return path.join(xdgConfig, CONFIG_DIR_NAME);
  }
  return path.join(os.homedir(), '.config', CONFIG_DIR_NAME);
}

/**
 * Config file to read when no path is given explicitly
 */
export function getDefaultConfigPath(env: Record<string, string | undefined> = process.env): string {
  return env[CONFIG_ENV_VAR] || path.join(getGlobalConfigDir(env), CONFIG_FILE_NAME);
}
