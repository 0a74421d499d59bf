/**
 * Prompt Configuration
 *
 * One JSONC document, validated with zod. Each module reads its own section;
 * missing sections and keys take their defaults.
 *
 * @module config
 * @example
 * ```typescript
 * import { loadConfig } from './config';
 *
 * const { config } = await loadConfig();
 * if (!config.os.disabled) {
 *   console.log(config.os.format);
 * }
 * ```
 */

export {
  ConfigSchema,
  OsConfigSchema,
  SymbolsSchema,
  LogLevelSchema,
  MODULE_NAMES,
  isModuleName,
  validateConfig,
  type Config,
  type ConfigInput,
  type OsConfig,
  type OsConfigInput,
  type ModuleName,
  type ConfigValidationError,
} from './schema';

export {
  DEFAULT_OS_FORMAT,
  DEFAULT_OS_STYLE,
  DEFAULT_OS_DISABLED,
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  getGlobalConfigDir,
  getDefaultConfigPath,
} from './defaults';

export {
  loadConfig,
  parseConfig,
  ConfigFileError,
  ConfigValidationErrorAggregate,
  type ConfigLoadOptions,
  type LoadedConfig,
} from './config';

export { serializeConfig, type SerializedConfig } from './serialize';
