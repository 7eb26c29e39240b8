/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, defaultName } from "./defaults";
// Inline overrides
export {
  BACKUP_CONFIG_OPTIONS,
  buildInlineConfig,
  INLINE_CONFIG_OPTIONS,
  type InlineValues,
} from "./inline";
// Loader
export {
  buildConfig,
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  readConfigFile,
} from "./loader";
// Selection
export {
  LOCAL_INSTANCE,
  parseSelection,
  type SelectionFlags,
  targetsLocalInstance,
  withInstanceId,
} from "./selection";
// Validator
export { validateConfig } from "./validator";
