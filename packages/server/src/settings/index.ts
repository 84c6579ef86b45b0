/**
 * @fileoverview Settings exports
 */

export type { ChessUciSettings, EngineSettings, LoadedSettings, LoggingSettings, UserSettings } from './types.js';
export {
  DEFAULT_ENGINE_OPTIONS,
  DEFAULT_ENGINE_PATH,
  WINDOWS_ENGINE_PATHS,
  getDefaultEnginePath,
  getDefaultSettings,
} from './defaults.js';
export {
  ENV_ENGINE_PATH,
  ENV_LOG_LEVEL,
  ENV_LOG_PRETTY,
  ENV_THINK_TIME_MS,
  parseOptionalBoolean,
  parseOptionalInteger,
  readEnvOverrides,
  type EnvParseLogger,
} from './env-parsing.js';
export { formatIssues, fromSettingsFile, settingsFileSchema, toSettingsFile, type SettingsFile } from './schema.js';
export {
  CONFIG_DIR,
  CONFIG_FILE,
  ConfigError,
  createDefaultConfigFile,
  expandHome,
  getConfiguredEngineName,
  getDefaultConfigLocations,
  loadSettings,
  loadSettingsFile,
  mergeSettings,
  parseSettingsFile,
  type LoadSettingsOptions,
} from './loader.js';
