/**
 * Configuration Module
 */

export {
  ConfigError,
  DEFAULT_SETTINGS,
  resolveSettings,
  settingsSchema,
  type DiffTrimSettings,
  type SettingsLayer,
} from './settings.js';
export { loadEnvSettings } from './env.js';
export { loadSettingsFile, findSettingsFile, SETTINGS_FILE_NAMES } from './file.js';
