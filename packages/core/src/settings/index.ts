/**
 * @fileoverview Settings exports
 */

export { DEFAULT_SETTINGS } from './defaults.js';
export { paperkitSettingsSchema, installerSettingsSchema } from './schema.js';
export {
  applyEnvOverrides,
  deepMerge,
  getSettingsPath,
  loadSettings,
  loadUserSettings,
  resolveSettings,
  validateSettings,
  type LoadSettingsOptions,
  type SettingsEnv,
} from './loader.js';
export {
  parseEnvChoice,
  parseEnvInteger,
  parseEnvString,
  type EnvParseLogger,
  type ParseEnvChoiceOptions,
  type ParseEnvIntegerOptions,
} from './env-parsing.js';
export type {
  DeepPartial,
  InstallerSettings,
  LoggingSettings,
  PaperkitSettings,
  UserSettings,
} from './types.js';
