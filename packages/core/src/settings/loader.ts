/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.paperkit/settings.json, merges them over the
 * defaults, applies PAPERKIT_* environment overrides and validates the result.
 *
 * Library code never calls this: the CLIs load settings once and hand
 * explicit values to the components they build.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS, createLogger } from '../logging/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { parseEnvChoice, parseEnvInteger, parseEnvString, type EnvParseLogger } from './env-parsing.js';
import { paperkitSettingsSchema } from './schema.js';
import type { PaperkitSettings, UserSettings } from './types.js';

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.paperkit';
const SETTINGS_FILE = 'settings.json';

export type SettingsEnv = Record<string, string | undefined>;

export interface LoadSettingsOptions {
  /** Settings file; defaults to ~/.paperkit/settings.json */
  settingsPath?: string;
  /** Environment to read overrides from; defaults to process.env */
  env?: SettingsEnv;
  logger?: EnvParseLogger;
}

// =============================================================================
// Merge Utilities
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain objects, with source taking precedence.
 * Arrays are replaced entirely, not merged.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// =============================================================================
// Settings Loading
// =============================================================================

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR, SETTINGS_FILE);
}

/**
 * Read the user settings file.
 * Returns null when the file does not exist or cannot be parsed.
 */
export async function loadUserSettings(
  settingsPath: string,
  logger: EnvParseLogger = createLogger('settings')
): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await fs.readFile(settingsPath, 'utf-8');
  } catch (error) {
    // ENOENT is expected if file doesn't exist - not an error
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    logger.warn('Failed to read settings, using defaults', {
      settingsPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (!isPlainObject(parsed)) {
      logger.warn('Settings file is not a JSON object, using defaults', { settingsPath });
      return null;
    }
    return parsed;
  } catch (error) {
    logger.warn('Failed to parse settings, using defaults', {
      settingsPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Apply PAPERKIT_* environment overrides on top of merged settings.
 */
export function applyEnvOverrides(
  settings: PaperkitSettings,
  env: SettingsEnv,
  logger?: EnvParseLogger
): PaperkitSettings {
  const { installer } = settings;

  return {
    ...settings,
    logging: {
      level: parseEnvChoice(env.PAPERKIT_LOG_LEVEL, {
        name: 'PAPERKIT_LOG_LEVEL',
        fallback: settings.logging.level,
        choices: LOG_LEVELS,
        logger,
      }),
    },
    installer: {
      ...installer,
      packageUrl: parseEnvString(env.PAPERKIT_PACKAGE_URL) ?? installer.packageUrl,
      appPath: parseEnvString(env.PAPERKIT_APP_PATH) ?? installer.appPath,
      serviceName: parseEnvString(env.PAPERKIT_SERVICE_NAME) ?? installer.serviceName,
      pollIntervalMs: parseEnvInteger(env.PAPERKIT_POLL_INTERVAL_MS, {
        name: 'PAPERKIT_POLL_INTERVAL_MS',
        fallback: installer.pollIntervalMs,
        min: 1,
        logger,
      }),
      serviceTimeoutMs: parseEnvInteger(env.PAPERKIT_SERVICE_TIMEOUT_MS, {
        name: 'PAPERKIT_SERVICE_TIMEOUT_MS',
        fallback: installer.serviceTimeoutMs,
        min: 1,
        logger,
      }),
      queueTimeoutMs: parseEnvInteger(env.PAPERKIT_QUEUE_TIMEOUT_MS, {
        name: 'PAPERKIT_QUEUE_TIMEOUT_MS',
        fallback: installer.queueTimeoutMs,
        min: 1,
        logger,
      }),
    },
  };
}

/**
 * Validate a merged settings object.
 * @throws ConfigError listing every invalid field
 */
export function validateSettings(candidate: unknown): PaperkitSettings {
  const result = paperkitSettingsSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`
    );
    throw new ConfigError('Invalid settings', issues);
  }
  return result.data;
}

/**
 * Merge partial settings over the defaults and validate.
 */
export function resolveSettings(overrides: UserSettings | Record<string, unknown> = {}): PaperkitSettings {
  return validateSettings(deepMerge(DEFAULT_SETTINGS, overrides));
}

/**
 * Load, merge, override and validate settings.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<PaperkitSettings> {
  const logger = options.logger ?? createLogger('settings');
  const settingsPath = options.settingsPath ?? getSettingsPath();

  const userSettings = await loadUserSettings(settingsPath, logger);
  const merged = validateSettings(deepMerge(DEFAULT_SETTINGS, userSettings ?? {}));
  return validateSettings(applyEnvOverrides(merged, options.env ?? process.env, logger));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
