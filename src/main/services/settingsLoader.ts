/**
 * Settings Loader
 *
 * Builds the application settings from environment variables, once at process
 * start. Every value is validated and merged over DEFAULT_SETTINGS, so a bad
 * variable falls back to its default instead of failing. Only problems that make
 * a scan impossible (no library root, unknown provider) are raised, as ConfigError.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  AppSettings,
  DEFAULT_SETTINGS,
  LogLevelSetting,
  ProviderName,
} from '../../shared/types';
import { ConfigError } from './errors';

// ─── Constants ───────────────────────────────────────────────────────────────

const PROVIDER_NAMES: readonly ProviderName[] = ['tunehub', 'lrcapi'];

const LOG_LEVELS: readonly LogLevelSetting[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

// ─── Value Parsers ───────────────────────────────────────────────────────────

/**
 * Parses a boolean environment value. Returns null when the value is missing or
 * not recognisable.
 */
export function parseBoolean(value: string | undefined): boolean | null {
  if (value === undefined) return null;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

/**
 * Parses a non-negative integer environment value. Returns null when missing,
 * not numeric, or negative.
 */
export function parseNonNegativeInteger(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  return Math.floor(parsed);
}

/**
 * Splits a separated list (comma by default), dropping empty items.
 */
export function parseList(value: string | undefined, separator: string = ','): string[] {
  if (value === undefined) return [];
  return value
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Validates a concurrency value and clamps it to the valid range (1-10).
 */
export function validateConcurrency(value: unknown): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return DEFAULT_SETTINGS.concurrency;
  }
  return Math.max(1, Math.min(10, Math.round(value)));
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

function isLogLevel(value: string): value is LogLevelSetting {
  return LOG_LEVELS.some((level) => level === value);
}

// ─── Environment Mapping ─────────────────────────────────────────────────────

/**
 * Reads every recognised variable from `env` into AppSettings.
 *
 * Invalid values are replaced by their defaults, except API_PROVIDER: an
 * unknown provider cannot be defaulted silently.
 *
 * @param env - Environment map, normally process.env
 * @throws ConfigError when API_PROVIDER names no known provider
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv): AppSettings {
  const settings: AppSettings = { ...DEFAULT_SETTINGS };

  const roots = parseList(env.MUSIC_PATH, path.delimiter);
  if (roots.length > 0) {
    settings.libraryRoots = roots.map((root) => path.resolve(root));
  } else {
    settings.libraryRoots = DEFAULT_SETTINGS.libraryRoots.map((root) => path.resolve(root));
  }

  const rawProvider = (env.API_PROVIDER ?? DEFAULT_SETTINGS.provider).trim().toLowerCase();
  if (!isProviderName(rawProvider)) {
    throw new ConfigError(
      `Unknown API_PROVIDER "${rawProvider}" (expected one of: ${PROVIDER_NAMES.join(', ')})`,
    );
  }
  settings.provider = rawProvider;

  const stringVars: Array<[keyof Pick<AppSettings, 'apiBaseUrl' | 'lrcApiUrl'>, string | undefined]> = [
    ['apiBaseUrl', env.API_BASE_URL],
    ['lrcApiUrl', env.LRCAPI_URL],
  ];
  for (const [key, value] of stringVars) {
    if (value !== undefined && value.trim().length > 0) {
      settings[key] = value.trim().replace(/\/+$/, '');
    }
  }

  if (env.LRCAPI_AUTH !== undefined) {
    settings.lrcApiAuth = env.LRCAPI_AUTH.trim();
  }

  if (env.DEFAULT_ARTIST !== undefined) {
    settings.defaultArtist = env.DEFAULT_ARTIST.trim();
  }

  const platforms = parseList(env.PLATFORMS).map((p) => p.toLowerCase());
  if (platforms.length > 0) {
    settings.platforms = platforms;
  }

  const booleanVars: Array<[BooleanSettingKey, string | undefined]> = [
    ['downloadLyrics', env.DOWNLOAD_LYRICS],
    ['downloadCover', env.DOWNLOAD_COVER],
    ['overwriteLyrics', env.OVERWRITE_LYRICS],
    ['overwriteCover', env.OVERWRITE_COVER],
    ['updateLyrics', env.UPDATE_LYRICS],
    ['updateCover', env.UPDATE_COVER],
    ['updateBasicInfo', env.UPDATE_BASIC_INFO],
    ['useFolderStructure', env.USE_FOLDER_STRUCTURE],
    ['logToFile', env.LOG_TO_FILE],
  ];
  for (const [key, value] of booleanVars) {
    const parsed = parseBoolean(value);
    if (parsed !== null) {
      settings[key] = parsed;
    }
  }

  const numberVars: Array<[NumberSettingKey, string | undefined]> = [
    ['scanIntervalDays', env.SCAN_INTERVAL_DAYS],
    ['requestTimeoutMs', env.REQUEST_TIMEOUT_MS],
    ['maxRetries', env.MAX_RETRIES],
    ['requestIntervalMs', env.REQUEST_INTERVAL_MS],
  ];
  for (const [key, value] of numberVars) {
    const parsed = parseNonNegativeInteger(value);
    if (parsed !== null) {
      settings[key] = parsed;
    }
  }
  if (settings.requestTimeoutMs === 0) {
    settings.requestTimeoutMs = DEFAULT_SETTINGS.requestTimeoutMs;
  }

  const concurrency = parseNonNegativeInteger(env.CONCURRENCY);
  if (concurrency !== null) {
    settings.concurrency = validateConcurrency(concurrency);
  }

  if (env.LOG_DIR !== undefined && env.LOG_DIR.trim().length > 0) {
    settings.logDir = path.resolve(env.LOG_DIR.trim());
  }

  const logLevel = env.LOG_LEVEL?.trim().toUpperCase();
  if (logLevel !== undefined && isLogLevel(logLevel)) {
    settings.logLevel = logLevel;
  }

  return settings;
}

type BooleanSettingKey = {
  [K in keyof AppSettings]: AppSettings[K] extends boolean ? K : never;
}[keyof AppSettings];

type NumberSettingKey = {
  [K in keyof AppSettings]: AppSettings[K] extends number ? K : never;
}[keyof AppSettings];

// ─── Startup Validation ──────────────────────────────────────────────────────

/**
 * Rejects settings a scan cannot run with.
 *
 * @throws ConfigError when a library root is missing or not a directory
 */
export async function assertSettingsUsable(settings: AppSettings): Promise<void> {
  if (settings.libraryRoots.length === 0) {
    throw new ConfigError('No library root configured (set MUSIC_PATH)');
  }

  for (const root of settings.libraryRoots) {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(root);
    } catch (error: unknown) {
      throw new ConfigError(`Library root does not exist: ${root}`, {
        filePath: root,
        cause: error instanceof Error ? error : undefined,
      });
    }
    if (!stats.isDirectory()) {
      throw new ConfigError(`Library root is not a directory: ${root}`, { filePath: root });
    }
  }
}
