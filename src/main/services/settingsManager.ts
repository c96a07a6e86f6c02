/**
 * Settings Manager Service
 *
 * Persists albumsmith settings as JSON at
 * %APPDATA%/albumsmith/settings.json (Windows) or
 * ~/.config/albumsmith/settings.json (other platforms).
 *
 * Every field is validated on its own; an invalid or missing field falls back
 * to its default and numbers are clamped to their valid range, so a partly
 * broken file still yields usable settings.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AppSettings, DEFAULT_SETTINGS, LogLevel } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface SettingsManagerOptions {
  /** Directory holding the settings file. Defaults to the platform config dir */
  settingsDir?: string;
  /** Defaults to 'settings.json' */
  fileName?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'albumsmith';

const DEFAULT_SETTINGS_FILENAME = 'settings.json';

const LOG_LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO'];

/** Valid range of each numeric setting, inclusive */
export const SETTING_RANGES = {
  coverSize: { min: 16, max: 4000 },
  carCoverSize: { min: 16, max: 1000 },
  jpegQuality: { min: 1, max: 100 },
} as const;

type NumericSetting = keyof typeof SETTING_RANGES;

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the directory albumsmith keeps its settings and logs in.
 * On Windows: %APPDATA%/albumsmith/
 * On other platforms: ~/.config/albumsmith/
 */
export function getAppDataDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

/**
 * Rounds a numeric setting and clamps it to its range. Non-numbers yield
 * the default.
 */
export function clampSetting(key: NumericSetting, value: unknown): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return DEFAULT_SETTINGS[key];
  }
  const { min, max } = SETTING_RANGES[key];
  return Math.max(min, Math.min(max, Math.round(value)));
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Builds complete settings from an untrusted object, field by field.
 */
export function validateSettings(partial: unknown): AppSettings {
  if (partial === null || typeof partial !== 'object' || Array.isArray(partial)) {
    return { ...DEFAULT_SETTINGS };
  }

  const raw = new Map<string, unknown>(Object.entries(partial));
  const exportRoot = raw.get('exportRoot');
  const logLevel = raw.get('logLevel');

  return {
    exportRoot:
      typeof exportRoot === 'string' && exportRoot.trim().length > 0 ? exportRoot : DEFAULT_SETTINGS.exportRoot,
    coverSize: clampSetting('coverSize', raw.get('coverSize')),
    carCoverSize: clampSetting('carCoverSize', raw.get('carCoverSize')),
    jpegQuality: clampSetting('jpegQuality', raw.get('jpegQuality')),
    logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_SETTINGS.logLevel,
  };
}

/**
 * Parses a settings file. Returns null if the content is not a JSON object.
 */
export function deserializeSettings(json: string): AppSettings | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return null;
  }
  return validateSettings(parsed);
}

export function serializeSettings(settings: AppSettings): string {
  return JSON.stringify(settings, null, 2);
}

/**
 * Converts a key and value given on the command line into a settings
 * update. Returns null for unknown keys.
 *
 * @example parseSettingAssignment('coverSize', '600') → { coverSize: 600 }
 */
export function parseSettingAssignment(key: string, value: string): Partial<AppSettings> | null {
  switch (key) {
    case 'exportRoot':
      return { exportRoot: value.length === 0 ? null : value };
    case 'coverSize':
      return { coverSize: Number(value) };
    case 'carCoverSize':
      return { carCoverSize: Number(value) };
    case 'jpegQuality':
      return { jpegQuality: Number(value) };
    case 'logLevel': {
      const level = value.toUpperCase();
      return { logLevel: isLogLevel(level) ? level : DEFAULT_SETTINGS.logLevel };
    }
    default:
      return null;
  }
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Loads, updates and persists settings.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize();
 * const { coverSize } = manager.get();
 * await manager.save({ jpegQuality: 90 });
 * ```
 */
export class SettingsManager {
  private settings: AppSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private initialized = false;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getAppDataDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.settings = { ...DEFAULT_SETTINGS };
  }

  /**
   * Loads settings from file. A missing or corrupt file leaves the defaults
   * in place; any other read failure is thrown.
   */
  async initialize(): Promise<void> {
    let content: string | null = null;
    try {
      content = await fs.promises.readFile(this.getFilePath(), 'utf-8');
    } catch (error: unknown) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    if (content !== null) {
      this.settings = deserializeSettings(content) ?? { ...DEFAULT_SETTINGS };
    }
    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Returns a copy of the current settings */
  get(): AppSettings {
    return { ...this.settings };
  }

  /**
   * Merges and validates a partial update, then writes the file.
   */
  async save(updates: Partial<AppSettings>): Promise<AppSettings> {
    this.settings = validateSettings({ ...this.settings, ...updates });
    await this.writeToFile();
    return { ...this.settings };
  }

  async reset(): Promise<AppSettings> {
    this.settings = { ...DEFAULT_SETTINGS };
    await this.writeToFile();
    return { ...this.settings };
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }

  private async writeToFile(): Promise<void> {
    await fs.promises.mkdir(this.settingsDir, { recursive: true });
    await fs.promises.writeFile(this.getFilePath(), serializeSettings(this.settings), 'utf-8');
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
