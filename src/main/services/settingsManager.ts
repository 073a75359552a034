/**
 * Settings Manager Service for Tagsmith
 *
 * Persists AppSettings as JSON at %APPDATA%/tagsmith/settings.json (Windows)
 * or ~/.config/tagsmith/settings.json (other platforms). Every field read from
 * disk is validated; invalid or missing values fall back to the defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { AppSettings, DEFAULT_SETTINGS, LogLevel, TranscodeFormat } from '../../shared/types';
import { errorMessage } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Directory holding the settings file. Defaults to the platform config dir */
  settingsDir?: string;
  /** Settings filename. Defaults to 'settings.json' */
  fileName?: string;
  logger?: Logger;
}

/** Listener callback type for settings changes */
export type SettingsChangeListener = (settings: AppSettings) => void;

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'tagsmith';
const DEFAULT_SETTINGS_FILENAME = 'settings.json';

const TRANSCODE_FORMATS: readonly TranscodeFormat[] = ['flac', 'wav'];
const LOG_LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO'];

export const REQUEST_TIMEOUT_RANGE = { min: 1000, max: 60000 } as const;
export const MAX_RETRIES_RANGE = { min: 0, max: 5 } as const;

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the default settings directory.
 * On Windows: %APPDATA%/tagsmith/, elsewhere ~/.config/tagsmith/
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Rounds `value` and clamps it into [min, max]. Non-numbers yield `fallback`.
 */
export function clampInteger(
  value: unknown,
  range: { min: number; max: number },
  fallback: number,
): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return fallback;
  }
  return Math.max(range.min, Math.min(range.max, Math.round(value)));
}

/** Trimmed non-empty string, or null. */
function optionalPath(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function isTranscodeFormat(value: unknown): value is TranscodeFormat {
  return TRANSCODE_FORMATS.some((format) => format === value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validates a partial or untrusted settings object, merging with defaults.
 */
export function validateSettings(partial: unknown): AppSettings {
  if (!isRecord(partial)) {
    return { ...DEFAULT_SETTINGS };
  }

  const raw = partial;
  const validated: AppSettings = { ...DEFAULT_SETTINGS };

  if (raw.lastDirectory === null || typeof raw.lastDirectory === 'string') {
    validated.lastDirectory = optionalPath(raw.lastDirectory);
  }

  if (typeof raw.replaceExistingCovers === 'boolean') {
    validated.replaceExistingCovers = raw.replaceExistingCovers;
  }

  const interpreter = optionalPath(raw.romanizerInterpreter);
  if (interpreter !== null) {
    validated.romanizerInterpreter = interpreter;
  }

  if (raw.romanizerScriptPath === null || typeof raw.romanizerScriptPath === 'string') {
    validated.romanizerScriptPath = optionalPath(raw.romanizerScriptPath);
  }

  const ffmpegPath = optionalPath(raw.ffmpegPath);
  if (ffmpegPath !== null) {
    validated.ffmpegPath = ffmpegPath;
  }

  if (isTranscodeFormat(raw.transcodeFormat)) {
    validated.transcodeFormat = raw.transcodeFormat;
  }

  if (typeof raw.usePersistentCache === 'boolean') {
    validated.usePersistentCache = raw.usePersistentCache;
  }

  if (raw.requestTimeout !== undefined) {
    validated.requestTimeout = clampInteger(
      raw.requestTimeout,
      REQUEST_TIMEOUT_RANGE,
      DEFAULT_SETTINGS.requestTimeout,
    );
  }

  if (raw.maxRetries !== undefined) {
    validated.maxRetries = clampInteger(raw.maxRetries, MAX_RETRIES_RANGE, DEFAULT_SETTINGS.maxRetries);
  }

  if (isLogLevel(raw.logLevel)) {
    validated.logLevel = raw.logLevel;
  }

  return validated;
}

export function serializeSettings(settings: AppSettings): string {
  return JSON.stringify(settings, null, 2);
}

/**
 * Parses settings JSON. Returns null for invalid JSON or a non-object root.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Manages application settings with file-based persistence.
 *
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize();
 * const { ffmpegPath } = manager.get();
 * await manager.save({ transcodeFormat: 'wav' });
 * ```
 */
export class SettingsManager {
  private settings: AppSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private readonly logger: Logger | null;
  private readonly listeners: SettingsChangeListener[] = [];
  private initialized = false;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.logger = options?.logger ?? null;
    this.settings = { ...DEFAULT_SETTINGS };
  }

  /**
   * Loads settings from file. A missing file keeps the defaults; an unreadable
   * or corrupt one keeps the defaults and logs a warning.
   */
  async initialize(): Promise<void> {
    const filePath = this.getFilePath();
    let content: string | null = null;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (!isMissingFile(error)) {
        this.logger?.warn(`Could not read settings: ${errorMessage(error)}`, {
          filePath,
          step: 'settings',
        });
      }
    }

    if (content !== null) {
      const parsed = deserializeSettings(content);
      if (parsed) {
        this.settings = validateSettings(parsed);
      } else {
        this.logger?.warn('Settings file is not valid JSON, using defaults', {
          filePath,
          step: 'settings',
        });
      }
    }

    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Returns a copy of the current settings. */
  get(): AppSettings {
    return { ...this.settings };
  }

  /**
   * Merges a partial update into the current settings, validates, persists
   * and notifies listeners.
   */
  async save(updates: Partial<AppSettings>): Promise<AppSettings> {
    this.settings = validateSettings({ ...this.settings, ...updates });
    await this.writeToFile();
    this.notifyListeners();
    return { ...this.settings };
  }

  /** Resets every setting to its default and persists. */
  async reset(): Promise<AppSettings> {
    this.settings = { ...DEFAULT_SETTINGS };
    await this.writeToFile();
    this.notifyListeners();
    return { ...this.settings };
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }

  getSettingsDir(): string {
    return this.settingsDir;
  }

  /**
   * Registers a listener for settings changes. Returns an unsubscribe function.
   */
  onChange(listener: SettingsChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  getListenerCount(): number {
    return this.listeners.length;
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  /** Settings stay in memory when the file cannot be written. */
  private async writeToFile(): Promise<void> {
    const filePath = this.getFilePath();
    try {
      await fs.promises.mkdir(this.settingsDir, { recursive: true });
      await fs.promises.writeFile(filePath, serializeSettings(this.settings), 'utf-8');
    } catch (error: unknown) {
      this.logger?.warn(`Could not write settings: ${errorMessage(error)}`, {
        filePath,
        step: 'settings',
      });
    }
  }

  private notifyListeners(): void {
    const settingsCopy = { ...this.settings };
    for (const listener of this.listeners) {
      try {
        listener(settingsCopy);
      } catch (error: unknown) {
        this.logger?.logError(error, { step: 'settings' });
      }
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}
