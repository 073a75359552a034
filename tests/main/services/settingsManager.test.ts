/**
 * Tests for Settings Manager Service
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  SettingsManager,
  getDefaultSettingsDir,
  clampInteger,
  validateSettings,
  serializeSettings,
  deserializeSettings,
} from '../../../src/main/services/settingsManager';
import { Logger } from '../../../src/main/services/logger';
import { DEFAULT_SETTINGS, AppSettings } from '../../../src/shared/types';

// ─── Helper ──────────────────────────────────────────────────────────────────

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tagsmith-settings-'));
}

function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('SettingsManager', () => {
  describe('getDefaultSettingsDir', () => {
    it('uses APPDATA when set', () => {
      const original = process.env.APPDATA;
      process.env.APPDATA = path.join('fake', 'appdata');
      try {
        expect(getDefaultSettingsDir()).toBe(path.join('fake', 'appdata', 'tagsmith'));
      } finally {
        if (original !== undefined) {
          process.env.APPDATA = original;
        } else {
          delete process.env.APPDATA;
        }
      }
    });

    it('falls back to homedir/.config', () => {
      const original = process.env.APPDATA;
      delete process.env.APPDATA;
      try {
        expect(getDefaultSettingsDir()).toBe(path.join(os.homedir(), '.config', 'tagsmith'));
      } finally {
        if (original !== undefined) {
          process.env.APPDATA = original;
        }
      }
    });
  });

  // ─── clampInteger ─────────────────────────────────────────────────────

  describe('clampInteger', () => {
    const range = { min: 0, max: 5 };

    it('keeps values inside the range', () => {
      expect(clampInteger(3, range, 2)).toBe(3);
    });

    it('clamps to the bounds', () => {
      expect(clampInteger(-1, range, 2)).toBe(0);
      expect(clampInteger(9, range, 2)).toBe(5);
    });

    it('rounds fractional values', () => {
      expect(clampInteger(3.6, range, 2)).toBe(4);
    });

    it('returns the fallback for non-numbers and NaN', () => {
      expect(clampInteger('3', range, 2)).toBe(2);
      expect(clampInteger(NaN, range, 2)).toBe(2);
      expect(clampInteger(null, range, 2)).toBe(2);
    });
  });

  // ─── validateSettings ─────────────────────────────────────────────────

  describe('validateSettings', () => {
    it('returns defaults for non-object input', () => {
      expect(validateSettings(null)).toEqual(DEFAULT_SETTINGS);
      expect(validateSettings('string')).toEqual(DEFAULT_SETTINGS);
      expect(validateSettings([1, 2])).toEqual(DEFAULT_SETTINGS);
    });

    it('trims lastDirectory and maps blank to null', () => {
      expect(validateSettings({ lastDirectory: '  /music  ' }).lastDirectory).toBe('/music');
      expect(validateSettings({ lastDirectory: '   ' }).lastDirectory).toBeNull();
    });

    it('keeps the default interpreter and ffmpeg path when blank', () => {
      const result = validateSettings({ romanizerInterpreter: '', ffmpegPath: '  ' });
      expect(result.romanizerInterpreter).toBe('python3');
      expect(result.ffmpegPath).toBe('ffmpeg');
    });

    it('accepts a romanizer script path', () => {
      expect(validateSettings({ romanizerScriptPath: '/opt/romanize.py' }).romanizerScriptPath).toBe(
        '/opt/romanize.py',
      );
    });

    it('rejects unknown transcode formats', () => {
      expect(validateSettings({ transcodeFormat: 'wav' }).transcodeFormat).toBe('wav');
      expect(validateSettings({ transcodeFormat: 'mp3' }).transcodeFormat).toBe('flac');
    });

    it('clamps requestTimeout and maxRetries', () => {
      const result = validateSettings({ requestTimeout: 500, maxRetries: 12 });
      expect(result.requestTimeout).toBe(1000);
      expect(result.maxRetries).toBe(5);
    });

    it('rejects unknown log levels', () => {
      expect(validateSettings({ logLevel: 'WARN' }).logLevel).toBe('WARN');
      expect(validateSettings({ logLevel: 'DEBUG' }).logLevel).toBe('INFO');
    });

    it('ignores non-boolean flags', () => {
      const result = validateSettings({ replaceExistingCovers: 'yes', usePersistentCache: 1 });
      expect(result.replaceExistingCovers).toBe(false);
      expect(result.usePersistentCache).toBe(false);
    });

    it('returns a complete valid object unchanged', () => {
      const input: AppSettings = {
        lastDirectory: '/music',
        replaceExistingCovers: true,
        romanizerInterpreter: 'python',
        romanizerScriptPath: '/opt/romanize.py',
        ffmpegPath: '/usr/bin/ffmpeg',
        transcodeFormat: 'wav',
        usePersistentCache: true,
        requestTimeout: 5000,
        maxRetries: 0,
        logLevel: 'ERROR',
      };
      expect(validateSettings(input)).toEqual(input);
    });

    it('drops unknown fields', () => {
      const result = validateSettings({ unknownField: 'x' });
      expect(Object.keys(result).sort()).toEqual(Object.keys(DEFAULT_SETTINGS).sort());
    });
  });

  // ─── serialize / deserialize ──────────────────────────────────────────

  describe('serializeSettings / deserializeSettings', () => {
    it('serializes with 2-space indentation', () => {
      expect(serializeSettings(DEFAULT_SETTINGS)).toContain('\n  "lastDirectory": null');
    });

    it('parses an object', () => {
      expect(deserializeSettings('{"maxRetries": 3}')).toEqual({ maxRetries: 3 });
    });

    it('returns null for invalid JSON and non-object roots', () => {
      expect(deserializeSettings('not json')).toBeNull();
      expect(deserializeSettings('[1]')).toBeNull();
      expect(deserializeSettings('null')).toBeNull();
      expect(deserializeSettings('')).toBeNull();
    });
  });

  // ─── SettingsManager lifecycle ────────────────────────────────────────

  describe('lifecycle', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it('starts with defaults when no file exists', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.initialize();
      expect(manager.isInitialized()).toBe(true);
      expect(manager.get()).toEqual(DEFAULT_SETTINGS);
    });

    it('loads and validates an existing file', async () => {
      fs.writeFileSync(
        path.join(tempDir, 'settings.json'),
        JSON.stringify({ transcodeFormat: 'wav', maxRetries: 99 }),
      );
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.initialize();
      expect(manager.get().transcodeFormat).toBe('wav');
      expect(manager.get().maxRetries).toBe(5);
    });

    it('warns and keeps defaults for a corrupt file', async () => {
      fs.writeFileSync(path.join(tempDir, 'settings.json'), '{ broken');
      const logger = new Logger({ writeToFile: false });
      const manager = new SettingsManager({ settingsDir: tempDir, logger });
      await manager.initialize();
      expect(manager.get()).toEqual(DEFAULT_SETTINGS);
      expect(logger.getWarnings()).toHaveLength(1);
      expect(logger.getWarnings()[0].message).toBe('Settings file is not valid JSON, using defaults');
    });

    it('persists saved updates', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.initialize();
      const saved = await manager.save({ replaceExistingCovers: true });
      expect(saved.replaceExistingCovers).toBe(true);

      const reloaded = new SettingsManager({ settingsDir: tempDir });
      await reloaded.initialize();
      expect(reloaded.get().replaceExistingCovers).toBe(true);
    });

    it('returns copies from get()', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      const copy = manager.get();
      copy.maxRetries = 4;
      expect(manager.get().maxRetries).toBe(DEFAULT_SETTINGS.maxRetries);
    });

    it('resets to defaults', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.save({ logLevel: 'ERROR' });
      expect(await manager.reset()).toEqual(DEFAULT_SETTINGS);
    });

    it('notifies listeners and supports unsubscribe', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      const listener = vi.fn();
      const unsubscribe = manager.onChange(listener);
      await manager.save({ maxRetries: 1 });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0].maxRetries).toBe(1);

      unsubscribe();
      expect(manager.getListenerCount()).toBe(0);
      await manager.save({ maxRetries: 2 });
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('logs a throwing listener and keeps notifying the others', async () => {
      const logger = new Logger({ writeToFile: false });
      const manager = new SettingsManager({ settingsDir: tempDir, logger });
      const second = vi.fn();
      manager.onChange(() => {
        throw new Error('listener failed');
      });
      manager.onChange(second);
      await manager.save({ maxRetries: 3 });
      expect(second).toHaveBeenCalledTimes(1);
      expect(logger.getErrors()[0].message).toBe('listener failed');
    });
  });
});
