/**
 * Tagsmith entry point
 *
 * `createTagEditor` is the composition root: it loads settings, opens the
 * logger and lookup caches, resolves the romanizer and ffmpeg paths once and
 * injects every collaborator into a NavigationState. Every scanned root is
 * remembered as `lastDirectory`.
 */

import * as path from 'path';
import type { AppSettings } from '../shared/types';
import type {
  CoverLookup,
  FileService,
  LyricsLookup,
  LyricsMatch,
  Romanizer,
  TagService,
  Transcoder,
} from './services/collaborators';
import { Logger } from './services/logger';
import { SettingsManager } from './services/settingsManager';
import { LocalFileService } from './services/fileService';
import { LocalTagService } from './services/tagService';
import { LrclibLyricsLookup } from './services/lyricsFetcher';
import { CoverArtLookup } from './services/coverFetcher';
import { ScriptRomanizer } from './services/romanizer';
import { FfmpegTranscoder } from './services/transcoder';
import {
  CacheDatabase,
  type CoverCache,
  type LyricsCache,
  MemoryLookupCache,
  PersistentCoverCache,
  PersistentLyricsCache,
} from './services/persistentCache';
import { NavigationState } from './services/navigationState';

export interface TagEditorOptions {
  /** Directory for settings, logs and the cache database. Defaults to the platform config dir */
  configDir?: string;
  /** Collaborator overrides, mainly for tests and embedding */
  fileService?: FileService;
  tagService?: TagService;
  lyricsLookup?: LyricsLookup;
  coverLookup?: CoverLookup;
  transcoder?: Transcoder;
  romanizer?: Romanizer | null;
  /** Whether the logger writes daily files. Defaults to true */
  writeLogFiles?: boolean;
}

export interface TagEditor {
  state: NavigationState;
  settings: SettingsManager;
  logger: Logger;
  /** Open cache database, when settings ask for a persistent cache */
  cacheDatabase: CacheDatabase | null;
  /** Scans the directory opened last time. False when there is none. */
  openLastDirectory(): Promise<boolean>;
  /** Releases the cache database */
  close(): void;
}

/** Absolute romanizer script path, or null when romanization is not configured. */
export function resolveScriptPath(settings: AppSettings, baseDir: string): string | null {
  if (settings.romanizerScriptPath === null) return null;
  return path.resolve(baseDir, settings.romanizerScriptPath);
}

function openCaches(
  settings: AppSettings,
  configDir: string | undefined,
  logger: Logger,
): { db: CacheDatabase | null; lyrics: LyricsCache; covers: CoverCache } {
  if (settings.usePersistentCache) {
    const db = new CacheDatabase({
      dbPath: configDir ? path.join(configDir, 'cache.db') : undefined,
    });
    try {
      db.initialize();
      return { db, lyrics: new PersistentLyricsCache(db), covers: new PersistentCoverCache(db) };
    } catch (error: unknown) {
      logger.logError(error, { filePath: db.getPath(), step: 'cache' });
      logger.warn('Persistent cache unavailable, using in-memory cache', { step: 'cache' });
    }
  }
  return {
    db: null,
    lyrics: new MemoryLookupCache<LyricsMatch>(),
    covers: new MemoryLookupCache<Buffer>(),
  };
}

/**
 * Builds a ready-to-use editor. Settings are read once; later settings
 * changes take effect on the next call.
 */
export async function createTagEditor(options: TagEditorOptions = {}): Promise<TagEditor> {
  const { configDir } = options;

  const bootLogger = new Logger({ writeToFile: false });
  const settings = new SettingsManager({ settingsDir: configDir, logger: bootLogger });
  await settings.initialize();
  const current = settings.get();

  const logger = new Logger({
    logDir: configDir ? path.join(configDir, 'logs') : undefined,
    minLevel: current.logLevel,
    writeToFile: options.writeLogFiles ?? true,
  });
  await logger.initialize();
  for (const entry of bootLogger.getWarnings()) {
    logger.warn(entry.message, { filePath: entry.filePath ?? undefined, step: entry.step ?? undefined });
  }

  const caches = openCaches(current, configDir, logger);
  const http = {
    requestTimeout: current.requestTimeout,
    maxRetries: current.maxRetries,
    logger,
  };

  const scriptPath = resolveScriptPath(current, configDir ?? settings.getSettingsDir());
  const romanizer =
    options.romanizer !== undefined
      ? options.romanizer
      : scriptPath !== null
        ? new ScriptRomanizer({
            interpreter: current.romanizerInterpreter,
            scriptPath,
            timeout: current.requestTimeout,
            logger,
          })
        : null;

  const state = new NavigationState({
    fileService: options.fileService ?? new LocalFileService(logger),
    tagService: options.tagService ?? new LocalTagService(logger),
    lyricsLookup: options.lyricsLookup ?? new LrclibLyricsLookup({ ...http, cache: caches.lyrics }),
    coverLookup: options.coverLookup ?? new CoverArtLookup({ ...http, cache: caches.covers }),
    transcoder:
      options.transcoder ??
      new FfmpegTranscoder({ ffmpegPath: current.ffmpegPath, format: current.transcodeFormat, logger }),
    romanizer,
    replaceExistingCovers: current.replaceExistingCovers,
    onRootOpened: async (dirPath) => {
      if (settings.get().lastDirectory !== dirPath) {
        await settings.save({ lastDirectory: dirPath });
      }
    },
    logger,
  });

  logger.info('Tag editor ready', { step: 'startup' });

  return {
    state,
    settings,
    logger,
    cacheDatabase: caches.db,
    async openLastDirectory(): Promise<boolean> {
      const { lastDirectory } = settings.get();
      if (lastDirectory === null) return false;
      await state.scanDirectory(lastDirectory);
      return true;
    },
    close(): void {
      caches.db?.close();
    },
  };
}

export * from '../shared/types';
export * from '../shared/mediaItem';
export * from './services/collaborators';
export * from './services/errors';
export { Logger } from './services/logger';
export { SettingsManager } from './services/settingsManager';
export { mergeForSave, analyzeSharedFields, applyTemplateEdit } from './services/mergeEngine';
export { BatchSession } from './services/batchSession';
export { CommitEngine } from './services/commitEngine';
export { EnrichmentOrchestrator } from './services/enrichmentOrchestrator';
export { NavigationState } from './services/navigationState';
