/**
 * Enrichment Orchestrator
 *
 * Runs the batch pipelines (lyrics, covers, transcode, save) over a batch
 * session. Items are processed one at a time in list order; every step
 * replaces the item in the session and fires the change callback, and every
 * finished item fires a progress update. One item's failure never stops the
 * loop.
 *
 * Only one pipeline runs per session at a time: a run started while the
 * session is busy returns a rejected summary without touching any item.
 */

import {
  BATCH_STATUS,
  BatchStatus,
  MediaItem,
  PipelineKind,
  PipelineSummary,
  ProgressUpdate,
} from '../../shared/types';
import { baseNameWithoutExtension, setTo, withPending, withStatus } from '../../shared/mediaItem';
import type {
  CoverLookup,
  LyricsLookup,
  Romanizer,
  TagService,
  Transcoder,
} from './collaborators';
import type { BatchSession } from './batchSession';
import type { CommitEngine } from './commitEngine';
import { ErrorCategory, wrapError } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface EnrichmentOrchestratorOptions {
  tagService: TagService;
  lyricsLookup: LyricsLookup;
  coverLookup: CoverLookup;
  transcoder: Transcoder;
  commitEngine: CommitEngine;
  /** Null when romanization is not configured */
  romanizer?: Romanizer | null;
  /** Default for fetchCovers when no replaceExisting flag is passed */
  replaceExistingCovers?: boolean;
  logger?: Logger;
  /** Called after every atomic step */
  onChange?: () => void;
  /** Called after every finished item */
  onProgress?: (update: ProgressUpdate) => void;
}

export interface FetchCoversOptions {
  /** Replace covers that are already embedded or pending */
  replaceExisting?: boolean;
}

type StepOutcome = 'succeeded' | 'skipped' | 'notFound' | 'failed';

/** Search key for a lyrics lookup */
export interface LyricsSearchKey {
  artist: string;
  title: string;
  album: string | null;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function firstFilled(...values: Array<string | null | undefined>): string | null {
  for (const value of values) {
    if (value) return value;
  }
  return null;
}

/**
 * Derives the lyrics search key, falling back to the template's artist and
 * album and to the filename for the title. Null when artist or title is empty.
 */
export function lyricsSearchKey(item: MediaItem, template: MediaItem): LyricsSearchKey | null {
  const tags = item.tags;
  const artist = firstFilled(tags?.trackArtist, tags?.albumArtist, template.tags?.trackArtist);
  const title = firstFilled(tags?.title, baseNameWithoutExtension(item));
  const album = firstFilled(tags?.album, template.tags?.album);
  if (!artist || !title) return null;
  return { artist, title, album };
}

function emptySummary(pipeline: PipelineKind, total: number): PipelineSummary {
  return { pipeline, total, succeeded: 0, skipped: 0, notFound: 0, failed: 0, rejected: false };
}

// ─── EnrichmentOrchestrator ──────────────────────────────────────────────────

export class EnrichmentOrchestrator {
  private readonly tagService: TagService;
  private readonly lyricsLookup: LyricsLookup;
  private readonly coverLookup: CoverLookup;
  private readonly transcoder: Transcoder;
  private readonly commitEngine: CommitEngine;
  private readonly romanizer: Romanizer | null;
  private readonly replaceExistingCovers: boolean;
  private readonly logger: Logger | null;
  private readonly onChange: (() => void) | null;
  private readonly onProgress: ((update: ProgressUpdate) => void) | null;

  constructor(options: EnrichmentOrchestratorOptions) {
    this.tagService = options.tagService;
    this.lyricsLookup = options.lyricsLookup;
    this.coverLookup = options.coverLookup;
    this.transcoder = options.transcoder;
    this.commitEngine = options.commitEngine;
    this.romanizer = options.romanizer ?? null;
    this.replaceExistingCovers = options.replaceExistingCovers ?? false;
    this.logger = options.logger ?? null;
    this.onChange = options.onChange ?? null;
    this.onProgress = options.onProgress ?? null;
  }

  // ─── Pipelines ─────────────────────────────────────────────────────────

  /**
   * Looks up lyrics for every item, romanizing them when the template's
   * romanize flag is set. Results land in the item's pending lyrics and in
   * the session's path-keyed lyrics map.
   */
  fetchLyrics(session: BatchSession): Promise<PipelineSummary> {
    return this.run(session, 'lyrics', async (index) => {
      this.setStatus(session, index, BATCH_STATUS.FINDING_LYRICS);
      const item = await this.ensureLoaded(session, index);

      const key = lyricsSearchKey(item, session.template);
      if (!key) {
        this.logger?.logSkippedFile(item.path, 'no artist or title', 'lyrics');
        return this.finish(session, index, BATCH_STATUS.SKIPPED_NO_METADATA, 'skipped');
      }

      try {
        const match = await this.lyricsLookup.findBestMatch(
          key.artist,
          key.title,
          key.album,
          item.duration,
        );
        const lyrics = match ? firstFilled(match.syncedLyrics, match.plainLyrics) : null;
        if (!lyrics) {
          return this.finish(session, index, BATCH_STATUS.NOT_FOUND, 'notFound');
        }

        let finalLyrics = lyrics;
        if (session.template.pending.romanize && this.romanizer) {
          this.setStatus(session, index, BATCH_STATUS.ROMANIZING);
          finalLyrics = (await this.romanizer.romanize(lyrics)) ?? lyrics;
        }

        session.setPendingLyrics(item.path, finalLyrics);
        session.replaceAt(index, withPending(session.itemAt(index), { lyrics: setTo(finalLyrics) }));
        return this.finish(session, index, BATCH_STATUS.DONE, 'succeeded');
      } catch (error: unknown) {
        return this.fail(session, index, error, 'LookupError', 'lyrics', BATCH_STATUS.ERROR);
      }
    });
  }

  /**
   * Looks up cover art for every item that has none (or for every item when
   * replacing). Image bytes land in the item's pending cover.
   */
  fetchCovers(session: BatchSession, options?: FetchCoversOptions): Promise<PipelineSummary> {
    const replaceExisting = options?.replaceExisting ?? this.replaceExistingCovers;

    return this.run(session, 'covers', async (index) => {
      this.setStatus(session, index, BATCH_STATUS.FINDING_COVER);
      const item = await this.ensureLoaded(session, index);

      const hasCover = (item.tags?.pictures.length ?? 0) > 0 || item.pending.cover.kind === 'set';
      if (hasCover && !replaceExisting) {
        return this.finish(session, index, BATCH_STATUS.SKIPPED_HAS_COVER, 'skipped');
      }

      const artist = firstFilled(item.tags?.trackArtist, item.tags?.albumArtist);
      const album = firstFilled(item.tags?.album);
      if (!artist || !album) {
        this.logger?.logSkippedFile(item.path, 'no artist or album', 'covers');
        return this.finish(session, index, BATCH_STATUS.SKIPPED_NO_METADATA, 'skipped');
      }

      try {
        const cover = await this.coverLookup.fetchCover(artist, album);
        if (!cover) {
          return this.finish(session, index, BATCH_STATUS.NOT_FOUND, 'notFound');
        }
        session.replaceAt(index, withPending(session.itemAt(index), { cover: setTo(cover) }));
        return this.finish(session, index, BATCH_STATUS.DONE, 'succeeded');
      } catch (error: unknown) {
        return this.fail(session, index, error, 'LookupError', 'covers', BATCH_STATUS.ERROR);
      }
    });
  }

  /** Converts every item with the transcoder. */
  transcode(session: BatchSession): Promise<PipelineSummary> {
    return this.run(session, 'transcode', async (index) => {
      this.setStatus(session, index, BATCH_STATUS.CONVERTING);
      try {
        const produced = await this.transcoder.convert(session.itemAt(index));
        if (!produced) {
          return this.finish(session, index, BATCH_STATUS.CONVERSION_FAILED, 'failed');
        }
        this.logger?.info(`Converted to ${produced}`, {
          filePath: session.itemAt(index).path,
          step: 'transcode',
        });
        return this.finish(session, index, BATCH_STATUS.CONVERTED, 'succeeded');
      } catch (error: unknown) {
        return this.fail(
          session,
          index,
          error,
          'TranscodeError',
          'transcode',
          BATCH_STATUS.CONVERSION_FAILED,
        );
      }
    });
  }

  /**
   * Commits every item with the template merged in. Each item ends as
   * "Saved" or "Save failed" according to its own commit result.
   */
  saveAll(session: BatchSession): Promise<PipelineSummary> {
    return this.run(session, 'save', async (index) => {
      this.setStatus(session, index, BATCH_STATUS.SAVING);
      const result = await this.commitEngine.commitBatchItem(session.itemAt(index), session);
      session.replaceAt(index, result.item);
      return result.success
        ? this.finish(session, index, BATCH_STATUS.SAVED, 'succeeded')
        : this.finish(session, index, BATCH_STATUS.SAVE_FAILED, 'failed');
    });
  }

  // ─── Loop ──────────────────────────────────────────────────────────────

  private async run(
    session: BatchSession,
    pipeline: PipelineKind,
    step: (index: number) => Promise<StepOutcome>,
  ): Promise<PipelineSummary> {
    const summary = emptySummary(pipeline, session.size);

    if (!session.tryAcquire()) {
      this.logger?.warn(`Batch ${pipeline} rejected: another batch operation is running`, {
        step: pipeline,
      });
      return { ...summary, rejected: true };
    }

    this.logger?.info(`Batch ${pipeline} started: ${session.size} files`, { step: pipeline });
    try {
      for (let index = 0; index < session.size; index++) {
        const outcome = await step(index);
        summary[outcome]++;
        this.emitProgress(summary, index + 1, session.itemAt(index).name);
      }
    } finally {
      session.release();
      this.onChange?.();
    }

    this.logger?.info(
      `Batch ${pipeline} finished: ${summary.succeeded} succeeded, ${summary.skipped} skipped, ` +
        `${summary.notFound} not found, ${summary.failed} failed`,
      { step: pipeline },
    );
    return summary;
  }

  // ─── Step helpers ──────────────────────────────────────────────────────

  private setStatus(session: BatchSession, index: number, status: BatchStatus): void {
    session.replaceAt(index, withStatus(session.itemAt(index), status, true));
    this.onChange?.();
  }

  private finish(
    session: BatchSession,
    index: number,
    status: BatchStatus,
    outcome: StepOutcome,
  ): StepOutcome {
    session.replaceAt(index, withStatus(session.itemAt(index), status, false));
    this.onChange?.();
    return outcome;
  }

  private fail(
    session: BatchSession,
    index: number,
    error: unknown,
    category: ErrorCategory,
    step: string,
    status: BatchStatus,
  ): StepOutcome {
    this.logger?.logError(wrapError(error, category, { filePath: session.itemAt(index).path, step }));
    return this.finish(session, index, status, 'failed');
  }

  /**
   * Reads tags and duration for an unloaded item and stores the result in the
   * session. A read failure is logged and the item stays unloaded.
   */
  private async ensureLoaded(session: BatchSession, index: number): Promise<MediaItem> {
    const item = session.itemAt(index);
    if (item.tags) return item;
    try {
      const read = await this.tagService.readTags(item);
      const loaded = withPending(read, item.pending);
      session.replaceAt(index, loaded);
      return loaded;
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'FileReadError', { filePath: item.path, step: 'reading' }));
      return item;
    }
  }

  private emitProgress(summary: PipelineSummary, processedFiles: number, currentFile: string): void {
    this.onProgress?.({
      pipeline: summary.pipeline,
      totalFiles: summary.total,
      processedFiles,
      successCount: summary.succeeded,
      errorCount: summary.failed,
      skippedCount: summary.skipped,
      notFoundCount: summary.notFound,
      currentFile,
    });
  }
}
