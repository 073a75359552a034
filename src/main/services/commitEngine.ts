/**
 * Commit Engine
 *
 * Reconciles one item's pending overlay with its persisted tags and writes
 * the result through the tag and file services. The overlay is cleared only
 * when every write the commit needed has succeeded.
 */

import type { MediaItem, Picture, Tags } from '../../shared/types';
import {
  clearPending,
  copyItem,
  copyTags,
  createTags,
  pendingValue,
  setTo,
  tagsEqual,
  withPending,
} from '../../shared/mediaItem';
import type { FileService, Romanizer, TagService } from './collaborators';
import type { BatchSession } from './batchSession';
import { mergeForSave } from './mergeEngine';
import { WriteError, errorMessage, wrapError } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────

export interface CommitResult {
  /** True when every write this commit needed succeeded */
  success: boolean;
  /** Updated item for the caller to store in place of the input */
  item: MediaItem;
  /** Whether a tag write was performed */
  wroteTags: boolean;
  /** Whether a lyrics sidecar was written */
  wroteSidecar: boolean;
}

export interface CommitEngineOptions {
  tagService: TagService;
  fileService: FileService;
  /** Null when romanization is not configured; romanize flags then keep the source text */
  romanizer?: Romanizer | null;
  logger?: Logger;
}

// ─── Helpers ─────────────────────────────────────────────────────────────

const IMAGE_SIGNATURES: ReadonlyArray<{ bytes: readonly number[]; mimeType: string }> = [
  { bytes: [0xff, 0xd8, 0xff], mimeType: 'image/jpeg' },
  { bytes: [0x89, 0x50, 0x4e, 0x47], mimeType: 'image/png' },
  { bytes: [0x47, 0x49, 0x46, 0x38], mimeType: 'image/gif' },
];

/**
 * MIME type of image bytes by magic number. Unrecognized data is reported as JPEG.
 */
export function detectImageMimeType(data: Buffer): string {
  const match = IMAGE_SIGNATURES.find(
    ({ bytes }) => data.length >= bytes.length && bytes.every((byte, i) => data[i] === byte),
  );
  return match?.mimeType ?? 'image/jpeg';
}

/** Builds the single front-cover picture that replaces a file's pictures. */
export function frontCover(data: Buffer): Picture {
  return { pictureType: 'front_cover', mimeType: detectImageMimeType(data), data };
}

// ─── CommitEngine ────────────────────────────────────────────────────────

export class CommitEngine {
  private readonly tagService: TagService;
  private readonly fileService: FileService;
  private readonly romanizer: Romanizer | null;
  private readonly logger: Logger | null;

  constructor(options: CommitEngineOptions) {
    this.tagService = options.tagService;
    this.fileService = options.fileService;
    this.romanizer = options.romanizer ?? null;
    this.logger = options.logger ?? null;
  }

  /**
   * Persists the item's pending lyrics, cover and sidecar request.
   */
  async commit(item: MediaItem): Promise<CommitResult> {
    const loaded = await this.resolveCurrent(item);
    const current = loaded.tags ?? createTags();
    return this.persistOverlay(loaded, current, current);
  }

  /**
   * Persists one batch member: the template's dirty fields are merged into
   * the file's tags, then the item's overlay (seeded from the session) is
   * applied on top of the merged tags. The result goes out in one write.
   */
  async commitBatchItem(item: MediaItem, session: BatchSession): Promise<CommitResult> {
    const template = session.template;
    const sessionLyrics = session.pendingLyricsFor(item.path);

    let seeded = withPending(item, {
      extractLyrics: template.pending.extractLyrics,
      romanize: template.pending.romanize,
    });
    if (sessionLyrics !== null && item.pending.lyrics.kind === 'unset') {
      seeded = withPending(seeded, { lyrics: setTo(sessionLyrics) });
    }
    if (item.pending.cover.kind === 'unset' && template.pending.cover.kind === 'set') {
      seeded = withPending(seeded, { cover: template.pending.cover });
    }

    const loaded = await this.resolveCurrent(seeded);
    const current = loaded.tags ?? createTags();
    const merged = mergeForSave(current, template.tags ?? createTags(), session.dirtyFields);
    const result = await this.persistOverlay(loaded, merged, current);

    if (result.success) {
      session.removePendingLyrics(item.path);
      return result;
    }
    return { ...result, item: restoreOverlay(result.item, item) };
  }

  // ─── Steps ─────────────────────────────────────────────────────────

  /** Loaded item, or the item read through the tag service. */
  private async resolveCurrent(item: MediaItem): Promise<MediaItem> {
    if (item.tags) return item;
    try {
      const read = await this.tagService.readTags(item);
      return withPending(read, item.pending);
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'FileReadError', { filePath: item.path, step: 'commit' }));
      return item;
    }
  }

  /**
   * Applies the overlay on top of `baseTags`, writes when the candidate moves
   * away from `currentTags` (the tags on disk) or a cover is set, writes the
   * sidecar when requested, and clears the overlay on success.
   */
  private async persistOverlay(item: MediaItem, baseTags: Tags, currentTags: Tags): Promise<CommitResult> {
    const lyrics = await this.resolveLyrics(item, baseTags);
    const { cover } = item.pending;

    let pictures = baseTags.pictures;
    if (cover.kind === 'set') {
      pictures = [frontCover(cover.value)];
    } else if (cover.kind === 'cleared') {
      pictures = [];
    }

    const candidate = copyTags(baseTags, { lyrics, pictures });
    const needsWrite =
      !tagsEqual(baseTags, currentTags) ||
      lyrics !== baseTags.lyrics ||
      cover.kind === 'set' ||
      (cover.kind === 'cleared' && baseTags.pictures.length > 0);

    let wroteTags = false;
    if (needsWrite) {
      if (!(await this.writeTags(item, candidate))) {
        return { success: false, item, wroteTags: false, wroteSidecar: false };
      }
      wroteTags = true;
    }

    let wroteSidecar = false;
    if (item.pending.extractLyrics && lyrics !== null && lyrics.length > 0) {
      wroteSidecar = await this.writeSidecar(item, lyrics);
      if (!wroteSidecar) {
        // Tags already written stay written; the overlay is kept for a retry.
        const written = wroteTags ? copyItem(item, { tags: candidate }) : item;
        return { success: false, item: written, wroteTags, wroteSidecar: false };
      }
    }

    const refreshed = await this.reload(copyItem(item, { tags: candidate }));
    return { success: true, item: clearPending(refreshed), wroteTags, wroteSidecar };
  }

  /**
   * The lyrics to persist. With the romanize flag, the pending (or current)
   * text is romanized, falling back to the source when romanization yields nothing.
   */
  private async resolveLyrics(item: MediaItem, baseTags: Tags): Promise<string | null> {
    const pending = item.pending.lyrics;
    const source = pending.kind === 'unset' ? baseTags.lyrics : pendingValue(pending);

    if (!item.pending.romanize || source === null || source.length === 0) {
      return source;
    }
    return (await this.romanize(item, source)) ?? source;
  }

  private async romanize(item: MediaItem, text: string): Promise<string | null> {
    if (!this.romanizer) return null;
    try {
      return await this.romanizer.romanize(text);
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'LookupError', { filePath: item.path, step: 'romanize' }));
      return null;
    }
  }

  private async writeTags(item: MediaItem, tags: Tags): Promise<boolean> {
    try {
      const ok = await this.tagService.writeTags(item, tags);
      if (!ok) {
        this.logger?.logError(new WriteError('Tag write failed', { filePath: item.path, step: 'commit' }));
      }
      return ok;
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'WriteError', { filePath: item.path, step: 'commit' }));
      return false;
    }
  }

  private async writeSidecar(item: MediaItem, lyrics: string): Promise<boolean> {
    try {
      const ok = await this.fileService.writeLyricsSidecar(item, lyrics);
      if (!ok) {
        this.logger?.logError(
          new WriteError('Lyrics sidecar write failed', { filePath: item.path, step: 'sidecar' }),
        );
      }
      return ok;
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'WriteError', { filePath: item.path, step: 'sidecar' }));
      return false;
    }
  }

  /** Re-reads tags after a commit. On failure the written candidate stays in memory. */
  private async reload(item: MediaItem): Promise<MediaItem> {
    try {
      const read = await this.tagService.readTags(item);
      return withPending(read, item.pending);
    } catch (error: unknown) {
      this.logger?.warn(`Re-read after commit failed: ${errorMessage(error)}`, {
        filePath: item.path,
        step: 'commit',
      });
      return item;
    }
  }
}

/** Keeps the caller's original overlay (and status) on a failed batch commit. */
function restoreOverlay(item: MediaItem, original: MediaItem): MediaItem {
  return withPending(item, original.pending);
}
