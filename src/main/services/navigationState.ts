/**
 * Navigation and Selection State
 *
 * Framework-agnostic state holder for the editor: the browsed directory level,
 * the selected file, the search filter, single-file pending edits and the
 * batch session. Batch pipelines and commits are delegated to the
 * orchestrator and commit engine; this class only owns the item lists and
 * replaces entries after each operation.
 *
 * States: no directory → browsing (scanDirectory) ⇄ batch-active (toggleBatchMode).
 */

import * as path from 'path';
import type {
  BatchTemplate,
  DirtyField,
  MediaItem,
  PipelineSummary,
  ProgressUpdate,
  Tags,
} from '../../shared/types';
import {
  cleared,
  clearPending,
  copyItem,
  createMediaItem,
  createTags,
  EMPTY_OVERLAY,
  pendingValue,
  setTo,
  unset,
  withPending,
} from '../../shared/mediaItem';
import type {
  CoverLookup,
  FileService,
  LyricsLookup,
  Romanizer,
  TagService,
  Transcoder,
} from './collaborators';
import { BatchSession } from './batchSession';
import { CommitEngine } from './commitEngine';
import { EnrichmentOrchestrator, FetchCoversOptions } from './enrichmentOrchestrator';
import { analyzeSharedFields, applyTemplateEdit, SharedFieldAnalysis, TemplateEdit } from './mergeEngine';
import { errorMessage, wrapError } from './errors';
import type { Logger } from './logger';

// ─── Types ───────────────────────────────────────────────────────────────────

export type NavigationMode = 'none' | 'browsing' | 'batch';

/** Target of a delete operation */
export type DeleteTarget =
  | { kind: 'directory'; path: string }
  | { kind: 'media'; item: MediaItem };

export interface Breadcrumb {
  name: string;
  path: string;
}

/** Read-only view of the batch session */
export interface BatchSnapshot {
  files: readonly MediaItem[];
  template: BatchTemplate;
  dirtyFields: DirtyField[];
  busy: boolean;
  pendingLyricsCount: number;
}

/** State published to observers after every atomic step */
export interface NavigationSnapshot {
  mode: NavigationMode;
  rootDirectory: string | null;
  currentDirectory: string | null;
  subdirectories: readonly string[];
  files: readonly MediaItem[];
  selectedFile: MediaItem | null;
  searchQuery: string;
  isLoading: boolean;
  batch: BatchSnapshot | null;
}

export type NavigationListener = (snapshot: NavigationSnapshot) => void;
export type ProgressListener = (update: ProgressUpdate) => void;

export interface NavigationStateOptions {
  fileService: FileService;
  tagService: TagService;
  lyricsLookup: LyricsLookup;
  coverLookup: CoverLookup;
  transcoder: Transcoder;
  romanizer?: Romanizer | null;
  replaceExistingCovers?: boolean;
  /** Called with every directory opened by scanDirectory, e.g. to remember it */
  onRootOpened?: (dirPath: string) => Promise<void>;
  logger?: Logger;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Whether the item's title, artist or album contains `query` (case-insensitive).
 * An empty query matches everything.
 */
export function matchesQuery(item: MediaItem, query: string): boolean {
  const needle = query.trim().toLowerCase();
  if (needle.length === 0) return true;
  const tags = item.tags;
  if (!tags) return false;
  return [tags.title, tags.trackArtist, tags.album].some(
    (value) => value !== null && value.toLowerCase().includes(needle),
  );
}

// ─── NavigationState ─────────────────────────────────────────────────────────

export class NavigationState {
  private readonly fileService: FileService;
  private readonly tagService: TagService;
  private readonly romanizer: Romanizer | null;
  private readonly onRootOpened: ((dirPath: string) => Promise<void>) | null;
  private readonly logger: Logger | null;
  private readonly commitEngine: CommitEngine;
  private readonly orchestrator: EnrichmentOrchestrator;

  private rootDirectory: string | null = null;
  private currentDirectory: string | null = null;
  private subdirectories: string[] = [];
  private files: MediaItem[] = [];
  private selectedPath: string | null = null;
  private searchQuery = '';
  private isLoading = false;
  private session: BatchSession | null = null;
  /** Bumped by every toggle; an enable whose generation is stale drops its session. */
  private batchGeneration = 0;

  private readonly listeners: NavigationListener[] = [];
  private readonly progressListeners: ProgressListener[] = [];

  constructor(options: NavigationStateOptions) {
    this.fileService = options.fileService;
    this.tagService = options.tagService;
    this.romanizer = options.romanizer ?? null;
    this.onRootOpened = options.onRootOpened ?? null;
    this.logger = options.logger ?? null;

    this.commitEngine = new CommitEngine({
      tagService: options.tagService,
      fileService: options.fileService,
      romanizer: this.romanizer,
      logger: options.logger,
    });
    this.orchestrator = new EnrichmentOrchestrator({
      tagService: options.tagService,
      lyricsLookup: options.lyricsLookup,
      coverLookup: options.coverLookup,
      transcoder: options.transcoder,
      commitEngine: this.commitEngine,
      romanizer: this.romanizer,
      replaceExistingCovers: options.replaceExistingCovers,
      logger: options.logger,
      onChange: () => this.emit(),
      onProgress: (update) => this.emitProgress(update),
    });
  }

  // ─── Observers ─────────────────────────────────────────────────────────

  /** Registers a state listener. Returns an unsubscribe function. */
  onChange(listener: NavigationListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  /** Registers a batch progress listener. Returns an unsubscribe function. */
  onProgress(listener: ProgressListener): () => void {
    this.progressListeners.push(listener);
    return () => {
      const index = this.progressListeners.indexOf(listener);
      if (index >= 0) this.progressListeners.splice(index, 1);
    };
  }

  getSnapshot(): NavigationSnapshot {
    return {
      mode: this.mode,
      rootDirectory: this.rootDirectory,
      currentDirectory: this.currentDirectory,
      subdirectories: [...this.subdirectories],
      files: [...this.files],
      selectedFile: this.selectedFile,
      searchQuery: this.searchQuery,
      isLoading: this.isLoading,
      batch: this.session
        ? {
            files: [...this.session.items],
            template: this.session.template,
            dirtyFields: [...this.session.dirtyFields],
            busy: this.session.isBusy,
            pendingLyricsCount: this.session.pendingLyricsCount,
          }
        : null,
    };
  }

  get mode(): NavigationMode {
    if (this.session) return 'batch';
    return this.currentDirectory === null ? 'none' : 'browsing';
  }

  get selectedFile(): MediaItem | null {
    return this.files.find((file) => file.path === this.selectedPath) ?? null;
  }

  get batchSession(): BatchSession | null {
    return this.session;
  }

  // ─── Directory navigation ──────────────────────────────────────────────

  /** Opens `dirPath` as the new root and lists its first level. */
  async scanDirectory(dirPath: string): Promise<void> {
    this.rootDirectory = dirPath;
    await this.navigateToDirectory(dirPath);
    if (this.onRootOpened) {
      try {
        await this.onRootOpened(dirPath);
      } catch (error: unknown) {
        this.logger?.warn(`Could not remember directory: ${errorMessage(error)}`, {
          filePath: dirPath,
          step: 'scan',
        });
      }
    }
  }

  /** Lists `dirPath` under the current root and loads every file's tags. */
  async navigateToDirectory(dirPath: string): Promise<void> {
    if (this.rootDirectory === null) {
      this.rootDirectory = dirPath;
    }
    this.currentDirectory = dirPath;
    this.selectedPath = null;
    await this.loadCurrentLevel();
  }

  /** Moves to the parent directory. No-op at the root. */
  async navigateUp(): Promise<void> {
    if (this.currentDirectory === null || this.currentDirectory === this.rootDirectory) return;
    await this.navigateToDirectory(path.dirname(this.currentDirectory));
  }

  /** Path segments from the root to the current directory. */
  breadcrumbs(): Breadcrumb[] {
    const root = this.rootDirectory;
    const current = this.currentDirectory;
    if (root === null || current === null) return [];

    const crumbs: Breadcrumb[] = [{ name: path.basename(root) || root, path: root }];
    const relative = path.relative(root, current);
    if (relative.length === 0 || relative.startsWith('..')) return crumbs;

    let cursor = root;
    for (const segment of relative.split(path.sep)) {
      cursor = path.join(cursor, segment);
      crumbs.push({ name: segment, path: cursor });
    }
    return crumbs;
  }

  /** Navigates to the breadcrumb at `index`. No-op when out of range. */
  async navigateToBreadcrumb(index: number): Promise<void> {
    const crumbs = this.breadcrumbs();
    if (index < 0 || index >= crumbs.length) return;
    await this.navigateToDirectory(crumbs[index].path);
  }

  private async loadCurrentLevel(): Promise<void> {
    const dirPath = this.currentDirectory;
    if (dirPath === null) return;

    this.isLoading = true;
    this.emit();
    try {
      const listing = await this.fileService.listDirectory(dirPath);
      this.subdirectories = listing.subdirectories;
      this.files = listing.audioFiles.map(createMediaItem);
      this.emit();

      for (let i = 0; i < this.files.length; i++) {
        this.files[i] = await this.readThrough(this.files[i]);
      }
    } finally {
      this.isLoading = false;
      this.emit();
    }
  }

  /** Item with tags loaded; on failure the unloaded item, with the error logged. */
  private async readThrough(item: MediaItem): Promise<MediaItem> {
    if (item.tags) return item;
    try {
      return withPending(await this.tagService.readTags(item), item.pending);
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'FileReadError', { filePath: item.path }));
      return item;
    }
  }

  // ─── Selection & search ────────────────────────────────────────────────

  /** Selects a listed file (or clears the selection), loading its tags if needed. */
  async selectFile(item: MediaItem | null): Promise<void> {
    if (item === null) {
      this.selectedPath = null;
      this.emit();
      return;
    }
    const current = this.fileByPath(item.path);
    if (!current) return;

    this.selectedPath = current.path;
    this.emit();
    if (!current.tags) {
      this.replaceFile(await this.readThrough(current));
    }
  }

  setSearchQuery(query: string): void {
    this.searchQuery = query;
    this.emit();
  }

  filteredFiles(): MediaItem[] {
    return this.files.filter((file) => matchesQuery(file, this.searchQuery));
  }

  // ─── File operations ───────────────────────────────────────────────────

  /**
   * Deletes a directory or a media file, then lists the current directory
   * again. A deleted current directory lists as empty.
   */
  async deleteItem(target: DeleteTarget): Promise<boolean> {
    const targetPath = target.kind === 'directory' ? target.path : target.item.path;
    const deleted =
      target.kind === 'directory'
        ? await this.fileService.deleteDirectory(target.path)
        : await this.fileService.deleteFile(target.item.path);

    if (deleted && this.selectedPath === targetPath) {
      this.selectedPath = null;
    }
    if (!deleted) {
      this.logger?.warn('Delete failed', { filePath: targetPath, step: 'delete' });
    }
    await this.refreshCurrentLevel();
    return deleted;
  }

  /** Writes a full tag set to one file and re-reads it. */
  async updateTags(item: MediaItem, tags: Tags): Promise<boolean> {
    let written: boolean;
    try {
      written = await this.tagService.writeTags(item, tags);
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'WriteError', { filePath: item.path, step: 'update' }));
      written = false;
    }
    if (written) {
      await this.reloadFile(item);
    }
    return written;
  }

  /** Renames a file in place; its tags and pending edits follow it. */
  async renameFile(item: MediaItem, newName: string): Promise<boolean> {
    const current = this.fileByPath(item.path) ?? item;
    const newPath = await this.fileService.rename(current, newName);
    if (newPath === null) return false;

    const renamed = copyItem(current, { path: newPath, name: path.basename(newPath) });
    this.files = this.files.map((file) => (file.path === current.path ? renamed : file));
    if (this.selectedPath === current.path) {
      this.selectedPath = newPath;
    }
    this.emit();
    return true;
  }

  /** Re-reads one file's tags, keeping its pending edits. */
  async reloadFile(item: MediaItem): Promise<void> {
    const current = this.fileByPath(item.path) ?? item;
    try {
      this.replaceFile(withPending(await this.tagService.readTags(current), current.pending));
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'FileReadError', { filePath: item.path, step: 'reload' }));
    }
  }

  // ─── Single-file pending edits ─────────────────────────────────────────

  /**
   * Sets the pending cover. In batch mode it becomes the template cover
   * (null removes it); otherwise it applies to the selected file, where
   * null marks the embedded cover for removal.
   */
  setPendingCover(cover: Buffer | null): boolean {
    if (this.session) {
      this.session.template = withPending(this.session.template, {
        cover: cover === null ? unset() : setTo(cover),
      });
      this.emit();
      return true;
    }
    return this.updateSelected((item) =>
      withPending(item, { cover: cover === null ? cleared() : setTo(cover) }),
    );
  }

  /** Sets the selected file's pending lyrics; null marks them for removal. */
  setPendingLyrics(lyrics: string | null): boolean {
    return this.updateSelected((item) =>
      withPending(item, { lyrics: lyrics === null ? cleared() : setTo(lyrics) }),
    );
  }

  /** Drops the selected file's pending lyrics edit and its romanize preview. */
  discardPendingLyrics(): boolean {
    return this.updateSelected((item) => withPending(item, { lyrics: unset(), romanize: false }));
  }

  setExtractLyrics(extract: boolean): boolean {
    return this.updateSelected((item) => withPending(item, { extractLyrics: extract }));
  }

  /**
   * Turns romanization on or off for the selected file. Turning it on
   * previews the romanized text in the pending lyrics; turning it off
   * discards the pending lyrics.
   */
  async setRomanizeLyrics(romanize: boolean): Promise<boolean> {
    const selected = this.selectedFile;
    if (!selected) return false;

    if (!romanize) {
      return this.updateSelected((item) => withPending(item, { romanize: false, lyrics: unset() }));
    }

    this.updateSelected((item) => withPending(item, { romanize: true }));
    const source = pendingValue(selected.pending.lyrics) ?? selected.tags?.lyrics ?? '';
    if (source.length === 0 || !this.romanizer) return true;

    this.isLoading = true;
    this.emit();
    try {
      const romanized = await this.romanizer.romanize(source);
      if (romanized !== null) {
        this.replaceFile(withPending(this.fileByPath(selected.path) ?? selected, { lyrics: setTo(romanized) }));
      }
    } catch (error: unknown) {
      this.logger?.warn(`Romanization preview failed: ${errorMessage(error)}`, {
        filePath: selected.path,
        step: 'romanize',
      });
    } finally {
      this.isLoading = false;
      this.emit();
    }
    return true;
  }

  /** Commits the selected file (or `item`). The overlay is cleared only on success. */
  async savePendingChanges(item?: MediaItem): Promise<boolean> {
    const target = item ? this.fileByPath(item.path) ?? item : this.selectedFile;
    if (!target) return false;

    const result = await this.commitEngine.commit(target);
    this.replaceFile(result.item);
    if (!result.success) {
      this.logger?.warn('Save failed; pending changes kept', { filePath: target.path, step: 'commit' });
    }
    return result.success;
  }

  /** Drops every pending edit on the selected file. */
  discardPendingChanges(): boolean {
    return this.updateSelected(clearPending);
  }

  // ─── Batch mode ────────────────────────────────────────────────────────

  /**
   * Enabling snapshots every audio file under the current directory, loads
   * their tags and seeds a fresh template from the first file. Disabling
   * drops the session with every pending batch edit, and also cancels an
   * enable that is still loading. Of two overlapping enables the later wins.
   */
  async toggleBatchMode(enabled: boolean): Promise<void> {
    const generation = ++this.batchGeneration;
    if (!enabled) {
      if (this.session) {
        this.session = null;
        this.logger?.info('Batch mode disabled; pending batch edits discarded', { step: 'batch' });
        this.emit();
      }
      return;
    }
    const directory = this.currentDirectory;
    if (this.session || directory === null) return;

    this.isLoading = true;
    this.emit();
    try {
      const paths = await this.fileService.listAllFilesRecursive(directory);
      const items: MediaItem[] = [];
      for (const filePath of paths) {
        const listed = this.fileByPath(filePath);
        const fresh = listed
          ? withPending(listed, EMPTY_OVERLAY)
          : createMediaItem(filePath);
        items.push(await this.readThrough(fresh));
      }
      if (generation !== this.batchGeneration) {
        this.logger?.info('Batch mode enable superseded before loading finished', { step: 'batch' });
        return;
      }
      this.session = new BatchSession(items);
      this.logger?.info(`Batch mode enabled: ${items.length} files`, { step: 'batch' });
    } finally {
      this.isLoading = false;
      this.emit();
    }
  }

  /** Applies a shared-field edit to the template; edited fields become dirty. */
  updateBatchTemplate(edit: TemplateEdit): BatchTemplate | null {
    const session = this.session;
    if (!session) return null;

    const { tags, dirtyFields } = applyTemplateEdit(
      session.template.tags ?? createTags(),
      session.dirtyFields,
      edit,
    );
    session.template = copyItem(session.template, { tags });
    session.dirtyFields = dirtyFields;
    this.emit();
    return session.template;
  }

  setBatchRomanize(romanize: boolean): boolean {
    return this.updateTemplateFlags({ romanize });
  }

  setBatchExtract(extractLyrics: boolean): boolean {
    return this.updateTemplateFlags({ extractLyrics });
  }

  async fetchBatchLyrics(): Promise<PipelineSummary | null> {
    return this.session ? this.orchestrator.fetchLyrics(this.session) : null;
  }

  async fetchBatchCovers(options?: FetchCoversOptions): Promise<PipelineSummary | null> {
    return this.session ? this.orchestrator.fetchCovers(this.session, options) : null;
  }

  async transcodeBatch(): Promise<PipelineSummary | null> {
    return this.session ? this.orchestrator.transcode(this.session) : null;
  }

  /**
   * Commits every batch member with the template merged in, then lists the
   * current directory again to pick up the written tags.
   */
  async saveBatchChanges(): Promise<PipelineSummary | null> {
    const session = this.session;
    if (!session) return null;

    const summary = await this.orchestrator.saveAll(session);
    if (!summary.rejected) {
      await this.refreshCurrentLevel();
    }
    return summary;
  }

  /** Distribution of shared-field values across the batch. */
  analyzeBatch(): SharedFieldAnalysis | null {
    return this.session ? analyzeSharedFields(this.session.items) : null;
  }

  // ─── Private helpers ───────────────────────────────────────────────────

  private updateTemplateFlags(flags: { romanize?: boolean; extractLyrics?: boolean }): boolean {
    if (!this.session) return false;
    this.session.template = withPending(this.session.template, flags);
    this.emit();
    return true;
  }

  /** Lists the current level again, keeping the selection when the file still exists. */
  private async refreshCurrentLevel(): Promise<void> {
    const selected = this.selectedPath;
    await this.loadCurrentLevel();
    this.selectedPath = selected !== null && this.fileByPath(selected) ? selected : null;
    this.emit();
  }

  private fileByPath(filePath: string): MediaItem | undefined {
    return this.files.find((file) => file.path === filePath);
  }

  private replaceFile(item: MediaItem): void {
    this.files = this.files.map((file) => (file.path === item.path ? item : file));
    this.emit();
  }

  private updateSelected(update: (item: MediaItem) => MediaItem): boolean {
    const selected = this.selectedFile;
    if (!selected) return false;
    this.replaceFile(update(selected));
    return true;
  }

  private emit(): void {
    const snapshot = this.getSnapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error: unknown) {
        this.logger?.logError(error, { step: 'notify' });
      }
    }
  }

  private emitProgress(update: ProgressUpdate): void {
    for (const listener of this.progressListeners) {
      try {
        listener(update);
      } catch (error: unknown) {
        this.logger?.logError(error, { step: 'notify' });
      }
    }
  }
}
