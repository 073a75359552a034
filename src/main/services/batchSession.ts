/**
 * Batch Session
 *
 * Holds the state of one batch-mode session: the file list, the template,
 * path-keyed pending lyrics, the dirty-field set and the busy gate. A session
 * is created when batch mode is enabled and dropped when it is disabled.
 */

import type { BatchTemplate, DirtyField, MediaItem } from '../../shared/types';
import { createMediaItem, copyItem } from '../../shared/mediaItem';
import { seedTemplateTags } from './mergeEngine';

export class BatchSession {
  private files: MediaItem[];
  private templateItem: BatchTemplate;
  private readonly lyricsByPath = new Map<string, string>();
  private dirty = new Set<DirtyField>();
  private busy = false;

  constructor(files: readonly MediaItem[]) {
    this.files = [...files];
    this.templateItem = copyItem(createMediaItem(''), {
      name: '',
      tags: seedTemplateTags(files[0]?.tags ?? null),
    });
  }

  // ─── Files ────────────────────────────────────────────────────────────

  get items(): readonly MediaItem[] {
    return this.files;
  }

  get size(): number {
    return this.files.length;
  }

  itemAt(index: number): MediaItem {
    return this.files[index];
  }

  /** Replaces the item at `index`. Out-of-range indexes are ignored. */
  replaceAt(index: number, item: MediaItem): void {
    if (index < 0 || index >= this.files.length) return;
    this.files = this.files.map((existing, i) => (i === index ? item : existing));
  }

  /** Replaces the item with the same path, if any. */
  replaceByPath(item: MediaItem): void {
    this.replaceAt(
      this.files.findIndex((existing) => existing.path === item.path),
      item,
    );
  }

  // ─── Template ─────────────────────────────────────────────────────────

  get template(): BatchTemplate {
    return this.templateItem;
  }

  set template(template: BatchTemplate) {
    this.templateItem = template;
  }

  get dirtyFields(): ReadonlySet<DirtyField> {
    return this.dirty;
  }

  set dirtyFields(fields: ReadonlySet<DirtyField>) {
    this.dirty = new Set(fields);
  }

  // ─── Pending lyrics ───────────────────────────────────────────────────

  pendingLyricsFor(filePath: string): string | null {
    return this.lyricsByPath.get(filePath) ?? null;
  }

  setPendingLyrics(filePath: string, lyrics: string): void {
    this.lyricsByPath.set(filePath, lyrics);
  }

  removePendingLyrics(filePath: string): void {
    this.lyricsByPath.delete(filePath);
  }

  get pendingLyricsCount(): number {
    return this.lyricsByPath.size;
  }

  // ─── Busy gate ────────────────────────────────────────────────────────

  get isBusy(): boolean {
    return this.busy;
  }

  /** Marks the session busy. Returns false when it already was. */
  tryAcquire(): boolean {
    if (this.busy) return false;
    this.busy = true;
    return true;
  }

  release(): void {
    this.busy = false;
  }
}
