/**
 * Media Item Model
 *
 * Constructors and copy helpers for the immutable entity types. Every
 * "mutation" returns a new value; inputs are never modified.
 */

import * as path from 'path';
import type { MediaItem, PendingField, PendingOverlay, Picture, Tags } from './types';

// ─── Pending Fields ──────────────────────────────────────────────────────────

const UNSET: PendingField<never> = { kind: 'unset' };
const CLEARED: PendingField<never> = { kind: 'cleared' };

export function unset<T>(): PendingField<T> {
  return UNSET;
}

export function setTo<T>(value: T): PendingField<T> {
  return { kind: 'set', value };
}

export function cleared<T>(): PendingField<T> {
  return CLEARED;
}

/** Returns the pending value, or null when the field is unset or cleared. */
export function pendingValue<T>(field: PendingField<T>): T | null {
  return field.kind === 'set' ? field.value : null;
}

/** Whether the field carries an edit (value or tombstone). */
export function isPending<T>(field: PendingField<T>): boolean {
  return field.kind !== 'unset';
}

// ─── Tags ────────────────────────────────────────────────────────────────────

export const EMPTY_OVERLAY: PendingOverlay = {
  lyrics: UNSET,
  cover: UNSET,
  extractLyrics: false,
  romanize: false,
  status: null,
  processing: false,
};

/** Creates a Tags value with every field empty, overriding any given fields. */
export function createTags(fields: Partial<Tags> = {}): Tags {
  return {
    title: null,
    trackArtist: null,
    album: null,
    albumArtist: null,
    year: null,
    genre: null,
    trackNumber: null,
    trackTotal: null,
    discNumber: null,
    discTotal: null,
    lyrics: null,
    pictures: [],
    ...fields,
  };
}

/** Returns a copy of `tags` with the given fields replaced. */
export function copyTags(tags: Tags, changes: Partial<Tags>): Tags {
  return { ...tags, ...changes };
}

function picturesEqual(a: readonly Picture[], b: readonly Picture[]): boolean {
  if (a.length !== b.length) return false;
  return a.every(
    (pic, i) =>
      pic.pictureType === b[i].pictureType &&
      pic.mimeType === b[i].mimeType &&
      pic.data.equals(b[i].data),
  );
}

/** Value equality over every tag field; pictures are compared byte for byte. */
export function tagsEqual(a: Tags | null, b: Tags | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return (
    a.title === b.title &&
    a.trackArtist === b.trackArtist &&
    a.album === b.album &&
    a.albumArtist === b.albumArtist &&
    a.year === b.year &&
    a.genre === b.genre &&
    a.trackNumber === b.trackNumber &&
    a.trackTotal === b.trackTotal &&
    a.discNumber === b.discNumber &&
    a.discTotal === b.discTotal &&
    a.lyrics === b.lyrics &&
    picturesEqual(a.pictures, b.pictures)
  );
}

// ─── Media Items ─────────────────────────────────────────────────────────────

/** Creates an unloaded media item for a scanned file. */
export function createMediaItem(filePath: string): MediaItem {
  return {
    path: filePath,
    name: path.basename(filePath),
    duration: null,
    tags: null,
    pending: EMPTY_OVERLAY,
  };
}

/** Returns a copy of `item` with the given fields replaced. */
export function copyItem(
  item: MediaItem,
  changes: Partial<Omit<MediaItem, 'pending'>>,
): MediaItem {
  return { ...item, ...changes };
}

/** Returns a copy of `item` with the given overlay fields replaced. */
export function withPending(item: MediaItem, changes: Partial<PendingOverlay>): MediaItem {
  return { ...item, pending: { ...item.pending, ...changes } };
}

/** Sets the batch status label and processing flag in one step. */
export function withStatus(item: MediaItem, status: string | null, processing: boolean): MediaItem {
  return withPending(item, { status, processing });
}

/**
 * Drops every pending edit and flag. The status label is kept so that
 * observers still see the outcome of the last batch step.
 */
export function clearPending(item: MediaItem): MediaItem {
  return withPending(item, {
    lyrics: UNSET,
    cover: UNSET,
    extractLyrics: false,
    romanize: false,
  });
}

/** Whether the item carries any edit that a commit would act on. */
export function hasPendingChanges(item: MediaItem): boolean {
  const { pending } = item;
  return (
    isPending(pending.lyrics) || isPending(pending.cover) || pending.extractLyrics || pending.romanize
  );
}

/** Filename without its extension. */
export function baseNameWithoutExtension(item: MediaItem): string {
  return path.basename(item.name, path.extname(item.name));
}
