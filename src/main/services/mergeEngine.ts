/**
 * Merge Engine
 *
 * Pure functions that layer a batch template's dirty fields over a file's
 * persisted tags, and that build and edit the template itself.
 */

import {
  DirtyField,
  MediaItem,
  SHARED_FIELDS,
  SHARED_FIELD_KEYS,
  Tags,
} from '../../shared/types';
import { copyTags, createTags } from '../../shared/mediaItem';

/** A partial edit of the template's shared fields, as entered by the user */
export interface TemplateEdit {
  artist?: string | null;
  album?: string | null;
  albumArtist?: string | null;
  genre?: string | null;
  /** Free text; parsed as an integer */
  year?: string | number | null;
}

/** Result of applying a TemplateEdit */
export interface TemplateUpdate {
  tags: Tags;
  dirtyFields: ReadonlySet<DirtyField>;
}

/** One distinct value of a shared field and the files carrying it */
export interface FieldValueGroup {
  /** The value, or null for files where the field is not set */
  value: string | null;
  files: string[];
}

export type SharedFieldAnalysis = Record<DirtyField, FieldValueGroup[]>;

function isFilled(value: string | number | null): boolean {
  return value !== null && value !== '';
}

/**
 * Computes the tags to persist for one batch member.
 *
 * Shared fields come from the template only when dirty and non-empty.
 * Everything else, including per-file-unique fields, lyrics and pictures,
 * comes from `current`.
 */
export function mergeForSave(
  current: Tags,
  template: Tags,
  dirtyFields: ReadonlySet<DirtyField>,
): Tags {
  const year = dirtyFields.has('year') && isFilled(template.year) ? template.year : current.year;

  return copyTags(current, {
    trackArtist: pickShared('artist', current, template, dirtyFields),
    album: pickShared('album', current, template, dirtyFields),
    albumArtist: pickShared('albumArtist', current, template, dirtyFields),
    genre: pickShared('genre', current, template, dirtyFields),
    year,
  });
}

function pickShared(
  field: Exclude<DirtyField, 'year'>,
  current: Tags,
  template: Tags,
  dirtyFields: ReadonlySet<DirtyField>,
): string | null {
  const key = SHARED_FIELD_KEYS[field];
  const value = template[key];
  return dirtyFields.has(field) && isFilled(value) ? value : current[key];
}

/**
 * Seeds template tags from the first batch member. Per-file-unique fields
 * and lyrics start empty.
 */
export function seedTemplateTags(first: Tags | null): Tags {
  if (!first) return createTags();
  return createTags({
    trackArtist: first.trackArtist,
    album: first.album,
    albumArtist: first.albumArtist,
    year: first.year,
    genre: first.genre,
    pictures: first.pictures,
  });
}

/**
 * Parses a year entered as text. Leading digits are taken ("1999-03" is 1999);
 * anything without them is null.
 */
export function parseYear(value: string | number | null): number | null {
  if (value === null) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  const parsed = parseInt(value.trim(), 10);
  return Number.isNaN(parsed) ? null : parsed;
}

/** Empty strings are stored as null so that they never win a merge. */
function normalizeText(value: string | null): string | null {
  return value === null || value === '' ? null : value;
}

/**
 * Applies a user edit to the template. Every field named in the edit becomes
 * dirty, including fields set to empty.
 */
export function applyTemplateEdit(
  template: Tags,
  dirtyFields: ReadonlySet<DirtyField>,
  edit: TemplateEdit,
): TemplateUpdate {
  const changes: { -readonly [K in keyof Tags]?: Tags[K] } = {};
  const dirty = new Set(dirtyFields);

  if (edit.artist !== undefined) {
    changes.trackArtist = normalizeText(edit.artist);
    dirty.add('artist');
  }
  if (edit.album !== undefined) {
    changes.album = normalizeText(edit.album);
    dirty.add('album');
  }
  if (edit.albumArtist !== undefined) {
    changes.albumArtist = normalizeText(edit.albumArtist);
    dirty.add('albumArtist');
  }
  if (edit.genre !== undefined) {
    changes.genre = normalizeText(edit.genre);
    dirty.add('genre');
  }
  if (edit.year !== undefined) {
    changes.year = parseYear(edit.year);
    dirty.add('year');
  }

  return { tags: copyTags(template, changes), dirtyFields: dirty };
}

/**
 * Groups the batch's files by the value of each shared field, largest group
 * first. Items whose tags are not loaded are left out.
 */
export function analyzeSharedFields(items: readonly MediaItem[]): SharedFieldAnalysis {
  const analysis: SharedFieldAnalysis = {
    artist: [],
    album: [],
    albumArtist: [],
    genre: [],
    year: [],
  };

  for (const field of SHARED_FIELDS) {
    const groups = new Map<string | null, string[]>();
    for (const item of items) {
      if (!item.tags) continue;
      const raw = item.tags[SHARED_FIELD_KEYS[field]];
      const value = raw === null || raw === '' ? null : String(raw);
      const files = groups.get(value);
      if (files) {
        files.push(item.name);
      } else {
        groups.set(value, [item.name]);
      }
    }
    analysis[field] = [...groups.entries()]
      .map(([value, files]) => ({ value, files }))
      .sort((a, b) => b.files.length - a.files.length);
  }

  return analysis;
}
