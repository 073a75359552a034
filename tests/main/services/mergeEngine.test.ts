import { describe, it, expect } from 'vitest';
import type { DirtyField, MediaItem, Tags } from '../../../src/shared/types';
import { copyItem, createMediaItem, createTags } from '../../../src/shared/mediaItem';
import {
  analyzeSharedFields,
  applyTemplateEdit,
  mergeForSave,
  parseYear,
  seedTemplateTags,
} from '../../../src/main/services/mergeEngine';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function fileTags(overrides: Partial<Tags> = {}): Tags {
  return createTags({
    title: 'Track One',
    trackArtist: 'Original Artist',
    album: 'Original Album',
    albumArtist: 'Original Album Artist',
    year: 2001,
    genre: 'Rock',
    trackNumber: 1,
    trackTotal: 10,
    discNumber: 1,
    discTotal: 2,
    lyrics: 'la la la',
    ...overrides,
  });
}

function loadedItem(filePath: string, tags: Tags | null): MediaItem {
  return copyItem(createMediaItem(filePath), { tags });
}

const NO_DIRTY: ReadonlySet<DirtyField> = new Set();

// ─── mergeForSave ────────────────────────────────────────────────────────────

describe('mergeForSave', () => {
  it('should keep every current value when nothing is dirty', () => {
    const current = fileTags();
    const template = createTags({ trackArtist: 'Template Artist', album: 'Template Album' });

    expect(mergeForSave(current, template, NO_DIRTY)).toEqual(current);
  });

  it('should take dirty non-empty shared fields from the template', () => {
    const current = fileTags();
    const template = createTags({
      trackArtist: 'Template Artist',
      album: 'Template Album',
      albumArtist: 'Template Album Artist',
      genre: 'Jazz',
      year: 1999,
    });
    const dirty = new Set<DirtyField>(['artist', 'album', 'albumArtist', 'genre', 'year']);

    const merged = mergeForSave(current, template, dirty);

    expect(merged.trackArtist).toBe('Template Artist');
    expect(merged.album).toBe('Template Album');
    expect(merged.albumArtist).toBe('Template Album Artist');
    expect(merged.genre).toBe('Jazz');
    expect(merged.year).toBe(1999);
  });

  it('should never overwrite per-file-unique fields, lyrics or pictures', () => {
    const picture = { pictureType: 'front_cover' as const, mimeType: 'image/png', data: Buffer.from([1, 2]) };
    const current = fileTags({ pictures: [picture] });
    const template = createTags({
      title: 'Template Title',
      trackNumber: 9,
      trackTotal: 99,
      discNumber: 3,
      discTotal: 4,
      lyrics: 'template lyrics',
      pictures: [],
    });
    const dirty = new Set<DirtyField>(['artist', 'album', 'albumArtist', 'genre', 'year']);

    const merged = mergeForSave(current, template, dirty);

    expect(merged.title).toBe('Track One');
    expect(merged.trackNumber).toBe(1);
    expect(merged.trackTotal).toBe(10);
    expect(merged.discNumber).toBe(1);
    expect(merged.discTotal).toBe(2);
    expect(merged.lyrics).toBe('la la la');
    expect(merged.pictures).toEqual([picture]);
  });

  it('should keep the current value when a dirty template field is empty', () => {
    const current = fileTags();
    const template = createTags({ trackArtist: '', album: null, year: null });
    const dirty = new Set<DirtyField>(['artist', 'album', 'year']);

    const merged = mergeForSave(current, template, dirty);

    expect(merged.trackArtist).toBe('Original Artist');
    expect(merged.album).toBe('Original Album');
    expect(merged.year).toBe(2001);
  });

  it('should ignore a non-dirty template value that differs', () => {
    const current = fileTags({ genre: 'Rock' });
    const template = createTags({ genre: 'Pop', trackArtist: 'Shared' });

    const merged = mergeForSave(current, template, new Set<DirtyField>(['artist']));

    expect(merged.trackArtist).toBe('Shared');
    expect(merged.genre).toBe('Rock');
  });

  it('should not modify its inputs', () => {
    const current = fileTags();
    const template = createTags({ trackArtist: 'Template Artist' });

    mergeForSave(current, template, new Set<DirtyField>(['artist']));

    expect(current.trackArtist).toBe('Original Artist');
    expect(template.trackArtist).toBe('Template Artist');
  });
});

// ─── seedTemplateTags ────────────────────────────────────────────────────────

describe('seedTemplateTags', () => {
  it('should return empty tags when there is no first file', () => {
    expect(seedTemplateTags(null)).toEqual(createTags());
  });

  it('should copy shared fields and pictures but not unique fields or lyrics', () => {
    const seeded = seedTemplateTags(fileTags());

    expect(seeded).toEqual(
      createTags({
        trackArtist: 'Original Artist',
        album: 'Original Album',
        albumArtist: 'Original Album Artist',
        year: 2001,
        genre: 'Rock',
      }),
    );
  });
});

// ─── parseYear ───────────────────────────────────────────────────────────────

describe('parseYear', () => {
  it('should parse leading digits', () => {
    expect(parseYear('1999')).toBe(1999);
    expect(parseYear(' 2004-05-01')).toBe(2004);
  });

  it('should return null for text without digits', () => {
    expect(parseYear('unknown')).toBeNull();
    expect(parseYear('')).toBeNull();
    expect(parseYear(null)).toBeNull();
  });

  it('should truncate numbers', () => {
    expect(parseYear(1987.6)).toBe(1987);
    expect(parseYear(Number.NaN)).toBeNull();
  });
});

// ─── applyTemplateEdit ───────────────────────────────────────────────────────

describe('applyTemplateEdit', () => {
  it('should mark only the edited fields dirty', () => {
    const update = applyTemplateEdit(createTags(), NO_DIRTY, { artist: 'New Artist' });

    expect(update.tags.trackArtist).toBe('New Artist');
    expect([...update.dirtyFields]).toEqual(['artist']);
  });

  it('should keep fields that were already dirty', () => {
    const update = applyTemplateEdit(createTags(), new Set<DirtyField>(['genre']), { year: '1975' });

    expect(update.tags.year).toBe(1975);
    expect([...update.dirtyFields].sort()).toEqual(['genre', 'year']);
  });

  it('should store empty text as null but still mark the field dirty', () => {
    const update = applyTemplateEdit(createTags({ album: 'Old' }), NO_DIRTY, { album: '' });

    expect(update.tags.album).toBeNull();
    expect(update.dirtyFields.has('album')).toBe(true);
  });

  it('should not mutate the given dirty set', () => {
    const dirty = new Set<DirtyField>();
    applyTemplateEdit(createTags(), dirty, { genre: 'Folk' });

    expect(dirty.size).toBe(0);
  });
});

// ─── analyzeSharedFields ─────────────────────────────────────────────────────

describe('analyzeSharedFields', () => {
  it('should group files by value with the largest group first', () => {
    const items = [
      loadedItem('/music/a.mp3', fileTags({ trackArtist: 'X' })),
      loadedItem('/music/b.mp3', fileTags({ trackArtist: 'Y' })),
      loadedItem('/music/c.mp3', fileTags({ trackArtist: 'Y' })),
    ];

    const analysis = analyzeSharedFields(items);

    expect(analysis.artist).toEqual([
      { value: 'Y', files: ['b.mp3', 'c.mp3'] },
      { value: 'X', files: ['a.mp3'] },
    ]);
  });

  it('should report unset values as null and stringify years', () => {
    const items = [
      loadedItem('/music/a.mp3', fileTags({ genre: null, year: 1990 })),
      loadedItem('/music/b.mp3', fileTags({ genre: '', year: 1990 })),
    ];

    const analysis = analyzeSharedFields(items);

    expect(analysis.genre).toEqual([{ value: null, files: ['a.mp3', 'b.mp3'] }]);
    expect(analysis.year).toEqual([{ value: '1990', files: ['a.mp3', 'b.mp3'] }]);
  });

  it('should skip items whose tags are not loaded', () => {
    const items = [loadedItem('/music/a.mp3', null), loadedItem('/music/b.mp3', fileTags())];

    expect(analyzeSharedFields(items).album).toEqual([{ value: 'Original Album', files: ['b.mp3'] }]);
  });
});
