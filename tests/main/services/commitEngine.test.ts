import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { DirtyField, Tags } from '../../../src/shared/types';
import {
  cleared,
  copyItem,
  copyTags,
  createMediaItem,
  createTags,
  setTo,
  withPending,
} from '../../../src/shared/mediaItem';
import { BatchSession } from '../../../src/main/services/batchSession';
import { CommitEngine, detectImageMimeType, frontCover } from '../../../src/main/services/commitEngine';
import { Logger } from '../../../src/main/services/logger';
import type { Romanizer } from '../../../src/main/services/collaborators';
import { InMemoryFileService, InMemoryTagService, loadedItem } from '../../helpers/fakeServices';

const PATH_A = '/music/album/a.mp3';
const PATH_B = '/music/album/b.mp3';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a]);
const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00]);

function trackTags(overrides: Partial<Tags> = {}): Tags {
  return createTags({
    title: 'Song A',
    trackArtist: 'Old Artist',
    album: 'Old Album',
    trackNumber: 1,
    ...overrides,
  });
}

function romanizerReturning(result: string | null) {
  return { romanize: vi.fn(async (_text: string): Promise<string | null> => result) };
}

describe('detectImageMimeType', () => {
  it('should recognize PNG, JPEG and GIF signatures', () => {
    expect(detectImageMimeType(PNG_BYTES)).toBe('image/png');
    expect(detectImageMimeType(JPEG_BYTES)).toBe('image/jpeg');
    expect(detectImageMimeType(Buffer.from('GIF89a'))).toBe('image/gif');
  });

  it('should fall back to JPEG for unknown data', () => {
    expect(detectImageMimeType(Buffer.from([0x00, 0x01]))).toBe('image/jpeg');
  });

  it('should build a front cover picture', () => {
    expect(frontCover(PNG_BYTES)).toEqual({ pictureType: 'front_cover', mimeType: 'image/png', data: PNG_BYTES });
  });
});

describe('CommitEngine.commit', () => {
  let tagService: InMemoryTagService;
  let fileService: InMemoryFileService;
  let logger: Logger;

  beforeEach(() => {
    tagService = new InMemoryTagService({ [PATH_A]: trackTags() });
    fileService = new InMemoryFileService();
    logger = new Logger({ writeToFile: false });
  });

  function engine(romanizer: Romanizer | null = null): CommitEngine {
    return new CommitEngine({ tagService, fileService, romanizer, logger });
  }

  it('should write pending lyrics and clear the overlay', async () => {
    const item = withPending(loadedItem(PATH_A, trackTags()), { lyrics: setTo('hello') });

    const result = await engine().commit(item);

    expect(result.success).toBe(true);
    expect(result.wroteTags).toBe(true);
    expect(result.wroteSidecar).toBe(false);
    expect(tagService.writesFor(PATH_A)).toEqual([trackTags({ lyrics: 'hello' })]);
    expect(result.item.tags?.lyrics).toBe('hello');
    expect(result.item.pending.lyrics.kind).toBe('unset');
  });

  it('should be idempotent: committing the result again writes nothing', async () => {
    const item = withPending(loadedItem(PATH_A, trackTags()), {
      lyrics: setTo('hello'),
      cover: setTo(PNG_BYTES),
    });

    const first = await engine().commit(item);
    const second = await engine().commit(first.item);

    expect(second.success).toBe(true);
    expect(second.wroteTags).toBe(false);
    expect(tagService.writes).toHaveLength(1);
    expect(second.item.tags).toEqual(first.item.tags);
  });

  it('should persist the source lyrics when the romanizer returns nothing', async () => {
    const romanizer = romanizerReturning(null);
    const item = withPending(loadedItem(PATH_A, trackTags()), {
      lyrics: setTo('가사'),
      romanize: true,
    });

    const result = await engine(romanizer).commit(item);

    expect(romanizer.romanize).toHaveBeenCalledWith('가사');
    expect(result.success).toBe(true);
    expect(tagService.writesFor(PATH_A)[0].lyrics).toBe('가사');
  });

  it('should persist romanized lyrics when the romanizer answers', async () => {
    const item = withPending(loadedItem(PATH_A, trackTags()), {
      lyrics: setTo('가사'),
      romanize: true,
    });

    await engine(romanizerReturning('gasa')).commit(item);

    expect(tagService.writesFor(PATH_A)[0].lyrics).toBe('gasa');
  });

  it('should romanize the existing lyrics when no lyrics are pending', async () => {
    tagService.files.set(PATH_A, trackTags({ lyrics: '노래' }));
    const item = withPending(loadedItem(PATH_A, trackTags({ lyrics: '노래' })), { romanize: true });

    await engine(romanizerReturning('norae')).commit(item);

    expect(tagService.writesFor(PATH_A)[0].lyrics).toBe('norae');
  });

  it('should fall back to the source text and log when the romanizer throws', async () => {
    const romanizer: Romanizer = { romanize: vi.fn().mockRejectedValue(new Error('script crashed')) };
    const item = withPending(loadedItem(PATH_A, trackTags()), {
      lyrics: setTo('가사'),
      romanize: true,
    });

    const result = await engine(romanizer).commit(item);

    expect(result.success).toBe(true);
    expect(tagService.writesFor(PATH_A)[0].lyrics).toBe('가사');
    expect(logger.getErrors()).toHaveLength(1);
    expect(logger.getErrors()[0].category).toBe('LookupError');
  });

  it('should replace pictures with the pending cover', async () => {
    const item = withPending(loadedItem(PATH_A, trackTags()), { cover: setTo(PNG_BYTES) });

    await engine().commit(item);

    expect(tagService.writesFor(PATH_A)[0].pictures).toEqual([
      { pictureType: 'front_cover', mimeType: 'image/png', data: PNG_BYTES },
    ]);
  });

  it('should remove existing pictures for a cleared cover', async () => {
    const withPicture = trackTags({ pictures: [frontCover(JPEG_BYTES)] });
    tagService.files.set(PATH_A, withPicture);
    const item = withPending(loadedItem(PATH_A, withPicture), { cover: cleared() });

    const result = await engine().commit(item);

    expect(result.success).toBe(true);
    expect(tagService.writesFor(PATH_A)[0].pictures).toEqual([]);
    expect(result.item.pending.cover.kind).toBe('unset');
  });

  it('should skip the write for a cleared cover when there is no picture', async () => {
    const item = withPending(loadedItem(PATH_A, trackTags()), { cover: cleared() });

    const result = await engine().commit(item);

    expect(result.success).toBe(true);
    expect(result.wroteTags).toBe(false);
    expect(tagService.writes).toHaveLength(0);
  });

  it('should keep the overlay when the tag write fails', async () => {
    tagService.failingWrites.add(PATH_A);
    const item = withPending(loadedItem(PATH_A, trackTags()), { lyrics: setTo('hello') });

    const result = await engine().commit(item);

    expect(result.success).toBe(false);
    expect(result.wroteTags).toBe(false);
    expect(result.item.pending.lyrics).toEqual(setTo('hello'));
    expect(logger.getErrors()[0].category).toBe('WriteError');
  });

  it('should write a sidecar when extraction is requested', async () => {
    const item = withPending(loadedItem(PATH_A, trackTags()), {
      lyrics: setTo('[00:01.00] hi'),
      extractLyrics: true,
    });

    const result = await engine().commit(item);

    expect(result.success).toBe(true);
    expect(result.wroteSidecar).toBe(true);
    expect(fileService.sidecars).toEqual([{ path: PATH_A, lyrics: '[00:01.00] hi' }]);
    expect(result.item.pending.extractLyrics).toBe(false);
  });

  it('should extract existing lyrics without rewriting the tags', async () => {
    tagService.files.set(PATH_A, trackTags({ lyrics: 'existing words' }));
    const item = withPending(loadedItem(PATH_A, trackTags({ lyrics: 'existing words' })), {
      extractLyrics: true,
    });

    const result = await engine().commit(item);

    expect(result.success).toBe(true);
    expect(result.wroteTags).toBe(false);
    expect(fileService.sidecars).toEqual([{ path: PATH_A, lyrics: 'existing words' }]);
  });

  it('should report failure but keep written tags when the sidecar write fails', async () => {
    fileService.failingSidecars.add(PATH_A);
    const item = withPending(loadedItem(PATH_A, trackTags()), {
      lyrics: setTo('[00:01.00] hi'),
      extractLyrics: true,
    });

    const result = await engine().commit(item);

    expect(result.success).toBe(false);
    expect(result.wroteTags).toBe(true);
    expect(result.wroteSidecar).toBe(false);
    expect(result.item.tags?.lyrics).toBe('[00:01.00] hi');
    expect(result.item.pending.extractLyrics).toBe(true);
    expect(result.item.pending.lyrics).toEqual(setTo('[00:01.00] hi'));
  });

  it('should treat an unreadable file as having empty tags', async () => {
    const item = withPending(createMediaItem('/music/album/new.mp3'), { lyrics: setTo('words') });

    const result = await engine().commit(item);

    expect(result.success).toBe(true);
    expect(tagService.writesFor('/music/album/new.mp3')).toEqual([createTags({ lyrics: 'words' })]);
    expect(logger.getErrors()[0].category).toBe('FileReadError');
  });
});

describe('CommitEngine.commitBatchItem', () => {
  let tagService: InMemoryTagService;
  let fileService: InMemoryFileService;
  let session: BatchSession;
  let commitEngine: CommitEngine;

  const tagsA = trackTags({ title: 'Song A', trackNumber: 1 });
  const tagsB = trackTags({ title: 'Song B', trackNumber: 2 });

  beforeEach(() => {
    tagService = new InMemoryTagService({ [PATH_A]: tagsA, [PATH_B]: tagsB });
    fileService = new InMemoryFileService();
    session = new BatchSession([loadedItem(PATH_A, tagsA), loadedItem(PATH_B, tagsB)]);
    commitEngine = new CommitEngine({ tagService, fileService, logger: new Logger({ writeToFile: false }) });
  });

  function editTemplate(changes: Partial<Tags>, dirty: DirtyField[]): void {
    const template = session.template;
    session.template = copyItem(template, { tags: copyTags(template.tags ?? createTags(), changes) });
    session.dirtyFields = new Set(dirty);
  }

  it('should write dirty template fields and keep unique fields', async () => {
    editTemplate({ trackArtist: 'New Artist' }, ['artist']);

    const result = await commitEngine.commitBatchItem(session.itemAt(1), session);

    expect(result.success).toBe(true);
    expect(result.wroteTags).toBe(true);
    expect(tagService.writesFor(PATH_B)).toEqual([copyTags(tagsB, { trackArtist: 'New Artist' })]);
    expect(result.item.tags?.title).toBe('Song B');
  });

  it('should not write when the merge changes nothing and nothing is pending', async () => {
    editTemplate({ genre: 'Ignored' }, []);

    const result = await commitEngine.commitBatchItem(session.itemAt(0), session);

    expect(result.success).toBe(true);
    expect(result.wroteTags).toBe(false);
    expect(tagService.writes).toHaveLength(0);
  });

  it('should apply session lyrics and drop them after a successful save', async () => {
    session.setPendingLyrics(PATH_A, 'sung words');

    const result = await commitEngine.commitBatchItem(session.itemAt(0), session);

    expect(result.success).toBe(true);
    expect(tagService.writesFor(PATH_A)).toEqual([copyTags(tagsA, { lyrics: 'sung words' })]);
    expect(session.pendingLyricsFor(PATH_A)).toBeNull();
  });

  it('should apply the template cover and extraction flag', async () => {
    tagService.files.set(PATH_A, copyTags(tagsA, { lyrics: 'words' }));
    session.replaceAt(0, loadedItem(PATH_A, copyTags(tagsA, { lyrics: 'words' })));
    session.template = withPending(session.template, { cover: setTo(JPEG_BYTES), extractLyrics: true });

    const result = await commitEngine.commitBatchItem(session.itemAt(0), session);

    expect(result.success).toBe(true);
    expect(tagService.writesFor(PATH_A)[0].pictures).toEqual([frontCover(JPEG_BYTES)]);
    expect(fileService.sidecars).toEqual([{ path: PATH_A, lyrics: 'words' }]);
  });

  it('should write merged fields and pending lyrics in a single write', async () => {
    session.setPendingLyrics(PATH_B, 'sung words');
    editTemplate({ trackArtist: 'New Artist' }, ['artist']);

    const result = await commitEngine.commitBatchItem(session.itemAt(1), session);

    expect(result.success).toBe(true);
    expect(result.wroteTags).toBe(true);
    expect(tagService.writesFor(PATH_B)).toEqual([
      copyTags(tagsB, { trackArtist: 'New Artist', lyrics: 'sung words' }),
    ]);
    expect(result.item.tags?.lyrics).toBe('sung words');
  });

  it('should keep the original overlay and session lyrics when the write fails', async () => {
    tagService.failingWrites.add(PATH_A);
    session.setPendingLyrics(PATH_A, 'sung words');
    editTemplate({ trackArtist: 'New Artist' }, ['artist']);
    const original = session.itemAt(0);

    const result = await commitEngine.commitBatchItem(original, session);

    expect(result.success).toBe(false);
    expect(result.item.pending).toEqual(original.pending);
    expect(session.pendingLyricsFor(PATH_A)).toBe('sung words');
    expect(tagService.files.get(PATH_A)).toEqual(tagsA);
  });
});
