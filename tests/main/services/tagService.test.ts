import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { copyTags, createMediaItem, createTags } from '../../../src/shared/mediaItem';
import { LocalTagService } from '../../../src/main/services/tagService';
import { FileReadError } from '../../../src/main/services/errors';
import { Logger } from '../../../src/main/services/logger';
import { writeFlacFixture } from '../../helpers/flacFixture';

describe('LocalTagService', () => {
  let tempDir: string;
  let logger: Logger;
  let service: LocalTagService;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tagsmith-tags-'));
    logger = new Logger({ writeToFile: false });
    service = new LocalTagService(logger);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should populate tags and duration without touching the overlay', async () => {
    const filePath = path.join(tempDir, 'song.flac');
    writeFlacFixture(filePath, createTags({ title: 'Test Song', genre: 'Jazz' }), 3);

    const item = await service.readTags(createMediaItem(filePath));

    expect(item.path).toBe(filePath);
    expect(item.name).toBe('song.flac');
    expect(item.duration).toBe(3);
    expect(item.tags?.title).toBe('Test Song');
    expect(item.tags?.genre).toBe('Jazz');
    expect(item.pending.lyrics).toEqual({ kind: 'unset' });
  });

  it('should throw a FileReadError with the file path when reading fails', async () => {
    const filePath = path.join(tempDir, 'missing.flac');

    const failure = service.readTags(createMediaItem(filePath));

    await expect(failure).rejects.toBeInstanceOf(FileReadError);
    await expect(failure).rejects.toMatchObject({ filePath });
  });

  it('should write tags that read back', async () => {
    const filePath = path.join(tempDir, 'song.flac');
    writeFlacFixture(filePath, createTags({ title: 'Before' }));
    const item = createMediaItem(filePath);

    expect(await service.writeTags(item, createTags({ title: 'After', trackArtist: 'Test Artist' }))).toBe(true);

    const reread = await service.readTags(item);
    expect(reread.tags?.title).toBe('After');
    expect(reread.tags?.trackArtist).toBe('Test Artist');
  });

  it('should keep both pictures of an MP3 when only the lyrics are saved', async () => {
    const filePath = path.join(tempDir, 'song.mp3');
    fs.writeFileSync(filePath, Buffer.concat([Buffer.from([0xff, 0xfb, 0x90, 0x64]), Buffer.alloc(400)]));
    const front = { pictureType: 'front_cover' as const, mimeType: 'image/jpeg', data: Buffer.from([0xff, 0xd8, 0xff, 0x01]) };
    const back = { pictureType: 'back_cover' as const, mimeType: 'image/jpeg', data: Buffer.from([0xff, 0xd8, 0xff, 0x02]) };
    const item = createMediaItem(filePath);
    expect(await service.writeTags(item, createTags({ title: 'Test Song', pictures: [front, back] }))).toBe(true);

    const loaded = await service.readTags(item);
    expect(loaded.tags?.pictures).toHaveLength(2);
    expect(await service.writeTags(loaded, copyTags(loaded.tags ?? createTags(), { lyrics: 'la la' }))).toBe(true);

    const reread = await service.readTags(item);
    expect(reread.tags?.lyrics).toBe('la la');
    expect(reread.tags?.pictures).toEqual([front, back]);
  });

  it('should log a WriteError and return false when the write fails', async () => {
    const filePath = path.join(tempDir, 'song.m4a');

    expect(await service.writeTags(createMediaItem(filePath), createTags())).toBe(false);

    const errors = logger.getErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0].category).toBe('WriteError');
    expect(errors[0].filePath).toBe(filePath);
    expect(errors[0].message).toBe('Tag writing for M4A is not supported. Only MP3 and FLAC can be written.');
  });
});
