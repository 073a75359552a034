/**
 * Tag Writer Service
 *
 * Replaces the controlled tag fields of an audio file with a full Tags value:
 * - MP3: ID3v2 via `node-id3`, one APIC frame per picture; frames this
 *   project does not model are kept
 * - FLAC: Vorbis Comment and PICTURE metadata blocks rewritten in place;
 *   comments this project does not model are kept
 *
 * A null field removes the corresponding frame or comment. Audio data is
 * never re-encoded.
 */

import * as fs from 'fs';
import NodeID3 from 'node-id3';
import type { Picture, PictureType, Tags } from '../../shared/types';
import { getAudioFormat } from './audioReader';
import { errorMessage } from './errors';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Result of a tag write operation */
export interface WriteTagsResult {
  success: boolean;
  filePath: string;
  /** Error message if the write failed */
  error: string | null;
}

// ─── Read-only Helper ─────────────────────────────────────────────────────────

/**
 * If `filePath` is read-only, makes it writable and returns a function that
 * restores the original mode. Otherwise the returned function does nothing.
 *
 * On Windows, clearing the owner-write bit maps to FILE_ATTRIBUTE_READONLY.
 */
function makeWritableTemporarily(filePath: string): () => void {
  const stat = fs.statSync(filePath);
  if (stat.mode & 0o200) {
    return (): void => undefined;
  }
  const originalMode = stat.mode & 0o777;
  fs.chmodSync(filePath, originalMode | 0o200);
  return (): void => fs.chmodSync(filePath, originalMode);
}

/**
 * Runs a synchronous write with the read-only flag temporarily cleared.
 */
function withWritableFile(filePath: string, write: () => void): WriteTagsResult {
  if (!fs.existsSync(filePath)) {
    return { success: false, filePath, error: `File not found: ${filePath}` };
  }

  let restore: (() => void) | null = null;
  try {
    restore = makeWritableTemporarily(filePath);
    write();
    return { success: true, filePath, error: null };
  } catch (error: unknown) {
    return { success: false, filePath, error: errorMessage(error) };
  } finally {
    restore?.();
  }
}

function formatPosition(no: number | null, total: number | null): string | undefined {
  if (no === null) return undefined;
  return total === null ? String(no) : `${no}/${total}`;
}

// ─── MP3 (ID3v2) ──────────────────────────────────────────────────────────────

type TextFrame =
  | 'title'
  | 'artist'
  | 'album'
  | 'performerInfo'
  | 'year'
  | 'genre'
  | 'trackNumber'
  | 'partOfSet';

const ID3_PICTURE_TYPES: Record<PictureType, { id: number; name: string }> = {
  front_cover: { id: 3, name: 'front cover' },
  back_cover: { id: 4, name: 'back cover' },
  other: { id: 0, name: 'other' },
};

const ID3_HEADER_SIZE = 10;

const ID3_PICTURE_DESCRIPTIONS: Record<PictureType, string> = {
  front_cover: 'Front Cover',
  back_cover: 'Back Cover',
  other: '',
};

/**
 * Builds the node-id3 frames for a Tags value, starting from the file's
 * existing frames. Null fields are removed from the result.
 *
 * Pictures are left out: node-id3 holds one `image`, so every APIC frame
 * comes from {@link buildId3PictureFrames} instead.
 */
export function buildId3Tags(tags: Tags, existing: NodeID3.Tags = {}): NodeID3.Tags {
  // `raw` is the reader's frame dump, not a writable frame
  const frames: NodeID3.Tags = Object.fromEntries(
    Object.entries(existing).filter(([key]) => key !== 'raw' && key !== 'image'),
  );

  const assign = (key: TextFrame, value: string | undefined): void => {
    if (value === undefined) {
      delete frames[key];
    } else {
      frames[key] = value;
    }
  };

  assign('title', tags.title ?? undefined);
  assign('artist', tags.trackArtist ?? undefined);
  assign('album', tags.album ?? undefined);
  assign('performerInfo', tags.albumArtist ?? undefined);
  assign('year', tags.year === null ? undefined : String(tags.year));
  assign('genre', tags.genre ?? undefined);
  assign('trackNumber', formatPosition(tags.trackNumber, tags.trackTotal));
  assign('partOfSet', formatPosition(tags.discNumber, tags.discTotal));

  if (tags.lyrics === null) {
    delete frames.unsynchronisedLyrics;
  } else {
    frames.unsynchronisedLyrics = { language: 'eng', text: tags.lyrics };
  }

  return frames;
}

/** One encoded APIC frame per picture, in order. */
export function buildId3PictureFrames(pictures: readonly Picture[]): Buffer[] {
  return pictures.map((picture) =>
    NodeID3.create({
      image: {
        mime: picture.mimeType,
        type: ID3_PICTURE_TYPES[picture.pictureType],
        description: ID3_PICTURE_DESCRIPTIONS[picture.pictureType],
        imageBuffer: picture.data,
      },
    }).subarray(ID3_HEADER_SIZE),
  );
}

function decodeSynchsafe(data: Buffer, offset: number): number {
  return (
    ((data[offset] & 0x7f) << 21) |
    ((data[offset + 1] & 0x7f) << 14) |
    ((data[offset + 2] & 0x7f) << 7) |
    (data[offset + 3] & 0x7f)
  );
}

function encodeSynchsafe(size: number): Buffer {
  return Buffer.from([(size >> 21) & 0x7f, (size >> 14) & 0x7f, (size >> 7) & 0x7f, size & 0x7f]);
}

/** Appends frames to the ID3v2 tag at the start of `tagged` and fixes the header size. */
function appendId3Frames(tagged: Buffer, frames: Buffer[]): Buffer {
  const extra = Buffer.concat(frames);
  if (extra.length === 0) return tagged;

  const size = decodeSynchsafe(tagged, 6);
  const header = Buffer.from(tagged.subarray(0, ID3_HEADER_SIZE));
  encodeSynchsafe(size + extra.length).copy(header, 6);
  const end = ID3_HEADER_SIZE + size;
  return Buffer.concat([header, tagged.subarray(ID3_HEADER_SIZE, end), extra, tagged.subarray(end)]);
}

/**
 * Replaces the ID3v2 tag of an MP3 buffer. Unmodelled frames survive, and
 * every picture in `tags` is written as its own APIC frame.
 */
export function rewriteMp3Buffer(fileData: Buffer, tags: Tags): Buffer {
  const tagged = NodeID3.write(buildId3Tags(tags, NodeID3.read(fileData)), fileData);
  return appendId3Frames(tagged, buildId3PictureFrames(tags.pictures));
}

export function writeMp3Tags(filePath: string, tags: Tags): WriteTagsResult {
  return withWritableFile(filePath, () => {
    fs.writeFileSync(filePath, rewriteMp3Buffer(fs.readFileSync(filePath), tags));
  });
}

// ─── FLAC ─────────────────────────────────────────────────────────────────────

const FLAC_MAGIC = 'fLaC';
const FLAC_BLOCK_TYPE_PADDING = 1;
const FLAC_BLOCK_TYPE_VORBIS_COMMENT = 4;
const FLAC_BLOCK_TYPE_PICTURE = 6;
const VORBIS_VENDOR = 'tagsmith';

const FLAC_PICTURE_TYPES: Record<PictureType, number> = {
  front_cover: 3,
  back_cover: 4,
  other: 0,
};

/** Vorbis comment keys owned by Tags, including the alternative spellings that are dropped on write */
const CONTROLLED_COMMENT_KEYS = [
  'TITLE',
  'ARTIST',
  'ALBUM',
  'ALBUMARTIST',
  'DATE',
  'GENRE',
  'TRACKNUMBER',
  'TRACKTOTAL',
  'TOTALTRACKS',
  'DISCNUMBER',
  'DISCTOTAL',
  'TOTALDISCS',
  'LYRICS',
  'UNSYNCEDLYRICS',
];

export interface FlacBlock {
  type: number;
  data: Buffer;
}

/** Parses FLAC metadata blocks; returns blocks and the byte offset where audio frames begin. */
export function parseFlacBlocks(fileData: Buffer): { blocks: FlacBlock[]; audioOffset: number } {
  if (fileData.length < 4 || fileData.toString('ascii', 0, 4) !== FLAC_MAGIC) {
    throw new Error('Not a valid FLAC file (missing fLaC magic)');
  }
  const blocks: FlacBlock[] = [];
  let offset = 4;
  while (offset + 4 <= fileData.length) {
    const headerByte = fileData[offset];
    const isLast = (headerByte & 0x80) !== 0;
    const length = fileData.readUIntBE(offset + 1, 3);
    offset += 4;
    if (offset + length > fileData.length) throw new Error('Truncated FLAC metadata block');
    blocks.push({ type: headerByte & 0x7f, data: Buffer.from(fileData.subarray(offset, offset + length)) });
    offset += length;
    if (isLast) break;
  }
  return { blocks, audioOffset: offset };
}

/** Parses a Vorbis Comment block into an ordered key→values map (keys uppercased). */
export function parseVorbisComments(data: Buffer): Map<string, string[]> {
  const result = new Map<string, string[]>();
  if (data.length < 4) return result;
  let offset = 4 + data.readUInt32LE(0);
  if (offset + 4 > data.length) return result;
  const count = data.readUInt32LE(offset);
  offset += 4;
  for (let i = 0; i < count && offset + 4 <= data.length; i++) {
    const len = data.readUInt32LE(offset);
    offset += 4;
    if (offset + len > data.length) break;
    const comment = data.toString('utf8', offset, offset + len);
    offset += len;
    const eqIdx = comment.indexOf('=');
    if (eqIdx < 0) continue;
    const key = comment.slice(0, eqIdx).toUpperCase();
    result.set(key, [...(result.get(key) ?? []), comment.slice(eqIdx + 1)]);
  }
  return result;
}

function buildVorbisCommentBlock(comments: Map<string, string[]>): Buffer {
  const vendor = Buffer.from(VORBIS_VENDOR, 'utf8');
  const parts: Buffer[] = [];
  let count = 0;
  for (const [key, values] of comments) {
    for (const value of values) {
      const entry = Buffer.from(`${key}=${value}`, 'utf8');
      parts.push(uint32LE(entry.length), entry);
      count++;
    }
  }
  return Buffer.concat([uint32LE(vendor.length), vendor, uint32LE(count), ...parts]);
}

function uint32LE(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32LE(value, 0);
  return buf;
}

/** Builds the Vorbis comments for `tags` on top of the file's unmodelled comments. */
export function buildVorbisComments(tags: Tags, existing: Map<string, string[]>): Map<string, string[]> {
  const comments = new Map(
    [...existing].filter(([key]) => !CONTROLLED_COMMENT_KEYS.includes(key)),
  );
  const put = (key: string, value: string | number | null): void => {
    if (value !== null) comments.set(key, [String(value)]);
  };
  put('TITLE', tags.title);
  put('ARTIST', tags.trackArtist);
  put('ALBUM', tags.album);
  put('ALBUMARTIST', tags.albumArtist);
  put('DATE', tags.year);
  put('GENRE', tags.genre);
  put('TRACKNUMBER', tags.trackNumber);
  put('TRACKTOTAL', tags.trackTotal);
  put('DISCNUMBER', tags.discNumber);
  put('DISCTOTAL', tags.discTotal);
  put('LYRICS', tags.lyrics);
  return comments;
}

/** Pixel dimensions of a JPEG or PNG buffer, for the FLAC PICTURE header. Zero when unknown. */
function getImageDimensions(data: Buffer, mimeType: string): { width: number; height: number; depth: number } {
  if (mimeType === 'image/png' && data.length >= 26) {
    const channels = [1, 0, 3, 1, 2, 0, 4][data[25]] ?? 3;
    return { width: data.readUInt32BE(16), height: data.readUInt32BE(20), depth: data[24] * channels };
  }
  let i = 2;
  while (i + 9 < data.length) {
    if (data[i] !== 0xff) {
      i++;
      continue;
    }
    const marker = data[i + 1];
    if (marker >= 0xc0 && marker <= 0xc3) {
      return { width: data.readUInt16BE(i + 7), height: data.readUInt16BE(i + 5), depth: 8 * data[i + 9] };
    }
    if (marker === 0xda) break;
    i += 2 + data.readUInt16BE(i + 2);
  }
  return { width: 0, height: 0, depth: 0 };
}

/** Builds a METADATA_BLOCK_PICTURE body. */
export function buildFlacPictureBlock(picture: Picture): Buffer {
  const { width, height, depth } = getImageDimensions(picture.data, picture.mimeType);
  const mime = Buffer.from(picture.mimeType, 'ascii');
  return Buffer.concat([
    uint32BE(FLAC_PICTURE_TYPES[picture.pictureType]),
    uint32BE(mime.length),
    mime,
    uint32BE(0), // empty description
    uint32BE(width),
    uint32BE(height),
    uint32BE(depth),
    uint32BE(0), // indexed colour count
    uint32BE(picture.data.length),
    picture.data,
  ]);
}

function uint32BE(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(value, 0);
  return buf;
}

/** Serialises metadata blocks and audio data into a complete FLAC file. */
export function serializeFlacBlocks(blocks: FlacBlock[], audioData: Buffer): Buffer {
  const parts: Buffer[] = [Buffer.from(FLAC_MAGIC, 'ascii')];
  blocks.forEach((block, i) => {
    const header = Buffer.alloc(4);
    header[0] = (i === blocks.length - 1 ? 0x80 : 0x00) | (block.type & 0x7f);
    header.writeUIntBE(block.data.length, 1, 3);
    parts.push(header, block.data);
  });
  parts.push(audioData);
  return Buffer.concat(parts);
}

/**
 * Rewrites a FLAC buffer with `tags`: the Vorbis Comment block is rebuilt,
 * every PICTURE block is replaced by one per picture in `tags`, and
 * padding is dropped. STREAMINFO and other blocks keep their order.
 */
export function rewriteFlacBuffer(fileData: Buffer, tags: Tags): Buffer {
  const { blocks, audioOffset } = parseFlacBlocks(fileData);
  const vorbis = blocks.find((b) => b.type === FLAC_BLOCK_TYPE_VORBIS_COMMENT);
  const existing = vorbis ? parseVorbisComments(vorbis.data) : new Map<string, string[]>();

  const kept = blocks.filter(
    (b) =>
      b.type !== FLAC_BLOCK_TYPE_VORBIS_COMMENT &&
      b.type !== FLAC_BLOCK_TYPE_PICTURE &&
      b.type !== FLAC_BLOCK_TYPE_PADDING,
  );
  const rebuilt: FlacBlock[] = [
    ...kept,
    { type: FLAC_BLOCK_TYPE_VORBIS_COMMENT, data: buildVorbisCommentBlock(buildVorbisComments(tags, existing)) },
    ...tags.pictures.map((picture) => ({
      type: FLAC_BLOCK_TYPE_PICTURE,
      data: buildFlacPictureBlock(picture),
    })),
  ];

  return serializeFlacBlocks(rebuilt, fileData.subarray(audioOffset));
}

export function writeFlacTags(filePath: string, tags: Tags): WriteTagsResult {
  return withWritableFile(filePath, () => {
    fs.writeFileSync(filePath, rewriteFlacBuffer(fs.readFileSync(filePath), tags));
  });
}

// ─── Dispatch ─────────────────────────────────────────────────────────────────

/**
 * Writes tags to an audio file, dispatching on its format. Only MP3 and FLAC
 * are writable; other formats fail without touching the file.
 */
export function writeTags(filePath: string, tags: Tags): WriteTagsResult {
  const format = getAudioFormat(filePath);

  switch (format) {
    case 'mp3':
      return writeMp3Tags(filePath, tags);
    case 'flac':
      return writeFlacTags(filePath, tags);
    case null:
      return { success: false, filePath, error: `Unsupported audio format: ${filePath}` };
    default:
      return {
        success: false,
        filePath,
        error: `Tag writing for ${format.toUpperCase()} is not supported. Only MP3 and FLAC can be written.`,
      };
  }
}
