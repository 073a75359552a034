/**
 * Audio Reader Service
 *
 * Reads embedded tags and duration with the music-metadata library.
 * Supports MP3, FLAC, M4A, WAV, OGG, Opus and WMA.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as mm from 'music-metadata';
import {
  AudioFormat,
  Picture,
  PictureType,
  SUPPORTED_EXTENSIONS,
  Tags,
} from '../../shared/types';
import { createTags } from '../../shared/mediaItem';
import { FileReadError, errorMessage } from './errors';

/** Tags and duration read from one file */
export interface AudioFileTags {
  tags: Tags;
  /** Duration in seconds, or null when the container does not report one */
  duration: number | null;
}

function isAudioFormat(value: string): value is AudioFormat {
  return SUPPORTED_EXTENSIONS.includes(`.${value}`);
}

/**
 * Maps a file extension to its AudioFormat, or null if unsupported.
 */
export function getAudioFormat(filePath: string): AudioFormat | null {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return isAudioFormat(ext) ? ext : null;
}

/**
 * Reads tags (including pictures) and duration from an audio file.
 *
 * @throws FileReadError if the file is missing, unsupported or unparseable
 */
export async function readAudioTags(filePath: string): Promise<AudioFileTags> {
  if (!fs.existsSync(filePath)) {
    throw new FileReadError(`File not found: ${filePath}`, { filePath });
  }

  const format = getAudioFormat(filePath);
  if (format === null) {
    throw new FileReadError(`Unsupported audio format: ${path.extname(filePath)}`, { filePath });
  }

  let metadata: mm.IAudioMetadata;
  try {
    metadata = await mm.parseFile(filePath, { duration: true });
  } catch (error: unknown) {
    throw new FileReadError(
      `Failed to parse audio file "${path.basename(filePath)}": ${errorMessage(error)}`,
      { filePath, cause: error instanceof Error ? error : undefined },
    );
  }

  return {
    tags: mapToTags(metadata),
    duration: metadata.format.duration ?? null,
  };
}

/**
 * Maps music-metadata results onto Tags. Missing fields become null.
 */
export function mapToTags(metadata: mm.IAudioMetadata): Tags {
  const common = metadata.common;

  return createTags({
    title: common.title || null,
    trackArtist: common.artist || null,
    album: common.album || null,
    albumArtist: common.albumartist || null,
    year: common.year ?? null,
    genre: common.genre && common.genre.length > 0 ? common.genre.join('/') : null,
    trackNumber: common.track.no ?? null,
    trackTotal: common.track.of ?? null,
    discNumber: common.disk.no ?? null,
    discTotal: common.disk.of ?? null,
    lyrics: extractLyrics(common, metadata.native),
    pictures: (common.picture ?? []).map(mapPicture),
  });
}

function mapPicture(picture: mm.IPicture): Picture {
  return {
    pictureType: mapPictureType(picture.type),
    mimeType: picture.format.includes('/') ? picture.format : `image/${picture.format}`,
    data: Buffer.from(picture.data),
  };
}

function mapPictureType(type: string | undefined): PictureType {
  switch (type) {
    case 'Cover (front)':
      return 'front_cover';
    case 'Cover (back)':
      return 'back_cover';
    default:
      return type === undefined ? 'front_cover' : 'other';
  }
}

/**
 * Lyrics from the common field, falling back to native USLT frames (ID3v2).
 */
function extractLyrics(
  common: mm.ICommonTagsResult,
  native: mm.IAudioMetadata['native'],
): string | null {
  if (common.lyrics && common.lyrics.length > 0) {
    return common.lyrics.join('\n');
  }

  for (const tags of Object.values(native)) {
    for (const tag of tags) {
      if (tag.id !== 'USLT' || !tag.value) continue;
      const value: unknown = tag.value;
      if (typeof value === 'string') {
        return value;
      }
      if (typeof value === 'object' && value !== null && 'text' in value && typeof value.text === 'string') {
        return value.text;
      }
    }
  }

  return null;
}
