/**
 * Collaborator interfaces
 *
 * The state and batch layers only talk to files, tags, lookup services and
 * external processes through these interfaces. The default implementations
 * live beside this file and are wired up in the composition root.
 */

import type { MediaItem, Tags } from '../../shared/types';

/** Contents of one directory level */
export interface DirectoryListing {
  /** Absolute paths of child directories, sorted by name */
  subdirectories: string[];
  /** Absolute paths of supported audio files, sorted by name */
  audioFiles: string[];
}

export interface FileService {
  /** Lists one directory level. A missing directory lists as empty. */
  listDirectory(dirPath: string): Promise<DirectoryListing>;
  /** Lists supported audio files under `dirPath` at any depth. */
  listAllFilesRecursive(dirPath: string): Promise<string[]>;
  /** Renames the file within its directory. Returns the new path, or null on failure. */
  rename(item: MediaItem, newName: string): Promise<string | null>;
  deleteFile(filePath: string): Promise<boolean>;
  deleteDirectory(dirPath: string): Promise<boolean>;
  /** Writes lyrics to a sidecar text file beside the audio file. */
  writeLyricsSidecar(item: MediaItem, lyrics: string): Promise<boolean>;
}

export interface TagService {
  /**
   * Returns a copy of `item` with tags and duration populated from disk.
   * Throws a FileReadError when the file cannot be read.
   */
  readTags(item: MediaItem): Promise<MediaItem>;
  /** Replaces the file's tags with `tags`. Returns false when the write failed. */
  writeTags(item: MediaItem, tags: Tags): Promise<boolean>;
}

/** A lyrics search hit; at least one of the two texts is usually present */
export interface LyricsMatch {
  syncedLyrics: string | null;
  plainLyrics: string | null;
}

export interface LyricsLookup {
  /**
   * Finds the best lyrics match. Returns null when nothing matches; throws
   * when the lookup itself failed.
   */
  findBestMatch(
    artist: string,
    title: string,
    album?: string | null,
    duration?: number | null,
  ): Promise<LyricsMatch | null>;
}

export interface Romanizer {
  /** Romanized text, or null when romanization failed. */
  romanize(text: string): Promise<string | null>;
}

export interface CoverLookup {
  /** Image bytes of the album cover, or null when nothing matches. */
  fetchCover(artist: string, album: string): Promise<Buffer | null>;
}

export interface Transcoder {
  /** Path of the produced file, or null when nothing was produced. */
  convert(item: MediaItem): Promise<string | null>;
}
