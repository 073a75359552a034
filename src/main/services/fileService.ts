/**
 * Local filesystem implementation of the FileService collaborator.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { MediaItem } from '../../shared/types';
import type { DirectoryListing, FileService } from './collaborators';
import { WriteError, wrapError } from './errors';
import type { Logger } from './logger';
import {
  getUniqueFilePath,
  listDirectoryLevel,
  sanitizeFilename,
  scanDirectoryForAudioFiles,
} from '../utils/fileScanner';

const SYNCED_LYRICS_PATTERN = /\[\d{2}:\d{2}/;

/**
 * Sidecar path for lyrics: `.lrc` when the text carries timestamps,
 * `.txt` otherwise, named after the audio file.
 */
export function sidecarPath(audioPath: string, lyrics: string): string {
  const ext = SYNCED_LYRICS_PATTERN.test(lyrics) ? '.lrc' : '.txt';
  const dir = path.dirname(audioPath);
  return path.join(dir, path.basename(audioPath, path.extname(audioPath)) + ext);
}

export class LocalFileService implements FileService {
  constructor(private readonly logger: Logger | null = null) {}

  listDirectory(dirPath: string): Promise<DirectoryListing> {
    return listDirectoryLevel(dirPath);
  }

  listAllFilesRecursive(dirPath: string): Promise<string[]> {
    return scanDirectoryForAudioFiles(dirPath);
  }

  /**
   * Renames within the same directory. A name without an extension keeps
   * the original one; a taken name gets a " (n)" suffix.
   */
  async rename(item: MediaItem, newName: string): Promise<string | null> {
    const sanitized = sanitizeFilename(newName);
    if (sanitized.length === 0) {
      this.logger?.warn('Rename skipped: empty filename', { filePath: item.path, step: 'rename' });
      return null;
    }

    const fileName = path.extname(sanitized) ? sanitized : sanitized + path.extname(item.path);
    const desired = path.join(path.dirname(item.path), fileName);
    if (desired === item.path) return item.path;

    const target = getUniqueFilePath(desired);
    try {
      await fs.promises.rename(item.path, target);
      return target;
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'WriteError', { filePath: item.path, step: 'rename' }));
      return null;
    }
  }

  deleteFile(filePath: string): Promise<boolean> {
    return this.remove(filePath, { force: false });
  }

  deleteDirectory(dirPath: string): Promise<boolean> {
    return this.remove(dirPath, { recursive: true, force: false });
  }

  async writeLyricsSidecar(item: MediaItem, lyrics: string): Promise<boolean> {
    const target = sidecarPath(item.path, lyrics);
    try {
      await fs.promises.writeFile(target, lyrics, 'utf-8');
      return true;
    } catch (error: unknown) {
      this.logger?.logError(
        new WriteError(`Failed to write lyrics sidecar ${path.basename(target)}`, {
          filePath: item.path,
          step: 'sidecar',
          cause: error instanceof Error ? error : undefined,
        }),
      );
      return false;
    }
  }

  private async remove(target: string, options: fs.RmOptions): Promise<boolean> {
    try {
      await fs.promises.rm(target, options);
      return true;
    } catch (error: unknown) {
      this.logger?.logError(wrapError(error, 'WriteError', { filePath: target, step: 'delete' }));
      return false;
    }
  }
}
