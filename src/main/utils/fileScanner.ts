/**
 * File Scanner Utility
 *
 * Lists directories for supported audio files, one level or recursively.
 * Hidden entries (dot-prefixed) are skipped.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SUPPORTED_EXTENSIONS } from '../../shared/types';

export interface DirectoryLevel {
  subdirectories: string[];
  audioFiles: string[];
}

/**
 * Checks if a file has a supported audio extension.
 */
export function isSupportedAudioFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

function byName(a: string, b: string): number {
  return path.basename(a).localeCompare(path.basename(b), undefined, { sensitivity: 'base' });
}

function isMissingDirectory(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Reads directory entries. A missing directory reads as empty; any other
 * error propagates.
 */
async function readEntries(dirPath: string): Promise<fs.Dirent[]> {
  try {
    return await fs.promises.readdir(dirPath, { withFileTypes: true });
  } catch (error: unknown) {
    if (isMissingDirectory(error)) return [];
    throw error;
  }
}

/**
 * Lists one directory level: child directories and supported audio files,
 * each sorted by name.
 */
export async function listDirectoryLevel(dirPath: string): Promise<DirectoryLevel> {
  const subdirectories: string[] = [];
  const audioFiles: string[] = [];

  for (const entry of await readEntries(dirPath)) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      subdirectories.push(fullPath);
    } else if (entry.isFile() && isSupportedAudioFile(entry.name)) {
      audioFiles.push(fullPath);
    }
  }

  return { subdirectories: subdirectories.sort(byName), audioFiles: audioFiles.sort(byName) };
}

/**
 * Recursively lists supported audio files under `dirPath`. Each directory's
 * own files come before its subdirectories' files.
 */
export async function scanDirectoryForAudioFiles(dirPath: string): Promise<string[]> {
  const { subdirectories, audioFiles } = await listDirectoryLevel(dirPath);
  const nested: string[] = [];
  for (const subdirectory of subdirectories) {
    nested.push(...(await scanDirectoryForAudioFiles(subdirectory)));
  }
  return [...audioFiles, ...nested];
}

/**
 * Removes characters invalid in Windows filenames (/ \ : * ? " < > |) and
 * collapses whitespace.
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[/\\:*?"<>|]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Returns `desiredPath`, or the first free "name (n).ext" variant of it.
 */
export function getUniqueFilePath(desiredPath: string): string {
  if (!fs.existsSync(desiredPath)) {
    return desiredPath;
  }

  const dir = path.dirname(desiredPath);
  const ext = path.extname(desiredPath);
  const baseName = path.basename(desiredPath, ext);

  let counter = 1;
  let candidatePath: string;
  do {
    candidatePath = path.join(dir, `${baseName} (${counter})${ext}`);
    counter++;
  } while (fs.existsSync(candidatePath));

  return candidatePath;
}
