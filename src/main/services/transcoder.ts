/**
 * Audio transcoding with an ffmpeg binary.
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import type { MediaItem, TranscodeFormat } from '../../shared/types';
import type { Transcoder } from './collaborators';
import { TranscodeError } from './errors';
import type { Logger } from './logger';

export interface FfmpegTranscoderOptions {
  ffmpegPath: string;
  format: TranscodeFormat;
  /** Process timeout in milliseconds; 0 disables it */
  timeout?: number;
  logger?: Logger | null;
}

/** Codec arguments per output format */
const CODEC_ARGS: Record<TranscodeFormat, readonly string[]> = {
  flac: ['-c:a', 'flac', '-compression_level', '8'],
  wav: ['-c:a', 'pcm_s16le'],
};

/**
 * Output path: the source's base name with the target extension, in the
 * source's directory.
 */
export function transcodeTargetPath(sourcePath: string, format: TranscodeFormat): string {
  const dir = path.dirname(sourcePath);
  return path.join(dir, `${path.basename(sourcePath, path.extname(sourcePath))}.${format}`);
}

/**
 * ffmpeg argument list. Tags are carried over with `-map_metadata 0`; the
 * target is never overwritten (`-n`).
 */
export function buildFfmpegArgs(sourcePath: string, targetPath: string, format: TranscodeFormat): string[] {
  return ['-hide_banner', '-loglevel', 'error', '-n', '-i', sourcePath, '-map_metadata', '0', ...CODEC_ARGS[format], targetPath];
}

function run(file: string, args: readonly string[], timeout: number): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(file, args, { timeout, encoding: 'utf8' }, (error, _stdout, stderr) => {
      if (error) {
        const detail = stderr.trim();
        reject(detail.length > 0 ? new Error(detail, { cause: error }) : error);
        return;
      }
      resolve();
    });
  });
}

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly options: FfmpegTranscoderOptions) {}

  /**
   * Converts `item` to the configured format.
   *
   * @returns the new file's path; null when the source already has the
   *   target format or the target file exists
   * @throws TranscodeError when ffmpeg fails; a partial target is removed first
   */
  async convert(item: MediaItem): Promise<string | null> {
    const { format } = this.options;
    if (path.extname(item.path).toLowerCase() === `.${format}`) {
      return null;
    }

    const target = transcodeTargetPath(item.path, format);
    if (fs.existsSync(target)) {
      this.options.logger?.logSkippedFile(item.path, `${path.basename(target)} already exists`, 'transcoding');
      return null;
    }

    try {
      await run(this.options.ffmpegPath, buildFfmpegArgs(item.path, target, format), this.options.timeout ?? 0);
    } catch (error: unknown) {
      await fs.promises.rm(target, { force: true });
      throw new TranscodeError(`ffmpeg failed for ${item.name}`, {
        filePath: item.path,
        cause: error instanceof Error ? error : undefined,
      });
    }
    return target;
  }

  /** Whether the configured ffmpeg binary runs. */
  async isAvailable(): Promise<boolean> {
    try {
      await run(this.options.ffmpegPath, ['-version'], 5000);
      return true;
    } catch (error: unknown) {
      this.options.logger?.warn(`ffmpeg not available: ${error instanceof Error ? error.message : String(error)}`, {
        step: 'transcoding',
      });
      return false;
    }
  }
}
