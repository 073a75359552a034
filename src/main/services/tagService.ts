/**
 * Tag persistence on the local filesystem: music-metadata for reading,
 * the tag writer for MP3 and FLAC writes.
 */

import type { MediaItem, Tags } from '../../shared/types';
import { copyItem } from '../../shared/mediaItem';
import type { TagService } from './collaborators';
import { readAudioTags } from './audioReader';
import { writeTags } from './tagWriter';
import { WriteError, wrapError } from './errors';
import type { Logger } from './logger';

export class LocalTagService implements TagService {
  constructor(private readonly logger: Logger | null = null) {}

  async readTags(item: MediaItem): Promise<MediaItem> {
    try {
      const { tags, duration } = await readAudioTags(item.path);
      return copyItem(item, { tags, duration });
    } catch (error: unknown) {
      throw wrapError(error, 'FileReadError', { filePath: item.path, step: 'reading' });
    }
  }

  async writeTags(item: MediaItem, tags: Tags): Promise<boolean> {
    const result = writeTags(item.path, tags);
    if (!result.success) {
      this.logger?.logError(
        new WriteError(result.error ?? 'Tag write failed', { filePath: item.path, step: 'writing' }),
      );
    }
    return result.success;
  }
}
