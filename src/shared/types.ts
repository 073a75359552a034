/**
 * Shared type definitions for Tagsmith.
 * These value types are used by every service and by the state layer.
 */

/** Supported audio file formats */
export type AudioFormat = 'mp3' | 'flac' | 'm4a' | 'wav' | 'ogg' | 'opus' | 'wma';

/** Supported audio file extensions (with dot prefix) */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.mp3',
  '.flac',
  '.m4a',
  '.wav',
  '.ogg',
  '.opus',
  '.wma',
] as const;

/** Role of an embedded picture */
export type PictureType = 'front_cover' | 'back_cover' | 'other';

/** A picture embedded in an audio file's tags */
export interface Picture {
  readonly pictureType: PictureType;
  /** MIME type of the image bytes (e.g. "image/jpeg") */
  readonly mimeType: string;
  readonly data: Buffer;
}

/** The tag set embedded in an audio file */
export interface Tags {
  readonly title: string | null;
  readonly trackArtist: string | null;
  readonly album: string | null;
  readonly albumArtist: string | null;
  readonly year: number | null;
  readonly genre: string | null;
  readonly trackNumber: number | null;
  readonly trackTotal: number | null;
  readonly discNumber: number | null;
  readonly discTotal: number | null;
  /** Lyrics text (plain or LRC-timestamped) */
  readonly lyrics: string | null;
  readonly pictures: readonly Picture[];
}

/** Tag fields that are unique to each file and never taken from a batch template */
export const PER_FILE_UNIQUE_FIELDS = [
  'title',
  'trackNumber',
  'trackTotal',
  'discNumber',
  'discTotal',
] as const satisfies ReadonlyArray<keyof Tags>;

/** Fields a batch template can apply to every file */
export type DirtyField = 'artist' | 'album' | 'albumArtist' | 'genre' | 'year';

/** All dirty-trackable fields, in display order */
export const SHARED_FIELDS: readonly DirtyField[] = [
  'artist',
  'album',
  'albumArtist',
  'genre',
  'year',
] as const;

/** Maps a dirty-field identifier to the Tags property it controls */
export const SHARED_FIELD_KEYS = {
  artist: 'trackArtist',
  album: 'album',
  albumArtist: 'albumArtist',
  genre: 'genre',
  year: 'year',
} as const satisfies Record<DirtyField, keyof Tags>;

/**
 * A pending edit with an explicit tombstone.
 * - unset: nothing pending, the persisted value stays
 * - set: persist `value` on commit
 * - cleared: remove the persisted value on commit
 */
export type PendingField<T> =
  | { readonly kind: 'unset' }
  | { readonly kind: 'set'; readonly value: T }
  | { readonly kind: 'cleared' };

/** Unsaved, in-memory edits attached to a media item */
export interface PendingOverlay {
  readonly lyrics: PendingField<string>;
  readonly cover: PendingField<Buffer>;
  /** Write a lyrics sidecar file next to the audio file on commit */
  readonly extractLyrics: boolean;
  /** Romanize lyrics before they are persisted */
  readonly romanize: boolean;
  /** Free-text status label shown next to the item during batch work */
  readonly status: string | null;
  /** Whether a batch step is currently working on this item */
  readonly processing: boolean;
}

/** An audio file in the library, with its persisted tags and pending edits */
export interface MediaItem {
  /** Absolute path to the audio file (identity) */
  readonly path: string;
  /** Filename with extension */
  readonly name: string;
  /** Duration in seconds (null until tags are read) */
  readonly duration: number | null;
  /** Persisted tags (null until loaded) */
  readonly tags: Tags | null;
  readonly pending: PendingOverlay;
}

/** Synthetic MediaItem-shaped value holding the batch-wide edit target */
export type BatchTemplate = MediaItem;

/** Status labels written to a media item's overlay by batch pipelines */
export const BATCH_STATUS = {
  FINDING_LYRICS: 'Finding lyrics...',
  ROMANIZING: 'Romanizing...',
  FINDING_COVER: 'Finding cover...',
  CONVERTING: 'Converting...',
  SAVING: 'Saving...',
  DONE: 'Done',
  NOT_FOUND: 'Not found',
  SKIPPED_NO_METADATA: 'Skipped (no metadata)',
  SKIPPED_HAS_COVER: 'Skipped (has cover)',
  ERROR: 'Error',
  CONVERTED: 'Converted',
  CONVERSION_FAILED: 'Conversion failed',
  SAVED: 'Saved',
  SAVE_FAILED: 'Save failed',
} as const;

export type BatchStatus = (typeof BATCH_STATUS)[keyof typeof BATCH_STATUS];

/** Name of a batch pipeline */
export type PipelineKind = 'lyrics' | 'covers' | 'transcode' | 'save';

/** Aggregate outcome of one pipeline run over a batch */
export interface PipelineSummary {
  pipeline: PipelineKind;
  /** Number of files in the batch */
  total: number;
  succeeded: number;
  skipped: number;
  notFound: number;
  failed: number;
  /** True when the run was refused because another run was in flight */
  rejected: boolean;
}

/** Progress update published after every pipeline step */
export interface ProgressUpdate {
  pipeline: PipelineKind;
  totalFiles: number;
  processedFiles: number;
  successCount: number;
  errorCount: number;
  skippedCount: number;
  notFoundCount: number;
  /** Filename of the item being worked on */
  currentFile: string | null;
}

/** Output formats the transcoder can produce */
export type TranscodeFormat = 'flac' | 'wav';

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** Application settings */
export interface AppSettings {
  /** Directory opened on the previous run */
  lastDirectory: string | null;
  /** Whether batch cover fetch replaces existing cover art by default */
  replaceExistingCovers: boolean;
  /** Interpreter used to run the romanization script */
  romanizerInterpreter: string;
  /** Path to the romanization script (null = romanization unavailable) */
  romanizerScriptPath: string | null;
  /** Path to the ffmpeg binary */
  ffmpegPath: string;
  /** Format produced by the transcode pipeline */
  transcodeFormat: TranscodeFormat;
  /** Whether lyrics/cover lookups are cached in SQLite across sessions */
  usePersistentCache: boolean;
  /** HTTP and process timeout in milliseconds */
  requestTimeout: number;
  /** Retries for lookup requests */
  maxRetries: number;
  /** Minimum level written by the logger */
  logLevel: LogLevel;
}

/** Default application settings */
export const DEFAULT_SETTINGS: AppSettings = {
  lastDirectory: null,
  replaceExistingCovers: false,
  romanizerInterpreter: 'python3',
  romanizerScriptPath: null,
  ffmpegPath: 'ffmpeg',
  transcodeFormat: 'flac',
  usePersistentCache: false,
  requestTimeout: 10000,
  maxRetries: 2,
  logLevel: 'INFO',
};
