/**
 * Lyrics Fetching Service
 *
 * Looks up synced and plain lyrics on the LRCLIB API (no key required).
 * The exact-match endpoint `/api/get` is tried first; when it has nothing
 * usable, `/api/search` results are ranked instead. Results, including
 * misses, are cached when a cache is supplied.
 */

import type { LyricsLookup, LyricsMatch } from './collaborators';
import { type LyricsCache, makeCacheKey } from './persistentCache';
import type { Logger } from './logger';
import { getWithRetry, type RetryOptions } from '../utils/http';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** LRCLIB API record */
export interface LrclibRecord {
  id: number;
  trackName: string;
  artistName: string;
  albumName?: string | null;
  duration?: number | null;
  instrumental: boolean;
  plainLyrics: string | null;
  syncedLyrics: string | null;
}

export interface LrclibLookupOptions extends RetryOptions {
  /** Override the API base URL (for testing) */
  baseUrl?: string;
  cache?: LyricsCache | null;
  logger?: Logger | null;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const LRCLIB_API_URL = 'https://lrclib.net/api';
const LRCLIB_SERVICE = 'LRCLIB';
/** Search hits further than this from the file's duration (seconds) rank lower */
const DURATION_TOLERANCE = 2;

// ─── Lyrics Cleanup ─────────────────────────────────────────────────────────

/**
 * Normalizes line endings, strips trailing whitespace per line and
 * collapses runs of blank lines to one.
 */
export function cleanLyrics(rawLyrics: string): string {
  if (rawLyrics.trim().length === 0) {
    return '';
  }

  return rawLyrics
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

// ─── Match Validation ───────────────────────────────────────────────────────

/**
 * Fuzzy check that a record belongs to the requested song: lowercased
 * substring containment in either direction for artist and title.
 */
export function validateLyricsMatch(
  queryArtist: string,
  queryTitle: string,
  responseArtist: string | undefined | null,
  responseTitle: string | undefined | null,
): boolean {
  if (!responseArtist && !responseTitle) {
    return true;
  }

  const qArtist = queryArtist.toLowerCase().trim();
  const qTitle = queryTitle.toLowerCase().trim();
  const rArtist = (responseArtist || '').toLowerCase().trim();
  const rTitle = (responseTitle || '').toLowerCase().trim();

  const artistMatch = rArtist.length === 0 || rArtist.includes(qArtist) || qArtist.includes(rArtist);
  const titleMatch = rTitle.length === 0 || rTitle.includes(qTitle) || qTitle.includes(rTitle);

  return artistMatch && titleMatch;
}

function hasLyrics(record: LrclibRecord): boolean {
  return (
    !record.instrumental &&
    ((record.syncedLyrics !== null && record.syncedLyrics.trim().length > 0) ||
      (record.plainLyrics !== null && record.plainLyrics.trim().length > 0))
  );
}

function withinDuration(record: LrclibRecord, duration: number | null | undefined): boolean {
  if (duration === null || duration === undefined || typeof record.duration !== 'number') {
    return true;
  }
  return Math.abs(record.duration - duration) <= DURATION_TOLERANCE;
}

/**
 * Ranks search results: records with lyrics only; validated artist/title
 * first, then those within the duration tolerance, then synced lyrics.
 */
export function pickBestRecord(
  records: readonly LrclibRecord[],
  artist: string,
  title: string,
  duration?: number | null,
): LrclibRecord | null {
  const score = (record: LrclibRecord): number =>
    (validateLyricsMatch(artist, title, record.artistName, record.trackName) ? 4 : 0) +
    (withinDuration(record, duration) ? 2 : 0) +
    (record.syncedLyrics ? 1 : 0);

  let best: LrclibRecord | null = null;
  let bestScore = -1;
  for (const record of records) {
    if (!hasLyrics(record)) continue;
    const recordScore = score(record);
    if (recordScore > bestScore) {
      best = record;
      bestScore = recordScore;
    }
  }
  return best;
}

export function toLyricsMatch(record: LrclibRecord): LyricsMatch {
  const synced = record.syncedLyrics ? cleanLyrics(record.syncedLyrics) : '';
  const plain = record.plainLyrics ? cleanLyrics(record.plainLyrics) : '';
  return {
    syncedLyrics: synced.length > 0 ? synced : null,
    plainLyrics: plain.length > 0 ? plain : null,
  };
}

// ─── LRCLIB API ─────────────────────────────────────────────────────────────

function searchParams(
  artist: string,
  title: string,
  album?: string | null,
  duration?: number | null,
): Record<string, string | number> {
  const params: Record<string, string | number> = { track_name: title, artist_name: artist };
  if (album) params.album_name = album;
  if (typeof duration === 'number' && duration > 0) params.duration = Math.round(duration);
  return params;
}

/**
 * Queries `/api/get` for an exact match.
 *
 * @returns the record, or null on 404
 * @throws APIError once retries are exhausted
 */
export async function queryLrclib(
  artist: string,
  title: string,
  album?: string | null,
  duration?: number | null,
  options: LrclibLookupOptions = {},
): Promise<LrclibRecord | null> {
  return getWithRetry<LrclibRecord>(
    LRCLIB_SERVICE,
    `${options.baseUrl ?? LRCLIB_API_URL}/get`,
    { params: searchParams(artist, title, album, duration), headers: { Accept: 'application/json' } },
    options,
  );
}

/**
 * Queries `/api/search`. Album and duration are not sent, so that
 * re-releases and different cuts still show up.
 */
export async function searchLrclib(
  artist: string,
  title: string,
  options: LrclibLookupOptions = {},
): Promise<LrclibRecord[]> {
  const records = await getWithRetry<LrclibRecord[]>(
    LRCLIB_SERVICE,
    `${options.baseUrl ?? LRCLIB_API_URL}/search`,
    { params: searchParams(artist, title), headers: { Accept: 'application/json' } },
    options,
  );
  return Array.isArray(records) ? records : [];
}

// ─── Lookup ──────────────────────────────────────────────────────────────────

export class LrclibLyricsLookup implements LyricsLookup {
  constructor(private readonly options: LrclibLookupOptions = {}) {}

  async findBestMatch(
    artist: string,
    title: string,
    album?: string | null,
    duration?: number | null,
  ): Promise<LyricsMatch | null> {
    const trimmedArtist = artist.trim();
    const trimmedTitle = title.trim();
    if (trimmedArtist.length === 0 || trimmedTitle.length === 0) {
      return null;
    }

    const cache = this.options.cache ?? null;
    const key = makeCacheKey(trimmedArtist, trimmedTitle, album);
    const cached = cache?.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const match = await this.lookup(trimmedArtist, trimmedTitle, album, duration);
    cache?.set(key, match);
    return match;
  }

  private async lookup(
    artist: string,
    title: string,
    album?: string | null,
    duration?: number | null,
  ): Promise<LyricsMatch | null> {
    const exact = await queryLrclib(artist, title, album, duration, this.options);
    if (exact && hasLyrics(exact)) {
      return toLyricsMatch(exact);
    }

    this.options.logger?.info(`No exact lyrics match for "${artist} - ${title}", searching`, {
      step: 'lyrics',
    });
    const best = pickBestRecord(await searchLrclib(artist, title, this.options), artist, title, duration);
    return best ? toLyricsMatch(best) : null;
  }
}
