/**
 * Album Cover Lookup Service
 *
 * Finds album artwork by artist and album name. Sources, in order:
 *
 * 1. Deezer album search (`cover_xl`, 1000×1000)
 * 2. iTunes album search (`artworkUrl100`, upscaled to 600×600)
 *
 * Neither needs an API key. The first image that downloads wins.
 */

import type { CoverLookup } from './collaborators';
import { type CoverCache, makeCacheKey } from './persistentCache';
import { errorMessage } from './errors';
import type { Logger } from './logger';
import { getWithRetry, type RetryOptions } from '../utils/http';

// ─── Constants ───────────────────────────────────────────────────────────────

const DEEZER_API_URL = 'https://api.deezer.com';
const ITUNES_SEARCH_URL = 'https://itunes.apple.com/search';

// ─── Response Shapes ─────────────────────────────────────────────────────────

interface DeezerAlbum {
  id: number;
  title: string;
  artist?: { name?: string };
  cover_xl?: string;
  cover_big?: string;
  cover?: string;
}

interface DeezerAlbumSearchResponse {
  data?: DeezerAlbum[];
}

interface ItunesAlbum {
  wrapperType?: string;
  collectionType?: string;
  artistName?: string;
  collectionName?: string;
  artworkUrl100?: string;
}

interface ItunesSearchResponse {
  resultCount: number;
  results?: ItunesAlbum[];
}

export interface CoverArtLookupOptions extends RetryOptions {
  /** Override the Deezer API base URL (for testing) */
  deezerBaseUrl?: string;
  /** Override the iTunes search URL (for testing) */
  itunesSearchUrl?: string;
  cache?: CoverCache | null;
  logger?: Logger | null;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Normalises a name for fuzzy comparison: lowercase, alphanumerics only.
 */
function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

/**
 * True when `actual` is a plausible match for `expected` (substring either
 * way, so "feat." variants still match).
 */
export function namesMatch(expected: string, actual: string | undefined): boolean {
  if (actual === undefined) return true;
  const exp = normalizeName(expected);
  const act = normalizeName(actual);
  if (!exp || !act) return false;
  return act.includes(exp) || exp.includes(act);
}

export function bestDeezerCover(album: DeezerAlbum): string | null {
  return album.cover_xl ?? album.cover_big ?? album.cover ?? null;
}

/** iTunes serves 100×100 artwork by default; 600×600 is usually available */
export function upscaleItunesArtwork(url: string): string {
  return url.replace('100x100bb', '600x600bb').replace('100x100', '600x600');
}

/** Result of trying every source; `failed` when any search or download threw */
interface CoverLookupOutcome {
  cover: Buffer | null;
  failed: boolean;
}

// ─── Lookup ──────────────────────────────────────────────────────────────────

export class CoverArtLookup implements CoverLookup {
  constructor(private readonly options: CoverArtLookupOptions = {}) {}

  /**
   * Returns cover bytes, or null when no source has a matching album.
   * Throws an APIError when every source failed outright.
   *
   * A miss is cached only when every source answered without error.
   */
  async fetchCover(artist: string, album: string): Promise<Buffer | null> {
    const cache = this.options.cache ?? null;
    const key = makeCacheKey(artist, album);
    const cached = cache?.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const { cover, failed } = await this.lookup(artist.trim(), album.trim());
    if (cover !== null || !failed) {
      cache?.set(key, cover);
    }
    return cover;
  }

  /** Deezer album search; the first result whose artist matches. */
  async findDeezerCoverUrl(artist: string, album: string): Promise<string | null> {
    const response = await getWithRetry<DeezerAlbumSearchResponse>(
      'Deezer',
      `${this.options.deezerBaseUrl ?? DEEZER_API_URL}/search/album`,
      { params: { q: `${artist} ${album}` } },
      this.options,
    );
    const matched = (response?.data ?? []).find((result) => namesMatch(artist, result.artist?.name));
    return matched ? bestDeezerCover(matched) : null;
  }

  /** iTunes album search; an exact album-name match is preferred. */
  async findItunesCoverUrl(artist: string, album: string): Promise<string | null> {
    const response = await getWithRetry<ItunesSearchResponse>(
      'iTunes',
      this.options.itunesSearchUrl ?? ITUNES_SEARCH_URL,
      { params: { term: `${artist} ${album}`, entity: 'album', media: 'music', limit: 5 } },
      this.options,
    );
    const albums = (response?.results ?? []).filter(
      (result) => result.artworkUrl100 && namesMatch(artist, result.artistName),
    );
    const exact = albums.find(
      (result) => result.collectionName?.toLowerCase() === album.toLowerCase(),
    );
    const chosen = exact ?? albums[0];
    return chosen?.artworkUrl100 ? upscaleItunesArtwork(chosen.artworkUrl100) : null;
  }

  async downloadImage(url: string): Promise<Buffer | null> {
    const data = await getWithRetry<ArrayBuffer>('Cover download', url, { responseType: 'arraybuffer' }, this.options);
    if (data === null) return null;
    const image = Buffer.from(data);
    return image.length > 0 ? image : null;
  }

  private async lookup(artist: string, album: string): Promise<CoverLookupOutcome> {
    const sources: Array<[string, () => Promise<string | null>]> = [
      ['Deezer', () => this.findDeezerCoverUrl(artist, album)],
      ['iTunes', () => this.findItunesCoverUrl(artist, album)],
    ];

    let lastError: unknown = null;
    let anySourceAnswered = false;

    for (const [name, findUrl] of sources) {
      try {
        const url = await findUrl();
        anySourceAnswered = true;
        if (url === null) continue;
        const image = await this.downloadImage(url);
        if (image !== null) return { cover: image, failed: false };
      } catch (error: unknown) {
        lastError = error;
        this.options.logger?.warn(`${name} cover lookup failed: ${errorMessage(error)}`, {
          step: 'covers',
        });
      }
    }

    if (!anySourceAnswered && lastError !== null) {
      throw lastError;
    }
    return { cover: null, failed: lastError !== null };
  }
}
