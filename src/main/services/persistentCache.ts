/**
 * Lookup Cache Service
 *
 * Caches lyrics and cover lookups so that repeated batch runs over the same
 * albums do not hit the network again. Two backends share one interface:
 * an in-memory map for a single session, and SQLite (better-sqlite3) for
 * caching across sessions.
 *
 * A cached `null` means "looked up, nothing found"; `undefined` from get()
 * means "not cached".
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { LyricsMatch } from './collaborators';
import { getDefaultSettingsDir } from './settingsManager';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface LookupCache<T> {
  has(key: string): boolean;
  get(key: string): T | null | undefined;
  set(key: string, value: T | null): void;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}

export type LyricsCache = LookupCache<LyricsMatch>;
export type CoverCache = LookupCache<Buffer>;

/**
 * Normalized cache key: parts lowercased, trimmed and joined with "|".
 * Absent parts contribute an empty segment.
 */
export function makeCacheKey(...parts: Array<string | number | null | undefined>): string {
  return parts.map((part) => (part === null || part === undefined ? '' : String(part).toLowerCase().trim())).join('|');
}

// ─── In-Memory Cache ─────────────────────────────────────────────────────────

export class MemoryLookupCache<T> implements LookupCache<T> {
  private readonly entries = new Map<string, T | null>();

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): T | null | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: T | null): void {
    this.entries.set(key, value);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// ─── Database ────────────────────────────────────────────────────────────────

/** Current schema version for migration support */
const SCHEMA_VERSION = 1;

/**
 * Returns the default path for the cache database file.
 */
export function getDefaultCachePath(): string {
  return path.join(getDefaultSettingsDir(), 'cache.db');
}

export interface CacheDatabaseOptions {
  /** Path to the SQLite database file. Defaults to the settings directory. */
  dbPath?: string;
  /** Whether to use an in-memory database (for testing) */
  inMemory?: boolean;
}

export type CacheTable = 'lyrics' | 'covers';

interface LyricsRow {
  result_json: string | null;
}

interface CoverRow {
  image: Buffer | null;
}

interface CountRow {
  count: number;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

/**
 * Parses a stored lyrics match. Malformed rows read as "not cached".
 */
export function parseLyricsMatch(json: string): LyricsMatch | undefined {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    return undefined;
  }
  if (
    typeof value === 'object' &&
    value !== null &&
    'syncedLyrics' in value &&
    'plainLyrics' in value &&
    isNullableString(value.syncedLyrics) &&
    isNullableString(value.plainLyrics)
  ) {
    return { syncedLyrics: value.syncedLyrics, plainLyrics: value.plainLyrics };
  }
  return undefined;
}

/**
 * SQLite database holding the lyrics and covers tables.
 */
export class CacheDatabase {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly inMemory: boolean;

  constructor(options: CacheDatabaseOptions = {}) {
    this.inMemory = options.inMemory ?? false;
    this.dbPath = this.inMemory ? ':memory:' : (options.dbPath ?? getDefaultCachePath());
  }

  /**
   * Opens the database and creates tables if they don't exist.
   * Must be called before any cache operations.
   */
  initialize(): void {
    if (!this.inMemory) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS lyrics (
        cache_key TEXT PRIMARY KEY,
        result_json TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS covers (
        cache_key TEXT PRIMARY KEY,
        image BLOB,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const versionRow = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
    if (!versionRow) {
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
    }

    this.db = db;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.dbPath;
  }

  // ─── Lyrics ────────────────────────────────────────────────────────────────

  setLyrics(key: string, match: LyricsMatch | null): void {
    const json = match === null ? null : JSON.stringify(match);
    this.requireDb()
      .prepare(
        `INSERT OR REPLACE INTO lyrics (cache_key, result_json, created_at)
           VALUES (?, ?, datetime('now'))`,
      )
      .run(key, json);
  }

  getLyrics(key: string): LyricsMatch | null | undefined {
    const row = this.requireDb()
      .prepare<[string], LyricsRow>('SELECT result_json FROM lyrics WHERE cache_key = ?')
      .get(key);
    if (row === undefined) return undefined;
    if (row.result_json === null) return null;
    return parseLyricsMatch(row.result_json);
  }

  // ─── Covers ────────────────────────────────────────────────────────────────

  setCover(key: string, image: Buffer | null): void {
    this.requireDb()
      .prepare(
        `INSERT OR REPLACE INTO covers (cache_key, image, created_at)
           VALUES (?, ?, datetime('now'))`,
      )
      .run(key, image);
  }

  getCover(key: string): Buffer | null | undefined {
    const row = this.requireDb()
      .prepare<[string], CoverRow>('SELECT image FROM covers WHERE cache_key = ?')
      .get(key);
    if (row === undefined) return undefined;
    return row.image === null ? null : Buffer.from(row.image);
  }

  // ─── Shared ────────────────────────────────────────────────────────────────

  has(table: CacheTable, key: string): boolean {
    return this.requireDb().prepare(`SELECT 1 FROM ${table} WHERE cache_key = ?`).get(key) !== undefined;
  }

  delete(table: CacheTable, key: string): boolean {
    return this.requireDb().prepare(`DELETE FROM ${table} WHERE cache_key = ?`).run(key).changes > 0;
  }

  count(table: CacheTable): number {
    const row = this.requireDb().prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get();
    return row?.count ?? 0;
  }

  clear(table: CacheTable): void {
    this.requireDb().exec(`DELETE FROM ${table}`);
  }

  clearAll(): void {
    this.clear('lyrics');
    this.clear('covers');
  }

  getStats(): { lyrics: number; covers: number; totalEntries: number } {
    const lyrics = this.count('lyrics');
    const covers = this.count('covers');
    return { lyrics, covers, totalEntries: lyrics + covers };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error('CacheDatabase is not initialized. Call initialize() first.');
    }
    return this.db;
  }
}

// ─── Adapters ────────────────────────────────────────────────────────────────

export class PersistentLyricsCache implements LyricsCache {
  constructor(private readonly db: CacheDatabase) {}

  has(key: string): boolean {
    return this.db.has('lyrics', key);
  }

  get(key: string): LyricsMatch | null | undefined {
    return this.db.getLyrics(key);
  }

  set(key: string, value: LyricsMatch | null): void {
    this.db.setLyrics(key, value);
  }

  delete(key: string): boolean {
    return this.db.delete('lyrics', key);
  }

  clear(): void {
    this.db.clear('lyrics');
  }

  get size(): number {
    return this.db.count('lyrics');
  }
}

export class PersistentCoverCache implements CoverCache {
  constructor(private readonly db: CacheDatabase) {}

  has(key: string): boolean {
    return this.db.has('covers', key);
  }

  get(key: string): Buffer | null | undefined {
    return this.db.getCover(key);
  }

  set(key: string, value: Buffer | null): void {
    this.db.setCover(key, value);
  }

  delete(key: string): boolean {
    return this.db.delete('covers', key);
  }

  clear(): void {
    this.db.clear('covers');
  }

  get size(): number {
    return this.db.count('covers');
  }
}
