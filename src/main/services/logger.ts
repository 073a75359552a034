/**
 * Logger Service for Tagsmith
 *
 * Structured logging with an in-memory session log (for status panels and
 * export) and optional daily log files with size rotation.
 *
 * Log levels: ERROR (failed items), WARN (skipped items), INFO (progress)
 *
 * Default log directory: ~/.config/tagsmith/logs/ (%APPDATA%/tagsmith/logs/ on Windows)
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { LogLevel } from '../../shared/types';
import { PipelineError, isPipelineError, errorMessage, ErrorCategory } from './errors';

export type { LogLevel };

// ─── Interfaces ──────────────────────────────────────────────────────────

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** File being worked on when the entry was created */
  filePath: string | null;
  /** Step that produced the entry (e.g. 'lyrics', 'commit') */
  step: string | null;
  /** Message of the underlying error, if any */
  cause: string | null;
}

/** Optional context attached to a log call */
export interface LogContext {
  category?: ErrorCategory;
  filePath?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory for log files. Defaults to the platform config directory */
  logDir?: string;
  /** Minimum log level to record (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Clock override for tests */
  getCurrentDate?: () => Date;
}

/** Counts of the session log, for display */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  errorsByCategory: Record<string, number>;
  logFilePath: string | null;
}

/** Filter options for retrieving log entries */
export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  /** Case-insensitive substring of the file path */
  filePath?: string;
  /** Return only the last N matching entries */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'tagsmith';
const LOG_DIR_NAME = 'logs';
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory.
 * On Windows: %APPDATA%/tagsmith/logs/, elsewhere ~/.config/tagsmith/logs/
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Log filename for a date, formatted YYYY-MM-DD.log.
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats an entry as a single line:
 * [TIMESTAMP] LEVEL [CATEGORY] message | filePath: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [`[${entry.timestamp}]`, entry.level];

  if (entry.category) parts.push(`[${entry.category}]`);
  parts.push(entry.message);
  if (entry.filePath) parts.push(`| filePath: ${entry.filePath}`);
  if (entry.step) parts.push(`| step: ${entry.step}`);
  if (entry.cause) parts.push(`| cause: ${entry.cause}`);

  return parts.join(' ');
}

/**
 * Whether `level` passes the `minLevel` threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a message and optional context.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  getCurrentDate: () => Date = (): Date => new Date(),
): LogEntry {
  return {
    timestamp: getCurrentDate().toISOString(),
    level,
    message,
    category: context?.category ?? null,
    filePath: context?.filePath ?? null,
    step: context?.step ?? null,
    cause: context?.cause ?? null,
  };
}

/**
 * Creates a LogEntry carrying the context of a PipelineError.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  return createLogEntry(
    level,
    error.message,
    {
      category: error.category,
      filePath: error.filePath ?? undefined,
      step: error.step,
      cause: error.cause?.message,
    },
    getCurrentDate,
  );
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Session logger.
 *
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.info('Batch lyrics fetch started', { step: 'lyrics' });
 * logger.logError(new WriteError('disk full', { filePath: '/music/a.flac' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly writeToFile: boolean;
  private readonly maxFileSize: number;
  private readonly getCurrentDate: () => Date;

  private entries: LogEntry[] = [];
  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file logging
   * is disabled and a WARN entry records why.
   */
  async initialize(): Promise<void> {
    this.initialized = true;
    if (!this.writeToFile) return;

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
    } catch (error: unknown) {
      this.entries.push(
        createLogEntry(
          'WARN',
          `Failed to create log directory "${this.logDir}": ${errorMessage(error)}. File logging disabled.`,
          undefined,
          this.getCurrentDate,
        ),
      );
    }
  }

  /** Path of today's log file. */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  /**
   * Logs any thrown value. PipelineErrors keep their category, file and step;
   * anything else becomes a plain ERROR entry with the given context.
   */
  logError(error: unknown, context?: { filePath?: string; step?: string }): void {
    if (isPipelineError(error)) {
      if (shouldLog('ERROR', this.minLevel)) {
        this.addEntry(createLogEntryFromError(error, 'ERROR', this.getCurrentDate));
      }
      return;
    }

    this.error(errorMessage(error), {
      filePath: context?.filePath,
      step: context?.step,
      cause: error instanceof Error ? error.message : undefined,
    });
  }

  /**
   * Logs a skipped item (WARN level).
   */
  logSkippedFile(filePath: string, reason: string, step = 'processing'): void {
    this.warn(`File skipped: ${reason}`, { filePath, step });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, context, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.writeToFile && this.initialized) {
      this.writeEntryToFile(entry);
    }
  }

  /**
   * Appends an entry to today's file, rotating it first when it has grown
   * past maxFileSize. A failed write only loses the file copy of the entry.
   */
  private writeEntryToFile(entry: LogEntry): void {
    const logFilePath = this.getLogFilePath();
    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
      fs.appendFileSync(logFilePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.entries.push(
        createLogEntry(
          'WARN',
          `Failed to write log file: ${errorMessage(error)}`,
          { filePath: logFilePath, step: 'logging' },
          this.getCurrentDate,
        ),
      );
    }
  }

  /**
   * Renames a full log file with the next free numeric suffix,
   * e.g. 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    while (fs.existsSync(`${base}.${rotationIndex}${ext}`)) {
      rotationIndex++;
    }
    fs.renameSync(logFilePath, `${base}.${rotationIndex}${ext}`);
  }

  // ─── Retrieval ─────────────────────────────────────────────────────

  /**
   * Returns session entries, optionally filtered.
   */
  getEntries(filter?: LogFilter): LogEntry[] {
    let entries = [...this.entries];

    if (filter?.level) {
      entries = entries.filter((e) => e.level === filter.level);
    }
    if (filter?.category) {
      entries = entries.filter((e) => e.category === filter.category);
    }
    if (filter?.filePath) {
      const search = filter.filePath.toLowerCase();
      entries = entries.filter((e) => e.filePath?.toLowerCase().includes(search) ?? false);
    }
    if (filter?.limit && filter.limit > 0) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  getErrors(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'ERROR', limit });
  }

  getWarnings(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'WARN', limit });
  }

  getSummary(): LogSummary {
    const errorsByCategory: Record<string, number> = {};
    let errorCount = 0;
    let warnCount = 0;
    let infoCount = 0;

    for (const entry of this.entries) {
      switch (entry.level) {
        case 'ERROR':
          errorCount++;
          if (entry.category) {
            errorsByCategory[entry.category] = (errorsByCategory[entry.category] ?? 0) + 1;
          }
          break;
        case 'WARN':
          warnCount++;
          break;
        case 'INFO':
          infoCount++;
          break;
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount,
      warnCount,
      infoCount,
      errorsByCategory,
      logFilePath: this.writeToFile ? this.getLogFilePath() : null,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Writes every session entry to `exportPath`, creating parent directories.
   * Returns false if the file could not be written.
   */
  async exportLog(exportPath: string): Promise<boolean> {
    try {
      await fs.promises.mkdir(path.dirname(exportPath), { recursive: true });
      const lines = this.entries.map(formatLogEntry);
      await fs.promises.writeFile(
        exportPath,
        lines.join('\n') + (lines.length > 0 ? '\n' : ''),
        'utf-8',
      );
      return true;
    } catch (error: unknown) {
      this.warn(`Log export failed: ${errorMessage(error)}`, { filePath: exportPath });
      return false;
    }
  }

  /** Clears session entries. Log files are kept. */
  clear(): void {
    this.entries = [];
  }
}
