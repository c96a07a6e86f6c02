/**
 * Logger Service
 *
 * Structured logging for albumsmith. Entries are kept in memory for the
 * end-of-run summary, appended to a daily log file and optionally echoed to
 * the terminal.
 *
 * Log levels: ERROR (track failed), WARN (track skipped), INFO (progress)
 *
 * Default log directory: ~/.config/albumsmith/logs/ (%APPDATA% on Windows)
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { AlbumError, ErrorCategory, isAlbumError } from './errors';
import { getAppDataDir } from './settingsManager';
import { LogLevel } from '../../shared/types';

export type { LogLevel };

// ─── Interfaces ──────────────────────────────────────────────────────────

export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  category: ErrorCategory | null;
  /** File being handled when the entry was created */
  filePath: string | null;
  step: string | null;
  /** Message of the underlying error */
  cause: string | null;
}

/** Context attached to a log entry */
export interface LogContext {
  category?: ErrorCategory;
  filePath?: string;
  step?: string;
  cause?: string;
}

/** Receives every entry that passes the level filter, e.g. to print it */
export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Defaults to the albumsmith app data `logs` directory */
  logDir?: string;
  /** Minimum level kept (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Defaults to true */
  writeToFile?: boolean;
  sink?: LogSink;
  /** Clock override for tests */
  getCurrentDate?: () => Date;
}

export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  errorsByCategory: Partial<Record<ErrorCategory, number>>;
  /** Null when file logging is off */
  logFilePath: string | null;
}

// ─── Constants ───────────────────────────────────────────────────────────

const LOG_DIR_NAME = 'logs';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

// ─── Helper Functions ────────────────────────────────────────────────────

export function getDefaultLogDir(): string {
  return path.join(getAppDataDir(), LOG_DIR_NAME);
}

/**
 * @example getLogFileName(new Date(2024, 0, 5)) === '2024-01-05.log'
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats an entry as one line of a log file.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | filePath: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [`[${entry.timestamp}]`, entry.level];

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }
  parts.push(entry.message);
  if (entry.filePath) {
    parts.push(`| filePath: ${entry.filePath}`);
  }
  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }
  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * Formats an entry for the terminal: no timestamp, no step.
 *
 * @example formatConsoleLine(entry) === 'WARN  skipped (tags up to date) [01 - Intro.mp3]'
 */
export function formatConsoleLine(entry: LogEntry): string {
  const level = entry.level.padEnd(5);
  const file = entry.filePath ? ` [${entry.filePath}]` : '';
  const cause = entry.cause && entry.cause !== entry.message ? `: ${entry.cause}` : '';
  return `${level} ${entry.message}${cause}${file}`;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

export function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  now: Date = new Date(),
): LogEntry {
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: context?.category ?? null,
    filePath: context?.filePath ?? null,
    step: context?.step ?? null,
    cause: context?.cause ?? null,
  };
}

export function createLogEntryFromError(error: AlbumError, level: LogLevel, now: Date = new Date()): LogEntry {
  return createLogEntry(
    level,
    error.message,
    {
      category: error.category,
      filePath: error.filePath ?? undefined,
      step: error.step,
      cause: error.cause?.message,
    },
    now,
  );
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Usage:
 * ```typescript
 * const logger = new Logger({ sink: (entry) => console.error(formatConsoleLine(entry)) });
 * await logger.initialize();
 * logger.info('tags updated', { filePath: '/music/Album/01 - Intro.mp3' });
 * logger.logError(new TagError('write failed', { filePath }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private writeToFile: boolean;
  private readonly sink: LogSink | null;
  private readonly getCurrentDate: () => Date;

  private entries: LogEntry[] = [];
  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.sink = options?.sink ?? null;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Creates the log directory. If that fails, file logging is turned off and
   * a warning is recorded; in-memory logging keeps working.
   */
  async initialize(): Promise<void> {
    if (this.writeToFile) {
      try {
        await fs.promises.mkdir(this.logDir, { recursive: true });
      } catch (error: unknown) {
        this.disableFileLogging(`Failed to create log directory "${this.logDir}"`, error);
      }
    }
    this.initialized = true;
  }

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
   * Logs any thrown value at ERROR level. Category, file and step are taken
   * from an `AlbumError`; other values only carry their message.
   */
  logError(error: unknown, context?: { filePath?: string; step?: string }): void {
    if (isAlbumError(error)) {
      if (shouldLog('ERROR', this.minLevel)) {
        this.addEntry(createLogEntryFromError(error, 'ERROR', this.getCurrentDate()));
      }
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.error(message, context);
  }

  /** Logs a track that was left untouched (WARN level) */
  logSkippedFile(filePath: string, reason: string): void {
    this.warn(`skipped (${reason})`, { filePath, step: 'processing' });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, context, this.getCurrentDate()));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    this.sink?.(entry);
    if (this.writeToFile && this.initialized) {
      this.appendToFile(entry);
    }
  }

  private appendToFile(entry: LogEntry): void {
    const logFilePath = this.getLogFilePath();
    try {
      fs.appendFileSync(logFilePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.disableFileLogging(`Failed to write log file "${logFilePath}"`, error);
    }
  }

  private disableFileLogging(reason: string, error: unknown): void {
    this.writeToFile = false;
    const message = error instanceof Error ? error.message : String(error);
    this.addEntry(createLogEntry('WARN', `${reason}: ${message}. File logging disabled.`, undefined, this.getCurrentDate()));
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /** In-memory entries, optionally restricted to one level */
  getEntries(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter((e) => e.level === level) : [...this.entries];
  }

  getErrors(): LogEntry[] {
    return this.getEntries('ERROR');
  }

  getSummary(): LogSummary {
    const errorsByCategory: Partial<Record<ErrorCategory, number>> = {};
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

  clear(): void {
    this.entries = [];
  }
}
