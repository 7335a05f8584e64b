/**
 * Logger Service
 *
 * Structured logging with log levels, error categorization and integration with
 * the PipelineError classes. Entries are counted per level and per error
 * category for the end-of-run report, optionally appended to a daily log file,
 * and optionally echoed to the console. Nothing else is kept in memory, so a
 * long-running scheduler does not accumulate entries.
 *
 * Default log directory: $XDG_CONFIG_HOME (or ~/.config)/music-sidecar/logs/
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineError, isPipelineError, ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Log severity level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** Track being processed when the log was created (if applicable) */
  filePath: string | null;
  /** Processing step where the log was created (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
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
  /** Directory to store log files */
  logDir?: string;
  /** Minimum log level to record (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Whether to echo entries to stdout/stderr. Defaults to false */
  writeToConsole?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Counts of what has been logged so far */
export interface LogSummary {
  errorCount: number;
  warnCount: number;
  infoCount: number;
  debugCount: number;
  /** ERROR and WARN entries per error category */
  problemsByCategory: Partial<Record<ErrorCategory, number>>;
  /** Current log file (null when file logging is off or unavailable) */
  logFilePath: string | null;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'music-sidecar';

const LOG_DIR_NAME = 'logs';

/** Default maximum log file size (10MB) */
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Log level numeric values for comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path.
 */
export function getDefaultLogDir(): string {
  const configHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(configHome, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename from a Date object.
 * Format: YYYY-MM-DD.log
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single line.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | filePath: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];

  parts.push(`[${entry.timestamp}]`);
  parts.push(entry.level);

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
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a PipelineError.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    filePath: error.filePath,
    step: error.step,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a generic message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  options?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: options?.category ?? null,
    filePath: options?.filePath ?? null,
    step: options?.step ?? null,
    cause: options?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for the sidecar pipeline.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/var/log/music-sidecar', writeToConsole: true });
 * await logger.initialize();
 * logger.info('Scan started');
 * logger.logPipelineError(new WriteError('disk full', { filePath: '/music/a/b.mp3' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly writeToFile: boolean;
  private readonly writeToConsole: boolean;
  private readonly maxFileSize: number;
  private readonly getCurrentDate: () => Date;

  private readonly levelCounts: Record<LogLevel, number> = { ERROR: 0, WARN: 0, INFO: 0, DEBUG: 0 };
  private readonly problemsByCategory: Partial<Record<ErrorCategory, number>> = {};

  /** Whether the log directory has been prepared */
  private initialized = false;

  /** Cleared when the log directory cannot be created */
  private fileSinkAvailable = true;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.writeToConsole = options?.writeToConsole ?? false;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file logging is
   * disabled and a WARN entry records why.
   */
  async initialize(): Promise<void> {
    if (!this.writeToFile) {
      this.initialized = true;
      return;
    }

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
    } catch (error: unknown) {
      this.fileSinkAvailable = false;
      const message = error instanceof Error ? error.message : String(error);
      this.addEntry(
        createLogEntry(
          'WARN',
          `Failed to create log directory "${this.logDir}": ${message}. File logging disabled.`,
          undefined,
          this.getCurrentDate,
        ),
      );
    }
    this.initialized = true;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, options?: LogContext): void {
    this.log('ERROR', message, options);
  }

  warn(message: string, options?: LogContext): void {
    this.log('WARN', message, options);
  }

  info(message: string, options?: LogContext): void {
    this.log('INFO', message, options);
  }

  debug(message: string, options?: LogContext): void {
    this.log('DEBUG', message, options);
  }

  /**
   * Logs a PipelineError with full context.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any error. PipelineError context is preserved; anything else becomes a
   * plain ERROR entry with the supplied context.
   */
  logError(
    error: unknown,
    context?: {
      filePath?: string;
      step?: string;
    },
  ): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.error(message, {
      filePath: context?.filePath,
      step: context?.step,
      cause: error instanceof Error ? error.message : undefined,
    });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, options?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, options, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.levelCounts[entry.level]++;
    if (entry.category && (entry.level === 'ERROR' || entry.level === 'WARN')) {
      this.problemsByCategory[entry.category] = (this.problemsByCategory[entry.category] ?? 0) + 1;
    }
    if (this.writeToConsole) {
      this.writeEntryToConsole(entry);
    }
    if (this.writeToFile && this.initialized && this.fileSinkAvailable) {
      this.writeEntryToFile(entry);
    }
  }

  private writeEntryToConsole(entry: LogEntry): void {
    const line = formatLogEntry(entry) + '\n';
    if (entry.level === 'ERROR' || entry.level === 'WARN') {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  }

  /**
   * Appends a log entry to the current log file, rotating it when it exceeds
   * maxFileSize. A failed file write disables the file sink and is reported on
   * stderr once; it never reaches the caller.
   */
  private writeEntryToFile(entry: LogEntry): void {
    try {
      const logFilePath = this.currentLogFilePath();

      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }

      fs.appendFileSync(logFilePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.fileSinkAvailable = false;
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`File logging disabled: ${message}\n`);
    }
  }

  /**
   * Rotates a log file by renaming it with a numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  private currentLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  // ─── Summary ───────────────────────────────────────────────────────

  /**
   * Returns counts per level and ERROR/WARN counts per category.
   */
  getSummary(): LogSummary {
    const fileActive = this.writeToFile && this.initialized && this.fileSinkAvailable;
    return {
      errorCount: this.levelCounts.ERROR,
      warnCount: this.levelCounts.WARN,
      infoCount: this.levelCounts.INFO,
      debugCount: this.levelCounts.DEBUG,
      problemsByCategory: { ...this.problemsByCategory },
      logFilePath: fileActive ? this.currentLogFilePath() : null,
    };
  }
}
