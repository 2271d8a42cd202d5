import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels for filtering output.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  PERF = 4  // Performance measurements
}

/**
 * Structured log entry for JSONL format
 */
interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  metadata?: Record<string, unknown>;
  stack?: string;
  duration?: number;
}

/**
 * Destination for the human-readable transport.
 */
export interface LogSink {
  write(line: string): void;
}

/**
 * Logger interface for dependency injection.
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown): void;
  perf(component: string, operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
  setLevel(level: LogLevel): void;
}

const stderrSink: LogSink = {
  write: (line: string) => {
    process.stderr.write(line + '\n');
  }
};

/**
 * Logging service for the CLI.
 *
 * Features:
 * - Dual transport: stderr (keeps stdout for results) + optional JSONL file
 * - PERF entries for phase timings
 * - Buffered file writes, flushed on dispose
 *
 * Usage:
 * ```typescript
 * logger.info('[DirectoryWalker] Walk complete');
 * logger.perf('SearchEngine', 'score', 12.5, { chunks: 4 });
 * ```
 */
export class LoggerService implements ILogger {
  private currentLevel: LogLevel;
  private logFilePath = '';
  private logBuffer: LogEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private readonly maxBufferSize = 50;
  private readonly flushIntervalMs = 5000;

  constructor(level: LogLevel = LogLevel.WARN, private readonly sink: LogSink = stderrSink) {
    this.currentLevel = level;
  }

  /**
   * Enable the JSONL file transport. Every level is written to the file,
   * independent of the console threshold.
   */
  initFileLogging(logFilePath: string): void {
    try {
      fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
      this.logFilePath = logFilePath;
      this.debug('[Logger] File logging initialized: ' + logFilePath);
    } catch (error: unknown) {
      this.warn('[Logger] Failed to initialize file logging: ' + describeError(error));
    }
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, 'DEBUG', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, 'INFO', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, 'WARN', message, args);
  }

  /**
   * Log an error message with optional error object.
   */
  error(message: string, error?: unknown): void {
    let fullMessage = message;
    let stack: string | undefined;

    if (error !== undefined) {
      if (error instanceof Error) {
        fullMessage += `: ${error.message}`;
        stack = error.stack;
      } else {
        fullMessage += `: ${this.stringify(error)}`;
      }
    }

    this.logStructured(LogLevel.ERROR, 'ERROR', fullMessage, undefined, { stack });
  }

  perf(component: string, operation: string, durationMs: number, metadata?: Record<string, unknown>): void {
    const message = `[${component}] ${operation}`;
    this.logStructured(LogLevel.PERF, 'PERF', message, metadata, { duration: durationMs });
  }

  /**
   * Flush buffered logs to file
   */
  flush(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.logBuffer.length === 0 || !this.logFilePath) {
      return;
    }

    const lines = this.logBuffer.map(entry => JSON.stringify(entry)).join('\n') + '\n';
    this.logBuffer = [];
    try {
      fs.appendFileSync(this.logFilePath, lines, 'utf-8');
    } catch (error: unknown) {
      this.sink.write(`[Logger] Failed to write ${this.logFilePath}: ${describeError(error)}`);
    }
  }

  dispose(): void {
    this.flush();
  }

  private log(level: LogLevel, label: string, message: string, args: unknown[]): void {
    const metadata = args.length > 0 ? { args: args.map(a => this.stringify(a)) } : undefined;
    this.logStructured(level, label, message, metadata);
  }

  private logStructured(
    level: LogLevel,
    label: string,
    message: string,
    metadata?: Record<string, unknown>,
    extra?: { stack?: string; duration?: number }
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: label,
      message,
      ...(metadata && { metadata }),
      ...(extra?.stack && { stack: extra.stack }),
      ...(extra?.duration !== undefined && { duration: extra.duration })
    };

    // Transport 1: stderr (human-readable, filtered by level; PERF only when debugging)
    const visible = level === LogLevel.PERF
      ? this.currentLevel === LogLevel.DEBUG
      : this.currentLevel <= level;
    if (visible) {
      this.sink.write(this.formatForConsole(entry));
    }

    // Transport 2: File (JSONL, all levels)
    if (this.logFilePath) {
      this.bufferLog(entry);
    }
  }

  private formatForConsole(entry: LogEntry): string {
    const timestamp = entry.timestamp.split('T')[1]?.substring(0, 8) || '';
    const level = entry.level.padEnd(5);
    let message = `[${timestamp}] [${level}] ${entry.message}`;

    if (entry.duration !== undefined) {
      message += ` (${entry.duration.toFixed(2)}ms)`;
    }

    return message;
  }

  private bufferLog(entry: LogEntry): void {
    this.logBuffer.push(entry);

    if (this.logBuffer.length >= this.maxBufferSize) {
      this.flush();
    } else if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => this.flush(), this.flushIntervalMs);
      this.flushTimer.unref();
    }
  }

  private stringify(value: unknown): string {
    if (value === null) {
      return 'null';
    }
    if (value === undefined) {
      return 'undefined';
    }
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }

    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Null logger for testing or disabled logging scenarios.
 */
export class NullLogger implements ILogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  perf(): void {}
  setLevel(): void {}
}
