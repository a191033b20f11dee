/**
 * logger.ts
 * Structured logger shared by the registry, the builders and the scanner.
 *
 * ConsoleLogger for the CLI; SilentLogger wherever the caller passes none.
 * FileLogger buffers lines until flush(); TeeLogger feeds both.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const DEFAULT_LOG_PREFIX = 'annotations';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Format: `HH:MM:SS.mmm [prefix] [LEVEL] message  {"context":"json"}` */
export function formatLogLine(
  prefix: string,
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const ts = now.toISOString().slice(11, 23);
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${LEVEL_LABEL[level]}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// Level-filtering base
// ---------------------------------------------------------------------------

abstract class LevelLogger implements Logger {
  private readonly _minLevel: number;
  protected readonly _prefix: string;

  protected constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract _emit(
    level: Exclude<LogLevel, 'silent'>,
    line: string,
  ): void;

  private _log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this._emit(level, formatLogLine(this._prefix, level, message, context));
  }
}

// ---------------------------------------------------------------------------
// ConsoleLogger
// ---------------------------------------------------------------------------

export class ConsoleLogger extends LevelLogger {
  constructor(level: LogLevel = 'info', prefix = DEFAULT_LOG_PREFIX) {
    super(level, prefix);
  }

  protected _emit(level: Exclude<LogLevel, 'silent'>, line: string): void {
    if (level === 'error') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ---------------------------------------------------------------------------
// FileLogger: buffers lines, written out by flush()
// ---------------------------------------------------------------------------

export class FileLogger extends LevelLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_LOG_PREFIX) {
    super(level, prefix);
  }

  /** Lines buffered so far. */
  get lines(): readonly string[] {
    return this._lines;
  }

  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected _emit(_level: Exclude<LogLevel, 'silent'>, line: string): void {
    this._lines.push(line);
  }
}

// ---------------------------------------------------------------------------
// TeeLogger: console and file
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _file: FileLogger;

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_LOG_PREFIX) {
    this._console = new ConsoleLogger(level, prefix);
    this._file = new FileLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._file.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._file.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._file.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._file.error(message, context);
  }

  flush(filePath: string): void {
    this._file.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// SilentLogger: default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
