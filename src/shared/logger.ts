/**
 * wikiladder logger
 * stderr + optional file output. stdout stays free for paths and JSON.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean;
}

/** Receives every formatted line that passes the level filter. */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

let globalLogLevel: LogLevel = 'warn';
let sink: LogSink = stderrSink;
let logFilePath: string | null = null;
let logFileStream: fs.WriteStream | null = null;

export function configureLogger(options: {
  level?: LogLevel;
  file?: string | null;
  sink?: LogSink | null;
}): void {
  if (options.level) {
    globalLogLevel = options.level;
  }
  if (options.sink !== undefined) {
    sink = options.sink ?? stderrSink;
  }
  if (options.file !== undefined) {
    if (logFileStream) {
      logFileStream.end();
      logFileStream = null;
    }
    logFilePath = options.file;
    if (logFilePath) {
      const dir = path.dirname(logFilePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      logFileStream = fs.createWriteStream(logFilePath, { flags: 'a' });
    }
  }
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[globalLogLevel];
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
  return JSON.stringify(arg);
}

export function formatLogLine(
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  args: unknown[],
  now: Date = new Date(),
): string {
  const levelTag = level.toUpperCase().padEnd(5);
  const extra = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  return `[${now.toISOString()}] ${levelTag} ${message}${extra}`;
}

function write(
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  args: unknown[],
): void {
  if (!shouldLog(level)) return;
  const formatted = formatLogLine(level, message, args);
  sink(formatted);
  if (logFileStream) {
    logFileStream.write(formatted + '\n');
  }
}

export function closeLogger(): void {
  if (logFileStream) {
    logFileStream.end();
    logFileStream = null;
  }
}

export function createLogger(prefix?: string): Logger {
  const p = prefix ? `[${prefix}] ` : '';
  return {
    debug(message: string, ...args: unknown[]) {
      write('debug', p + message, args);
    },
    info(message: string, ...args: unknown[]) {
      write('info', p + message, args);
    },
    warn(message: string, ...args: unknown[]) {
      write('warn', p + message, args);
    },
    error(message: string, ...args: unknown[]) {
      write('error', p + message, args);
    },
    isLevelEnabled(level) {
      return shouldLog(level);
    },
  };
}
