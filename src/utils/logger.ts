import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import pino, { type Logger } from 'pino';
import pretty from 'pino-pretty';
import { createStream } from 'rotating-file-stream';
import type { LogLevel } from './config';

export const LOG_FILE_NAME = 'app.log';

/** Rotate once the active file reaches this size. */
const ROTATE_SIZE = '10M';
/** Number of rotated files kept. Counts files, not days: size rotations use slots too. */
const RETAINED_FILES = 14;

const PINO_LEVELS: Record<LogLevel, pino.Level> = {
  TRACE: 'trace',
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

export interface LoggerOptions {
  level: LogLevel;
  /** Directory for `app.log` and its rotated, gzip-compressed predecessors. */
  dir: string;
  /** Pretty-print to stderr as well as the file. Default: true. */
  console?: boolean;
}

export interface LoggerHandle {
  readonly logger: Logger;
  readonly filePath: string;
  /** Flush and close the log file. */
  close(): Promise<void>;
}

// One handle per log directory while it is open.
const handles = new Map<string, LoggerHandle>();

export function toPinoLevel(level: LogLevel): pino.Level {
  return PINO_LEVELS[level];
}

/**
 * Configure the logger for a directory: pretty lines on stderr plus a rotating
 * JSON file. Calling it again for the same directory returns the open handle.
 */
export function setupLogger(options: LoggerOptions): LoggerHandle {
  const dir = resolve(options.dir);
  const existing = handles.get(dir);
  if (existing) return existing;

  mkdirSync(dir, { recursive: true });
  const file = createStream(LOG_FILE_NAME, {
    path: dir,
    size: ROTATE_SIZE,
    interval: '1d',
    compress: 'gzip',
    maxFiles: RETAINED_FILES,
  });
  file.on('error', (err) => {
    process.stderr.write(`log file ${join(dir, LOG_FILE_NAME)}: ${String(err)}\n`);
  });

  const streams: pino.StreamEntry[] = [{ level: 'trace', stream: file }];
  if (options.console ?? true) {
    streams.push({
      level: 'trace',
      stream: pretty({
        destination: 2,
        sync: true,
        colorize: process.stderr.isTTY,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
      }),
    });
  }

  const logger = pino(
    {
      level: toPinoLevel(options.level),
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    pino.multistream(streams)
  );

  const handle: LoggerHandle = {
    logger,
    filePath: join(dir, LOG_FILE_NAME),
    close: () =>
      new Promise<void>((resolveClose) => {
        handles.delete(dir);
        file.end(() => resolveClose());
      }),
  };
  handles.set(dir, handle);
  logger.info(`Logger configured with level: ${options.level}`);
  return handle;
}
