import fs from 'fs';
import path from 'path';
import schedule from 'node-schedule';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { rotateFile, RotateFileOptions } from '../rotateFile.js';

type ConsoleLevel = 'log' | 'info' | 'warn' | 'error';

const LEVELS: readonly ConsoleLevel[] = ['log', 'info', 'warn', 'error'];

export interface FileLoggerOptions {
  /** Log file path (default: LOG_FILE_PATH or data/app.log) */
  logFile?: string;
  /** Days of rotated logs to keep (default: LOG_RETENTION_DAYS or 7) */
  retentionDays?: number;
}

export interface FileLoggerHandle {
  logFile: string;
  /** Restore the original console methods and cancel rotation; resolves once the file is flushed */
  uninstall: () => Promise<void>;
}

/**
 * Tees console output into a log file that is rotated every midnight
 */
export function installFileLogger(options: FileLoggerOptions = {}): FileLoggerHandle {
  const orig: Record<ConsoleLevel, (...args: unknown[]) => void> = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  const logFile =
    options.logFile ||
    process.env.LOG_FILE_PATH ||
    path.resolve(process.cwd(), 'data/app.log');
  ensureDirExistence(logFile);

  const rotateFileOptions: RotateFileOptions = {
    dir: path.dirname(logFile),
    filename: path.basename(logFile),
    retentionDays:
      options.retentionDays ?? parseInt(process.env.LOG_RETENTION_DAYS || '7', 10),
  };

  rotateFile(rotateFileOptions);
  let logStream = fs.createWriteStream(logFile, { flags: 'a' });
  const job = schedule.scheduleJob('0 0 * * *', () => {
    logStream.end();
    rotateFile(rotateFileOptions);
    logStream = fs.createWriteStream(logFile, { flags: 'a' });
  });

  const write = (level: ConsoleLevel, args: unknown[]) => {
    const now = new Date().toISOString();
    const message = `[${now}] [${level.toUpperCase()}] ${args.map(formatArg).join(' ')}\n`;
    logStream.write(message);
  };

  for (const level of LEVELS) {
    console[level] = (...args: unknown[]) => {
      write(level, args);
      orig[level](...args);
    };
  }

  return {
    logFile,
    uninstall: () =>
      new Promise<void>(resolve => {
        job.cancel();
        for (const level of LEVELS) {
          console[level] = orig[level];
        }
        logStream.end(resolve);
      }),
  };
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack || arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
