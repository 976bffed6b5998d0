/**
 * Logger Module
 *
 * Component-tagged leveled logging. Lines go to stderr until createLogger()
 * points the shared instance at a directory; file writes are appended in
 * call order.
 *
 * Line format: `[2026-01-01T00:00:00.000Z] [INFO] [Component] message {"meta":1}`
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Log levels ordered by severity (lower = more severe)
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface Logger {
  error(component: string, message: string, meta?: object): void;
  warn(component: string, message: string, meta?: object): void;
  info(component: string, message: string, meta?: object): void;
  debug(component: string, message: string, meta?: object): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

export interface LoggerOptions {
  /** Defaults to the environment's level, else INFO */
  level?: LogLevel;
  /** Defaults to rag-folder-sync.log */
  fileName?: string;
}

const LOG_FILE_NAME = 'rag-folder-sync.log';

function formatLine(level: LogLevel, component: string, message: string, meta?: object): string {
  const line = `[${new Date().toISOString()}] [${LogLevel[level]}] [${component}] ${message}`;
  return meta && Object.keys(meta).length > 0 ? `${line} ${JSON.stringify(meta)}` : line;
}

/**
 * stderr only: stdout belongs to the host process
 */
function toConsole(level: LogLevel, line: string): void {
  if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.error(line);
  }
}

class SyncLogger implements Logger {
  private level: LogLevel;
  private readonly file: string | null;
  private pending: Promise<void> = Promise.resolve();

  constructor(level: LogLevel, file: string | null) {
    this.level = level;
    this.file = file;
  }

  error(component: string, message: string, meta?: object): void {
    this.log(LogLevel.ERROR, component, message, meta);
  }

  warn(component: string, message: string, meta?: object): void {
    this.log(LogLevel.WARN, component, message, meta);
  }

  info(component: string, message: string, meta?: object): void {
    this.log(LogLevel.INFO, component, message, meta);
  }

  debug(component: string, message: string, meta?: object): void {
    this.log(LogLevel.DEBUG, component, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  flush(): Promise<void> {
    return this.pending;
  }

  private log(level: LogLevel, component: string, message: string, meta?: object): void {
    if (level > this.level) {
      return;
    }
    const line = formatLine(level, component, message, meta);
    const file = this.file;
    if (file === null) {
      toConsole(level, line);
      return;
    }

    this.pending = this.pending.then(async () => {
      try {
        await fs.promises.appendFile(file, `${line}\n`);
      } catch (error) {
        console.error(`[logger] cannot append to ${file}:`, error);
        toConsole(level, line);
      }
    });
  }
}

let shared: SyncLogger | null = null;

/**
 * Level from RAG_SYNC_DEBUG / DEBUG (1, true or debug), then
 * RAG_SYNC_LOG_LEVEL / LOG_LEVEL
 */
function levelFromEnv(): LogLevel {
  const debug = process.env.RAG_SYNC_DEBUG || process.env.DEBUG;
  if (debug === '1' || debug === 'true' || debug?.toLowerCase() === 'debug') {
    return LogLevel.DEBUG;
  }
  const named = process.env.RAG_SYNC_LOG_LEVEL || process.env.LOG_LEVEL;
  return named ? parseLogLevel(named) : LogLevel.INFO;
}

/**
 * Make a file logger the shared instance. If the directory cannot be
 * created the shared instance logs to the console.
 */
export function createLogger(logDir: string = getDefaultLogDir(), options: LoggerOptions = {}): Logger {
  const level = options.level ?? levelFromEnv();
  let file: string | null = path.join(logDir, options.fileName ?? LOG_FILE_NAME);
  try {
    fs.mkdirSync(logDir, { recursive: true });
  } catch (error) {
    console.error(`[logger] cannot create ${logDir}, logging to the console:`, error);
    file = null;
  }
  shared = new SyncLogger(level, file);
  return shared;
}

/**
 * The shared instance; a console logger until createLogger() runs
 */
export function getLogger(): Logger {
  if (!shared) {
    shared = new SyncLogger(levelFromEnv(), null);
  }
  return shared;
}

/**
 * Wait for pending file writes of the shared instance
 */
export async function flushLogger(): Promise<void> {
  await shared?.flush();
}

/** Drop the shared instance (tests) */
export function resetLogger(): void {
  shared = null;
}

/**
 * ~/.rag-folder-sync/logs
 */
export function getDefaultLogDir(): string {
  return path.join(os.homedir(), '.rag-folder-sync', 'logs');
}

/**
 * Unknown names map to INFO; WARNING is accepted for WARN
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}
