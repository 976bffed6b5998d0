import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  LogLevel,
  createLogger,
  flushLogger,
  getLogger,
  resetLogger,
  getDefaultLogDir,
  parseLogLevel,
} from '../../../src/utils/logger.js';

describe('Logger Module', () => {
  let logDir: string;
  let logFile: string;

  beforeEach(async () => {
    resetLogger();
    logDir = path.join(await fs.promises.mkdtemp(path.join(os.tmpdir(), 'logger-test-')), 'logs');
    logFile = path.join(logDir, 'rag-folder-sync.log');
  });

  afterEach(async () => {
    await flushLogger();
    resetLogger();
    vi.restoreAllMocks();
    await fs.promises.rm(path.dirname(logDir), { recursive: true, force: true });
  });

  async function readLog(file: string = logFile): Promise<string> {
    await flushLogger();
    return fs.promises.readFile(file, 'utf-8');
  }

  describe('LogLevel enum', () => {
    it('should order levels by severity', () => {
      expect(LogLevel.ERROR).toBe(0);
      expect(LogLevel.WARN).toBe(1);
      expect(LogLevel.INFO).toBe(2);
      expect(LogLevel.DEBUG).toBe(3);
    });
  });

  describe('createLogger', () => {
    it('should create the log directory', () => {
      createLogger(logDir);
      expect(fs.existsSync(logDir)).toBe(true);
    });

    it('should set the specified log level', () => {
      const logger = createLogger(logDir, { level: LogLevel.DEBUG });
      expect(logger.getLevel()).toBe(LogLevel.DEBUG);
    });

    it('should become the shared instance', () => {
      const logger = createLogger(logDir);
      expect(getLogger()).toBe(logger);
    });
  });

  describe('Log level filtering', () => {
    it('should write only ERROR and WARN when level is WARN', async () => {
      const logger = createLogger(logDir, { level: LogLevel.WARN });

      logger.error('test', 'error message');
      logger.warn('test', 'warn message');
      logger.info('test', 'info message');
      logger.debug('test', 'debug message');

      const content = await readLog();
      expect(content).toContain('error message');
      expect(content).toContain('warn message');
      expect(content).not.toContain('info message');
      expect(content).not.toContain('debug message');
    });

    it('should write everything when level is DEBUG', async () => {
      const logger = createLogger(logDir, { level: LogLevel.DEBUG });

      logger.info('test', 'info message');
      logger.debug('test', 'debug message');

      const lines = (await readLog()).trim().split('\n');
      expect(lines).toHaveLength(2);
    });

    it('should respect setLevel() changes', async () => {
      const logger = createLogger(logDir, { level: LogLevel.ERROR });

      logger.info('test', 'should not appear');
      logger.setLevel(LogLevel.INFO);
      logger.info('test', 'should appear');

      const content = await readLog();
      expect(content).not.toContain('should not appear');
      expect(content).toContain('should appear');
    });
  });

  describe('Log format', () => {
    it('should write timestamp, level, component and message', async () => {
      const logger = createLogger(logDir, { level: LogLevel.INFO });
      logger.info('FolderSynchronizer', 'Scan complete');

      expect(await readLog()).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] \[FolderSynchronizer\] Scan complete\n$/
      );
    });

    it('should append metadata as JSON', async () => {
      const logger = createLogger(logDir, { level: LogLevel.INFO });
      logger.info('fileSync', 'Indexed file', { path: '/notes/a.md', fragments: 3 });

      expect(await readLog()).toContain('Indexed file {"path":"/notes/a.md","fragments":3}\n');
    });

    it('should omit empty metadata', async () => {
      const logger = createLogger(logDir, { level: LogLevel.INFO });
      logger.info('fileSync', 'Nothing to add', {});

      expect(await readLog()).toMatch(/\[fileSync\] Nothing to add\n$/);
    });
  });

  describe('Log files', () => {
    it('should use a custom file name', async () => {
      const logger = createLogger(logDir, { fileName: 'custom.log' });
      logger.warn('test', 'custom');

      expect(await readLog(path.join(logDir, 'custom.log'))).toContain('custom');
    });

    it('should append lines in call order', async () => {
      const logger = createLogger(logDir, { level: LogLevel.INFO });
      for (let i = 0; i < 5; i++) {
        logger.info('test', `line ${i}`);
      }

      const lines = (await readLog()).trim().split('\n').map((line) => line.replace(/^\[[^\]]+\] /, ''));
      expect(lines).toEqual([0, 1, 2, 3, 4].map((i) => `[INFO] [test] line ${i}`));
    });
  });

  describe('Console fallback', () => {
    it('should log to the console when the directory cannot be created', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const blocker = path.join(path.dirname(logDir), 'blocker');
      await fs.promises.writeFile(blocker, 'not a directory');

      const logger = createLogger(path.join(blocker, 'logs'), { level: LogLevel.INFO });
      logger.warn('test', 'still visible');

      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('cannot create');
      expect(String(warnSpy.mock.lastCall?.[0])).toMatch(/\[WARN\] \[test\] still visible$/);
    });

    it('should write to stderr when no log directory is set', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      getLogger().error('test', 'console error message');

      expect(String(consoleSpy.mock.lastCall?.[0])).toContain('[ERROR] [test] console error message');
    });
  });

  describe('getDefaultLogDir', () => {
    it('should live under the home directory', () => {
      expect(getDefaultLogDir()).toBe(path.join(os.homedir(), '.rag-folder-sync', 'logs'));
    });
  });

  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
      expect(parseLogLevel('Warning')).toBe(LogLevel.WARN);
      expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
      expect(parseLogLevel('info')).toBe(LogLevel.INFO);
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    });

    it('should default to INFO for unknown values', () => {
      expect(parseLogLevel('')).toBe(LogLevel.INFO);
      expect(parseLogLevel('TRACE')).toBe(LogLevel.INFO);
    });
  });

  describe('resetLogger', () => {
    it('should drop the shared instance', () => {
      const first = createLogger(logDir);
      resetLogger();
      expect(getLogger()).not.toBe(first);
    });
  });
});
