/**
 * Notification Source
 *
 * Raw filesystem notifications for one watched root. The chokidar source
 * reports a rename as unlink + add; both carry the file's inode as their
 * cookie so the debouncer can pair them into a move.
 */

import chokidar from 'chokidar';
import { getLogger } from '../utils/logger.js';
import { matchesAnyPattern, normalizePath, toRelativePath } from '../utils/paths.js';
import type { RawEvent } from './eventDebouncer.js';

// ============================================================================
// Types
// ============================================================================

export interface NotificationListener {
  onEvent(event: RawEvent): void;
  /** A directory under the root disappeared */
  onDirectoryRemoved(directory: string): void;
  onError(error: Error): void;
}

export interface NotificationSource {
  /** Resolves once the source is ready to deliver events */
  start(listener: NotificationListener): Promise<void>;
  close(): Promise<void>;
}

export interface NotificationSourceOptions {
  root: string;
  exclude: readonly string[];
  /** Inode recorded for a path, used as the cookie of its deletion */
  inodeOf(filePath: string): number | undefined;
}

export type NotificationSourceFactory = (options: NotificationSourceOptions) => NotificationSource;

// ============================================================================
// Constants
// ============================================================================

/**
 * Wait this long for a file's size to stop changing before reporting it
 */
export const STABILITY_THRESHOLD = 500;

/**
 * Poll interval while waiting for writes to finish
 */
export const POLL_INTERVAL = 100;

/**
 * Polling interval on Windows
 */
export const WINDOWS_POLL_INTERVAL = 300;

// ============================================================================
// ChokidarNotificationSource Class
// ============================================================================

export class ChokidarNotificationSource implements NotificationSource {
  private readonly options: NotificationSourceOptions;
  private watcher: chokidar.FSWatcher | null = null;

  constructor(options: NotificationSourceOptions) {
    this.options = options;
  }

  async start(listener: NotificationListener): Promise<void> {
    if (this.watcher) {
      return;
    }

    const { root, exclude, inodeOf } = this.options;
    const watchOptions: chokidar.WatchOptions = {
      ignored: (candidate: string) => matchesAnyPattern(toRelativePath(candidate, root), exclude),
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: STABILITY_THRESHOLD,
        pollInterval: POLL_INTERVAL,
      },
      followSymlinks: false,
      usePolling: process.platform === 'win32',
      interval: process.platform === 'win32' ? WINDOWS_POLL_INTERVAL : undefined,
      alwaysStat: true,
      ignorePermissionErrors: true,
    };

    const watcher = chokidar.watch(root, watchOptions);
    this.watcher = watcher;

    watcher.on('add', (filePath, stats) => {
      listener.onEvent({ kind: 'created', path: normalizePath(filePath), cookie: stats?.ino });
    });
    watcher.on('change', (filePath) => {
      listener.onEvent({ kind: 'modified', path: normalizePath(filePath) });
    });
    watcher.on('unlink', (filePath) => {
      const normalized = normalizePath(filePath);
      listener.onEvent({ kind: 'deleted', path: normalized, cookie: inodeOf(normalized) });
    });
    watcher.on('unlinkDir', (directory) => {
      listener.onDirectoryRemoved(normalizePath(directory));
    });
    watcher.on('error', (error) => {
      listener.onError(error);
    });

    await new Promise<void>((resolve) => {
      watcher.on('ready', () => {
        getLogger().debug('NotificationSource', 'Watcher ready', { root });
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
  }
}

export const createChokidarSource: NotificationSourceFactory = (options) => new ChokidarNotificationSource(options);
