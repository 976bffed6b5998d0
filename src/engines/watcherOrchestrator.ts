/**
 * Watcher Orchestrator
 *
 * Registry of watched folders. Validates and registers roots, owns one
 * FolderSynchronizer per root, persists the folder set and its progress,
 * and restores everything after a restart.
 *
 * An unwatched folder stays registered as 'removed' until its collection is
 * purged; the sweep and restore() retry purges that failed.
 */

import * as fs from 'node:fs';
import { v4 as uuidv4 } from 'uuid';
import { assertDirectory, FolderSynchronizer, type SynchronizerChange } from './folderSynchronizer.js';
import type { ContentCategory, ExtractorGateway } from './extraction.js';
import type { EmbeddingProvider } from './embedding.js';
import { createChokidarSource, type NotificationSourceFactory } from './notificationSource.js';
import type { EngineConfig } from '../storage/config.js';
import { FileRecordStore } from '../storage/fileRecords.js';
import type { VectorStore } from '../storage/vectorStore.js';
import {
  loadPersistedState,
  PersistScheduler,
  savePersistedState,
  type FolderStatus,
  type PersistedState,
  type WatchedFolder,
} from '../storage/watcherState.js';
import {
  AlreadyWatchedError,
  InvalidConfigError,
  NotWatchedError,
  PathConflictError,
  toError,
} from '../errors/index.js';
import { ReadWriteLock } from '../utils/asyncMutex.js';
import { hashString } from '../utils/hash.js';
import { getLogger } from '../utils/logger.js';
import { expandTilde, isWithinDirectory, normalizePath } from '../utils/paths.js';
import type { WorkerPool } from '../utils/workerPool.js';

// ============================================================================
// Types
// ============================================================================

export type ContentTypes = WatchedFolder['contentTypes'];

export interface FolderStatusSnapshot {
  id: string;
  path: string;
  status: FolderStatus;
  progressPercent: number;
  filesDiscovered: number;
  filesProcessed: number;
  errorCount: number;
  collectionName: string;
  contentTypes: ContentCategory[];
  createdAt: string;
  scanCompletedAt?: string;
  lastError?: string;
}

export interface WatcherOrchestratorOptions {
  store: VectorStore;
  embedder: EmbeddingProvider;
  extractor: ExtractorGateway;
  pool: WorkerPool;
  config: EngineConfig;
  /** Defaults to chokidar */
  sourceFactory?: NotificationSourceFactory;
  /** Delay before restarting a failed notification source */
  restartDelayMs?: number;
}

interface FolderEntry {
  id: string;
  path: string;
  contentTypes: ContentTypes;
  collectionName: string;
  createdAt: string;
  sync: FolderSynchronizer;
  /** Unwatched, waiting for its collection to be purged */
  removing: boolean;
  purging: Promise<void> | null;
}

// ============================================================================
// Collection Names
// ============================================================================

export const MAX_COLLECTION_NAME_LENGTH = 64;

/**
 * Characters of the sanitized name kept before the hash suffix
 */
const TRUNCATED_NAME_LENGTH = 55;

function withHashSuffix(name: string, folderPath: string): string {
  const head = name.slice(0, TRUNCATED_NAME_LENGTH).replace(/[_.-]+$/, '');
  return `${head}_${hashString(folderPath).slice(0, 8)}`;
}

/**
 * Derive a collection name from a canonical folder path
 *
 * @example
 * ```typescript
 * collectionNameFor('rag', '/home/me/notes') // => 'rag_home_me_notes'
 * collectionNameFor('rag', 'C:\\Users\\me')  // => 'rag_C_Users_me'
 * ```
 */
export function collectionNameFor(prefix: string, folderPath: string): string {
  const name = `${prefix}_${folderPath}`
    .replace(/:/g, '')
    .replace(/[\\/]/g, '_')
    .replace(/[^a-zA-Z0-9_.-]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[_.-]+|[_.-]+$/g, '');

  if (name === '') {
    throw new InvalidConfigError('collectionPrefix', `cannot derive a collection name for ${folderPath}`);
  }
  return name.length > MAX_COLLECTION_NAME_LENGTH ? withHashSuffix(name, folderPath) : name;
}

/**
 * Canonical form of a user-supplied root: tilde expanded, absolute,
 * symlinks resolved when the path exists
 */
async function canonicalize(inputPath: string): Promise<string> {
  const absolute = normalizePath(expandTilde(inputPath));
  try {
    return normalizePath(await fs.promises.realpath(absolute));
  } catch {
    return absolute;
  }
}

function toContentTypes(requested: readonly ContentCategory[]): ContentTypes {
  const [first, ...rest] = [...new Set(requested)];
  if (first === undefined) {
    throw new InvalidConfigError('contentTypes', 'at least one content type is required');
  }
  return [first, ...rest];
}

// ============================================================================
// WatcherOrchestrator Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const orchestrator = new WatcherOrchestrator({ store, embedder, extractor, pool, config });
 * await orchestrator.restore();
 * await orchestrator.watchFolder('~/notes', ['text', 'pdf']);
 * ```
 */
export class WatcherOrchestrator {
  private readonly options: WatcherOrchestratorOptions;
  private readonly folders = new Map<string, FolderEntry>();
  private readonly lock = new ReadWriteLock('FolderRegistry');
  private readonly persistence: PersistScheduler;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private restored = false;
  private closed = false;

  constructor(options: WatcherOrchestratorOptions) {
    this.options = options;
    this.persistence = new PersistScheduler(
      () => savePersistedState(options.store, this.toPersisted()),
      options.config.persistIntervalMs
    );
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Register a root and start its initial scan in the background
   *
   * @throws PathNotFoundError if the path is missing or not a directory
   * @throws AlreadyWatchedError if the root is registered
   * @throws PathConflictError if it contains or is inside a watched root
   */
  async watchFolder(
    folderPath: string,
    contentTypes: readonly ContentCategory[] = ['text']
  ): Promise<FolderStatusSnapshot> {
    const canonical = await canonicalize(folderPath);
    await assertDirectory(canonical);
    const types = toContentTypes(contentTypes);

    const leaving = await this.lock.withReadLock(async () => this.folders.get(canonical));
    if (leaving?.removing) {
      await this.finishRemoval(leaving);
    }

    const entry = await this.lock.withWriteLock(async () => {
      if (this.folders.has(canonical)) {
        throw new AlreadyWatchedError(canonical);
      }
      const conflicts = this.activeEntries()
        .map((watched) => watched.path)
        .filter((watched) => isWithinDirectory(watched, canonical) || isWithinDirectory(canonical, watched));
      if (conflicts.length > 0) {
        throw new PathConflictError(canonical, conflicts);
      }

      const created = this.createEntry({
        id: uuidv4(),
        path: canonical,
        contentTypes: types,
        collectionName: this.uniqueCollectionName(canonical),
        createdAt: new Date().toISOString(),
      });
      this.folders.set(canonical, created);
      return created;
    });

    getLogger().info('WatcherOrchestrator', 'Watching folder', {
      path: canonical,
      collection: entry.collectionName,
      contentTypes: types,
    });

    try {
      await this.persistence.saveNow();
    } catch (error) {
      await this.lock.withWriteLock(async () => {
        if (this.folders.get(canonical) === entry) {
          this.folders.delete(canonical);
        }
      });
      throw error;
    }
    await entry.sync.start({ mode: 'scan' });
    this.ensureSweep();
    return this.snapshot(entry);
  }

  /**
   * Stop watching a root and delete everything indexed for it. Calling it
   * again for a folder whose purge failed retries the purge.
   *
   * @throws NotWatchedError if the root is not registered
   */
  async unwatchFolder(folderPath: string): Promise<void> {
    const entry = await this.lock.withWriteLock(async () => {
      const found = await this.find(folderPath);
      found.removing = true;
      return found;
    });

    // Returns once in-flight syncs have finished
    await entry.sync.stop();
    await this.persistence.saveNow();
    await this.finishRemoval(entry);
  }

  async getWatchedFolders(): Promise<FolderStatusSnapshot[]> {
    return this.lock.withReadLock(async () => [...this.folders.values()].map((entry) => this.snapshot(entry)));
  }

  /**
   * Collection names of the given roots (all roots when omitted)
   *
   * @throws NotWatchedError for a root that is not registered
   */
  async resolveCollections(folderPaths?: string[]): Promise<string[]> {
    return this.lock.withReadLock(async () => {
      if (!folderPaths) {
        return this.activeEntries().map((entry) => entry.collectionName);
      }
      const names: string[] = [];
      for (const folderPath of folderPaths) {
        names.push((await this.findActive(folderPath)).collectionName);
      }
      return names;
    });
  }

  async pauseFolder(folderPath: string): Promise<FolderStatusSnapshot> {
    const entry = await this.lock.withReadLock(() => this.findActive(folderPath));
    entry.sync.pause();
    await this.persistence.saveNow();
    return this.snapshot(entry);
  }

  async resumeFolder(folderPath: string): Promise<FolderStatusSnapshot> {
    const entry = await this.lock.withReadLock(() => this.findActive(folderPath));
    entry.sync.resume();
    await this.persistence.saveNow();
    return this.snapshot(entry);
  }

  /**
   * Rebuild the registry from persisted state. Runs once.
   *
   * Folders that finished their scan and were cleanly watching or paused
   * keep their records (rebuilt from the index) and reconcile quietly;
   * every other folder is scanned again from the beginning. Folders left
   * 'removed' by an unfinished unwatch are purged.
   */
  async restore(): Promise<FolderStatusSnapshot[]> {
    if (this.restored) {
      return this.getWatchedFolders();
    }
    this.restored = true;

    const logger = getLogger();
    let state: PersistedState | null = null;
    try {
      state = await loadPersistedState(this.options.store);
    } catch (error) {
      if (!(error instanceof InvalidConfigError)) {
        throw error;
      }
      logger.warn('WatcherOrchestrator', 'Persisted state is invalid, starting with no folders', {
        error: error.message,
      });
    }

    const starts: Array<() => Promise<void>> = [];
    const leaving: FolderEntry[] = [];
    await this.lock.withWriteLock(async () => {
      for (const folder of state?.folders ?? []) {
        if (this.folders.has(folder.path)) {
          continue;
        }

        if (folder.status === 'removed') {
          const { records } = await this.rebuildRecords(folder.collectionName);
          const entry = this.createEntry(folder, records);
          entry.removing = true;
          this.folders.set(folder.path, entry);
          leaving.push(entry);
          continue;
        }

        const clean =
          (folder.status === 'watching' || folder.status === 'paused') && folder.scanCompletedAt !== undefined;
        const { records, needsResync } = await this.rebuildRecords(folder.collectionName);

        const entry = this.createEntry(folder, records);
        this.folders.set(folder.path, entry);
        starts.push(() =>
          entry.sync.start({
            mode: clean ? 'reconcile' : 'scan',
            resyncPaths: needsResync,
            paused: folder.status === 'paused',
          })
        );

        logger.info('WatcherOrchestrator', clean ? 'Restored folder' : 'Restored folder for rescan', {
          path: folder.path,
          status: folder.status,
          records: records.size,
          resync: needsResync.length,
        });
      }
    });

    await Promise.all(starts.map((start) => start()));
    for (const entry of leaving) {
      await entry.sync.stop();
      await this.retryRemoval(entry);
    }
    await this.persistence.saveNow();
    this.ensureSweep();
    return this.getWatchedFolders();
  }

  /**
   * Retry every folder in 'error' and every purge that failed
   */
  async sweep(): Promise<void> {
    const { failing, leaving } = await this.lock.withReadLock(async () => {
      const entries = [...this.folders.values()];
      return {
        failing: entries.filter((entry) => !entry.removing && entry.sync.status === 'error'),
        leaving: entries.filter((entry) => entry.removing),
      };
    });
    for (const entry of leaving) {
      await this.retryRemoval(entry);
    }
    for (const entry of failing) {
      await entry.sync.retryFailed();
    }
    if (failing.length > 0) {
      this.persistence.schedule();
    }
  }

  /**
   * Resolves once the folder (every folder when omitted) has finished
   * scanning and has nothing pending
   */
  async waitForIdle(folderPath?: string): Promise<void> {
    const entries =
      folderPath === undefined
        ? await this.lock.withReadLock(async () => this.activeEntries())
        : [await this.lock.withReadLock(() => this.findActive(folderPath))];
    await Promise.all(entries.map((entry) => entry.sync.waitForIdle()));
    await this.persistence.flush();
  }

  /**
   * Stop every synchronizer and write the final state
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    const entries = [...this.folders.values()];
    await Promise.allSettled(entries.map((entry) => entry.purging));
    await Promise.all(entries.map((entry) => entry.sync.shutdown()));
    await this.persistence.saveNow();
    await this.persistence.close();
    getLogger().info('WatcherOrchestrator', 'Closed', { folders: entries.length });
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async find(folderPath: string): Promise<FolderEntry> {
    const direct = this.folders.get(normalizePath(expandTilde(folderPath)));
    if (direct) {
      return direct;
    }
    const canonical = await canonicalize(folderPath);
    const entry = this.folders.get(canonical);
    if (!entry) {
      throw new NotWatchedError(canonical);
    }
    return entry;
  }

  /**
   * Like find(), but a folder being removed counts as not watched
   */
  private async findActive(folderPath: string): Promise<FolderEntry> {
    const entry = await this.find(folderPath);
    if (entry.removing) {
      throw new NotWatchedError(entry.path);
    }
    return entry;
  }

  private activeEntries(): FolderEntry[] {
    return [...this.folders.values()].filter((entry) => !entry.removing);
  }

  /**
   * Purge an unwatched folder's collection, then drop it from the registry
   * and the persisted state. Concurrent calls share one attempt.
   */
  private finishRemoval(entry: FolderEntry): Promise<void> {
    if (!entry.purging) {
      entry.purging = this.purgeEntry(entry).finally(() => {
        entry.purging = null;
      });
    }
    return entry.purging;
  }

  private async purgeEntry(entry: FolderEntry): Promise<void> {
    await entry.sync.purge();
    await this.lock.withWriteLock(async () => {
      if (this.folders.get(entry.path) === entry) {
        this.folders.delete(entry.path);
      }
    });
    await this.persistence.saveNow();

    getLogger().info('WatcherOrchestrator', 'Unwatched folder', {
      path: entry.path,
      collection: entry.collectionName,
    });
  }

  /**
   * finishRemoval() for the sweep and restore: a failure is logged and
   * left for the next sweep
   */
  private async retryRemoval(entry: FolderEntry): Promise<void> {
    try {
      await this.finishRemoval(entry);
    } catch (error) {
      getLogger().warn('WatcherOrchestrator', 'Purge of unwatched folder failed, will retry', {
        path: entry.path,
        collection: entry.collectionName,
        error: toError(error).message,
      });
    }
  }

  private uniqueCollectionName(folderPath: string): string {
    const name = collectionNameFor(this.options.config.collectionPrefix, folderPath);
    const taken = [...this.folders.values()].some((entry) => entry.collectionName === name);
    return taken ? withHashSuffix(name, folderPath) : name;
  }

  private async rebuildRecords(collectionName: string): Promise<{ records: FileRecordStore; needsResync: string[] }> {
    try {
      return FileRecordStore.fromFragments(await this.options.store.listFragments(collectionName));
    } catch (error) {
      getLogger().warn('WatcherOrchestrator', 'Cannot read indexed fragments, starting with no records', {
        collection: collectionName,
        error: toError(error).message,
      });
      return { records: new FileRecordStore(), needsResync: [] };
    }
  }

  private createEntry(
    folder: Pick<WatchedFolder, 'id' | 'path' | 'contentTypes' | 'collectionName' | 'createdAt'> &
      Partial<WatchedFolder>,
    records?: FileRecordStore
  ): FolderEntry {
    const { store, embedder, extractor, pool, config } = this.options;
    const sync = new FolderSynchronizer({
      root: folder.path,
      collection: folder.collectionName,
      contentTypes: folder.contentTypes,
      store,
      embedder,
      extractor,
      pool,
      sourceFactory: this.options.sourceFactory ?? createChokidarSource,
      settings: config,
      records,
      initial: {
        filesDiscovered: folder.filesDiscovered ?? 0,
        filesProcessed: folder.filesProcessed ?? 0,
        errorCount: folder.errorCount ?? 0,
        scanCompletedAt: folder.scanCompletedAt,
        lastError: folder.lastError,
      },
      onChange: (change) => this.onSynchronizerChange(change),
      restartDelayMs: this.options.restartDelayMs,
    });

    return {
      id: folder.id,
      path: folder.path,
      contentTypes: folder.contentTypes,
      collectionName: folder.collectionName,
      createdAt: folder.createdAt,
      sync,
      removing: false,
      purging: null,
    };
  }

  private onSynchronizerChange(change: SynchronizerChange): void {
    if (this.closed) {
      return;
    }
    if (change === 'progress') {
      this.persistence.schedule();
      return;
    }
    this.persistence.saveNow().catch((error: unknown) => {
      getLogger().error('WatcherOrchestrator', 'Failed to persist folder state', {
        error: toError(error).message,
      });
    });
  }

  private ensureSweep(): void {
    if (this.sweepTimer || this.closed) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        getLogger().error('WatcherOrchestrator', 'Error sweep failed', { error: toError(error).message });
      });
    }, this.options.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  private snapshot(entry: FolderEntry): FolderStatusSnapshot {
    const progress = entry.sync.getProgress();
    return {
      id: entry.id,
      path: entry.path,
      status: progress.status,
      progressPercent: progress.progressPercent,
      filesDiscovered: progress.filesDiscovered,
      filesProcessed: progress.filesProcessed,
      errorCount: progress.errorCount,
      collectionName: entry.collectionName,
      contentTypes: [...entry.contentTypes],
      createdAt: entry.createdAt,
      scanCompletedAt: progress.scanCompletedAt,
      lastError: progress.lastError,
    };
  }

  private toPersisted(): WatchedFolder[] {
    return [...this.folders.values()].map((entry) => {
      const progress = entry.sync.getProgress();
      return {
        id: entry.id,
        path: entry.path,
        contentTypes: entry.contentTypes,
        collectionName: entry.collectionName,
        status: progress.status,
        progressPercent: progress.progressPercent,
        filesDiscovered: progress.filesDiscovered,
        filesProcessed: progress.filesProcessed,
        errorCount: progress.errorCount,
        createdAt: entry.createdAt,
        scanCompletedAt: progress.scanCompletedAt,
        lastError: progress.lastError,
      };
    });
  }
}
