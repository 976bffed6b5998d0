/**
 * Folder Synchronizer
 *
 * Keeps the collection of one watched root in step with its files.
 *
 * States: initializing -> scanning -> watching <-> {paused, error} -> removed
 *
 * Features:
 * - Background scan through the shared worker pool, gated on its capacity
 * - Settled events applied in order per path (lanes); a move holds both lanes
 * - Generation counter per path so stale syncs never commit their record
 * - Events held while paused and replayed on resume; queued work parks
 * - Failed operations kept per path and retried by retryFailed()
 * - Notification source restarted after errors
 */

import * as fs from 'node:fs';
import { globIterate } from 'glob';
import { EventDebouncer, type SettledEvent } from './eventDebouncer.js';
import { removeFile, synchronizeFile, type FileSyncContext, type SyncResult } from './fileSync.js';
import type { ContentCategory, ExtractorGateway } from './extraction.js';
import type { EmbeddingProvider } from './embedding.js';
import type { NotificationSource, NotificationSourceFactory } from './notificationSource.js';
import type { EngineConfig } from '../storage/config.js';
import { FileRecordStore } from '../storage/fileRecords.js';
import type { VectorStore } from '../storage/vectorStore.js';
import type { FolderStatus } from '../storage/watcherState.js';
import { PathNotFoundError, toError } from '../errors/index.js';
import { registerCleanup, unregisterCleanup, isShutdownInProgress, type CleanupHandler } from '../utils/cleanup.js';
import { getLogger } from '../utils/logger.js';
import { normalizePath } from '../utils/paths.js';
import { withRetry } from '../utils/retry.js';
import type { WorkerPool } from '../utils/workerPool.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Maximum notification source restarts after errors
 */
export const MAX_RESTART_ATTEMPTS = 3;

/**
 * Delay before a restart attempt in milliseconds
 */
export const RESTART_DELAY_MS = 5000;

/**
 * Ids per delete call when purging a collection
 */
const PURGE_BATCH_SIZE = 500;

/**
 * Poll interval of waitForIdle() while debounce timers are pending
 */
const IDLE_POLL_MS = 25;

// ============================================================================
// Types
// ============================================================================

export type SynchronizerSettings = Pick<
  EngineConfig,
  | 'vectorSize'
  | 'chunkSizeWords'
  | 'chunkOverlapRatio'
  | 'minChunkChars'
  | 'debounceMs'
  | 'embedBatchSize'
  | 'retry'
  | 'exclude'
>;

export type SynchronizerChange = 'progress' | 'status' | 'scanComplete';

export interface SynchronizerProgress {
  status: FolderStatus;
  progressPercent: number;
  filesDiscovered: number;
  filesProcessed: number;
  errorCount: number;
  scanCompletedAt?: string;
  lastError?: string;
}

export interface FolderSynchronizerOptions {
  root: string;
  collection: string;
  contentTypes: readonly ContentCategory[];
  store: VectorStore;
  embedder: EmbeddingProvider;
  extractor: ExtractorGateway;
  pool: WorkerPool;
  sourceFactory: NotificationSourceFactory;
  settings: SynchronizerSettings;
  /** Records rebuilt from the index (restore) */
  records?: FileRecordStore;
  /** Counters carried over from persisted state */
  initial?: Omit<SynchronizerProgress, 'status' | 'progressPercent'>;
  onChange?: (change: SynchronizerChange) => void;
  restartDelayMs?: number;
}

/**
 * 'scan' walks the root as a fresh initial scan; 'reconcile' walks it
 * quietly while watching, to pick up changes made while not running.
 */
export type StartMode = 'scan' | 'reconcile';

export interface StartOptions {
  mode: StartMode;
  /** Paths resynchronized before the walk */
  resyncPaths?: readonly string[];
  paused?: boolean;
}

type Phase = 'initializing' | 'scanning' | 'watching' | 'removed';

/**
 * Check that a path exists and is a directory
 *
 * @throws PathNotFoundError
 */
export async function assertDirectory(directory: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(directory);
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT' || nodeError.code === 'ENOTDIR') {
      throw new PathNotFoundError(directory);
    }
    throw error;
  }
  if (!stats.isDirectory()) {
    throw new PathNotFoundError(directory, 'not_directory');
  }
}

function eventPaths(event: SettledEvent): string[] {
  return event.type === 'moved' ? [event.oldPath, event.newPath] : [event.path];
}

function eventKey(event: SettledEvent): string {
  return event.type === 'moved' ? event.newPath : event.path;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// FolderSynchronizer Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const sync = new FolderSynchronizer({ root: '/home/me/notes', collection: 'rag_home_me_notes', ... });
 * await sync.start({ mode: 'scan' });
 * await sync.waitForIdle();
 * ```
 */
export class FolderSynchronizer {
  readonly root: string;
  readonly collection: string;
  readonly contentTypes: readonly ContentCategory[];

  private readonly options: FolderSynchronizerOptions;
  private readonly records: FileRecordStore;
  private readonly ctx: FileSyncContext;
  private readonly debouncer: EventDebouncer;
  private readonly restartDelayMs: number;

  private phase: Phase = 'initializing';
  private paused = false;
  private closed = false;
  /** Set when the folder cannot run at all (missing root, store down, source dead) */
  private fatalError: string | null = null;
  private reportedStatus: FolderStatus | null = null;

  private filesDiscovered: number;
  private filesProcessed: number;
  private errorCount: number;
  private scanCompletedAt?: string;
  private lastError?: string;

  private startOptions: StartOptions = { mode: 'scan' };
  private source: NotificationSource | null = null;
  private restartAttempts = 0;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private walkController: AbortController | null = null;
  private initPromise: Promise<void> | null = null;
  private walkPromise: Promise<void> | null = null;
  private haltPromise: Promise<void> | null = null;
  private cleanupHandler: CleanupHandler | null = null;

  private readonly lanes = new Map<string, Promise<void>>();
  private readonly inFlight = new Set<Promise<void>>();
  /** Work executing in the pool right now */
  private readonly running = new Set<Promise<void>>();
  private readonly generations = new Map<string, number>();
  /** Latest settled event per path while paused */
  private readonly held = new Map<string, SettledEvent>();
  /** Operations that exhausted their retries, by path */
  private readonly failed = new Map<string, SettledEvent>();
  private resumeWaiters: Array<() => void> = [];

  constructor(options: FolderSynchronizerOptions) {
    this.options = options;
    this.root = options.root;
    this.collection = options.collection;
    this.contentTypes = options.contentTypes;
    this.records = options.records ?? new FileRecordStore();
    this.restartDelayMs = options.restartDelayMs ?? RESTART_DELAY_MS;

    const { settings } = options;
    this.ctx = {
      collection: options.collection,
      store: options.store,
      embedder: options.embedder,
      extractor: options.extractor,
      records: this.records,
      chunking: {
        sizeWords: settings.chunkSizeWords,
        overlapRatio: settings.chunkOverlapRatio,
        minChunkChars: settings.minChunkChars,
      },
      embedBatchSize: settings.embedBatchSize,
      retry: settings.retry,
      onDisplaced: (filePath) => this.onSettled({ type: 'changed', path: filePath }),
    };

    this.filesDiscovered = options.initial?.filesDiscovered ?? 0;
    this.filesProcessed = options.initial?.filesProcessed ?? 0;
    this.errorCount = options.initial?.errorCount ?? 0;
    this.scanCompletedAt = options.initial?.scanCompletedAt;
    this.lastError = options.initial?.lastError;

    this.debouncer = new EventDebouncer(settings.debounceMs, (event) => this.onSettled(event));
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  get status(): FolderStatus {
    if (this.phase === 'removed') {
      return 'removed';
    }
    if (this.paused) {
      return 'paused';
    }
    if (this.fatalError !== null) {
      return 'error';
    }
    if (this.phase === 'initializing' || this.phase === 'scanning') {
      return this.phase;
    }
    return this.failed.size > 0 ? 'error' : 'watching';
  }

  get progressPercent(): number {
    if (this.scanCompletedAt !== undefined && this.phase !== 'scanning') {
      return 100;
    }
    if (this.filesDiscovered === 0) {
      return 0;
    }
    return Math.min(100, Math.floor((this.filesProcessed * 100) / this.filesDiscovered));
  }

  getProgress(): SynchronizerProgress {
    return {
      status: this.status,
      progressPercent: this.progressPercent,
      filesDiscovered: this.filesDiscovered,
      filesProcessed: this.filesProcessed,
      errorCount: this.errorCount,
      scanCompletedAt: this.scanCompletedAt,
      lastError: this.lastError,
    };
  }

  /**
   * Paths whose last operation exhausted its retries
   */
  getFailedPaths(): string[] {
    return [...this.failed.keys()];
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Ensure the collection, start the notification source and launch the
   * walk in the background. Failures leave the folder in 'error'.
   */
  async start(options: StartOptions): Promise<void> {
    this.startOptions = options;
    this.paused = options.paused ?? false;

    if (!this.cleanupHandler) {
      this.cleanupHandler = () => this.shutdown();
      registerCleanup(this.cleanupHandler, `FolderSynchronizer:${this.root}`);
    }

    this.initPromise = this.initialize(options.mode);
    await this.initPromise;
  }

  pause(): void {
    if (this.closed || this.paused) {
      return;
    }
    this.paused = true;
    getLogger().info('FolderSynchronizer', 'Paused', { root: this.root });
    this.reportStatus();
  }

  resume(): void {
    if (this.closed || !this.paused) {
      return;
    }
    this.paused = false;
    this.releaseResumeWaiters();

    const held = [...this.held.values()];
    this.held.clear();
    getLogger().info('FolderSynchronizer', 'Resumed', { root: this.root, replayed: held.length });

    for (const event of held) {
      this.dispatchLogged(event);
    }
    this.reportStatus();
  }

  /**
   * Retry whatever put the folder in 'error'
   */
  async retryFailed(): Promise<void> {
    if (this.closed || this.paused) {
      return;
    }

    if (this.fatalError !== null) {
      await this.closeSource();
      const mode: StartMode = this.scanCompletedAt === undefined ? 'scan' : 'reconcile';
      this.initPromise = this.initialize(mode);
      await this.initPromise;
      return;
    }

    const pending = [...this.failed.values()];
    if (pending.length === 0) {
      return;
    }
    this.failed.clear();
    getLogger().info('FolderSynchronizer', `Retrying ${pending.length} failed operations`, { root: this.root });
    await Promise.all(pending.map((event) => this.dispatch(event)));
    this.reportStatus();
  }

  /**
   * Resolves once the walk has finished and no event is pending or running.
   * While paused, resolves once running work is done; parked work is not
   * waited for.
   */
  async waitForIdle(): Promise<void> {
    for (;;) {
      if (this.initPromise) {
        await this.initPromise;
      }
      if (this.paused && !this.closed) {
        if (this.running.size > 0) {
          await Promise.allSettled([...this.running]);
          continue;
        }
        if (this.debouncer.pendingCount > 0) {
          await delay(IDLE_POLL_MS);
          continue;
        }
        return;
      }
      if (this.walkPromise) {
        await this.walkPromise;
      }
      if (this.inFlight.size > 0) {
        await Promise.all([...this.inFlight]);
        continue;
      }
      if (this.debouncer.pendingCount > 0 && !this.closed) {
        await delay(IDLE_POLL_MS);
        continue;
      }
      return;
    }
  }

  /**
   * Stop for good (unwatch): status becomes 'removed'
   */
  async stop(): Promise<void> {
    this.phase = 'removed';
    this.reportStatus();
    await this.halt();
  }

  /**
   * Stop for process shutdown; the status is left as it was
   */
  shutdown(): Promise<void> {
    return this.halt();
  }

  /**
   * Delete every fragment of the folder and drop its collection.
   * Call after stop().
   */
  async purge(): Promise<void> {
    const ids = this.records.allFragmentIds();
    for (let start = 0; start < ids.length; start += PURGE_BATCH_SIZE) {
      const batch = ids.slice(start, start + PURGE_BATCH_SIZE);
      await withRetry(() => this.options.store.delete(this.collection, batch), {
        ...this.options.settings.retry,
        label: `purge ${this.collection}`,
      });
    }
    this.records.clear();
    await withRetry(() => this.options.store.dropCollection(this.collection), {
      ...this.options.settings.retry,
      label: `drop ${this.collection}`,
    });
    getLogger().info('FolderSynchronizer', 'Collection purged', {
      collection: this.collection,
      fragments: ids.length,
    });
  }

  // ==========================================================================
  // Initialization and Walk
  // ==========================================================================

  private async initialize(mode: StartMode): Promise<void> {
    const logger = getLogger();
    this.phase = 'initializing';
    this.fatalError = null;
    this.reportStatus();

    try {
      await assertDirectory(this.root);
      await withRetry(
        () => this.options.store.ensureCollection(this.collection, this.options.settings.vectorSize, 'cosine'),
        { ...this.options.settings.retry, label: `ensure ${this.collection}` }
      );
      await this.startSource();
    } catch (error) {
      if (this.closed) {
        return;
      }
      this.fail(toError(error));
      return;
    }

    if (this.closed) {
      return;
    }

    if (mode === 'scan') {
      this.phase = 'scanning';
      this.filesDiscovered = 0;
      this.filesProcessed = 0;
      this.errorCount = 0;
      this.scanCompletedAt = undefined;
      this.lastError = undefined;
    } else {
      this.phase = 'watching';
    }
    this.reportStatus();
    this.report('progress');

    logger.info('FolderSynchronizer', mode === 'scan' ? 'Starting scan' : 'Starting watch', {
      root: this.root,
      collection: this.collection,
      records: this.records.size,
    });

    for (const filePath of this.startOptions.resyncPaths ?? []) {
      this.onSettled({ type: 'changed', path: filePath });
    }

    this.walkPromise = this.walk(mode).catch((error: unknown) => {
      if (!this.closed) {
        this.fail(toError(error));
      }
    });
  }

  private fail(error: Error): void {
    this.fatalError = error.message;
    this.lastError = error.message;
    getLogger().error('FolderSynchronizer', 'Folder failed', { root: this.root, error: error.message });
    this.reportStatus();
  }

  /**
   * Walk the root and synchronize every accepted file. Recorded paths the
   * walk did not see are resynchronized too, which removes them when gone.
   */
  private async walk(mode: StartMode): Promise<void> {
    const controller = new AbortController();
    this.walkController = controller;
    const counted = mode === 'scan';
    const seen = new Set<string>();
    const tasks: Promise<void>[] = [];

    try {
      const entries = globIterate('**/*', {
        cwd: this.root,
        absolute: true,
        nodir: true,
        dot: true,
        follow: false,
        ignore: [...this.options.settings.exclude],
        signal: controller.signal,
      });

      for await (const entry of entries) {
        await this.waitWhilePaused();
        if (this.closed) {
          return;
        }

        const filePath = normalizePath(entry);
        if (!this.options.extractor.classify(filePath, this.contentTypes)) {
          continue;
        }
        seen.add(filePath);
        if (counted) {
          this.filesDiscovered++;
          this.report('progress');
        }

        await this.options.pool.waitForCapacity();
        if (this.closed) {
          return;
        }
        tasks.push(this.enqueueWalkSync(filePath, counted));
      }
    } catch (error) {
      if (controller.signal.aborted || this.closed) {
        return;
      }
      throw error;
    } finally {
      if (this.walkController === controller) {
        this.walkController = null;
      }
    }

    if (this.closed) {
      return;
    }
    for (const filePath of this.records.trackedPaths()) {
      if (!seen.has(filePath)) {
        tasks.push(this.enqueueWalkSync(filePath, false));
      }
    }

    await Promise.all(tasks);
    if (this.closed) {
      return;
    }

    if (counted) {
      this.phase = 'watching';
      this.scanCompletedAt = new Date().toISOString();
      getLogger().info('FolderSynchronizer', 'Scan complete', {
        root: this.root,
        files: this.filesProcessed,
        errors: this.errorCount,
      });
      this.reportStatus();
      this.report('scanComplete');
    } else {
      getLogger().debug('FolderSynchronizer', 'Reconcile complete', { root: this.root, files: seen.size });
    }
  }

  private enqueueWalkSync(filePath: string, counted: boolean): Promise<void> {
    const generation = this.generations.get(filePath) ?? 0;
    const isCurrent = (): boolean => (this.generations.get(filePath) ?? 0) === generation;
    return this.enqueue([filePath], async () => {
      await this.apply({ type: 'changed', path: filePath }, () => isCurrent);
      if (counted) {
        this.filesProcessed++;
        this.report('progress');
      }
    });
  }

  private waitWhilePaused(): Promise<void> {
    if (!this.paused || this.closed) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.resumeWaiters.push(resolve);
    });
  }

  private releaseResumeWaiters(): void {
    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  // ==========================================================================
  // Notification Source
  // ==========================================================================

  private async startSource(): Promise<void> {
    const source = this.options.sourceFactory({
      root: this.root,
      exclude: this.options.settings.exclude,
      inodeOf: (filePath) => this.records.get(filePath)?.inode,
    });
    this.source = source;

    await source.start({
      onEvent: (event) => {
        if (!this.closed) {
          this.debouncer.push(event);
        }
      },
      onDirectoryRemoved: (directory) => this.onDirectoryRemoved(directory),
      onError: (error) => this.onSourceError(error),
    });
    this.restartAttempts = 0;
  }

  private async closeSource(): Promise<void> {
    const source = this.source;
    this.source = null;
    if (source) {
      await source.close();
    }
  }

  private onDirectoryRemoved(directory: string): void {
    if (this.closed) {
      return;
    }
    for (const filePath of this.records.pathsUnder(directory)) {
      this.debouncer.push({ kind: 'deleted', path: filePath, cookie: this.records.get(filePath)?.inode });
    }
  }

  /**
   * Restart the source after a delay, up to MAX_RESTART_ATTEMPTS times
   */
  private onSourceError(error: Error): void {
    const logger = getLogger();
    logger.error('FolderSynchronizer', 'Notification source error', {
      root: this.root,
      error: error.message,
      restartAttempts: this.restartAttempts,
    });

    if (this.closed || isShutdownInProgress()) {
      return;
    }

    if (this.restartAttempts >= MAX_RESTART_ATTEMPTS) {
      logger.error('FolderSynchronizer', 'Max restart attempts reached, giving up', { root: this.root });
      this.fail(new Error(`notification source failed: ${error.message}`));
      return;
    }

    this.restartAttempts++;
    logger.info('FolderSynchronizer', `Scheduling restart attempt ${this.restartAttempts}/${MAX_RESTART_ATTEMPTS}`, {
      delayMs: this.restartDelayMs,
    });

    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
    }
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.restartSource().catch((restartError: unknown) => {
        this.onSourceError(toError(restartError));
      });
    }, this.restartDelayMs);
    this.restartTimer.unref();
  }

  private async restartSource(): Promise<void> {
    await this.closeSource();
    if (this.closed) {
      return;
    }
    const attempts = this.restartAttempts;
    await this.startSource();
    getLogger().info('FolderSynchronizer', 'Notification source restarted', { root: this.root, attempt: attempts });
  }

  // ==========================================================================
  // Event Handling
  // ==========================================================================

  private onSettled(event: SettledEvent): void {
    if (this.closed) {
      return;
    }
    if (this.paused) {
      this.hold(event);
      return;
    }
    this.dispatchLogged(event);
  }

  /**
   * Keep the latest event per path; a held move is not lost to later events
   */
  private hold(event: SettledEvent): void {
    if (event.type === 'moved') {
      this.held.delete(event.oldPath);
      this.held.set(event.newPath, event);
      return;
    }

    const existing = this.held.get(event.path);
    if (existing?.type === 'moved') {
      if (event.type === 'changed') {
        return;
      }
      this.held.set(existing.oldPath, { type: 'removed', path: existing.oldPath });
    }
    this.held.set(event.path, event);
  }

  private dispatchLogged(event: SettledEvent): void {
    this.dispatch(event).catch((error: unknown) => {
      getLogger().error('FolderSynchronizer', 'Event dispatch failed', {
        key: eventKey(event),
        error: toError(error).message,
      });
    });
  }

  /**
   * Bump the generation of every path the event touches and queue it
   */
  private dispatch(event: SettledEvent): Promise<void> {
    const checks = new Map<string, () => boolean>();
    for (const filePath of eventPaths(event)) {
      const generation = (this.generations.get(filePath) ?? 0) + 1;
      this.generations.set(filePath, generation);
      checks.set(filePath, () => this.generations.get(filePath) === generation);
    }
    return this.enqueue(eventPaths(event), () =>
      this.apply(event, (filePath) => checks.get(filePath) ?? (() => true))
    );
  }

  /**
   * Run work in the pool after everything queued on the given paths.
   * With no earlier work on them it is submitted to the pool at once.
   */
  private enqueue(paths: string[], work: () => Promise<void>): Promise<void> {
    const previous = paths
      .map((filePath) => this.lanes.get(filePath))
      .filter((lane): lane is Promise<void> => lane !== undefined);
    const queued =
      previous.length === 0 ? this.runInPool(work) : Promise.all(previous).then(() => this.runInPool(work));
    const task: Promise<void> = queued.finally(() => {
      this.inFlight.delete(task);
      for (const filePath of paths) {
        if (this.lanes.get(filePath) === task) {
          this.lanes.delete(filePath);
        }
      }
    });

    this.inFlight.add(task);
    for (const filePath of paths) {
      this.lanes.set(filePath, task);
    }
    return task;
  }

  /**
   * Submit work to the pool; work reaching a worker while paused gives the
   * slot back and is submitted again on resume
   */
  private async runInPool(work: () => Promise<void>): Promise<void> {
    while (!(await this.options.pool.run(() => this.runUnlessPaused(work)))) {
      await this.waitWhilePaused();
    }
  }

  private async runUnlessPaused(work: () => Promise<void>): Promise<boolean> {
    if (this.paused && !this.closed) {
      return false;
    }
    const run = work();
    this.running.add(run);
    try {
      await run;
    } finally {
      this.running.delete(run);
    }
    return true;
  }

  /**
   * Apply one logical event. Failures are recorded, never thrown.
   */
  private async apply(event: SettledEvent, checkFor: (filePath: string) => () => boolean): Promise<void> {
    if (this.closed) {
      return;
    }

    const key = eventKey(event);
    try {
      const result = await this.applyEvent(event, checkFor);
      this.failed.delete(key);
      if (event.type === 'moved') {
        this.failed.delete(event.oldPath);
      }
      if (result?.outcome === 'skipped') {
        this.errorCount++;
        this.lastError = result.error?.message;
        this.report('progress');
      }
    } catch (error) {
      if (this.closed) {
        return;
      }
      const message = toError(error).message;
      this.failed.set(key, event);
      this.errorCount++;
      this.lastError = message;
      getLogger().error('FolderSynchronizer', 'Operation failed after retries', { key, error: message });
      this.report('progress');
    }
    this.reportStatus();
  }

  private async applyEvent(
    event: SettledEvent,
    checkFor: (filePath: string) => () => boolean
  ): Promise<SyncResult | null> {
    switch (event.type) {
      case 'changed':
        return this.applyChanged(event.path, checkFor(event.path));
      case 'removed':
        return removeFile(this.ctx, event.path);
      case 'moved':
        return this.applyMove(event.oldPath, event.newPath, checkFor(event.newPath));
    }
  }

  private async applyChanged(filePath: string, isCurrent: () => boolean): Promise<SyncResult | null> {
    const category = this.options.extractor.classify(filePath, this.contentTypes);
    if (!category) {
      if (this.records.get(filePath) || this.records.hasStrays(filePath)) {
        return removeFile(this.ctx, filePath);
      }
      return null;
    }
    return synchronizeFile(this.ctx, filePath, category, isCurrent);
  }

  /**
   * Relocate the fragments of a moved file instead of re-embedding them
   */
  private async applyMove(oldPath: string, newPath: string, isCurrent: () => boolean): Promise<SyncResult | null> {
    const category = this.options.extractor.classify(newPath, this.contentTypes);
    if (!category) {
      return removeFile(this.ctx, oldPath);
    }

    const record = this.records.get(oldPath);
    if (!record) {
      if (this.records.hasStrays(oldPath)) {
        await removeFile(this.ctx, oldPath);
      }
      return synchronizeFile(this.ctx, newPath, category, isCurrent);
    }

    if (record.fragmentIds.length > 0) {
      await withRetry(() => this.options.store.relocate(this.collection, record.fragmentIds, newPath), {
        ...this.options.settings.retry,
        label: `relocate ${oldPath}`,
      });
    }

    // A file overwritten by the move leaves its fragments to be deleted
    const displaced = this.records.get(newPath);
    if (displaced) {
      this.records.addStrays(newPath, displaced.fragmentIds);
    }
    this.records.rekey(oldPath, newPath);

    getLogger().debug('FolderSynchronizer', 'Relocated fragments', {
      from: oldPath,
      to: newPath,
      fragments: record.fragmentIds.length,
    });
    return synchronizeFile(this.ctx, newPath, category, isCurrent);
  }

  // ==========================================================================
  // Shutdown
  // ==========================================================================

  private halt(): Promise<void> {
    if (!this.haltPromise) {
      this.haltPromise = this.doHalt();
    }
    return this.haltPromise;
  }

  private async doHalt(): Promise<void> {
    this.closed = true;

    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    if (this.cleanupHandler) {
      unregisterCleanup(this.cleanupHandler);
      this.cleanupHandler = null;
    }

    this.walkController?.abort();
    this.releaseResumeWaiters();
    this.debouncer.cancel();
    this.held.clear();
    await this.closeSource();

    if (this.initPromise) {
      await this.initPromise;
    }
    if (this.walkPromise) {
      await this.walkPromise;
    }
    await Promise.all([...this.inFlight]);

    getLogger().debug('FolderSynchronizer', 'Stopped', { root: this.root, status: this.status });
  }

  // ==========================================================================
  // Reporting
  // ==========================================================================

  private report(change: SynchronizerChange): void {
    this.options.onChange?.(change);
  }

  private reportStatus(): void {
    const status = this.status;
    if (status !== this.reportedStatus) {
      this.reportedStatus = status;
      this.report('status');
    }
  }
}
