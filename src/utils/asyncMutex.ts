/**
 * Async Lock Utilities
 *
 * Provides async locking primitives for protecting critical sections:
 * - AsyncMutex: FIFO mutex for serializing store writes and state saves
 * - ReadWriteLock: shared reads, exclusive writes, for the folder registry
 */

import { getLogger } from './logger.js';

type Waiter = () => void;

// ============================================================================
// AsyncMutex Class
// ============================================================================

/**
 * Async Mutex for serializing access to critical sections
 *
 * Waiters are granted the lock in FIFO order.
 *
 * @example
 * ```typescript
 * const mutex = new AsyncMutex('LanceDBVectorStore');
 *
 * await mutex.withLock(async () => {
 *   await table.add(rows);
 * });
 * ```
 */
export class AsyncMutex {
  private locked = false;
  private readonly queue: Waiter[] = [];
  private readonly name: string;

  constructor(name?: string) {
    this.name = name ?? 'AsyncMutex';
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  /**
   * Acquire the lock, waiting behind earlier callers if it is held
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release the lock, handing it directly to the next waiter if any
   */
  release(): void {
    if (!this.locked) {
      getLogger().warn(this.name, 'release() called when mutex is not locked');
      return;
    }

    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the waiter; locked stays true
      next();
      return;
    }

    this.locked = false;
  }

  /**
   * Run fn while holding the lock; the lock is released even if fn throws
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// ============================================================================
// Read-Write Lock
// ============================================================================

/**
 * Read-Write Lock for concurrent reads, exclusive writes
 *
 * Any number of readers may hold the lock together; a writer needs it alone.
 * A waiting writer blocks newly arriving readers so that a steady stream of
 * status reads cannot starve registry mutations.
 *
 * @example
 * ```typescript
 * const rwlock = new ReadWriteLock('FolderRegistry');
 *
 * const snapshot = await rwlock.withReadLock(async () => [...folders.values()]);
 *
 * await rwlock.withWriteLock(async () => {
 *   folders.set(id, folder);
 * });
 * ```
 */
export class ReadWriteLock {
  private readers = 0;
  private writerActive = false;
  private readonly readerQueue: Waiter[] = [];
  private readonly writerQueue: Waiter[] = [];
  private readonly name: string;

  constructor(name?: string) {
    this.name = name ?? 'ReadWriteLock';
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriterActive(): boolean {
    return this.writerActive;
  }

  async acquireRead(): Promise<void> {
    if (!this.writerActive && this.writerQueue.length === 0) {
      this.readers++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.readerQueue.push(() => {
        this.readers++;
        resolve();
      });
    });
  }

  releaseRead(): void {
    if (this.readers <= 0) {
      getLogger().warn(this.name, 'releaseRead() called with no active readers');
      return;
    }

    this.readers--;
    if (this.readers === 0) {
      this.grantNext(false);
    }
  }

  async acquireWrite(): Promise<void> {
    if (!this.writerActive && this.readers === 0) {
      this.writerActive = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.writerQueue.push(() => {
        this.writerActive = true;
        resolve();
      });
    });
  }

  releaseWrite(): void {
    if (!this.writerActive) {
      getLogger().warn(this.name, 'releaseWrite() called with no active writer');
      return;
    }

    this.writerActive = false;
    this.grantNext(true);
  }

  /**
   * Hand the free lock to waiters. After a write, queued readers go first as
   * one batch; after the last read, the next writer goes first.
   */
  private grantNext(preferReaders: boolean): void {
    if (this.writerActive || this.readers > 0) {
      return;
    }

    if (this.readerQueue.length > 0 && (preferReaders || this.writerQueue.length === 0)) {
      const readers = this.readerQueue.splice(0);
      for (const reader of readers) {
        reader();
      }
      return;
    }

    const writer = this.writerQueue.shift();
    if (writer) {
      writer();
    }
  }

  async withReadLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }
}
