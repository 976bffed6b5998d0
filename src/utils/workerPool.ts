/**
 * Worker Pool
 *
 * Bounded concurrency for index mutations, shared by every watched folder.
 * Tasks beyond the concurrency limit wait in a FIFO queue. Producers that
 * can be slowed down (the initial scan) await `waitForCapacity()` before
 * each submission; event-driven tasks are submitted without that gate.
 */

import { getLogger } from './logger.js';

export interface WorkerPoolOptions {
  /** Tasks running at the same time */
  concurrency: number;
  /** waitForCapacity() blocks while this many tasks are queued */
  maxQueueDepth: number;
}

interface QueuedTask {
  start: () => void;
}

export class WorkerPool {
  private readonly concurrency: number;
  private readonly maxQueueDepth: number;
  private active = 0;
  private readonly queue: QueuedTask[] = [];
  private capacityWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    if (!Number.isInteger(options.maxQueueDepth) || options.maxQueueDepth < 1) {
      throw new RangeError(`maxQueueDepth must be a positive integer, got ${options.maxQueueDepth}`);
    }
    this.concurrency = options.concurrency;
    this.maxQueueDepth = options.maxQueueDepth;
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Run a task in the pool. The returned promise settles with the task.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active++;
        Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.next();
          });
      };

      if (this.active < this.concurrency) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  /**
   * Resolves once fewer than maxQueueDepth tasks are waiting
   */
  waitForCapacity(): Promise<void> {
    if (this.queue.length < this.maxQueueDepth) {
      return Promise.resolve();
    }
    getLogger().debug('WorkerPool', 'Queue full, producer waiting', {
      active: this.activeCount,
      queued: this.queuedCount,
    });
    return new Promise<void>((resolve) => {
      this.capacityWaiters.push(resolve);
    });
  }

  private next(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const queued = this.queue.shift();
      queued?.start();
    }

    if (this.queue.length < this.maxQueueDepth && this.capacityWaiters.length > 0) {
      const waiters = this.capacityWaiters;
      this.capacityWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
