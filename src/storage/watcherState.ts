/**
 * Watcher State Persistence
 *
 * The set of watched folders and their progress is stored as one JSON blob
 * in the vector store's metadata, under a fixed id. It is the only source of
 * truth across restarts.
 */

import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { InvalidConfigError, toError } from '../errors/index.js';
import type { VectorStore } from './vectorStore.js';

// ============================================================================
// Schema
// ============================================================================

/**
 * Metadata id of the persisted state
 */
export const PERSISTED_STATE_ID = 'f0f0f0f0-0000-0000-0000-000000000001';

export const PERSISTED_STATE_VERSION = '1.0.0';

export const ContentCategorySchema = z.enum(['text', 'pdf']);

export const FolderStatusSchema = z.enum(['initializing', 'scanning', 'watching', 'paused', 'error', 'removed']);

export type FolderStatus = z.infer<typeof FolderStatusSchema>;

export const WatchedFolderSchema = z.object({
  id: z.string().uuid(),
  path: z.string().min(1),
  contentTypes: z.array(ContentCategorySchema).nonempty(),
  collectionName: z.string().min(1),
  status: FolderStatusSchema,
  progressPercent: z.number().min(0).max(100),
  filesDiscovered: z.number().int().nonnegative(),
  filesProcessed: z.number().int().nonnegative(),
  errorCount: z.number().int().nonnegative(),
  createdAt: z.string().datetime(),
  scanCompletedAt: z.string().datetime().optional(),
  lastError: z.string().optional(),
});

export type WatchedFolder = z.infer<typeof WatchedFolderSchema>;

export const PersistedStateSchema = z.object({
  version: z.literal(PERSISTED_STATE_VERSION),
  updatedAt: z.string().datetime(),
  folders: z.array(WatchedFolderSchema),
});

export type PersistedState = z.infer<typeof PersistedStateSchema>;

// ============================================================================
// Load / Save
// ============================================================================

/**
 * Read the persisted state
 *
 * @returns null when nothing was persisted yet
 * @throws InvalidConfigError if the blob is not valid JSON or fails validation
 */
export async function loadPersistedState(store: VectorStore): Promise<PersistedState | null> {
  const blob = await store.getMetadata(PERSISTED_STATE_ID);
  if (blob === null) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (error) {
    throw new InvalidConfigError('persisted watcher state', 'not valid JSON', toError(error));
  }

  const result = PersistedStateSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new InvalidConfigError('persisted watcher state', errors);
  }

  return result.data;
}

export async function savePersistedState(store: VectorStore, folders: WatchedFolder[]): Promise<void> {
  const state: PersistedState = {
    version: PERSISTED_STATE_VERSION,
    updatedAt: new Date().toISOString(),
    folders,
  };
  await store.putMetadata(PERSISTED_STATE_ID, JSON.stringify(state));
}

// ============================================================================
// PersistScheduler
// ============================================================================

/**
 * Coalesces progress writes to at most one per interval
 *
 * `schedule()` is for progress updates; `saveNow()` for changes that must
 * reach storage immediately (folder set changes, scan completion).
 * Saves never overlap.
 */
export class PersistScheduler {
  private readonly save: () => Promise<void>;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private chain: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(save: () => Promise<void>, intervalMs: number) {
    this.save = save;
    this.intervalMs = intervalMs;
  }

  get hasPending(): boolean {
    return this.timer !== null;
  }

  schedule(): void {
    if (this.closed || this.timer) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.enqueue().catch((error: unknown) => {
        getLogger().error('PersistScheduler', 'Scheduled state save failed', {
          error: toError(error).message,
        });
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  async saveNow(): Promise<void> {
    this.clearTimer();
    await this.enqueue();
  }

  /**
   * Write a pending scheduled save now and wait for in-flight saves
   */
  async flush(): Promise<void> {
    if (this.timer) {
      await this.saveNow();
      return;
    }
    await this.chain;
  }

  /**
   * Flush and stop accepting scheduled saves
   */
  async close(): Promise<void> {
    await this.flush();
    this.closed = true;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private enqueue(): Promise<void> {
    const run = this.chain.then(() => this.save());
    // Keep the chain alive after a failure; the caller sees the rejection
    this.chain = run.catch(() => undefined);
    return run;
  }
}
