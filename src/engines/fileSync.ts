/**
 * File Synchronization
 *
 * Brings the index in line with one file's current content. Shared by the
 * initial scan and by settled events.
 *
 * 1. Fingerprint; same as recorded and no strays -> unchanged
 * 2. Extract text; ExtractionError -> skipped, nothing touched
 * 3. Chunk; ids bound to the new fingerprint
 * 4. Embed and upsert the new fragments
 * 5. Delete previously recorded and stray ids not in the new set
 * 6. Commit the record, unless a newer event for the path has settled
 *
 * New ids are written before old ones are deleted, so a reader never sees
 * the file missing from the index mid-update.
 */

import { chunkText } from './chunking.js';
import { fragmentIdsFor } from './fragmentIdentity.js';
import type { ContentCategory, ExtractorGateway } from './extraction.js';
import type { EmbeddingProvider } from './embedding.js';
import type { FileRecordStore } from '../storage/fileRecords.js';
import type { Fragment, VectorStore } from '../storage/vectorStore.js';
import { ExtractionError } from '../errors/index.js';
import { fingerprintFile, type FileFingerprint } from '../utils/hash.js';
import { getLogger } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

// ============================================================================
// Types
// ============================================================================

export type SyncOutcome = 'unchanged' | 'indexed' | 'skipped' | 'superseded' | 'removed';

export interface SyncResult {
  outcome: SyncOutcome;
  /** Fragments now recorded for the file */
  fragments: number;
  /** Set when the outcome is 'skipped' */
  error?: ExtractionError;
}

export interface ChunkingSettings {
  sizeWords: number;
  overlapRatio: number;
  minChunkChars: number;
}

/**
 * Everything a sync needs about the folder it belongs to
 */
export interface FileSyncContext {
  collection: string;
  store: VectorStore;
  embedder: EmbeddingProvider;
  extractor: ExtractorGateway;
  records: FileRecordStore;
  chunking: ChunkingSettings;
  embedBatchSize: number;
  retry: Omit<RetryOptions, 'label' | 'isRetryable'>;
  /** Called for each path whose record lost its ids to another path */
  onDisplaced?: (filePath: string) => void;
}

/**
 * Returns false once a newer event for the path has settled
 */
export type GenerationCheck = () => boolean;

// ============================================================================
// Helpers
// ============================================================================

function retrying<T>(ctx: FileSyncContext, label: string, fn: () => Promise<T>): Promise<T> {
  return withRetry(fn, { ...ctx.retry, label });
}

/**
 * Delete ids from the index and forget them as strays
 */
async function deleteIds(ctx: FileSyncContext, filePath: string, ids: string[]): Promise<void> {
  if (ids.length > 0) {
    await retrying(ctx, `delete ${filePath}`, () => ctx.store.delete(ctx.collection, ids));
  }
  ctx.records.clearStrays(filePath, ids);
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Synchronize one file
 *
 * @param category - Content category the file was classified as
 * @param isCurrent - Generation check for the path
 * @throws IndexStoreError / EmbeddingProviderError once retries are exhausted
 */
export async function synchronizeFile(
  ctx: FileSyncContext,
  filePath: string,
  category: ContentCategory,
  isCurrent: GenerationCheck = () => true
): Promise<SyncResult> {
  const logger = getLogger();

  let fingerprinted: FileFingerprint | null;
  try {
    fingerprinted = await fingerprintFile(filePath);
  } catch (error) {
    if (error instanceof ExtractionError) {
      return { outcome: 'skipped', fragments: 0, error };
    }
    throw error;
  }

  if (fingerprinted === null) {
    return removeFile(ctx, filePath);
  }
  const { fingerprint, inode } = fingerprinted;

  const record = ctx.records.get(filePath);
  if (record && record.fingerprint === fingerprint && !ctx.records.hasStrays(filePath)) {
    if (record.inode !== inode) {
      ctx.records.set({ ...record, inode });
    }
    return { outcome: 'unchanged', fragments: record.fragmentIds.length };
  }

  if (!isCurrent()) {
    return { outcome: 'superseded', fragments: record?.fragmentIds.length ?? 0 };
  }

  let text: string;
  try {
    text = await ctx.extractor.extract(filePath, category);
  } catch (error) {
    if (error instanceof ExtractionError) {
      return { outcome: 'skipped', fragments: record?.fragmentIds.length ?? 0, error };
    }
    throw error;
  }

  // Renumbered after filtering so stored ordinals stay contiguous
  const windows = chunkText(text, ctx.chunking.sizeWords, ctx.chunking.overlapRatio)
    .filter((window) => window.text.trim().length >= ctx.chunking.minChunkChars)
    .map((window, ordinal) => ({ ...window, ordinal }));
  const indexedAt = new Date().toISOString();
  const newIds = fragmentIdsFor(filePath, fingerprint, windows.length);
  const previousIds = new Set(record?.fragmentIds ?? []);

  for (const other of ctx.records.claim(filePath, newIds)) {
    logger.debug('FileSync', `Ids of ${other} reclaimed by ${filePath}`);
    ctx.onDisplaced?.(other);
  }

  // Ids written by this run that the record does not already own
  const written: string[] = [];

  try {
    for (let start = 0; start < windows.length; start += ctx.embedBatchSize) {
      const batch = windows.slice(start, start + ctx.embedBatchSize);
      const vectors = await retrying(ctx, `embed ${filePath}`, () =>
        ctx.embedder.embedPassages(batch.map((window) => window.text))
      );

      const fragments: Fragment[] = batch.map((window, i) => ({
        id: newIds[start + i],
        text: window.text,
        path: filePath,
        ordinal: window.ordinal,
        totalFragments: windows.length,
        fingerprint,
        wordStart: window.wordStart,
        wordEnd: window.wordEnd,
        charStart: window.charStart,
        charEnd: window.charEnd,
        indexedAt,
        vector: vectors[i],
      }));

      await retrying(ctx, `upsert ${filePath}`, () => ctx.store.upsert(ctx.collection, fragments));
      written.push(...fragments.map((f) => f.id).filter((id) => !previousIds.has(id)));
    }
  } catch (error) {
    // Partially written fragments are deleted by the next commit or removal
    ctx.records.addStrays(filePath, written);
    throw error;
  }

  if (!isCurrent()) {
    ctx.records.addStrays(filePath, written);
    logger.debug('FileSync', `Superseded before commit: ${filePath}`, { strays: written.length });
    return { outcome: 'superseded', fragments: record?.fragmentIds.length ?? 0 };
  }

  const keep = new Set(newIds);
  const obsolete = [...previousIds, ...ctx.records.getStrays(filePath)].filter((id) => !keep.has(id));
  try {
    await deleteIds(ctx, filePath, [...new Set(obsolete)]);
  } catch (error) {
    ctx.records.addStrays(filePath, written);
    throw error;
  }
  ctx.records.clearStrays(filePath, newIds);

  ctx.records.set({
    path: filePath,
    fingerprint,
    fragmentIds: newIds,
    inode,
  });

  logger.debug('FileSync', `Indexed ${filePath}`, {
    fragments: newIds.length,
    removed: obsolete.length,
  });
  return { outcome: 'indexed', fragments: newIds.length };
}

/**
 * Delete everything the index holds for a file and drop its record
 */
export async function removeFile(ctx: FileSyncContext, filePath: string): Promise<SyncResult> {
  const record = ctx.records.get(filePath);
  const ids = [...new Set([...(record?.fragmentIds ?? []), ...ctx.records.getStrays(filePath)])];

  await deleteIds(ctx, filePath, ids);
  ctx.records.delete(filePath);

  if (ids.length > 0) {
    getLogger().debug('FileSync', `Removed ${filePath}`, { fragments: ids.length });
  }
  return { outcome: 'removed', fragments: 0 };
}
