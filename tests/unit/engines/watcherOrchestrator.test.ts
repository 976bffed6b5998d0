/**
 * Watcher Orchestrator Tests
 *
 * Tests cover:
 * - Collection name derivation
 * - watchFolder validation (missing, file, duplicate, nested, parent)
 * - watchFolder rollback when the folder set cannot be saved
 * - unwatchFolder deletion and persistence, purge retried by sweep()
 * - restore() for clean folders, paused folders, crashes mid-scan,
 *   missing roots and invalid state
 * - sweep() recovery
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { WatcherOrchestrator, collectionNameFor } from '../../../src/engines/watcherOrchestrator.js';
import { ExtractorGateway } from '../../../src/engines/extraction.js';
import { EngineConfigSchema } from '../../../src/storage/config.js';
import {
  loadPersistedState,
  savePersistedState,
  PERSISTED_STATE_ID,
} from '../../../src/storage/watcherState.js';
import type { Fragment } from '../../../src/storage/vectorStore.js';
import {
  AlreadyWatchedError,
  IndexStoreError,
  NotWatchedError,
  PathConflictError,
  PathNotFoundError,
} from '../../../src/errors/index.js';
import { resetCleanupRegistry } from '../../../src/utils/cleanup.js';
import { hashString } from '../../../src/utils/hash.js';
import { normalizePath } from '../../../src/utils/paths.js';
import { WorkerPool } from '../../../src/utils/workerPool.js';
import { MemoryVectorStore } from '../../helpers/memoryVectorStore.js';
import { FakeEmbeddingProvider } from '../../helpers/fakeEmbeddingProvider.js';
import { ManualSourceFactory } from '../../helpers/manualNotificationSource.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

const CONFIG = EngineConfigSchema.parse({
  storagePath: '/unused',
  vectorSize: 16,
  debounceMs: 20,
  persistIntervalMs: 10,
  sweepIntervalMs: 60000,
  retry: { attempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
});

function words(count: number, prefix: string = 'w'): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
}

/**
 * Comparable view of a collection: ids, paths and texts, without timestamps
 */
function contentOf(store: MemoryVectorStore, collection: string): string[] {
  return store
    .fragments(collection)
    .map((f) => `${f.id} ${f.path} ${f.ordinal}/${f.totalFragments} ${f.text}`)
    .sort();
}

describe('collectionNameFor', () => {
  it('should replace separators and collapse underscores', () => {
    expect(collectionNameFor('rag', '/home/me/notes')).toBe('rag_home_me_notes');
  });

  it('should drop drive colons', () => {
    expect(collectionNameFor('rag', 'C:\\Users\\me')).toBe('rag_C_Users_me');
  });

  it('should replace characters outside [A-Za-z0-9_.-]', () => {
    expect(collectionNameFor('rag', '/data/My Docs/été')).toBe('rag_data_My_Docs_t');
  });

  it('should strip trailing separators and dots', () => {
    expect(collectionNameFor('rag', '/srv/site.')).toBe('rag_srv_site');
  });

  it('should shorten long names with a hash suffix', () => {
    const folderPath = `/${'a'.repeat(100)}`;
    const name = collectionNameFor('rag', folderPath);

    expect(name).toHaveLength(64);
    expect(name).toBe(`rag_${'a'.repeat(51)}_${hashString(folderPath).slice(0, 8)}`);
  });
});

describe('WatcherOrchestrator', () => {
  let tempDir: string;
  let root: string;
  let store: MemoryVectorStore;
  let embedder: FakeEmbeddingProvider;
  let factory: ManualSourceFactory;
  let orchestrators: WatcherOrchestrator[];

  beforeEach(async () => {
    tempDir = normalizePath(await fs.promises.realpath(await fs.promises.mkdtemp(path.join(os.tmpdir(), 'orch-test-'))));
    root = path.join(tempDir, 'notes');
    await fs.promises.mkdir(root);
    store = new MemoryVectorStore();
    embedder = new FakeEmbeddingProvider(16);
    factory = new ManualSourceFactory();
    orchestrators = [];
  });

  afterEach(async () => {
    for (const orchestrator of orchestrators) {
      await orchestrator.close();
    }
    resetCleanupRegistry();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  function createOrchestrator(targetStore: MemoryVectorStore = store): WatcherOrchestrator {
    const orchestrator = new WatcherOrchestrator({
      store: targetStore,
      embedder,
      extractor: new ExtractorGateway({
        maxFileSizeBytes: 1024 * 1024,
        fallbackEncoding: 'latin1',
        textExtensions: CONFIG.textExtensions,
      }),
      pool: new WorkerPool({ concurrency: 2, maxQueueDepth: 8 }),
      config: CONFIG,
      sourceFactory: factory.create,
      restartDelayMs: 10,
    });
    orchestrators.push(orchestrator);
    return orchestrator;
  }

  async function writeFile(directory: string, relativePath: string, content: string): Promise<string> {
    const filePath = path.join(directory, relativePath);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, content);
    return filePath;
  }

  describe('watchFolder', () => {
    it('should register the folder and index it in the background', async () => {
      await writeFile(root, 'a.md', words(300));
      await writeFile(root, 'b.pdf', 'not really a pdf');
      const orchestrator = createOrchestrator();

      const snapshot = await orchestrator.watchFolder(root);
      await orchestrator.waitForIdle();

      const expectedName = collectionNameFor('rag', root);
      expect(snapshot).toMatchObject({ path: root, collectionName: expectedName, contentTypes: ['text'] });
      expect(store.fragments(expectedName)).toHaveLength(3);

      const [folder] = await orchestrator.getWatchedFolders();
      expect(folder).toMatchObject({
        id: snapshot.id,
        status: 'watching',
        progressPercent: 100,
        filesDiscovered: 1,
        filesProcessed: 1,
        errorCount: 0,
      });
    });

    it('should canonicalize the path', async () => {
      const orchestrator = createOrchestrator();
      const snapshot = await orchestrator.watchFolder(`${root}/./sub/../`);
      expect(snapshot.path).toBe(root);
    });

    it('should persist the folder set', async () => {
      const orchestrator = createOrchestrator();
      const snapshot = await orchestrator.watchFolder(root, ['text', 'pdf', 'text']);
      await orchestrator.waitForIdle();

      const state = await loadPersistedState(store);
      expect(state?.folders).toHaveLength(1);
      expect(state?.folders[0]).toMatchObject({
        id: snapshot.id,
        path: root,
        contentTypes: ['text', 'pdf'],
        status: 'watching',
      });
      expect(state?.folders[0].scanCompletedAt).toBeDefined();
    });

    it('should reject missing paths and files', async () => {
      const orchestrator = createOrchestrator();
      const filePath = await writeFile(tempDir, 'file.md', 'x');

      await expect(orchestrator.watchFolder(path.join(tempDir, 'missing'))).rejects.toBeInstanceOf(PathNotFoundError);
      await expect(orchestrator.watchFolder(filePath)).rejects.toBeInstanceOf(PathNotFoundError);
    });

    it('should reject a folder that is already watched', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.watchFolder(root);
      await expect(orchestrator.watchFolder(root)).rejects.toBeInstanceOf(AlreadyWatchedError);
    });

    it('should reject folders nested in or containing a watched root', async () => {
      const orchestrator = createOrchestrator();
      const child = path.join(root, 'child');
      await fs.promises.mkdir(child);
      await orchestrator.watchFolder(root);

      await expect(orchestrator.watchFolder(child)).rejects.toBeInstanceOf(PathConflictError);
      await expect(orchestrator.watchFolder(tempDir)).rejects.toBeInstanceOf(PathConflictError);
    });

    it('should roll back the registration when the folder set cannot be saved', async () => {
      await writeFile(root, 'a.md', words(30));
      const orchestrator = createOrchestrator();
      vi.spyOn(store, 'putMetadata').mockRejectedValueOnce(new Error('store down'));

      await expect(orchestrator.watchFolder(root)).rejects.toThrow('store down');
      expect(await orchestrator.getWatchedFolders()).toEqual([]);

      const snapshot = await orchestrator.watchFolder(root);
      await orchestrator.waitForIdle();

      expect((await orchestrator.getWatchedFolders())[0].status).toBe('watching');
      expect(store.fragments(snapshot.collectionName)).toHaveLength(1);
    });

    it('should allow sibling folders', async () => {
      const sibling = path.join(tempDir, 'notes-archive');
      await fs.promises.mkdir(sibling);
      const orchestrator = createOrchestrator();

      await orchestrator.watchFolder(root);
      await orchestrator.watchFolder(sibling);

      expect((await orchestrator.getWatchedFolders()).map((f) => f.path)).toEqual([root, sibling]);
    });
  });

  describe('unwatchFolder', () => {
    it('should throw NotWatchedError for an unknown folder', async () => {
      const orchestrator = createOrchestrator();
      await expect(orchestrator.unwatchFolder(root)).rejects.toBeInstanceOf(NotWatchedError);
    });

    it('should delete the collection and the persisted entry', async () => {
      await writeFile(root, 'a.md', words(30));
      const orchestrator = createOrchestrator();
      const { collectionName } = await orchestrator.watchFolder(root);
      await orchestrator.waitForIdle();

      await orchestrator.unwatchFolder(root);

      expect(store.collections.has(collectionName)).toBe(false);
      expect(await orchestrator.getWatchedFolders()).toEqual([]);
      expect((await loadPersistedState(store))?.folders).toEqual([]);
      expect(factory.created[0].closed).toBe(true);
    });

    it('should keep the folder as removed until the sweep completes its purge', async () => {
      await writeFile(root, 'a.md', words(30));
      const orchestrator = createOrchestrator();
      const { collectionName } = await orchestrator.watchFolder(root);
      await orchestrator.waitForIdle();

      store.failNext('delete', 10);
      await expect(orchestrator.unwatchFolder(root)).rejects.toBeInstanceOf(IndexStoreError);

      expect((await orchestrator.getWatchedFolders()).map((f) => [f.path, f.status])).toEqual([[root, 'removed']]);
      expect((await loadPersistedState(store))?.folders.map((f) => f.status)).toEqual(['removed']);
      expect(store.fragments(collectionName)).toHaveLength(1);
      await expect(orchestrator.resolveCollections()).resolves.toEqual([]);

      store.failNext('delete', 0);
      await orchestrator.sweep();

      expect(store.collections.has(collectionName)).toBe(false);
      expect(await orchestrator.getWatchedFolders()).toEqual([]);
      expect((await loadPersistedState(store))?.folders).toEqual([]);
    });

    it('should retry the purge when unwatched again', async () => {
      await writeFile(root, 'a.md', words(30));
      const orchestrator = createOrchestrator();
      const { collectionName } = await orchestrator.watchFolder(root);
      await orchestrator.waitForIdle();

      store.failNext('delete', 2);
      await expect(orchestrator.unwatchFolder(root)).rejects.toBeInstanceOf(IndexStoreError);
      await orchestrator.unwatchFolder(root);

      expect(store.collections.has(collectionName)).toBe(false);
      expect(await orchestrator.getWatchedFolders()).toEqual([]);
    });

    it('should purge a folder left removed by an earlier run on restore', async () => {
      await writeFile(root, 'a.md', words(30));
      const first = createOrchestrator();
      const { collectionName } = await first.watchFolder(root);
      await first.waitForIdle();
      store.failNext('delete', 2);
      await expect(first.unwatchFolder(root)).rejects.toBeInstanceOf(IndexStoreError);
      await first.close();

      const second = createOrchestrator();
      await expect(second.restore()).resolves.toEqual([]);

      expect(store.collections.has(collectionName)).toBe(false);
      expect((await loadPersistedState(store))?.folders).toEqual([]);
    });

    it('should wait for an in-flight sync before purging', async () => {
      const orchestrator = createOrchestrator();
      const { collectionName } = await orchestrator.watchFolder(root);
      await orchestrator.waitForIdle();

      embedder.hold();
      const filePath = await writeFile(root, 'late.md', words(30));
      factory.for(root).emit({ kind: 'created', path: filePath });
      await vi.waitFor(() => {
        expect(embedder.waiting).toBe(1);
      });

      const unwatching = orchestrator.unwatchFolder(root);
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(store.collections.has(collectionName)).toBe(true);

      embedder.release();
      await unwatching;

      expect(store.calls.upsert).toBe(1);
      expect(store.collections.has(collectionName)).toBe(false);
      expect(await orchestrator.getWatchedFolders()).toEqual([]);
    });
  });

  describe('resolveCollections', () => {
    it('should resolve all or selected folders', async () => {
      const other = path.join(tempDir, 'other');
      await fs.promises.mkdir(other);
      const orchestrator = createOrchestrator();
      await orchestrator.watchFolder(root);
      await orchestrator.watchFolder(other);

      expect(await orchestrator.resolveCollections()).toEqual([
        collectionNameFor('rag', root),
        collectionNameFor('rag', other),
      ]);
      expect(await orchestrator.resolveCollections([other])).toEqual([collectionNameFor('rag', other)]);
      await expect(orchestrator.resolveCollections([tempDir])).rejects.toBeInstanceOf(NotWatchedError);
    });
  });

  describe('restore', () => {
    it('should restore a cleanly watched folder without re-embedding', async () => {
      await writeFile(root, 'a.md', words(300));
      const first = createOrchestrator();
      const { id } = await first.watchFolder(root);
      await first.waitForIdle();
      await first.close();
      const embedded = embedder.passageCalls;

      const second = createOrchestrator();
      const restored = await second.restore();
      await second.waitForIdle();

      expect(restored).toHaveLength(1);
      expect(restored[0].id).toBe(id);
      expect((await second.getWatchedFolders())[0].status).toBe('watching');
      expect(embedder.passageCalls).toBe(embedded);
    });

    it('should keep paused folders paused', async () => {
      const first = createOrchestrator();
      await first.watchFolder(root);
      await first.waitForIdle();
      await first.pauseFolder(root);
      await first.close();

      const second = createOrchestrator();
      await second.restore();

      expect((await second.getWatchedFolders())[0].status).toBe('paused');
      await second.resumeFolder(root);
      await second.waitForIdle();
      expect((await second.getWatchedFolders())[0].status).toBe('watching');
    });

    it('should rescan a folder that crashed mid-scan and match a fresh scan', async () => {
      await writeFile(root, 'a.md', words(300));
      await writeFile(root, 'b.md', words(40, 'b'));
      await writeFile(root, 'sub/c.txt', words(200, 'c'));

      // Reference: a fresh scan into its own store
      const freshStore = new MemoryVectorStore();
      const fresh = createOrchestrator(freshStore);
      const { collectionName } = await fresh.watchFolder(root);
      await fresh.waitForIdle();
      const expected = contentOf(freshStore, collectionName);

      // Crashed run: scan finished, then the state is rewound to mid-scan
      const crashed = createOrchestrator();
      await crashed.watchFolder(root);
      await crashed.waitForIdle();
      await crashed.close();

      const state = await loadPersistedState(store);
      const folder = state?.folders[0];
      if (!folder) {
        throw new Error('expected a persisted folder');
      }
      await savePersistedState(store, [
        { ...folder, status: 'scanning', progressPercent: 33, filesProcessed: 1, scanCompletedAt: undefined },
      ]);
      const [, ...unprocessed] = store.fragments(collectionName).filter((f) => f.path.endsWith('c.txt'));
      await store.delete(collectionName, unprocessed.map((f) => f.id));
      const stale: Fragment = {
        ...store.fragments(collectionName)[0],
        id: uuidv4(),
        path: path.join(root, 'deleted-before-restart.md'),
        fingerprint: 'stale',
      };
      await store.upsert(collectionName, [stale]);

      const restarted = createOrchestrator();
      await restarted.restore();
      await restarted.waitForIdle();

      expect(contentOf(store, collectionName)).toEqual(expected);
      expect((await restarted.getWatchedFolders())[0]).toMatchObject({
        status: 'watching',
        filesDiscovered: 3,
        filesProcessed: 3,
      });
    });

    it('should keep a folder whose root is gone in error until it returns', async () => {
      const first = createOrchestrator();
      await first.watchFolder(root);
      await first.waitForIdle();
      await first.close();
      await fs.promises.rm(root, { recursive: true });

      const second = createOrchestrator();
      await second.restore();

      const [folder] = await second.getWatchedFolders();
      expect(folder.status).toBe('error');
      expect(folder.lastError).toBe(`Path not found: ${root}`);

      await fs.promises.mkdir(root);
      await writeFile(root, 'back.md', words(30));
      await second.sweep();
      await second.waitForIdle();

      const [recovered] = await second.getWatchedFolders();
      expect(recovered.status).toBe('watching');
      expect(store.fragments(recovered.collectionName)).toHaveLength(1);
    });

    it('should start empty when the persisted state is invalid', async () => {
      await store.putMetadata(PERSISTED_STATE_ID, '{"version":"0.1"}');
      const orchestrator = createOrchestrator();

      await expect(orchestrator.restore()).resolves.toEqual([]);
    });

    it('should run only once', async () => {
      const first = createOrchestrator();
      await first.watchFolder(root);
      await first.close();

      const second = createOrchestrator();
      await second.restore();
      await second.restore();

      expect(await second.getWatchedFolders()).toHaveLength(1);
      expect(store.calls.listFragments).toBe(1);
    });
  });
});
