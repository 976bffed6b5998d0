/**
 * LanceDB Vector Store Unit Tests
 *
 * Tests for the LanceDB adapter including:
 * - Lifecycle (open, close)
 * - Upsert, delete, relocate and listing
 * - Cosine vector search
 * - Metadata blobs
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import { LanceDBVectorStore, distanceToScore } from '../../../src/storage/lancedb.js';
import type { Fragment } from '../../../src/storage/vectorStore.js';
import { IndexStoreError } from '../../../src/errors/index.js';
import { resetCleanupRegistry } from '../../../src/utils/cleanup.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

// ============================================================================
// Test Helpers
// ============================================================================

const COLLECTION = 'rag_test_notes';
const STATE_ID = 'f0f0f0f0-0000-0000-0000-000000000001';

function fragment(filePath: string, ordinal: number, vector: number[], text: string = `text ${ordinal}`): Fragment {
  return {
    id: uuidv4(),
    path: filePath,
    text,
    vector,
    ordinal,
    totalFragments: 2,
    fingerprint: 'fp-1',
    wordStart: ordinal * 10,
    wordEnd: ordinal * 10 + 10,
    charStart: ordinal * 50,
    charEnd: ordinal * 50 + 49,
    indexedAt: '2026-01-01T00:00:00.000Z',
  };
}

function byOrdinal(a: { ordinal: number }, b: { ordinal: number }): number {
  return a.ordinal - b.ordinal;
}

describe('LanceDBVectorStore', () => {
  let tempDir: string;
  let store: LanceDBVectorStore;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'lancedb-test-'));
    store = new LanceDBVectorStore(path.join(tempDir, 'db'));
    await store.open();
    await store.ensureCollection(COLLECTION, 4, 'cosine');
  });

  afterEach(async () => {
    await store.close();
    resetCleanupRegistry();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  describe('lifecycle', () => {
    it('should create the database directory', () => {
      expect(fs.existsSync(path.join(tempDir, 'db'))).toBe(true);
    });

    it('should reject operations after close', async () => {
      await store.close();
      await expect(store.listFragments(COLLECTION)).rejects.toBeInstanceOf(IndexStoreError);
    });

    it('should allow close to be called twice', async () => {
      await store.close();
      await expect(store.close()).resolves.toBeUndefined();
    });
  });

  describe('fragments', () => {
    it('should return nothing for a collection without data', async () => {
      await expect(store.listFragments(COLLECTION)).resolves.toEqual([]);
      await expect(store.search(COLLECTION, [1, 0, 0, 0], 5)).resolves.toEqual([]);
    });

    it('should store payloads without vectors', async () => {
      const first = fragment('/notes/a.md', 0, [1, 0, 0, 0]);
      const second = fragment('/notes/a.md', 1, [0, 1, 0, 0]);
      await store.upsert(COLLECTION, [first, second]);

      const listed = (await store.listFragments(COLLECTION)).sort(byOrdinal);

      expect(listed).toHaveLength(2);
      expect(listed[0]).not.toHaveProperty('vector');
      expect(listed[0]).toEqual({ ...first, vector: undefined });
      expect(listed[1].id).toBe(second.id);
    });

    it('should replace fragments with the same id', async () => {
      const original = fragment('/notes/a.md', 0, [1, 0, 0, 0], 'old text');
      await store.upsert(COLLECTION, [original]);
      await store.upsert(COLLECTION, [{ ...original, text: 'new text' }]);

      const listed = await store.listFragments(COLLECTION);
      expect(listed.map((f) => f.text)).toEqual(['new text']);
    });

    it('should reject vectors of the wrong dimension', async () => {
      await expect(store.upsert(COLLECTION, [fragment('/notes/a.md', 0, [1, 0])])).rejects.toThrow(
        'vector dimension mismatch in rag_test_notes: expected 4, got 2'
      );
    });

    it('should delete by id and ignore unknown ids', async () => {
      const keep = fragment('/notes/a.md', 0, [1, 0, 0, 0]);
      const drop = fragment('/notes/a.md', 1, [0, 1, 0, 0]);
      await store.upsert(COLLECTION, [keep, drop]);

      await store.delete(COLLECTION, [drop.id, uuidv4()]);

      expect((await store.listFragments(COLLECTION)).map((f) => f.id)).toEqual([keep.id]);
    });

    it('should reject ids that are not UUIDs', async () => {
      await store.upsert(COLLECTION, [fragment('/notes/a.md', 0, [1, 0, 0, 0])]);
      await expect(store.delete(COLLECTION, ["x' OR '1'='1"])).rejects.toBeInstanceOf(IndexStoreError);
      expect(await store.listFragments(COLLECTION)).toHaveLength(1);
    });

    it('should rewrite the path of relocated fragments only', async () => {
      const moved = fragment('/notes/a.md', 0, [1, 0, 0, 0]);
      const other = fragment('/notes/b.md', 0, [0, 1, 0, 0]);
      await store.upsert(COLLECTION, [moved, other]);

      await store.relocate(COLLECTION, [moved.id], '/notes/archive/a.md');

      const listed = await store.listFragments(COLLECTION);
      expect(listed.find((f) => f.id === moved.id)?.path).toBe('/notes/archive/a.md');
      expect(listed.find((f) => f.id === other.id)?.path).toBe('/notes/b.md');
    });
  });

  describe('search', () => {
    it('should rank by cosine similarity', async () => {
      const near = fragment('/notes/near.md', 0, [1, 0.1, 0, 0]);
      const far = fragment('/notes/far.md', 0, [0, 1, 0, 0]);
      await store.upsert(COLLECTION, [far, near]);

      const hits = await store.search(COLLECTION, [1, 0, 0, 0], 5);

      expect(hits.map((hit) => hit.fragment.id)).toEqual([near.id, far.id]);
      expect(hits[0].score).toBeCloseTo(1 / Math.sqrt(1.01), 4);
      expect(hits[1].score).toBeCloseTo(0, 4);
    });

    it('should honor the limit', async () => {
      await store.upsert(COLLECTION, [
        fragment('/notes/a.md', 0, [1, 0, 0, 0]),
        fragment('/notes/a.md', 1, [0, 1, 0, 0]),
      ]);
      expect(await store.search(COLLECTION, [1, 0, 0, 0], 1)).toHaveLength(1);
    });
  });

  describe('collections', () => {
    it('should drop a collection and its data', async () => {
      await store.upsert(COLLECTION, [fragment('/notes/a.md', 0, [1, 0, 0, 0])]);

      await store.dropCollection(COLLECTION);

      await expect(store.listFragments(COLLECTION)).resolves.toEqual([]);
    });

    it('should ignore dropping a collection that was never written', async () => {
      await expect(store.dropCollection('rag_unknown')).resolves.toBeUndefined();
    });
  });

  describe('metadata', () => {
    it('should return null before anything is stored', async () => {
      await expect(store.getMetadata(STATE_ID)).resolves.toBeNull();
    });

    it('should store and replace blobs', async () => {
      await store.putMetadata(STATE_ID, '{"v":1}');
      await store.putMetadata(STATE_ID, '{"v":2}');
      await expect(store.getMetadata(STATE_ID)).resolves.toBe('{"v":2}');
    });

    it('should persist across reopen', async () => {
      await store.putMetadata(STATE_ID, 'blob');
      await store.close();

      const reopened = new LanceDBVectorStore(path.join(tempDir, 'db'));
      await reopened.open();
      try {
        await expect(reopened.getMetadata(STATE_ID)).resolves.toBe('blob');
      } finally {
        await reopened.close();
      }
    });
  });
});

describe('distanceToScore', () => {
  it('should map cosine distance to similarity', () => {
    expect(distanceToScore(0)).toBe(1);
    expect(distanceToScore(1)).toBe(0);
    expect(distanceToScore(2)).toBe(-1);
  });
});
