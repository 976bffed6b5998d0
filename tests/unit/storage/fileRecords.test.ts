import { describe, it, expect } from 'vitest';
import { FileRecordStore } from '../../../src/storage/fileRecords.js';
import type { FragmentMetadata } from '../../../src/storage/vectorStore.js';

function meta(
  id: string,
  filePath: string,
  ordinal: number,
  totalFragments: number,
  fingerprint: string,
  indexedAt: string = '2026-01-01T00:00:00.000Z'
): FragmentMetadata {
  return {
    id,
    path: filePath,
    text: `fragment ${id}`,
    ordinal,
    totalFragments,
    fingerprint,
    wordStart: 0,
    wordEnd: 1,
    charStart: 0,
    charEnd: 1,
    indexedAt,
  };
}

describe('FileRecordStore', () => {
  it('should track records and strays per path', () => {
    const records = new FileRecordStore();
    records.set({ path: '/r/a.md', fingerprint: 'fa', fragmentIds: ['a0', 'a1'] });
    records.addStrays('/r/a.md', ['s1']);
    records.addStrays('/r/b.md', ['s2', 's3']);

    expect(records.size).toBe(1);
    expect(records.trackedPaths().sort()).toEqual(['/r/a.md', '/r/b.md']);
    expect(records.allFragmentIds().sort()).toEqual(['a0', 'a1', 's1', 's2', 's3']);
  });

  it('should forget a path once all its strays are cleared', () => {
    const records = new FileRecordStore();
    records.addStrays('/r/a.md', ['s1', 's2']);

    records.clearStrays('/r/a.md', ['s1']);
    expect(records.getStrays('/r/a.md')).toEqual(['s2']);

    records.clearStrays('/r/a.md', ['s2']);
    expect(records.hasStrays('/r/a.md')).toBe(false);
    expect(records.trackedPaths()).toEqual([]);
  });

  it('should list paths strictly below a directory', () => {
    const records = new FileRecordStore();
    records.set({ path: '/r/docs/a.md', fingerprint: 'f', fragmentIds: [] });
    records.addStrays('/r/docs/sub/b.md', ['s']);
    records.set({ path: '/r/docs-old/c.md', fingerprint: 'f', fragmentIds: [] });

    expect(records.pathsUnder('/r/docs').sort()).toEqual(['/r/docs/a.md', '/r/docs/sub/b.md']);
  });

  it('should rekey a record together with its strays', () => {
    const records = new FileRecordStore();
    records.set({ path: '/r/a.md', fingerprint: 'fa', fragmentIds: ['a0'], inode: 7 });
    records.addStrays('/r/a.md', ['s1']);

    const moved = records.rekey('/r/a.md', '/r/b.md');

    expect(moved).toEqual({ path: '/r/b.md', fingerprint: 'fa', fragmentIds: ['a0'], inode: 7 });
    expect(records.get('/r/a.md')).toBeUndefined();
    expect(records.getStrays('/r/b.md')).toEqual(['s1']);
    expect(records.rekey('/r/missing.md', '/r/x.md')).toBeUndefined();
  });

  it('should follow recorded ids through set and rekey', () => {
    const records = new FileRecordStore();
    records.set({ path: '/r/a.md', fingerprint: 'fa', fragmentIds: ['a0'] });
    records.addStrays('/r/c.md', ['s1']);

    records.rekey('/r/a.md', '/r/b.md');
    expect(records.ownerOf('a0')).toBe('/r/b.md');
    expect(records.ownerOf('s1')).toBe('/r/c.md');

    records.set({ path: '/r/b.md', fingerprint: 'fb', fragmentIds: ['b0'] });
    expect(records.ownerOf('a0')).toBeUndefined();
    expect(records.ownerOf('b0')).toBe('/r/b.md');
  });

  describe('claim', () => {
    it('should drop the record holding claimed ids and keep its other ids as strays', () => {
      const records = new FileRecordStore();
      records.set({ path: '/r/b.md', fingerprint: 'fa', fragmentIds: ['a0', 'a1', 'b9'] });

      const displaced = records.claim('/r/a.md', ['a0', 'a1']);

      expect(displaced).toEqual(['/r/b.md']);
      expect(records.get('/r/b.md')).toBeUndefined();
      expect(records.getStrays('/r/b.md')).toEqual(['b9']);
      expect(records.getStrays('/r/a.md')).toEqual(['a0', 'a1']);
      expect(records.ownerOf('a0')).toBe('/r/a.md');
    });

    it('should take claimed ids out of the strays of other paths', () => {
      const records = new FileRecordStore();
      records.addStrays('/r/c.md', ['a0', 'c1']);
      records.addStrays('/r/d.md', ['a1']);

      expect(records.claim('/r/a.md', ['a0', 'a1'])).toEqual([]);
      expect(records.getStrays('/r/c.md')).toEqual(['c1']);
      expect(records.hasStrays('/r/d.md')).toBe(false);
      expect(records.getStrays('/r/a.md')).toEqual(['a0', 'a1']);
    });

    it('should leave ids the path already owns alone', () => {
      const records = new FileRecordStore();
      records.set({ path: '/r/a.md', fingerprint: 'fa', fragmentIds: ['a0'] });

      expect(records.claim('/r/a.md', ['a0', 'a1'])).toEqual([]);
      expect(records.get('/r/a.md')?.fragmentIds).toEqual(['a0']);
      expect(records.hasStrays('/r/a.md')).toBe(false);
    });
  });

  describe('fromFragments', () => {
    it('should rebuild complete records in ordinal order', () => {
      const { records, needsResync } = FileRecordStore.fromFragments([
        meta('a1', '/r/a.md', 1, 2, 'fa'),
        meta('a0', '/r/a.md', 0, 2, 'fa'),
        meta('b0', '/r/b.md', 0, 1, 'fb'),
      ]);

      expect(records.get('/r/a.md')).toEqual({ path: '/r/a.md', fingerprint: 'fa', fragmentIds: ['a0', 'a1'] });
      expect(records.get('/r/b.md')?.fragmentIds).toEqual(['b0']);
      expect(needsResync).toEqual([]);
    });

    it('should keep the most recent fingerprint and mark the rest as strays', () => {
      const { records, needsResync } = FileRecordStore.fromFragments([
        meta('old0', '/r/a.md', 0, 1, 'f-old', '2026-01-01T00:00:00.000Z'),
        meta('new0', '/r/a.md', 0, 1, 'f-new', '2026-02-01T00:00:00.000Z'),
      ]);

      expect(records.get('/r/a.md')?.fingerprint).toBe('f-new');
      expect(records.getStrays('/r/a.md')).toEqual(['old0']);
      expect(needsResync).toEqual(['/r/a.md']);
    });

    it('should turn an incomplete set into strays without a record', () => {
      const { records, needsResync } = FileRecordStore.fromFragments([
        meta('a0', '/r/a.md', 0, 3, 'fa'),
        meta('a2', '/r/a.md', 2, 3, 'fa'),
      ]);

      expect(records.get('/r/a.md')).toBeUndefined();
      expect(records.getStrays('/r/a.md').sort()).toEqual(['a0', 'a2']);
      expect(needsResync).toEqual(['/r/a.md']);
    });
  });
});
