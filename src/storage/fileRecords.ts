/**
 * File Records
 *
 * In-memory bookkeeping of what the index holds for each file of one
 * watched folder: the fingerprint last indexed and the ids written for it.
 * Stray ids (written by a sync that was superseded before it could commit)
 * are tracked per path until a later commit or removal deletes them.
 */

import type { FragmentMetadata } from './vectorStore.js';
import { isWithinDirectory } from '../utils/paths.js';

export interface FileRecord {
  path: string;
  fingerprint: string;
  fragmentIds: string[];
  /** Inode at the time of indexing; pairs move notifications */
  inode?: number;
}

/**
 * Result of rebuilding records from the fragments stored in the index
 */
export interface RebuildResult {
  records: FileRecordStore;
  /** Paths whose fragments carry more than one fingerprint or an incomplete set */
  needsResync: string[];
}

export class FileRecordStore {
  private readonly records = new Map<string, FileRecord>();
  private readonly strays = new Map<string, Set<string>>();
  /** Recorded id -> path whose record holds it */
  private readonly owners = new Map<string, string>();

  get size(): number {
    return this.records.size;
  }

  get(filePath: string): FileRecord | undefined {
    return this.records.get(filePath);
  }

  set(record: FileRecord): void {
    this.release(record.path);
    this.records.set(record.path, record);
    for (const id of record.fragmentIds) {
      this.owners.set(id, record.path);
    }
  }

  delete(filePath: string): boolean {
    this.release(filePath);
    return this.records.delete(filePath);
  }

  private release(filePath: string): void {
    for (const id of this.records.get(filePath)?.fragmentIds ?? []) {
      if (this.owners.get(id) === filePath) {
        this.owners.delete(id);
      }
    }
  }

  /**
   * Path whose record or strays hold an id
   */
  ownerOf(id: string): string | undefined {
    const owner = this.owners.get(id);
    if (owner !== undefined) {
      return owner;
    }
    for (const [filePath, set] of this.strays) {
      if (set.has(id)) {
        return filePath;
      }
    }
    return undefined;
  }

  /**
   * Take ids for a path before they are written
   *
   * A moved file keeps the ids derived from its old path, so a new file with
   * the same content at that path derives the same ids. Other paths lose
   * their claim on them: a record holding any of them is dropped and its
   * remaining ids become its strays. The collided ids become strays of
   * filePath until its commit.
   *
   * @returns paths whose record was dropped and must be resynchronized
   */
  claim(filePath: string, ids: readonly string[]): string[] {
    const wanted = new Set(ids);
    const collided: string[] = [];
    const displaced = new Set<string>();

    for (const id of ids) {
      const owner = this.owners.get(id);
      if (owner !== undefined && owner !== filePath) {
        displaced.add(owner);
        collided.push(id);
      }
    }

    for (const [other, set] of this.strays) {
      if (other === filePath) {
        continue;
      }
      for (const id of set) {
        if (wanted.has(id)) {
          set.delete(id);
          collided.push(id);
        }
      }
      if (set.size === 0) {
        this.strays.delete(other);
      }
    }

    for (const other of displaced) {
      const record = this.records.get(other);
      if (!record) {
        continue;
      }
      this.delete(other);
      this.addStrays(other, record.fragmentIds.filter((id) => !wanted.has(id)));
    }

    this.addStrays(filePath, [...new Set(collided)]);
    return [...displaced];
  }

  /**
   * Paths with a record or strays
   */
  trackedPaths(): string[] {
    return [...new Set([...this.records.keys(), ...this.strays.keys()])];
  }

  /**
   * Paths with a record or strays at or below a directory
   */
  pathsUnder(directory: string): string[] {
    const found = new Set<string>();
    for (const filePath of [...this.records.keys(), ...this.strays.keys()]) {
      if (filePath !== directory && isWithinDirectory(filePath, directory)) {
        found.add(filePath);
      }
    }
    return [...found];
  }

  /**
   * Move a record (and its strays) to a new path
   *
   * @returns the re-keyed record, or undefined if oldPath had none
   */
  rekey(oldPath: string, newPath: string): FileRecord | undefined {
    const record = this.records.get(oldPath);
    if (!record) {
      return undefined;
    }

    this.delete(oldPath);
    const moved: FileRecord = { ...record, path: newPath };
    this.set(moved);

    const strays = this.strays.get(oldPath);
    if (strays) {
      this.strays.delete(oldPath);
      this.addStrays(newPath, [...strays]);
    }

    return moved;
  }

  // --------------------------------------------------------------------------
  // Strays
  // --------------------------------------------------------------------------

  addStrays(filePath: string, ids: string[]): void {
    if (ids.length === 0) {
      return;
    }
    let set = this.strays.get(filePath);
    if (!set) {
      set = new Set();
      this.strays.set(filePath, set);
    }
    for (const id of ids) {
      set.add(id);
    }
  }

  getStrays(filePath: string): string[] {
    return [...(this.strays.get(filePath) ?? [])];
  }

  hasStrays(filePath: string): boolean {
    return (this.strays.get(filePath)?.size ?? 0) > 0;
  }

  /**
   * Forget strays once they are deleted from the index
   */
  clearStrays(filePath: string, ids: Iterable<string>): void {
    const set = this.strays.get(filePath);
    if (!set) {
      return;
    }
    for (const id of ids) {
      set.delete(id);
    }
    if (set.size === 0) {
      this.strays.delete(filePath);
    }
  }

  /**
   * Every id known for the folder, recorded or stray
   */
  allFragmentIds(): string[] {
    const ids = new Set<string>();
    for (const record of this.records.values()) {
      for (const id of record.fragmentIds) {
        ids.add(id);
      }
    }
    for (const set of this.strays.values()) {
      for (const id of set) {
        ids.add(id);
      }
    }
    return [...ids];
  }

  clear(): void {
    this.records.clear();
    this.strays.clear();
    this.owners.clear();
  }

  /**
   * Rebuild records from stored fragment payloads
   *
   * A path whose fragments all share one fingerprint gets a record of those
   * ids in ordinal order. When several fingerprints are present, the most
   * recently indexed one becomes the record, the rest become strays and the
   * path is reported for resynchronization. A set missing ordinals (a
   * sync interrupted between batches) yields strays only.
   */
  static fromFragments(fragments: FragmentMetadata[]): RebuildResult {
    const byPath = new Map<string, FragmentMetadata[]>();
    for (const fragment of fragments) {
      const list = byPath.get(fragment.path);
      if (list) {
        list.push(fragment);
      } else {
        byPath.set(fragment.path, [fragment]);
      }
    }

    const records = new FileRecordStore();
    const needsResync: string[] = [];

    for (const [filePath, list] of byPath) {
      const byFingerprint = new Map<string, FragmentMetadata[]>();
      for (const fragment of list) {
        const group = byFingerprint.get(fragment.fingerprint);
        if (group) {
          group.push(fragment);
        } else {
          byFingerprint.set(fragment.fingerprint, [fragment]);
        }
      }

      let current: FragmentMetadata[] = [];
      let currentIndexedAt = '';
      for (const group of byFingerprint.values()) {
        const latest = group.reduce((max, f) => (f.indexedAt > max ? f.indexedAt : max), '');
        if (current.length === 0 || latest > currentIndexedAt) {
          current = group;
          currentIndexedAt = latest;
        }
      }

      const sorted = [...current].sort((a, b) => a.ordinal - b.ordinal);
      if (!isComplete(sorted)) {
        records.addStrays(filePath, list.map((f) => f.id));
        needsResync.push(filePath);
        continue;
      }

      records.set({
        path: filePath,
        fingerprint: sorted[0].fingerprint,
        fragmentIds: sorted.map((f) => f.id),
      });

      if (byFingerprint.size > 1) {
        const stale = list.filter((f) => f.fingerprint !== sorted[0].fingerprint).map((f) => f.id);
        records.addStrays(filePath, stale);
        needsResync.push(filePath);
      }
    }

    return { records, needsResync };
  }
}

/**
 * Ordinals 0..n-1 all present, n matching the declared total
 */
function isComplete(sorted: FragmentMetadata[]): boolean {
  return sorted.every((f, i) => f.ordinal === i && f.totalFragments === sorted.length);
}
