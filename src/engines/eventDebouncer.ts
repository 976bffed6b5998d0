/**
 * Event Debouncer
 *
 * Collapses bursts of raw filesystem notifications into one settled
 * logical event per path. Each path has its own idle timer that re-arms on
 * every raw event; when it fires, the entry settles.
 *
 * A "from" event (deleted / moved-from) and a "to" event (created /
 * moved-to) on different paths that carry the same cookie are paired into
 * a single move, regardless of which arrives first.
 */

import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type RawEventKind = 'created' | 'modified' | 'deleted' | 'moved-from' | 'moved-to';

/**
 * A notification as delivered by the notification source
 */
export interface RawEvent {
  kind: RawEventKind;
  path: string;
  /** Inode or platform rename cookie used to pair moves */
  cookie?: string | number;
}

export type SettledEvent =
  | { type: 'changed'; path: string }
  | { type: 'removed'; path: string }
  | { type: 'moved'; oldPath: string; newPath: string };

export type SettledListener = (event: SettledEvent) => void;

interface PendingEntry {
  path: string;
  lastKind: RawEventKind;
  cookie?: string | number;
  /** Set when this entry is the target of a paired move */
  movedFrom?: string;
  timer: ReturnType<typeof setTimeout>;
}

export function isFromKind(kind: RawEventKind): boolean {
  return kind === 'deleted' || kind === 'moved-from';
}

export function isToKind(kind: RawEventKind): boolean {
  return kind === 'created' || kind === 'moved-to';
}

// ============================================================================
// EventDebouncer Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const debouncer = new EventDebouncer(500, (event) => synchronizer.apply(event));
 * debouncer.push({ kind: 'modified', path: '/docs/a.md' });
 * ```
 */
export class EventDebouncer {
  private readonly debounceMs: number;
  private readonly listener: SettledListener;
  private readonly entries = new Map<string, PendingEntry>();

  constructor(debounceMs: number, listener: SettledListener) {
    this.debounceMs = debounceMs;
    this.listener = listener;
  }

  /**
   * Number of paths with a pending entry
   */
  get pendingCount(): number {
    return this.entries.size;
  }

  push(event: RawEvent): void {
    const existing = this.entries.get(event.path);
    let entry: PendingEntry;

    if (existing) {
      clearTimeout(existing.timer);
      existing.lastKind = event.kind;
      if (event.cookie !== undefined) {
        existing.cookie = event.cookie;
      }
      existing.timer = this.arm(event.path);
      entry = existing;
    } else {
      entry = {
        path: event.path,
        lastKind: event.kind,
        cookie: event.cookie,
        timer: this.arm(event.path),
      };
      this.entries.set(event.path, entry);
    }

    if (event.cookie !== undefined) {
      this.tryPair(entry);
    }
  }

  /**
   * Settle every pending entry now
   */
  flush(): void {
    const pending = [...this.entries.values()];
    this.entries.clear();
    for (const entry of pending) {
      clearTimeout(entry.timer);
      this.emit(entry);
    }
  }

  /**
   * Drop every pending entry without settling it
   */
  cancel(): void {
    for (const entry of this.entries.values()) {
      clearTimeout(entry.timer);
    }
    this.entries.clear();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private arm(filePath: string): ReturnType<typeof setTimeout> {
    return setTimeout(() => this.settle(filePath), this.debounceMs);
  }

  private settle(filePath: string): void {
    const entry = this.entries.get(filePath);
    if (!entry) {
      return;
    }
    this.entries.delete(filePath);
    this.emit(entry);
  }

  /**
   * Merge a from-side entry into the matching to-side entry
   */
  private tryPair(entry: PendingEntry): void {
    let source: PendingEntry | undefined;
    let target: PendingEntry | undefined;

    if (isFromKind(entry.lastKind)) {
      source = entry;
      target = this.findPending(
        (candidate) =>
          candidate !== entry &&
          candidate.cookie === entry.cookie &&
          isToKind(candidate.lastKind) &&
          candidate.movedFrom === undefined
      );
    } else if (isToKind(entry.lastKind) && entry.movedFrom === undefined) {
      target = entry;
      source = this.findPending(
        (candidate) => candidate !== entry && candidate.cookie === entry.cookie && isFromKind(candidate.lastKind)
      );
    }

    if (!source || !target) {
      return;
    }

    // A source that was itself a move target chains back to the original path
    target.movedFrom = source.movedFrom ?? source.path;
    clearTimeout(source.timer);
    this.entries.delete(source.path);
    clearTimeout(target.timer);
    target.timer = this.arm(target.path);

    getLogger().debug('EventDebouncer', 'Paired move', { from: target.movedFrom, to: target.path });
  }

  private findPending(predicate: (candidate: PendingEntry) => boolean): PendingEntry | undefined {
    for (const candidate of this.entries.values()) {
      if (predicate(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private emit(entry: PendingEntry): void {
    if (entry.movedFrom !== undefined) {
      if (isFromKind(entry.lastKind)) {
        // The move target vanished before settling
        this.listener({ type: 'removed', path: entry.movedFrom });
        this.listener({ type: 'removed', path: entry.path });
      } else if (entry.movedFrom === entry.path) {
        this.listener({ type: 'changed', path: entry.path });
      } else {
        this.listener({ type: 'moved', oldPath: entry.movedFrom, newPath: entry.path });
      }
      return;
    }

    if (isFromKind(entry.lastKind)) {
      this.listener({ type: 'removed', path: entry.path });
    } else {
      this.listener({ type: 'changed', path: entry.path });
    }
  }
}
