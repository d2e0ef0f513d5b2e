import type { CacheEntry, Snapshot } from "./types.js";

export interface PermissionCacheOptions {
  ttlMs: number;
  /** How long past its TTL an entry is kept for degraded reads. */
  maxStaleMs: number;
  maxEntries: number;
  now?: () => Date;
}

/**
 * Subject-keyed snapshot store. Entries are replaced whole, never mutated,
 * so a reader holding an entry never observes a half-written snapshot.
 */
export class PermissionCache {
  private readonly entriesBySubject = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxStaleMs: number;
  private readonly maxEntries: number;
  private readonly now: () => Date;

  constructor(options: PermissionCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxStaleMs = options.maxStaleMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? (() => new Date());
  }

  get size() {
    return this.entriesBySubject.size;
  }

  get(subjectId: string): CacheEntry | null {
    const entry = this.entriesBySubject.get(subjectId);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry, this.now().getTime())) {
      this.entriesBySubject.delete(subjectId);
      return null;
    }

    return entry;
  }

  put(snapshot: Snapshot, fetchedAt: Date = this.now()): CacheEntry {
    const entry: CacheEntry = Object.freeze({
      subjectId: snapshot.subjectId,
      snapshot,
      fetchedAt,
      ttlMs: this.ttlMs
    });

    // Re-inserting moves the subject to the back of the eviction order.
    this.entriesBySubject.delete(snapshot.subjectId);
    this.entriesBySubject.set(snapshot.subjectId, entry);
    this.enforceEntryCap();
    return entry;
  }

  invalidate(subjectId: string): boolean {
    return this.entriesBySubject.delete(subjectId);
  }

  isFresh(entry: CacheEntry): boolean {
    return this.now().getTime() - entry.fetchedAt.getTime() < entry.ttlMs;
  }

  ageMs(entry: CacheEntry): number {
    return this.now().getTime() - entry.fetchedAt.getTime();
  }

  /** Live entries, oldest fetch first. */
  entries(): CacheEntry[] {
    const nowMs = this.now().getTime();
    for (const [subjectId, entry] of this.entriesBySubject) {
      if (this.isExpired(entry, nowMs)) {
        this.entriesBySubject.delete(subjectId);
      }
    }

    return [...this.entriesBySubject.values()].sort(
      (left, right) => left.fetchedAt.getTime() - right.fetchedAt.getTime()
    );
  }

  clear() {
    this.entriesBySubject.clear();
  }

  private isExpired(entry: CacheEntry, nowMs: number) {
    return nowMs - entry.fetchedAt.getTime() >= entry.ttlMs + this.maxStaleMs;
  }

  private enforceEntryCap() {
    while (this.entriesBySubject.size > this.maxEntries) {
      const oldestKey = this.entriesBySubject.keys().next().value;
      if (oldestKey === undefined) {
        return;
      }
      this.entriesBySubject.delete(oldestKey);
    }
  }
}
