import {
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_CACHE_TTL_MS,
  RATE_WINDOW_SECONDS,
} from "./constants.js";
import { cacheKey } from "./fingerprint.js";
import { copySnapshot } from "./snapshot.js";
import type { CacheEntry, Snapshot, WindowSpec } from "./types.js";

export interface SnapshotCacheOptions {
  capacity?: number;
  /** freshness bound for snapshots whose rates still move with the clock */
  ttlMs?: number;
}

/**
 * Small LRU of built snapshots keyed by (window spec, source fingerprint).
 *
 * An entry is served only while the source fingerprint it was built against
 * is still the current one. Snapshots of windows that reach the present are
 * also bounded by `ttlMs`, since their end and rates follow the clock.
 */
export class SnapshotCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private hitCount = 0;
  private missCount = 0;

  constructor(options: SnapshotCacheOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CACHE_CAPACITY);
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_CACHE_TTL_MS);
  }

  get size(): number {
    return this.entries.size;
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  get(spec: WindowSpec, fingerprint: string, now: Date): Snapshot | undefined {
    const key = cacheKey(spec, fingerprint);
    const entry = this.entries.get(key);
    if (entry == null || !this.isFresh(entry, now)) {
      if (entry != null) {
        this.entries.delete(key);
      }
      this.missCount++;
      return undefined;
    }

    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hitCount++;
    return copySnapshot(entry.snapshot);
  }

  put(spec: WindowSpec, fingerprint: string, snapshot: Snapshot, now: Date): CacheEntry {
    const stored = copySnapshot(snapshot);
    const entry: CacheEntry = Object.freeze({
      key: cacheKey(spec, fingerprint),
      windowSpec: stored.windowSpec,
      sourceFingerprint: fingerprint,
      snapshot: stored,
      createdAt: new Date(now.getTime()),
    });
    this.restore(entry);
    return entry;
  }

  /**
   * Insert an entry as-is (used when loading the persisted cache), then
   * shrink back to capacity
   */
  restore(entry: CacheEntry): void {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
    this.evict(entry.sourceFingerprint);
  }

  /** Entries from least to most recently used */
  list(): CacheEntry[] {
    return [...this.entries.values()];
  }

  clear(): void {
    this.entries.clear();
  }

  private isFresh(entry: CacheEntry, now: Date): boolean {
    const { snapshot } = entry;
    // rate60s still moves until the window end is a full rate window behind
    const followsClock =
      snapshot.openEnded ||
      snapshot.windowEnd.getTime() + RATE_WINDOW_SECONDS * 1000 > entry.createdAt.getTime();
    if (!followsClock) {
      return true;
    }
    return now.getTime() - entry.createdAt.getTime() < this.ttlMs;
  }

  /**
   * Over capacity: stale-fingerprint entries go first (oldest first), then
   * the least recently used.
   */
  private evict(currentFingerprint: string): void {
    if (this.entries.size <= this.capacity) {
      return;
    }

    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.capacity) {
        return;
      }
      if (entry.sourceFingerprint !== currentFingerprint) {
        this.entries.delete(key);
      }
    }

    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.capacity) {
        return;
      }
      this.entries.delete(key);
    }
  }
}
