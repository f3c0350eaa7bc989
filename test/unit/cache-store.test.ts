import { describe, it, expect } from "vitest";
import { SnapshotCache } from "../../src/cache-store.js";
import { buildSnapshot } from "../../src/snapshot.js";
import { customWindow, presetWindow } from "../../src/time-window.js";
import type { Snapshot, WindowSpec } from "../../src/types.js";

const NOW = new Date("2025-06-04T10:00:00.000Z");
const later = (ms: number) => new Date(NOW.getTime() + ms);

function snapshotFor(spec: WindowSpec, start: Date, end: Date, openEnded: boolean): Snapshot {
  return buildSnapshot({
    records: [],
    windowSpec: spec,
    window: { start, end, openEnded },
    rates: { rate60s: 0, rateSessionAvg: 0 },
    diagnostics: { sourceAvailable: true, filesScanned: 0, skippedLines: 0, unreadableFiles: 0 },
    now: NOW,
  });
}

const today = presetWindow("today");
const todaySnapshot = snapshotFor(today, new Date("2025-06-04T00:00:00.000Z"), NOW, true);

describe("SnapshotCache", () => {
  it("serves a fresh entry for the same fingerprint", () => {
    const cache = new SnapshotCache({ ttlMs: 2000 });
    cache.put(today, "fp-1", todaySnapshot, NOW);

    expect(cache.get(today, "fp-1", later(1999))).toEqual(todaySnapshot);
    expect(cache.hits).toBe(1);
    expect(cache.misses).toBe(0);
  });

  it("misses when the fingerprint changed", () => {
    const cache = new SnapshotCache();
    cache.put(today, "fp-1", todaySnapshot, NOW);

    expect(cache.get(today, "fp-2", NOW)).toBeUndefined();
    expect(cache.misses).toBe(1);
  });

  it("expires open-ended snapshots after the ttl", () => {
    const cache = new SnapshotCache({ ttlMs: 2000 });
    cache.put(today, "fp-1", todaySnapshot, NOW);

    expect(cache.get(today, "fp-1", later(2000))).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("keeps closed historical windows until the data changes", () => {
    const start = new Date("2025-06-01T00:00:00.000Z");
    const end = new Date("2025-06-02T00:00:00.000Z");
    const spec = customWindow(start, end);
    const snapshot = snapshotFor(spec, start, end, false);
    const cache = new SnapshotCache({ ttlMs: 2000 });
    cache.put(spec, "fp-1", snapshot, NOW);

    expect(cache.get(spec, "fp-1", later(24 * 60 * 60 * 1000))).toEqual(snapshot);
  });

  it("applies the ttl to closed windows that end near creation", () => {
    const start = new Date("2025-06-04T09:00:00.000Z");
    const end = new Date("2025-06-04T09:59:30.000Z");
    const spec = customWindow(start, end);
    const cache = new SnapshotCache({ ttlMs: 2000 });
    cache.put(spec, "fp-1", snapshotFor(spec, start, end, false), NOW);

    expect(cache.get(spec, "fp-1", later(5000))).toBeUndefined();
  });

  it("evicts the least recently used entry", () => {
    const week = presetWindow("last-7d");
    const month = presetWindow("last-30d");
    const cache = new SnapshotCache({ capacity: 2, ttlMs: 60_000 });
    cache.put(today, "fp-1", todaySnapshot, NOW);
    cache.put(week, "fp-1", todaySnapshot, NOW);
    cache.get(today, "fp-1", NOW);
    cache.put(month, "fp-1", todaySnapshot, NOW);

    expect(cache.size).toBe(2);
    expect(cache.get(week, "fp-1", NOW)).toBeUndefined();
    expect(cache.get(today, "fp-1", NOW)).toEqual(todaySnapshot);
    expect(cache.get(month, "fp-1", NOW)).toEqual(todaySnapshot);
  });

  it("evicts entries for an old fingerprint first", () => {
    const week = presetWindow("last-7d");
    const month = presetWindow("last-30d");
    const cache = new SnapshotCache({ capacity: 2, ttlMs: 60_000 });
    cache.put(today, "fp-old", todaySnapshot, NOW);
    cache.put(week, "fp-new", todaySnapshot, NOW);
    cache.get(today, "fp-old", NOW);
    cache.put(month, "fp-new", todaySnapshot, NOW);

    expect(cache.list().map((entry) => entry.sourceFingerprint)).toEqual(["fp-new", "fp-new"]);
    expect(cache.get(week, "fp-new", NOW)).toEqual(todaySnapshot);
  });

  it("lists entries from least to most recently used", () => {
    const week = presetWindow("last-7d");
    const cache = new SnapshotCache({ ttlMs: 60_000 });
    const first = cache.put(today, "fp-1", todaySnapshot, NOW);
    const second = cache.put(week, "fp-1", todaySnapshot, NOW);
    cache.get(today, "fp-1", NOW);

    expect(cache.list()).toEqual([second, first]);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("hands out snapshots that callers cannot change for each other", () => {
    const cache = new SnapshotCache({ ttlMs: 60_000 });
    cache.put(today, "fp-1", todaySnapshot, NOW);

    const first = cache.get(today, "fp-1", NOW);
    first?.windowStart.setTime(0);
    first?.builtAt.setTime(0);

    const second = cache.get(today, "fp-1", NOW);
    expect(second?.windowStart.toISOString()).toBe("2025-06-04T00:00:00.000Z");
    expect(second?.builtAt.toISOString()).toBe("2025-06-04T10:00:00.000Z");
    expect(todaySnapshot.windowStart.toISOString()).toBe("2025-06-04T00:00:00.000Z");
  });

  it("shrinks to capacity when restoring entries", () => {
    const week = presetWindow("last-7d");
    const month = presetWindow("last-30d");
    const source = new SnapshotCache({ ttlMs: 60_000 });
    const entries = [
      source.put(today, "fp-1", todaySnapshot, NOW),
      source.put(week, "fp-1", todaySnapshot, NOW),
      source.put(month, "fp-1", todaySnapshot, NOW),
    ];

    const cache = new SnapshotCache({ capacity: 2, ttlMs: 60_000 });
    for (const entry of entries) {
      cache.restore(entry);
    }

    expect(cache.size).toBe(2);
    expect(cache.list().map((entry) => entry.windowSpec)).toEqual([week, month]);
  });
});
