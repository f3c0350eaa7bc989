import pino from "pino";
import { UsageAggregator } from "./aggregator.js";
import { SnapshotCacheFile } from "./cache-persistence.js";
import { SnapshotCache } from "./cache-store.js";
import { sourceFingerprint } from "./fingerprint.js";
import { defaultProjectRoots, locateAll, type LocateResult } from "./log-locator.js";
import type { Logger } from "./logger.js";
import { calculateRates } from "./rates.js";
import { buildSnapshot } from "./snapshot.js";
import { filterRecords, resolveWindow, validateWindowSpec } from "./time-window.js";
import type { Snapshot, SnapshotDiagnostics, WindowSpec } from "./types.js";

export interface UsageEngineOptions {
  /** project directories to scan; defaults to the Claude projects roots */
  roots?: readonly string[];
  now?: () => Date;
  logger?: Logger;
  cacheCapacity?: number;
  cacheTtlMs?: number;
  /** persist snapshots to this JSON file */
  cacheFile?: string;
}

export interface EngineStats {
  readonly scans: number;
  readonly syncs: number;
  readonly builds: number;
  readonly parseInvocations: number;
  readonly records: number;
  readonly cacheHits: number;
  readonly cacheMisses: number;
}

/**
 * Query facade over the locate → parse → aggregate → build pipeline.
 * Files are only read when no cached snapshot matches the current
 * fingerprint, so a persisted hit after a restart parses nothing.
 *
 * All state lives on the instance; two engines never share anything.
 * Queries are serialised so the aggregator and cache only ever see one
 * build at a time.
 */
export class UsageEngine {
  private readonly roots: readonly string[];
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly aggregator: UsageAggregator;
  private readonly cache: SnapshotCache;
  private readonly cacheFile: SnapshotCacheFile | null;

  private syncedFingerprint: string | null = null;
  private cacheFileLoaded = false;
  private reportedErrors = new Set<string>();
  private queue: Promise<unknown> = Promise.resolve();
  private scanCount = 0;
  private syncCount = 0;
  private buildCount = 0;

  constructor(options: UsageEngineOptions = {}) {
    this.roots = options.roots ?? defaultProjectRoots();
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "usage-engine",
    });
    this.aggregator = new UsageAggregator(this.logger);
    this.cache = new SnapshotCache({
      capacity: options.cacheCapacity,
      ttlMs: options.cacheTtlMs,
    });
    this.cacheFile =
      options.cacheFile != null
        ? new SnapshotCacheFile(options.cacheFile, this.logger)
        : null;
  }

  /**
   * Snapshot for the window. Rejects with InvalidWindowError for a custom
   * window that ends before it starts; nothing is scanned in that case.
   */
  query(spec: WindowSpec): Promise<Snapshot> {
    try {
      validateWindowSpec(spec);
    } catch (error) {
      return Promise.reject(error);
    }

    const run = this.queue.then(() => this.runQuery(spec));
    this.queue = run.catch(() => undefined);
    return run;
  }

  stats(): EngineStats {
    return {
      scans: this.scanCount,
      syncs: this.syncCount,
      builds: this.buildCount,
      parseInvocations: this.aggregator.parseInvocations,
      records: this.aggregator.size,
      cacheHits: this.cache.hits,
      cacheMisses: this.cache.misses,
    };
  }

  private async runQuery(spec: WindowSpec): Promise<Snapshot> {
    const located = await this.scan();
    const fingerprint = sourceFingerprint(located.files, located.availableRoots);

    await this.loadCacheFile(fingerprint);

    const now = this.now();
    const cached = this.cache.get(spec, fingerprint, now);
    if (cached != null) {
      return cached;
    }

    if (fingerprint !== this.syncedFingerprint) {
      const report = await this.aggregator.sync(located.files);
      this.syncCount++;
      // Retry unreadable files next time even if their metadata stays put
      this.syncedFingerprint = report.unreadableFiles > 0 ? null : fingerprint;
    }

    const snapshot = this.build(spec, located, now);
    this.cache.put(spec, fingerprint, snapshot, now);
    if (this.cacheFile != null) {
      await this.cacheFile.save(this.cache.list());
    }
    return snapshot;
  }

  private async scan(): Promise<LocateResult> {
    const located = await locateAll(this.roots);
    this.scanCount++;

    if (located.availableRoots.length === 0) {
      this.logger.debug({ roots: located.roots }, "no project directory found");
    }
    // Warn once per path; the same failure repeats on every tick
    const current = new Set<string>();
    for (const error of located.errors) {
      current.add(error.path);
      if (!this.reportedErrors.has(error.path)) {
        this.logger.warn({ path: error.path, err: error.message }, "could not read log path");
      }
    }
    this.reportedErrors = current;
    return located;
  }

  private build(spec: WindowSpec, located: LocateResult, now: Date): Snapshot {
    const all = this.aggregator.records();
    const window = resolveWindow(spec, now, all[0]?.timestamp ?? null);
    const records = filterRecords(all, window);
    const rates = calculateRates(records, window, now);
    const diagnostics: SnapshotDiagnostics = {
      sourceAvailable: located.availableRoots.length > 0,
      filesScanned: located.files.length,
      skippedLines: this.aggregator.skippedLines,
      unreadableFiles: this.aggregator.unreadableFiles + located.errors.length,
    };

    this.buildCount++;
    return buildSnapshot({ records, windowSpec: spec, window, rates, diagnostics, now });
  }

  private async loadCacheFile(fingerprint: string): Promise<void> {
    if (this.cacheFile == null || this.cacheFileLoaded) {
      return;
    }
    this.cacheFileLoaded = true;

    const { entries } = await this.cacheFile.load(fingerprint);
    for (const entry of entries) {
      this.cache.restore(entry);
    }
  }
}
