/**
 * Token counts for the four billing categories
 */
export interface TokenCounts {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheReadTokens: number;
  readonly cacheCreationTokens: number;
}

/**
 * One accounting event read from a transcript line. Frozen once built.
 */
export interface UsageRecord extends TokenCounts {
  readonly identity: string;
  readonly timestamp: Date;
  readonly projectId: string;
  readonly sessionId: string;
  readonly model: string;
  readonly reportedCostUSD: number | null;
  readonly sourceFile: string;
  readonly byteOffset: number;
}

/**
 * Per-model rollup over the records of one window
 */
export interface ModelUsage extends TokenCounts {
  readonly model: string;
  readonly totalTokens: number;
  readonly totalCostUSD: number;
  readonly recordCount: number;
}

export const WINDOW_PRESETS = [
  "week-monday-9am",
  "today",
  "last-24h",
  "last-7d",
  "last-30d",
  "all-time",
] as const;

export type WindowPreset = (typeof WINDOW_PRESETS)[number];

export type WindowSpec =
  | { readonly kind: "preset"; readonly preset: WindowPreset }
  | { readonly kind: "custom"; readonly start: Date; readonly end: Date };

/**
 * A window spec resolved against a concrete "now": [start, end)
 */
export interface ResolvedWindow {
  readonly start: Date;
  readonly end: Date;
  readonly openEnded: boolean;
}

export interface UsageRates {
  /** tokens per second over the trailing 60 seconds */
  readonly rate60s: number;
  /** tokens per second over the elapsed window */
  readonly rateSessionAvg: number;
}

/**
 * Counters for the soft failure categories, shown as a single indicator
 */
export interface SnapshotDiagnostics {
  readonly sourceAvailable: boolean;
  readonly filesScanned: number;
  readonly skippedLines: number;
  readonly unreadableFiles: number;
}

export interface Snapshot extends TokenCounts, UsageRates {
  readonly windowSpec: WindowSpec;
  readonly windowStart: Date;
  readonly windowEnd: Date;
  readonly openEnded: boolean;
  readonly totalTokens: number;
  readonly totalCostUSD: number;
  readonly recordCount: number;
  readonly perModel: readonly ModelUsage[];
  readonly earliestTimestamp: Date | null;
  readonly latestTimestamp: Date | null;
  readonly diagnostics: SnapshotDiagnostics;
  readonly builtAt: Date;
}

export interface CacheEntry {
  readonly key: string;
  readonly windowSpec: WindowSpec;
  readonly sourceFingerprint: string;
  readonly snapshot: Snapshot;
  readonly createdAt: Date;
}

/**
 * Metadata of one log file as seen by the locator
 */
export interface LogFileStat {
  readonly path: string;
  readonly size: number;
  readonly mtimeMs: number;
}
