import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorCode, errorMessage } from "./errors.js";
import { cacheKey } from "./fingerprint.js";
import type { Logger } from "./logger.js";
import { WINDOW_PRESETS, type CacheEntry, type Snapshot, type WindowSpec } from "./types.js";

export const CACHE_SCHEMA_VERSION = 1;

const isoTimestampSchema = z
  .string()
  .refine((val: string) => !isNaN(Date.parse(val)), {
    message: "Invalid ISO timestamp",
  })
  .transform((val) => new Date(val));

const windowSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("preset"), preset: z.enum(WINDOW_PRESETS) }),
  z.object({
    kind: z.literal("custom"),
    start: isoTimestampSchema,
    end: isoTimestampSchema,
  }),
]);

const tokenCount = z.number().finite().nonnegative();

const modelUsageSchema = z.object({
  model: z.string(),
  inputTokens: tokenCount,
  outputTokens: tokenCount,
  cacheReadTokens: tokenCount,
  cacheCreationTokens: tokenCount,
  totalTokens: tokenCount,
  totalCostUSD: z.number().finite(),
  recordCount: z.number().int().nonnegative(),
});

const snapshotSchema = z.object({
  windowSpec: windowSpecSchema,
  windowStart: isoTimestampSchema,
  windowEnd: isoTimestampSchema,
  openEnded: z.boolean(),
  inputTokens: tokenCount,
  outputTokens: tokenCount,
  cacheReadTokens: tokenCount,
  cacheCreationTokens: tokenCount,
  totalTokens: tokenCount,
  totalCostUSD: z.number().finite(),
  recordCount: z.number().int().nonnegative(),
  perModel: z.array(modelUsageSchema),
  rate60s: z.number().finite().nonnegative(),
  rateSessionAvg: z.number().finite().nonnegative(),
  earliestTimestamp: isoTimestampSchema.nullable(),
  latestTimestamp: isoTimestampSchema.nullable(),
  diagnostics: z.object({
    sourceAvailable: z.boolean(),
    filesScanned: z.number().int().nonnegative(),
    skippedLines: z.number().int().nonnegative(),
    unreadableFiles: z.number().int().nonnegative(),
  }),
  builtAt: isoTimestampSchema,
});

const persistedEntrySchema = z.object({
  windowSpec: windowSpecSchema,
  sourceFingerprint: z.string().min(1),
  createdAt: isoTimestampSchema,
  snapshot: snapshotSchema,
});

const cacheFileSchema = z.object({
  version: z.literal(CACHE_SCHEMA_VERSION),
  entries: z.array(z.unknown()),
});

function freezeSnapshot(snapshot: z.infer<typeof snapshotSchema>): Snapshot {
  return Object.freeze({
    ...snapshot,
    windowSpec: Object.freeze(snapshot.windowSpec),
    perModel: Object.freeze(snapshot.perModel.map((usage) => Object.freeze(usage))),
    diagnostics: Object.freeze(snapshot.diagnostics),
  });
}

export interface LoadResult {
  readonly entries: CacheEntry[];
  readonly discarded: number;
  readonly invalid: number;
}

/**
 * JSON file holding the last built snapshots across restarts. Every failure
 * here is soft: a bad file or entry is a cache miss, never an error.
 */
export class SnapshotCacheFile {
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "cache-file" });
  }

  /**
   * Entries still valid for the current disk state. Entries built against
   * another fingerprint are dropped before use.
   */
  async load(currentFingerprint: string): Promise<LoadResult> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        this.logger.warn({ file: this.filePath, err: errorMessage(error) }, "cache file unreadable");
      }
      return { entries: [], discarded: 0, invalid: 0 };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger.warn({ file: this.filePath, err: errorMessage(error) }, "cache file is not valid JSON");
      return { entries: [], discarded: 0, invalid: 1 };
    }

    const file = cacheFileSchema.safeParse(raw);
    if (!file.success) {
      this.logger.warn({ file: this.filePath }, "cache file has an unknown layout");
      return { entries: [], discarded: 0, invalid: 1 };
    }

    const entries: CacheEntry[] = [];
    let discarded = 0;
    let invalid = 0;
    for (const candidate of file.data.entries) {
      const parsed = persistedEntrySchema.safeParse(candidate);
      if (!parsed.success) {
        invalid++;
        continue;
      }
      const entry = parsed.data;
      if (entry.sourceFingerprint !== currentFingerprint) {
        discarded++;
        continue;
      }
      const windowSpec: WindowSpec = Object.freeze(entry.windowSpec);
      entries.push(
        Object.freeze({
          key: cacheKey(windowSpec, entry.sourceFingerprint),
          windowSpec,
          sourceFingerprint: entry.sourceFingerprint,
          createdAt: entry.createdAt,
          snapshot: freezeSnapshot(entry.snapshot),
        }),
      );
    }

    if (invalid > 0) {
      this.logger.warn({ file: this.filePath, invalid }, "ignored invalid cache entries");
    }
    this.logger.debug({ loaded: entries.length, discarded }, "cache file loaded");
    return { entries, discarded, invalid };
  }

  async save(entries: readonly CacheEntry[]): Promise<void> {
    const payload = {
      version: CACHE_SCHEMA_VERSION,
      entries: entries.map((entry) => ({
        windowSpec: entry.windowSpec,
        sourceFingerprint: entry.sourceFingerprint,
        createdAt: entry.createdAt,
        snapshot: entry.snapshot,
      })),
    };

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(payload), "utf8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      this.logger.warn({ file: this.filePath, err: errorMessage(error) }, "failed to write cache file");
    }
  }
}
