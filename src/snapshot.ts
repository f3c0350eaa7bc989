import { recordCost } from "./pricing.js";
import { getTotalTokens } from "./rates.js";
import type {
  ModelUsage,
  ResolvedWindow,
  Snapshot,
  SnapshotDiagnostics,
  UsageRates,
  UsageRecord,
  WindowSpec,
} from "./types.js";

export interface SnapshotInput {
  /** records already filtered to the window */
  readonly records: readonly UsageRecord[];
  readonly windowSpec: WindowSpec;
  readonly window: ResolvedWindow;
  readonly rates: UsageRates;
  readonly diagnostics: SnapshotDiagnostics;
  readonly now: Date;
}

interface ModelTotals {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheCreationTokens: number;
  totalCostUSD: number;
  recordCount: number;
}

/**
 * Highest cost first; equal costs fall back to the model name so the order
 * never depends on map iteration.
 */
export function compareModelUsage(a: ModelUsage, b: ModelUsage): number {
  if (a.totalCostUSD !== b.totalCostUSD) {
    return b.totalCostUSD - a.totalCostUSD;
  }
  return a.model < b.model ? -1 : a.model > b.model ? 1 : 0;
}

export function summarizeByModel(records: readonly UsageRecord[]): ModelUsage[] {
  const totals = new Map<string, ModelTotals>();

  for (const record of records) {
    let entry = totals.get(record.model);
    if (entry == null) {
      entry = {
        inputTokens: 0,
        outputTokens: 0,
        cacheReadTokens: 0,
        cacheCreationTokens: 0,
        totalCostUSD: 0,
        recordCount: 0,
      };
      totals.set(record.model, entry);
    }
    entry.inputTokens += record.inputTokens;
    entry.outputTokens += record.outputTokens;
    entry.cacheReadTokens += record.cacheReadTokens;
    entry.cacheCreationTokens += record.cacheCreationTokens;
    entry.totalCostUSD += recordCost(record);
    entry.recordCount++;
  }

  const usages: ModelUsage[] = [];
  for (const [model, entry] of totals) {
    usages.push(
      Object.freeze({
        model,
        ...entry,
        totalTokens: getTotalTokens(entry),
      }),
    );
  }
  return usages.sort(compareModelUsage);
}

function copyDate(date: Date): Date {
  return new Date(date.getTime());
}

function copyWindowSpec(spec: WindowSpec): WindowSpec {
  const copy: WindowSpec =
    spec.kind === "custom"
      ? { kind: "custom", start: copyDate(spec.start), end: copyDate(spec.end) }
      : { kind: "preset", preset: spec.preset };
  return Object.freeze(copy);
}

/**
 * Same snapshot with its own Date objects. Freezing does not stop
 * `setTime`, so every holder of a shared snapshot gets a copy.
 */
export function copySnapshot(snapshot: Snapshot): Snapshot {
  return Object.freeze({
    ...snapshot,
    windowSpec: copyWindowSpec(snapshot.windowSpec),
    windowStart: copyDate(snapshot.windowStart),
    windowEnd: copyDate(snapshot.windowEnd),
    earliestTimestamp: snapshot.earliestTimestamp != null ? copyDate(snapshot.earliestTimestamp) : null,
    latestTimestamp: snapshot.latestTimestamp != null ? copyDate(snapshot.latestTimestamp) : null,
    builtAt: copyDate(snapshot.builtAt),
  });
}

/**
 * Assemble the immutable result for one window. Pure apart from freezing.
 */
export function buildSnapshot(input: SnapshotInput): Snapshot {
  const perModel = summarizeByModel(input.records);

  let inputTokens = 0;
  let outputTokens = 0;
  let cacheReadTokens = 0;
  let cacheCreationTokens = 0;
  let totalCostUSD = 0;
  for (const usage of perModel) {
    inputTokens += usage.inputTokens;
    outputTokens += usage.outputTokens;
    cacheReadTokens += usage.cacheReadTokens;
    cacheCreationTokens += usage.cacheCreationTokens;
    totalCostUSD += usage.totalCostUSD;
  }

  let earliest: number | null = null;
  let latest: number | null = null;
  for (const record of input.records) {
    const ts = record.timestamp.getTime();
    if (earliest == null || ts < earliest) earliest = ts;
    if (latest == null || ts > latest) latest = ts;
  }

  return Object.freeze({
    windowSpec: copyWindowSpec(input.windowSpec),
    windowStart: copyDate(input.window.start),
    windowEnd: copyDate(input.window.end),
    openEnded: input.window.openEnded,
    inputTokens,
    outputTokens,
    cacheReadTokens,
    cacheCreationTokens,
    totalTokens: inputTokens + outputTokens + cacheReadTokens + cacheCreationTokens,
    totalCostUSD,
    recordCount: input.records.length,
    perModel: Object.freeze(perModel),
    rate60s: input.rates.rate60s,
    rateSessionAvg: input.rates.rateSessionAvg,
    earliestTimestamp: earliest != null ? new Date(earliest) : null,
    latestTimestamp: latest != null ? new Date(latest) : null,
    diagnostics: Object.freeze({ ...input.diagnostics }),
    builtAt: copyDate(input.now),
  });
}
