import path from "node:path";
import { z } from "zod";
import { UNKNOWN_MODEL, USAGE_FILE_EXTENSION } from "./constants.js";
import { extractProjectFromPath } from "./log-locator.js";
import type { UsageRecord } from "./types.js";

const tokenCountSchema = z.number().finite().nonnegative().nullish();

const usageSchema = z.object({
  input_tokens: tokenCountSchema,
  output_tokens: tokenCountSchema,
  cache_creation_input_tokens: tokenCountSchema,
  cache_read_input_tokens: tokenCountSchema,
  cache_creation: z
    .object({
      ephemeral_5m_input_tokens: tokenCountSchema,
      ephemeral_1h_input_tokens: tokenCountSchema,
    })
    .nullish(),
});

/**
 * Shape of one transcript line. Only the fields used for accounting are
 * declared; zod strips the rest.
 */
export const usageLineSchema = z.object({
  type: z.string().nullish(),
  timestamp: z.string().nullish(),
  sessionId: z.string().nullish(),
  requestId: z.string().nullish(),
  model: z.string().nullish(),
  costUSD: z.number().nullish(),
  message: z
    .object({
      id: z.string().nullish(),
      model: z.string().nullish(),
      usage: usageSchema.nullish(),
    })
    .nullish(),
});

export type UsageLine = z.infer<typeof usageLineSchema>;

/**
 * Where a line sits: identity for lines without message ids is built from this
 */
export interface LineLocation {
  readonly sourceFile: string;
  readonly byteOffset: number;
  readonly projectId: string;
  readonly fileSessionId: string;
}

export type SkipReason = "invalid-json" | "invalid-shape" | "missing-timestamp";

export type ParseOutcome =
  | { readonly kind: "record"; readonly record: UsageRecord }
  | { readonly kind: "ignored" }
  | { readonly kind: "skipped"; readonly reason: SkipReason };

const IGNORED: ParseOutcome = Object.freeze({ kind: "ignored" });

export function lineLocation(sourceFile: string, byteOffset: number): LineLocation {
  return {
    sourceFile,
    byteOffset,
    projectId: extractProjectFromPath(sourceFile),
    fileSessionId: path.basename(sourceFile, USAGE_FILE_EXTENSION),
  };
}

/**
 * Create the dedup key for a line. Claude Code repeats the same assistant
 * message across resumed transcripts with the same message and request ids.
 */
export function recordIdentity(data: UsageLine, location: LineLocation): string {
  const messageId = data.message?.id;
  const requestId = data.requestId;

  if (messageId != null && requestId != null) {
    return `msg:${messageId}:${requestId}`;
  }
  return `line:${location.sourceFile}:${location.byteOffset}`;
}

function parseTimestamp(value: string | null | undefined): Date | null {
  if (value == null || value.trim() === "") {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Decode one physical line. Bad lines are reported as skips for the caller
 * to count; they never throw.
 */
export function parseUsageLine(line: string, location: LineLocation): ParseOutcome {
  const text = line.trim();
  if (text === "") {
    return IGNORED;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { kind: "skipped", reason: "invalid-json" };
  }

  const result = usageLineSchema.safeParse(parsed);
  if (!result.success) {
    return { kind: "skipped", reason: "invalid-shape" };
  }
  const data = result.data;

  const usage = data.message?.usage;
  if (usage == null) {
    return IGNORED;
  }

  const timestamp = parseTimestamp(data.timestamp);
  if (timestamp == null) {
    return { kind: "skipped", reason: "missing-timestamp" };
  }

  const inputTokens = usage.input_tokens ?? 0;
  const outputTokens = usage.output_tokens ?? 0;
  const cacheReadTokens = usage.cache_read_input_tokens ?? 0;
  // Newer transcripts only carry the per-TTL breakdown
  const cacheCreationTokens =
    usage.cache_creation_input_tokens ??
    (usage.cache_creation?.ephemeral_5m_input_tokens ?? 0) +
      (usage.cache_creation?.ephemeral_1h_input_tokens ?? 0);

  if (inputTokens + outputTokens + cacheReadTokens + cacheCreationTokens === 0) {
    return IGNORED;
  }

  const model = data.message?.model?.trim() || data.model?.trim() || UNKNOWN_MODEL;
  const reportedCostUSD =
    data.costUSD != null && Number.isFinite(data.costUSD) ? data.costUSD : null;

  const record: UsageRecord = Object.freeze({
    identity: recordIdentity(data, location),
    timestamp,
    projectId: location.projectId,
    sessionId: data.sessionId ?? location.fileSessionId,
    model,
    inputTokens,
    outputTokens,
    cacheReadTokens,
    cacheCreationTokens,
    reportedCostUSD,
    sourceFile: location.sourceFile,
    byteOffset: location.byteOffset,
  });

  return { kind: "record", record };
}
