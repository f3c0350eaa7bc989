import type { TokenCounts, UsageRecord } from "./types.js";

/**
 * USD per million tokens for each billing category
 */
export interface ModelPricing {
  readonly inputPerMillion: number;
  readonly outputPerMillion: number;
  readonly cacheReadPerMillion: number;
  readonly cacheCreatePerMillion: number;
}

export type PricingMatch = "exact" | "prefix" | "default";

export interface ResolvedPricing {
  readonly key: string | null;
  readonly match: PricingMatch;
  readonly pricing: ModelPricing;
}

const OPUS: ModelPricing = {
  inputPerMillion: 5.0,
  outputPerMillion: 25.0,
  cacheReadPerMillion: 0.5,
  cacheCreatePerMillion: 6.25,
};

const OPUS_LEGACY: ModelPricing = {
  inputPerMillion: 15.0,
  outputPerMillion: 75.0,
  cacheReadPerMillion: 1.5,
  cacheCreatePerMillion: 18.75,
};

const SONNET: ModelPricing = {
  inputPerMillion: 3.0,
  outputPerMillion: 15.0,
  cacheReadPerMillion: 0.3,
  cacheCreatePerMillion: 3.75,
};

const HAIKU_4_5: ModelPricing = {
  inputPerMillion: 1.0,
  outputPerMillion: 5.0,
  cacheReadPerMillion: 0.1,
  cacheCreatePerMillion: 1.25,
};

const HAIKU_3_5: ModelPricing = {
  inputPerMillion: 0.8,
  outputPerMillion: 4.0,
  cacheReadPerMillion: 0.08,
  cacheCreatePerMillion: 1.0,
};

const HAIKU_3: ModelPricing = {
  inputPerMillion: 0.25,
  outputPerMillion: 1.25,
  cacheReadPerMillion: 0.03,
  cacheCreatePerMillion: 0.3,
};

/**
 * Model pricing keyed by full id or family prefix (as of November 2025).
 * The bare aliases are what Claude Code accepts for --model. Opus 4.0 and
 * 4.1 carry the old rates under their own ids; any other Opus 4 release
 * falls through to the current ones.
 */
export const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = Object.freeze({
  "claude-opus-4-5-20251101": OPUS,
  "claude-opus-4-5": OPUS,
  "claude-opus-4-1": OPUS_LEGACY,
  "claude-opus-4-0": OPUS_LEGACY,
  "claude-opus-4-20250514": OPUS_LEGACY,
  "claude-opus-4": OPUS,
  "claude-3-opus": OPUS_LEGACY,
  "claude-sonnet-4-5-20250929": SONNET,
  "claude-sonnet-4-5": SONNET,
  "claude-sonnet-4": SONNET,
  "claude-3-7-sonnet": SONNET,
  "claude-3-5-sonnet": SONNET,
  "claude-haiku-4-5-20251001": HAIKU_4_5,
  "claude-haiku-4-5": HAIKU_4_5,
  "claude-3-5-haiku": HAIKU_3_5,
  "claude-3-haiku": HAIKU_3,
  opus: OPUS,
  sonnet: SONNET,
  haiku: HAIKU_4_5,
});

/**
 * Unknown models are priced like Sonnet rather than as free
 */
export const DEFAULT_PRICING: ModelPricing = SONNET;

const PRICING_KEYS_LONGEST_FIRST = Object.keys(MODEL_PRICING).sort(
  (a, b) => b.length - a.length,
);

/**
 * "anthropic/Claude-Opus-4.5" -> "claude-opus-4-5"
 */
export function normalizeModelName(model: string): string {
  const trimmed = model.trim().toLowerCase();
  const slash = trimmed.lastIndexOf("/");
  const bare = slash === -1 ? trimmed : trimmed.slice(slash + 1);
  return bare.replace(/\./g, "-");
}

export function resolvePricing(model: string): ResolvedPricing {
  const normalized = normalizeModelName(model);

  const exact = MODEL_PRICING[normalized];
  if (exact != null) {
    return { key: normalized, match: "exact", pricing: exact };
  }

  for (const key of PRICING_KEYS_LONGEST_FIRST) {
    const pricing = MODEL_PRICING[key];
    if (pricing != null && normalized.startsWith(key)) {
      return { key, match: "prefix", pricing };
    }
  }

  return { key: null, match: "default", pricing: DEFAULT_PRICING };
}

/**
 * Estimated cost in USD for the given token counts
 */
export function costFor(model: string, tokens: TokenCounts): number {
  const { pricing } = resolvePricing(model);
  return (
    (tokens.inputTokens * pricing.inputPerMillion +
      tokens.outputTokens * pricing.outputPerMillion +
      tokens.cacheReadTokens * pricing.cacheReadPerMillion +
      tokens.cacheCreationTokens * pricing.cacheCreatePerMillion) /
    1_000_000
  );
}

/**
 * A cost reported in the transcript wins over the estimate.
 */
export function recordCost(record: UsageRecord): number {
  if (record.reportedCostUSD != null) {
    return record.reportedCostUSD;
  }
  return costFor(record.model, record);
}
