import { describe, it, expect } from "vitest";
import {
  DEFAULT_PRICING,
  MODEL_PRICING,
  costFor,
  normalizeModelName,
  recordCost,
  resolvePricing,
} from "../../src/pricing.js";
import { makeRecord } from "../helpers/fixtures.js";

const NO_TOKENS = { inputTokens: 0, outputTokens: 0, cacheReadTokens: 0, cacheCreationTokens: 0 };

describe("normalizeModelName", () => {
  it("lowercases, drops the provider and dots", () => {
    expect(normalizeModelName(" anthropic/Claude-Opus-4.5 ")).toBe("claude-opus-4-5");
    expect(normalizeModelName("claude-sonnet-4-5-20250929")).toBe("claude-sonnet-4-5-20250929");
  });
});

describe("resolvePricing", () => {
  it("prefers an exact match", () => {
    const resolved = resolvePricing("claude-opus-4-5-20251101");
    expect(resolved.match).toBe("exact");
    expect(resolved.key).toBe("claude-opus-4-5-20251101");
    expect(resolved.pricing.inputPerMillion).toBe(5);
  });

  it("matches normalized names exactly", () => {
    expect(resolvePricing("anthropic/Claude-Opus-4.5")).toEqual({
      key: "claude-opus-4-5",
      match: "exact",
      pricing: MODEL_PRICING["claude-opus-4-5"],
    });
    expect(resolvePricing("opus").match).toBe("exact");
  });

  it("uses the longest matching prefix for dated ids", () => {
    expect(resolvePricing("claude-opus-4-5-20260101").key).toBe("claude-opus-4-5");
    expect(resolvePricing("claude-sonnet-4-20250514").key).toBe("claude-sonnet-4");
    expect(resolvePricing("claude-opus-4-1-20250805").pricing.outputPerMillion).toBe(75);
  });

  it("keeps the old Opus rates to the 4.0 and 4.1 ids", () => {
    expect(resolvePricing("claude-opus-4-20250514")).toEqual({
      key: "claude-opus-4-20250514",
      match: "exact",
      pricing: MODEL_PRICING["claude-opus-4-0"],
    });
    expect(resolvePricing("claude-opus-4-0").pricing.inputPerMillion).toBe(15);
    expect(resolvePricing("claude-opus-4-1").pricing.inputPerMillion).toBe(15);
  });

  it("prices later Opus 4 releases at the current rates", () => {
    const resolved = resolvePricing("claude-opus-4-6");
    expect(resolved.key).toBe("claude-opus-4");
    expect(resolved.match).toBe("prefix");
    expect(resolved.pricing.inputPerMillion).toBe(5);
    expect(resolvePricing("claude-opus-4-7-20260301").pricing.outputPerMillion).toBe(25);
  });

  it("falls back to the default for unknown models", () => {
    expect(resolvePricing("gpt-4o")).toEqual({ key: null, match: "default", pricing: DEFAULT_PRICING });
    expect(resolvePricing("unknown").match).toBe("default");
  });
});

describe("costFor", () => {
  it("prices every category per million tokens", () => {
    expect(costFor("claude-opus-4-5", { ...NO_TOKENS, inputTokens: 100, outputTokens: 50 })).toBeCloseTo(0.00175, 10);
    expect(
      costFor("claude-opus-4-5", {
        inputTokens: 1_000_000,
        outputTokens: 1_000_000,
        cacheReadTokens: 1_000_000,
        cacheCreationTokens: 1_000_000,
      }),
    ).toBeCloseTo(36.75, 10);
  });

  it("prices unknown models like the default", () => {
    expect(costFor("mystery-model", { ...NO_TOKENS, inputTokens: 1_000_000 })).toBeCloseTo(3, 10);
  });

  it("is zero for no tokens", () => {
    expect(costFor("claude-opus-4-5", NO_TOKENS)).toBe(0);
  });
});

describe("recordCost", () => {
  it("uses the reported cost when present", () => {
    expect(recordCost(makeRecord({ inputTokens: 1_000_000, reportedCostUSD: 0.5 }))).toBe(0.5);
    expect(recordCost(makeRecord({ inputTokens: 1_000_000, reportedCostUSD: 0 }))).toBe(0);
  });

  it("estimates when nothing was reported", () => {
    expect(recordCost(makeRecord({ model: "claude-3-5-haiku-20241022", outputTokens: 1_000_000 }))).toBeCloseTo(4, 10);
  });
});
