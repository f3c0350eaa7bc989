import { describe, it, expect } from "vitest";
import {
  formatCost,
  formatDuration,
  formatTokenRate,
  formatTokens,
  formatTokensCompact,
  shortenModelName,
} from "../../src/format.js";

describe("formatTokens", () => {
  it("groups thousands", () => {
    expect(formatTokens(0)).toBe("0");
    expect(formatTokens(999)).toBe("999");
    expect(formatTokens(1234567)).toBe("1,234,567");
    expect(formatTokens(-1234)).toBe("-1,234");
    expect(formatTokens(12.9)).toBe("12");
  });
});

describe("formatTokensCompact", () => {
  it("abbreviates thousands and millions", () => {
    expect(formatTokensCompact(999)).toBe("999");
    expect(formatTokensCompact(1234)).toBe("1.2k");
    expect(formatTokensCompact(3_400_000)).toBe("3.4M");
  });
});

describe("formatCost", () => {
  it("formats dollars", () => {
    expect(formatCost(0)).toBe("$0.00");
    expect(formatCost(0.0012)).toBe("$0.0012");
    expect(formatCost(12.5)).toBe("$12.50");
    expect(formatCost(1234.5)).toBe("$1,234.50");
    expect(formatCost(1234567.891)).toBe("$1,234,567.89");
  });
});

describe("formatTokenRate", () => {
  it("formats tokens per second", () => {
    expect(formatTokenRate(0)).toBe("0 tok/s");
    expect(formatTokenRate(Number.NaN)).toBe("0 tok/s");
    expect(formatTokenRate(7.5)).toBe("7.5 tok/s");
    expect(formatTokenRate(42)).toBe("42 tok/s");
    expect(formatTokenRate(1234.4)).toBe("1,234 tok/s");
  });
});

describe("formatDuration", () => {
  it("picks a unit by size", () => {
    expect(formatDuration(42_000)).toBe("42s");
    expect(formatDuration(750_000)).toBe("12.5m");
    expect(formatDuration((3 * 3600 + 7 * 60) * 1000)).toBe("3h7m");
  });
});

describe("shortenModelName", () => {
  it("shortens current and older Claude ids", () => {
    expect(shortenModelName("claude-opus-4-5-20251101")).toBe("Opus 4.5");
    expect(shortenModelName("claude-sonnet-4-20250514")).toBe("Sonnet 4");
    expect(shortenModelName("claude-3-5-haiku-20241022")).toBe("Haiku 3.5");
    expect(shortenModelName("claude-3-opus-20240229")).toBe("Opus 3");
    expect(shortenModelName("anthropic/claude-opus-4.5")).toBe("Opus 4.5");
  });

  it("keeps the family for bare aliases", () => {
    expect(shortenModelName("opus")).toBe("Opus");
  });

  it("leaves other models alone", () => {
    expect(shortenModelName("gpt-4o")).toBe("gpt-4o");
    expect(shortenModelName("unknown")).toBe("unknown");
  });
});
