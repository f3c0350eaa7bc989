import { RATE_WINDOW_SECONDS } from "./constants.js";
import type { ResolvedWindow, TokenCounts, UsageRates, UsageRecord } from "./types.js";

export function getTotalTokens(tokenCounts: TokenCounts): number {
  return (
    tokenCounts.inputTokens +
    tokenCounts.outputTokens +
    tokenCounts.cacheReadTokens +
    tokenCounts.cacheCreationTokens
  );
}

function perSecond(tokens: number, seconds: number): number {
  if (tokens <= 0 || !Number.isFinite(seconds) || seconds <= 0) {
    return 0;
  }
  return tokens / seconds;
}

/**
 * rate60s: tokens stamped within the last 60 seconds of `now`, per second.
 * rateSessionAvg: window tokens over the window's elapsed seconds (at least
 * one), measured to `now` for open-ended windows.
 */
export function calculateRates(
  records: readonly UsageRecord[],
  window: ResolvedWindow,
  now: Date,
): UsageRates {
  const nowMs = now.getTime();
  const cutoff = nowMs - RATE_WINDOW_SECONDS * 1000;

  let recentTokens = 0;
  let windowTokens = 0;
  for (const record of records) {
    const tokens = getTotalTokens(record);
    windowTokens += tokens;
    const ts = record.timestamp.getTime();
    if (ts >= cutoff && ts <= nowMs) {
      recentTokens += tokens;
    }
  }

  const endMs = window.openEnded ? nowMs : window.end.getTime();
  const elapsedSeconds = Math.max(1, (endMs - window.start.getTime()) / 1000);

  return {
    rate60s: perSecond(recentTokens, RATE_WINDOW_SECONDS),
    rateSessionAvg: perSecond(windowTokens, elapsedSeconds),
  };
}
