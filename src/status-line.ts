import {
  formatCost,
  formatDuration,
  formatTokenRate,
  formatTokens,
  formatTokensCompact,
  shortenModelName,
} from "./format.js";
import { describeWindow } from "./time-window.js";
import type { Snapshot } from "./types.js";

// ---- Color and Style Helpers ----
const colors = {
  reset: "\x1b[0m",
  window: "\x1b[38;5;117m",
  model: "\x1b[38;5;150m",
  green: "\x1b[38;5;158m",
  yellow: "\x1b[38;5;215m",
  red: "\x1b[38;5;203m",
};

export type StatusColor = keyof typeof colors;

export const colorize = (color: StatusColor, text: string, enabled = true) =>
  enabled ? `${colors[color]}${text}${colors.reset}` : text;

export interface StatusLineOptions {
  /** ANSI colours; off when stdout is not a terminal */
  color?: boolean;
  /** models listed on the last line */
  topModels?: number;
}

function formatClock(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Diagnostics worth showing, or null when everything was read cleanly
 */
export function diagnosticsNotice(snapshot: Snapshot): string | null {
  const { diagnostics } = snapshot;
  if (!diagnostics.sourceAvailable) {
    return "no Claude logs found";
  }
  const parts: string[] = [];
  if (diagnostics.skippedLines > 0) {
    parts.push(`${formatTokens(diagnostics.skippedLines)} skipped`);
  }
  if (diagnostics.unreadableFiles > 0) {
    parts.push(`${diagnostics.unreadableFiles} unreadable`);
  }
  return parts.length > 0 ? parts.join(", ") : null;
}

/**
 * Four status lines for one snapshot: window, totals, rates, models.
 */
export function renderStatusLines(snapshot: Snapshot, options: StatusLineOptions = {}): string[] {
  const color = options.color ?? true;
  const topModels = options.topModels ?? 3;

  const end = snapshot.openEnded ? "now" : formatClock(snapshot.windowEnd);
  const span = snapshot.windowEnd.getTime() - snapshot.windowStart.getTime();
  const windowLine = colorize(
    "window",
    `📅 ${describeWindow(snapshot.windowSpec)} (${formatClock(snapshot.windowStart)} → ${end}, ${formatDuration(span)})`,
    color,
  );

  const totalsLine = `💰 ${formatCost(snapshot.totalCostUSD)} | ${formatTokens(snapshot.totalTokens)} tokens | ${formatTokens(snapshot.recordCount)} requests`;

  const rateColor: StatusColor = snapshot.rate60s > 0 ? "yellow" : "green";
  const ratesLine = `${colorize(rateColor, `🔥 ${formatTokenRate(snapshot.rate60s)} (60s)`, color)} | avg ${formatTokenRate(snapshot.rateSessionAvg)}`;

  const models = snapshot.perModel
    .slice(0, topModels)
    .map(
      (usage) =>
        `${shortenModelName(usage.model)} ${formatCost(usage.totalCostUSD)} (${formatTokensCompact(usage.totalTokens)})`,
    );
  let modelsLine = colorize("model", `🤖 ${models.length > 0 ? models.join(" · ") : "no usage"}`, color);

  const notice = diagnosticsNotice(snapshot);
  if (notice != null) {
    modelsLine += ` ${colorize("red", `⚠ ${notice}`, color)}`;
  }

  return [windowLine, totalsLine, ratesLine, modelsLine];
}
