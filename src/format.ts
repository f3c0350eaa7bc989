// ---- Number Formatting Helpers ----

function groupDigits(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/**
 * Whole token count with thousands separators: 1234567 -> "1,234,567"
 */
export function formatTokens(tokens: number): string {
  if (!Number.isFinite(tokens)) {
    return "0";
  }
  return groupDigits(Math.trunc(tokens).toString());
}

export function formatTokensCompact(tokens: number): string {
  if (tokens >= 1000000) {
    return (tokens / 1000000).toFixed(1) + "M";
  } else if (tokens >= 1000) {
    return (tokens / 1000).toFixed(1) + "k";
  } else {
    return Math.round(tokens).toString();
  }
}

/**
 * "$0.00" for nothing, four decimals under a cent, separators from $1,000
 */
export function formatCost(cost: number): string {
  if (!Number.isFinite(cost) || cost === 0) {
    return "$0.00";
  }
  if (cost < 0.01) {
    return `$${cost.toFixed(4)}`;
  }
  const fixed = cost.toFixed(2);
  const dot = fixed.indexOf(".");
  return `$${groupDigits(fixed.slice(0, dot))}${fixed.slice(dot)}`;
}

export function formatTokenRate(tokensPerSecond: number): string {
  if (!Number.isFinite(tokensPerSecond) || tokensPerSecond <= 0) {
    return "0 tok/s";
  }
  if (tokensPerSecond < 10) {
    return `${tokensPerSecond.toFixed(1)} tok/s`;
  }
  return `${formatTokens(Math.round(tokensPerSecond))} tok/s`;
}

/**
 * 42s, 12.5m, 3h7m
 */
export function formatDuration(ms: number): string {
  const seconds = Math.max(0, ms) / 1000;
  if (seconds < 60) {
    return `${Math.round(seconds)}s`;
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)}m`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor(seconds / 60) % 60;
  return `${hours}h${minutes}m`;
}

// ---- Model Name Helper ----

const MODEL_FAMILIES = ["opus", "sonnet", "haiku"] as const;

/**
 * "claude-opus-4-5-20251101" -> "Opus 4.5", "claude-3-5-haiku-20241022" ->
 * "Haiku 3.5". Names outside the Claude families come back unchanged.
 */
export function shortenModelName(model: string): string {
  const name = model.toLowerCase().replace(/\./g, "-");

  for (const family of MODEL_FAMILIES) {
    if (!name.includes(family)) {
      continue;
    }
    const label = family.charAt(0).toUpperCase() + family.slice(1);

    // claude-opus-4-5-20251101, claude-sonnet-4-20250514
    const current = new RegExp(`${family}-(\\d{1,2})(?:-(\\d))?(?:-|$)`).exec(name);
    // claude-3-5-sonnet-20241022
    const legacy = new RegExp(`claude-(\\d{1,2})(?:-(\\d))?-${family}`).exec(name);
    const match = current ?? legacy;
    const major = match?.[1];
    if (major == null) {
      return label;
    }
    const minor = match?.[2];
    return minor != null ? `${label} ${major}.${minor}` : `${label} ${major}`;
  }

  return model;
}
