import { InvalidWindowError } from "./errors.js";
import {
  WINDOW_PRESETS,
  type ResolvedWindow,
  type UsageRecord,
  type WindowPreset,
  type WindowSpec,
} from "./types.js";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const TRAILING_PRESETS: Partial<Record<WindowPreset, number>> = {
  "last-24h": DAY_MS,
  "last-7d": 7 * DAY_MS,
  "last-30d": 30 * DAY_MS,
};

export const PRESET_LABELS: Readonly<Record<WindowPreset, string>> = {
  "week-monday-9am": "Since Monday 9am",
  today: "Today",
  "last-24h": "Last 24 hours",
  "last-7d": "Last 7 days",
  "last-30d": "Last 30 days",
  "all-time": "All time",
};

export function presetWindow(preset: WindowPreset): WindowSpec {
  return { kind: "preset", preset };
}

export function customWindow(start: Date, end: Date): WindowSpec {
  return { kind: "custom", start, end };
}

export function isWindowPreset(value: string): value is WindowPreset {
  return (WINDOW_PRESETS as readonly string[]).includes(value);
}

/**
 * The most recent Monday 09:00 local time that is not after `now`.
 * Sunday counts as the last day of the week, so on Sunday this is six days
 * back, and on Monday before 09:00 it is the previous week's Monday.
 */
export function getMondayNineAM(now: Date): Date {
  const weekday = now.getDay() === 0 ? 7 : now.getDay();
  const monday = new Date(
    now.getFullYear(),
    now.getMonth(),
    now.getDate() - (weekday - 1),
    9,
    0,
    0,
    0,
  );
  if (monday.getTime() > now.getTime()) {
    monday.setDate(monday.getDate() - 7);
  }
  return monday;
}

export function startOfDay(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}

/**
 * Throw unless the window can be resolved. Presets always can.
 */
export function validateWindowSpec(spec: WindowSpec): void {
  if (spec.kind === "preset") {
    if (!isWindowPreset(spec.preset)) {
      throw new InvalidWindowError(`Unknown window preset "${String(spec.preset)}"`);
    }
    return;
  }

  const start = spec.start.getTime();
  const end = spec.end.getTime();
  if (Number.isNaN(start) || Number.isNaN(end)) {
    throw new InvalidWindowError("Custom window needs valid start and end dates");
  }
  if (start > end) {
    throw new InvalidWindowError(
      `Custom window starts after it ends (${spec.start.toISOString()} > ${spec.end.toISOString()})`,
    );
  }
}

/**
 * Turn a spec into concrete instants. Called on every query so presets keep
 * sliding with the clock. `earliest` anchors the all-time window.
 */
export function resolveWindow(
  spec: WindowSpec,
  now: Date,
  earliest: Date | null = null,
): ResolvedWindow {
  validateWindowSpec(spec);

  if (spec.kind === "custom") {
    return {
      start: new Date(spec.start.getTime()),
      end: new Date(spec.end.getTime()),
      openEnded: false,
    };
  }

  const end = new Date(now.getTime());
  switch (spec.preset) {
    case "week-monday-9am":
      return { start: getMondayNineAM(now), end, openEnded: true };
    case "today":
      return { start: startOfDay(now), end, openEnded: true };
    case "all-time": {
      const start =
        earliest != null && earliest.getTime() < now.getTime() ? earliest : now;
      return { start: new Date(start.getTime()), end, openEnded: true };
    }
    default: {
      const span = TRAILING_PRESETS[spec.preset] ?? DAY_MS;
      return { start: new Date(now.getTime() - span), end, openEnded: true };
    }
  }
}

/**
 * Records with start <= timestamp < end
 */
export function filterRecords(
  records: readonly UsageRecord[],
  window: ResolvedWindow,
): UsageRecord[] {
  const start = window.start.getTime();
  const end = window.end.getTime();
  return records.filter((record) => {
    const ts = record.timestamp.getTime();
    return ts >= start && ts < end;
  });
}

/**
 * Stable text form, used for cache keys and the persisted cache
 */
export function windowSpecKey(spec: WindowSpec): string {
  if (spec.kind === "preset") {
    return `preset:${spec.preset}`;
  }
  return `custom:${spec.start.toISOString()}..${spec.end.toISOString()}`;
}

/**
 * Parse "last-7d" or "2025-01-01T00:00:00Z..2025-01-08T00:00:00Z"
 */
export function parseWindowSpec(text: string): WindowSpec {
  const value = text.trim();
  if (isWindowPreset(value)) {
    return presetWindow(value);
  }

  const separator = value.indexOf("..");
  if (separator === -1) {
    throw new InvalidWindowError(
      `Unknown window "${value}", expected one of ${WINDOW_PRESETS.join(", ")} or START..END`,
    );
  }

  const spec = customWindow(
    new Date(value.slice(0, separator)),
    new Date(value.slice(separator + 2)),
  );
  validateWindowSpec(spec);
  return spec;
}

export function describeWindow(spec: WindowSpec): string {
  if (spec.kind === "preset") {
    return PRESET_LABELS[spec.preset];
  }
  return `${spec.start.toISOString()} → ${spec.end.toISOString()}`;
}
