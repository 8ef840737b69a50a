import { isValid, parseISO, sub } from "date-fns";

export type TimeInput = number | Date;

/** Epoch seconds, truncated to whole seconds. Numbers are taken as seconds. */
export function toEpochSeconds(value: TimeInput): number {
  const ms = value instanceof Date ? value.getTime() : value * 1000;
  return Math.floor(ms / 1000);
}

const RELATIVE = /^-(\d+)(m|h|d)$/;

/**
 * Parses an ISO-8601 timestamp or a relative offset such as `-15m`,
 * `-24h` or `-7d` (counted back from `now`). Returns null for anything
 * else.
 */
export function parseTimeInput(text: string, now: Date = new Date()): number | null {
  const trimmed = text.trim();
  const match = RELATIVE.exec(trimmed);
  if (match) {
    const amount = Number(match[1]);
    switch (match[2]) {
      case "m":
        return toEpochSeconds(sub(now, { minutes: amount }));
      case "h":
        return toEpochSeconds(sub(now, { hours: amount }));
      case "d":
        return toEpochSeconds(sub(now, { days: amount }));
    }
  }
  const parsed = parseISO(trimmed);
  return isValid(parsed) ? toEpochSeconds(parsed) : null;
}

/**
 * Epoch seconds from a transport timestamp: a number or numeric string
 * of seconds, or ISO-8601. Anything else yields `fallback`.
 */
export function timestampOr(ts: number | string | null | undefined, fallback: Date): number {
  if (typeof ts === "number" && Number.isFinite(ts)) return toEpochSeconds(ts);
  if (typeof ts === "string") {
    if (/^\d+(\.\d+)?$/.test(ts.trim())) return toEpochSeconds(Number(ts));
    const parsed = parseTimeInput(ts, fallback);
    if (parsed !== null) return parsed;
  }
  return toEpochSeconds(fallback);
}
