import { InvalidResolutionError } from "../common/errors";

export const RESOLUTION_SECONDS = {
  raw: 1,
  "1m": 60,
  "5m": 300,
  "15m": 900,
  "1h": 3600,
  "6h": 21600,
  "1d": 86400,
} as const;

export type Resolution = keyof typeof RESOLUTION_SECONDS;
export type RequestedResolution = Resolution | "auto";

// Ascending; "auto" takes the first entry that fits the budget
export const RESOLUTION_LADDER = Object.keys(RESOLUTION_SECONDS).filter(
  (r): r is Resolution => isResolution(r)
);

export const DEFAULT_POINT_BUDGET = 500;

export function isResolution(value: string): value is Resolution {
  return Object.hasOwn(RESOLUTION_SECONDS, value);
}

export function parseResolution(value: string): RequestedResolution {
  const v = value.trim();
  if (v === "auto" || isResolution(v)) return v;
  throw new InvalidResolutionError(value);
}

/** Start of the epoch-aligned bucket holding `ts`. */
export function bucketStart(ts: number, width: number): number {
  return Math.floor(ts / width) * width;
}

/** Number of aligned buckets of `width` seconds touched by [start, end]. */
export function bucketCount(start: number, end: number, width: number): number {
  return bucketStart(end, width) / width - bucketStart(start, width) / width + 1;
}

/**
 * Picks the bucket width for a query. Explicit widths pass through;
 * "auto" takes the finest width whose bucket count over [start, end]
 * stays within `budget`, or the coarsest width when none does.
 */
export function selectResolution(
  start: number,
  end: number,
  requested: RequestedResolution,
  budget: number = DEFAULT_POINT_BUDGET
): Resolution {
  if (requested !== "auto") return requested;
  for (const resolution of RESOLUTION_LADDER) {
    if (bucketCount(start, end, RESOLUTION_SECONDS[resolution]) <= budget) {
      return resolution;
    }
  }
  return "1d";
}
