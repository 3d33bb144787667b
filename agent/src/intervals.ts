/**
 * Candle interval arithmetic. Medium and long timeframes are derived from the
 * short one by a fixed scaling rule so every agent sees the same three views.
 */

import type { TimeframeLabels } from "./types.ts";

export const SUPPORTED_INTERVALS: Readonly<Record<string, number>> = {
  "1m": 1,
  "3m": 3,
  "5m": 5,
  "15m": 15,
  "30m": 30,
  "1h": 60,
  "2h": 120,
  "4h": 240,
  "6h": 360,
  "8h": 480,
  "12h": 720,
  "1d": 1440,
  "3d": 4320,
  "1w": 10080,
};

const BY_MINUTES = Object.entries(SUPPORTED_INTERVALS).sort((a, b) => a[1] - b[1]);

/** Returns 0 for labels outside the supported set. */
export function intervalToMinutes(interval: string): number {
  return SUPPORTED_INTERVALS[interval] ?? 0;
}

/** Scan interval in minutes → short candle interval. Unknown values map to "3m". */
export function minutesToInterval(minutes: number): string {
  const hit = BY_MINUTES.find(([, m]) => m === minutes);
  return hit ? hit[0] : "3m";
}

/**
 * Smallest supported interval within [4x, 5x] of `interval`.
 * Falls back to the smallest one at or above 4x, then to the largest supported.
 */
export function nextInterval(interval: string): string {
  const base = intervalToMinutes(interval);
  if (base <= 0) throw new Error(`Unsupported interval: ${interval}`);
  const lo = base * 4;
  const hi = base * 5;
  const inBand = BY_MINUTES.find(([, m]) => m >= lo && m <= hi);
  if (inBand) return inBand[0];
  const above = BY_MINUTES.find(([, m]) => m >= lo);
  if (above) return above[0];
  return BY_MINUTES[BY_MINUTES.length - 1][0];
}

export function deriveTimeframes(short: string): TimeframeLabels {
  const medium = nextInterval(short);
  return { short, medium, long: nextInterval(medium) };
}
