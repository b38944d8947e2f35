import type { Direction } from "./types";

const LOW_THRESHOLD = 25;
const HIGH_THRESHOLD = 75;

/**
 * Maps a 0–100 cursor percentage to a discrete direction. The middle half of
 * the axis is a dead zone; both thresholds themselves map to 0.
 */
export function signOf(pct: number): Direction {
  if (pct < LOW_THRESHOLD) return -1;
  if (pct > HIGH_THRESHOLD) return 1;
  return 0;
}
