/**
 * Shared Windowing Helpers
 *
 * Second-granularity time arithmetic for the sliding window aggregator.
 * All functions are pure and take epoch seconds (fractional allowed).
 */

/** Integer second an event timestamp belongs to. */
export function toSecondIndex(timestamp: number): number {
  return Math.floor(timestamp);
}

/**
 * Exclusive lower bound of a trailing window.
 * A bucket is "in window" when its secondIndex is strictly greater than this.
 */
export function getWindowCutoff(windowSeconds: number, now: number): number {
  return toSecondIndex(now) - windowSeconds;
}

/**
 * Oldest secondIndex still retained for a given reference time.
 * Buckets below this are evicted.
 */
export function getRetentionFloor(retentionSeconds: number, now: number): number {
  return toSecondIndex(now) - retentionSeconds;
}

/**
 * Per-second average over a window. The denominator is the full window, so
 * a single burst is spread across it rather than reported as a spike.
 */
export function computeRate(total: number, windowSeconds: number): number {
  if (windowSeconds <= 0) return 0;
  return total / windowSeconds;
}
