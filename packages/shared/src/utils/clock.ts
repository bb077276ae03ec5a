import { performance } from 'node:perf_hooks';

/** Milliseconds from an arbitrary origin; only differences are meaningful. */
export function monotonicNow(): number {
  return performance.now();
}

/** Whole milliseconds since a `monotonicNow()` reading, never negative. */
export function elapsedMs(since: number): number {
  return Math.max(0, Math.round(performance.now() - since));
}

/** Wall-clock ISO-8601 timestamp, for records only. */
export function isoNow(): string {
  return new Date().toISOString();
}
