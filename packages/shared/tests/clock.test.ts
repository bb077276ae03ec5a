import { describe, it, expect } from 'vitest';
import { elapsedMs, isoNow, monotonicNow } from '../src/utils/clock.js';

describe('clock', () => {
  it('measures whole elapsed milliseconds', async () => {
    const start = monotonicNow();
    await new Promise(r => setTimeout(r, 20));

    const elapsed = elapsedMs(start);

    expect(Number.isInteger(elapsed)).toBe(true);
    expect(elapsed).toBeGreaterThanOrEqual(15);
  });

  it('never reports negative durations', () => {
    expect(elapsedMs(monotonicNow() + 60_000)).toBe(0);
  });

  it('formats wall-clock time as ISO-8601', () => {
    expect(isoNow()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});
