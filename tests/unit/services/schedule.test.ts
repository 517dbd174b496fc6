import { describe, it, expect } from 'vitest';
import { formatDelay, nextFallbackRun, nextRun } from '../../../src/services/schedule';

// Local time; the fallback hours are wall-clock hours
const at = (day: number, hour: number, minute = 0) => new Date(2026, 9, day, hour, minute, 0, 0);

describe('nextRun', () => {
  it('should space polls evenly over the day', () => {
    const now = at(18, 10);
    const next = nextRun({ enabled: true, pollTimesPerDay: 4 }, now);
    expect(next.mode).toBe('interval');
    expect(next.delayMs).toBe(6 * 60 * 60 * 1000);
    expect(next.at.getTime()).toBe(now.getTime() + 6 * 60 * 60 * 1000);
  });

  it('should round uneven intervals down to whole minutes', () => {
    const next = nextRun({ enabled: true, pollTimesPerDay: 7 }, at(18, 10));
    expect(next.delayMs).toBe(205 * 60 * 1000);
    expect(formatDelay(next.delayMs)).toBe('3h 25m');
  });

  it('should fall back to fixed hours when polling is disabled', () => {
    const next = nextRun({ enabled: false, pollTimesPerDay: 4 }, at(18, 10));
    expect(next.mode).toBe('fallback');
    expect(next.at).toEqual(at(18, 17));
    expect(next.delayMs).toBe(7 * 60 * 60 * 1000);
  });

  it('should fall back when no polls per day are configured', () => {
    expect(nextRun({ enabled: true, pollTimesPerDay: 0 }, at(18, 10)).mode).toBe('fallback');
  });
});

describe('nextFallbackRun', () => {
  it('should pick 05:00 before dawn', () => {
    expect(nextFallbackRun(at(18, 4, 30))).toEqual(at(18, 5));
  });

  it('should move to the next morning after 17:00', () => {
    expect(nextFallbackRun(at(18, 17))).toEqual(at(19, 5));
    expect(nextFallbackRun(at(18, 23, 59))).toEqual(at(19, 5));
  });
});

describe('formatDelay', () => {
  it('should show minutes only below an hour', () => {
    expect(formatDelay(15 * 60 * 1000)).toBe('15m');
  });
});
