import type { TrackerSettings } from '../types/Settings';

export type ScheduleMode = 'interval' | 'fallback';

export interface NextRun {
  at: Date;
  delayMs: number;
  mode: ScheduleMode;
}

const HOUR_MS = 60 * 60 * 1000;
const FALLBACK_HOURS = [5, 17];

/** Next 05:00 or 17:00 local time strictly after `now`. */
export function nextFallbackRun(now: Date): Date {
  for (const hour of FALLBACK_HOURS) {
    const candidate = new Date(now);
    candidate.setHours(hour, 0, 0, 0);
    if (candidate.getTime() > now.getTime()) {
      return candidate;
    }
  }
  const tomorrow = new Date(now);
  tomorrow.setDate(tomorrow.getDate() + 1);
  tomorrow.setHours(FALLBACK_HOURS[0], 0, 0, 0);
  return tomorrow;
}

export function nextRun(settings: Pick<TrackerSettings, 'enabled' | 'pollTimesPerDay'>, now: Date = new Date()): NextRun {
  if (settings.enabled && settings.pollTimesPerDay > 0) {
    // Whole minutes, e.g. 7 polls a day -> every 3h25m
    const intervalMs = Math.floor((24 * 60) / settings.pollTimesPerDay) * 60 * 1000;
    return { at: new Date(now.getTime() + intervalMs), delayMs: intervalMs, mode: 'interval' };
  }
  const at = nextFallbackRun(now);
  return { at, delayMs: at.getTime() - now.getTime(), mode: 'fallback' };
}

export function formatDelay(delayMs: number): string {
  const hours = Math.floor(delayMs / HOUR_MS);
  const minutes = Math.round((delayMs % HOUR_MS) / 60000);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}
