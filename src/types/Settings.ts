import type { ItemOrigin } from './Release';

export interface TrackerSettings {
  enabled: boolean;
  pollTimesPerDay: number;
  lastPollTime: string | null;
  concurrency: number;
  sourcePriority: ItemOrigin[];
  confidenceThreshold: number;
}
