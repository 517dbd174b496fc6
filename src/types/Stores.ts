import type { TrackedShow } from './Show';
import type { FilterRule, ShowRuleOverride } from './Filter';
import type { DownloadRecord, NewDownloadRecord } from './Download';
import type { TrackerSettings } from './Settings';
import type { ConfigError } from '../utils/errors';

export interface ShowStore {
  getTracked(): TrackedShow[];
  getById(id: number): TrackedShow | undefined;
}

export interface LoadedRules {
  rules: FilterRule[];
  overrides: ShowRuleOverride[];
  invalid: ConfigError[];
}

export interface FilterStore {
  load(): LoadedRules;
}

export interface HistoryStore {
  findSuccess(showId: number, episode: number): DownloadRecord | undefined;
  findSuccessByContentId(contentId: string): DownloadRecord | undefined;
  /** Inserts a success record and advances the show watermark atomically. */
  recordSuccess(record: Omit<NewDownloadRecord, 'outcome' | 'error'>): DownloadRecord;
  recordFailure(record: Omit<NewDownloadRecord, 'outcome'>): DownloadRecord;
}

export interface SettingsStore {
  getTrackerSettings(): TrackerSettings;
  setLastPollTime(when: Date): void;
}
