import db from '../db';
import type { ItemOrigin } from '../types/Release';
import type { TrackerSettings } from '../types/Settings';
import { ConfigError } from '../utils/errors';

export const DEFAULT_TRACKER_SETTINGS: TrackerSettings = {
  enabled: true,
  pollTimesPerDay: 4,
  lastPollTime: null,
  concurrency: 3,
  sourcePriority: ['rss', 'scrape'],
  confidenceThreshold: 0,
};

const ORIGINS: readonly ItemOrigin[] = ['rss', 'scrape'];

function isOrigin(value: unknown): value is ItemOrigin {
  return typeof value === 'string' && (ORIGINS as readonly string[]).includes(value);
}

/** Validates a partial settings payload; unknown keys are ignored. */
export function parseTrackerSettings(raw: unknown): Partial<TrackerSettings> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Tracker settings must be an object', 'trackerSettings');
  }
  const input: Record<string, unknown> = { ...raw };
  const parsed: Partial<TrackerSettings> = {};

  if (input.enabled !== undefined) {
    if (typeof input.enabled !== 'boolean') throw new ConfigError('enabled must be a boolean', 'enabled');
    parsed.enabled = input.enabled;
  }
  if (input.pollTimesPerDay !== undefined) {
    const value = input.pollTimesPerDay;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 96) {
      throw new ConfigError('pollTimesPerDay must be an integer between 0 and 96', 'pollTimesPerDay');
    }
    parsed.pollTimesPerDay = value;
  }
  if (input.concurrency !== undefined) {
    const value = input.concurrency;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > 16) {
      throw new ConfigError('concurrency must be an integer between 1 and 16', 'concurrency');
    }
    parsed.concurrency = value;
  }
  if (input.sourcePriority !== undefined) {
    const value = input.sourcePriority;
    if (!Array.isArray(value) || value.length === 0 || !value.every(isOrigin)) {
      throw new ConfigError(`sourcePriority must list origins from: ${ORIGINS.join(', ')}`, 'sourcePriority');
    }
    parsed.sourcePriority = value;
  }
  if (input.confidenceThreshold !== undefined) {
    const value = input.confidenceThreshold;
    if (typeof value !== 'number' || value < 0 || value > 1) {
      throw new ConfigError('confidenceThreshold must be a number between 0 and 1', 'confidenceThreshold');
    }
    parsed.confidenceThreshold = value;
  }
  return parsed;
}

export const settingsModel = {
  get: (key: string): string | null => {
    const row = db.prepare('SELECT value FROM app_settings WHERE key = ?').get(key) as { value: string } | undefined;
    return row?.value || null;
  },

  set: (key: string, value: string): void => {
    db.prepare('INSERT OR REPLACE INTO app_settings (key, value) VALUES (?, ?)').run(key, value);
  },

  getTrackerSettings: (): TrackerSettings => {
    const value = settingsModel.get('trackerSettings');
    let stored: Partial<TrackerSettings> = {};
    if (value) {
      try {
        stored = parseTrackerSettings(JSON.parse(value));
      } catch (error) {
        console.warn('Stored tracker settings are invalid, falling back to defaults:', error);
      }
    }
    return {
      ...DEFAULT_TRACKER_SETTINGS,
      ...stored,
      lastPollTime: settingsModel.get('lastPollTime'),
    };
  },

  setTrackerSettings: (settings: Partial<TrackerSettings>): TrackerSettings => {
    const { lastPollTime: _ignored, ...current } = settingsModel.getTrackerSettings();
    const next = { ...current, ...parseTrackerSettings(settings) };
    settingsModel.set('trackerSettings', JSON.stringify(next));
    return settingsModel.getTrackerSettings();
  },

  setLastPollTime: (when: Date): void => {
    settingsModel.set('lastPollTime', when.toISOString());
  },
};
