import type { FeedSourceConfig, FeedSourceKind } from '../types/Show';
import { ConfigError } from '../utils/errors';

export const DEFAULT_SOURCES: FeedSourceConfig[] = [{ kind: 'nyaa_rss', uploader: 'subsplease' }];

const KINDS: readonly FeedSourceKind[] = ['nyaa_rss', 'subsplease_rss', 'nyaa_html'];

function parseUploader(value: unknown, path: string): string | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path}.uploader must be a string`, path);
  }
  return value.trim();
}

function parseSource(raw: unknown, path: string): FeedSourceConfig {
  // Shorthand strings: "subsplease_direct" and bare uploader names
  if (typeof raw === 'string') {
    const value = raw.trim();
    if (!value) throw new ConfigError(`${path} must not be empty`, path);
    if (value.toLowerCase() === 'subsplease_direct') return { kind: 'subsplease_rss' };
    return { kind: 'nyaa_rss', uploader: value };
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw) || !('kind' in raw)) {
    throw new ConfigError(`${path} must be a source object`, path);
  }

  switch (raw.kind) {
    case 'subsplease_rss':
      return { kind: 'subsplease_rss' };
    case 'nyaa_rss':
    case 'nyaa_html': {
      const kind = raw.kind === 'nyaa_html' ? 'nyaa_html' : 'nyaa_rss';
      const uploader = 'uploader' in raw ? parseUploader(raw.uploader, path) : undefined;
      return uploader ? { kind, uploader } : { kind };
    }
    default:
      throw new ConfigError(`${path}.kind must be one of ${KINDS.join(', ')}`, path);
  }
}

export function parseFeedSources(raw: unknown): FeedSourceConfig[] {
  if (raw === undefined || raw === null) return DEFAULT_SOURCES;
  const list = Array.isArray(raw) ? raw : [raw];
  if (list.length === 0) {
    throw new ConfigError('sources must contain at least one feed source', 'sources');
  }
  return list.map((entry, i) => parseSource(entry, `sources[${i}]`));
}
