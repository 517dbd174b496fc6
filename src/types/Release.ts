export type ItemOrigin = 'rss' | 'scrape';

/** A feed entry normalized across RSS and scraped listings. */
export interface RawItem {
  title: string;
  link: string;
  guid: string;
  publishedAt: string;
  origin: ItemOrigin;
  feed: string;
  group: string;
  infoHash?: string;
  magnetUrl?: string;
  torrentUrl?: string;
  viewUrl?: string;
  seeders?: number;
  size?: string;
}

export interface ParsedRelease {
  showGuess: string;
  season: number | null;
  episode: number;
  version: number;
  resolution: string;
  resolutionValue: number;
  group: string;
  hash: string;
  extras: string[];
}

export interface ReleaseCandidate extends ParsedRelease {
  title: string;
  contentId: string;
  downloadUrl: string;
  origin: ItemOrigin;
  feed: string;
  seeders: number;
  publishedAt: string;
  seenIndex: number;
  /** Prefer-rule points, set once the release is accepted. */
  preference?: number;
}
