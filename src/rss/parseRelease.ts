import { parseReleaseFromTitle } from '../scoring/parseFromTitle';
import type { RawItem, ReleaseCandidate } from '../types/Release';

export function buildMagnetUrl(infoHash: string, title: string): string {
  return `magnet:?xt=urn:btih:${infoHash}&dn=${encodeURIComponent(title)}`;
}

/** Identity used for dedup: the info hash when the feed carries one, otherwise the torrent link. */
export function contentIdFor(item: RawItem): string {
  if (item.infoHash) {
    return item.infoHash.toLowerCase();
  }
  return `torrent:${item.torrentUrl || item.link}`;
}

export function downloadUrlFor(item: RawItem): string {
  if (item.magnetUrl) return item.magnetUrl;
  if (item.infoHash) return buildMagnetUrl(item.infoHash, item.title);
  return item.torrentUrl || item.link;
}

/**
 * Turns a feed item into a selectable candidate.
 * Throws ParseError for titles without a single episode number.
 */
export function toCandidate(item: RawItem, seenIndex: number): ReleaseCandidate {
  const parsed = parseReleaseFromTitle(item.title);

  return {
    ...parsed,
    group: parsed.group || item.group,
    title: item.title,
    contentId: contentIdFor(item),
    downloadUrl: downloadUrlFor(item),
    origin: item.origin,
    feed: item.feed,
    seeders: item.seeders ?? 0,
    publishedAt: item.publishedAt,
    seenIndex,
  };
}
