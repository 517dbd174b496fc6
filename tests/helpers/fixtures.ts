import type { RawItem, ReleaseCandidate } from '../../src/types/Release';
import type { TrackedShow } from '../../src/types/Show';
import { toCandidate } from '../../src/rss/parseRelease';
import { detectReleaseGroup } from '../../src/scoring/parseFromTitle';

export function makeShow(overrides: Partial<TrackedShow> = {}): TrackedShow {
  return {
    id: 1,
    title: 'Sousou no Frieren',
    aliases: [],
    season: 1,
    sources: [{ kind: 'nyaa_rss', uploader: 'subsplease' }],
    quality: '1080p',
    preferredGroup: null,
    downloadPath: null,
    lastDownloadedEpisode: 0,
    lastDownloadedHash: null,
    isTracked: true,
    ...overrides,
  };
}

export function makeItem(title: string, overrides: Partial<RawItem> = {}): RawItem {
  return {
    title,
    link: `https://nyaa.test/download/${encodeURIComponent(title)}.torrent`,
    guid: title,
    publishedAt: '2026-10-01T12:00:00.000Z',
    origin: 'rss',
    feed: 'nyaa_rss:test',
    group: detectReleaseGroup(title),
    ...overrides,
  };
}

export function makeCandidate(title: string, overrides: Partial<RawItem> = {}, seenIndex = 0): ReleaseCandidate {
  return toCandidate(makeItem(title, overrides), seenIndex);
}

export interface FeedEntry {
  title?: string;
  link?: string;
  guid?: string;
  infoHash?: string;
  seeders?: number;
  size?: string;
}

function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** A Nyaa-style RSS document with the nyaa: extension fields. */
export function rssDocument(entries: FeedEntry[]): string {
  const items = entries
    .map((entry) => {
      const parts = [
        entry.title !== undefined ? `<title>${escapeXml(entry.title)}</title>` : '',
        entry.link !== undefined ? `<link>${escapeXml(entry.link)}</link>` : '',
        entry.guid !== undefined ? `<guid isPermaLink="true">${escapeXml(entry.guid)}</guid>` : '',
        '<pubDate>Wed, 01 Oct 2026 12:00:00 -0000</pubDate>',
        entry.infoHash !== undefined ? `<nyaa:infoHash>${entry.infoHash}</nyaa:infoHash>` : '',
        entry.seeders !== undefined ? `<nyaa:seeders>${entry.seeders}</nyaa:seeders>` : '',
        entry.size !== undefined ? `<nyaa:size>${entry.size}</nyaa:size>` : '',
      ];
      return `<item>${parts.join('')}</item>`;
    })
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss xmlns:atom="http://www.w3.org/2005/Atom" xmlns:nyaa="https://nyaa.si/xmlns/nyaa" version="2.0">
<channel>
<title>Test feed</title>
<link>https://nyaa.test/</link>
<description>Test feed</description>
${items}
</channel>
</rss>`;
}

export interface ListingRow {
  id: number;
  title?: string;
  magnet?: string;
  torrent?: boolean;
  size?: string;
  seeders?: number;
  timestamp?: number | string;
}

/** Search results table in the layout of the Nyaa listing page. */
export function listingPage(rows: ListingRow[]): string {
  const body = rows
    .map((row) => {
      const titleCell =
        row.title !== undefined
          ? `<a href="/view/${row.id}#comments" class="comments">2</a><a href="/view/${row.id}" title="${row.title}">${row.title}</a>`
          : `<a href="/view/${row.id}" title=""></a>`;
      const links = [
        row.torrent ? `<a href="/download/${row.id}.torrent"><i class="fa fa-download"></i></a>` : '',
        row.magnet ? `<a href="${row.magnet}"><i class="fa fa-magnet"></i></a>` : '',
      ].join('');
      return `<tr class="default">
  <td><a href="/?c=1_2">Anime</a></td>
  <td colspan="2">${titleCell}</td>
  <td class="text-center">${links}</td>
  <td class="text-center">${row.size ?? ''}</td>
  <td class="text-center" data-timestamp="${row.timestamp ?? ''}">2026-10-01 12:00</td>
  <td class="text-center">${row.seeders ?? 0}</td>
</tr>`;
    })
    .join('\n');

  return `<html><body><table class="torrent-list">
<thead><tr><th>Category</th><th>Name</th><th>Link</th><th>Size</th><th>Date</th><th>Seeders</th></tr></thead>
<tbody>
${body}
</tbody></table></body></html>`;
}

export interface TitleParts {
  group: string;
  show: string;
  season?: number;
  episode: number;
  version?: number;
  resolution: string;
  hash: string;
}

/** Renders a title in the common fansub layout. */
export function formatReleaseTitle(parts: TitleParts): string {
  const season = parts.season && parts.season > 1 ? ` S${parts.season}` : '';
  const episode = String(parts.episode).padStart(2, '0');
  const version = parts.version && parts.version > 1 ? `v${parts.version}` : '';
  return `[${parts.group}] ${parts.show}${season} - ${episode}${version} (${parts.resolution}) [${parts.hash}].mkv`;
}
