import axios, { AxiosInstance, isAxiosError } from 'axios';
import Parser from 'rss-parser';
import * as cheerio from 'cheerio';
import { config } from '../config';
import type { RawItem } from '../types/Release';
import type { FeedSourceConfig, TrackedShow } from '../types/Show';
import { detectReleaseGroup, normalizeTitle, normalizeTitleForSearch } from '../scoring/parseFromTitle';
import { FetchError, errorMessage } from '../utils/errors';
import { logger } from '../services/structuredLogging';

type NyaaItemFields = {
  infoHash?: string;
  seeders?: string;
  size?: string;
};

export interface FeedRequest {
  key: string;
  url: string;
  source: FeedSourceConfig;
}

export interface FetchResult {
  feed: string;
  items: RawItem[];
  skipped: number;
}

export interface FeedUrls {
  nyaaBaseUrl: string;
  subsPleaseBaseUrl: string;
}

/** One fetch per distinct request within a poll cycle; discarded with the cycle. */
export type FeedCache = Map<string, Promise<FetchResult>>;

export function extractInfoHash(magnetUrl: string): string | undefined {
  const match = magnetUrl.match(/urn:btih:([0-9a-z]{32,40})/i);
  return match ? match[1].toLowerCase() : undefined;
}

function showNames(show: TrackedShow): string[] {
  return [show.title, ...show.aliases].filter((name) => name.trim().length > 0);
}

function searchTerm(show: TrackedShow): string {
  const name = show.aliases[0] || show.title;
  return normalizeTitleForSearch(name);
}

export function titleMentionsShow(title: string, show: TrackedShow): boolean {
  const normalizedTitle = normalizeTitle(title);
  return showNames(show).some((name) => {
    const needle = normalizeTitle(normalizeTitleForSearch(name));
    return needle.length > 0 && normalizedTitle.includes(needle);
  });
}

function parseCount(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value.trim(), 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Listing dates carry epoch seconds; the cell text is the fallback. */
function listingDate(timestamp: string | undefined, text: string): string {
  const seconds = Number(timestamp);
  if (!timestamp || !Number.isFinite(seconds)) return text;
  const date = new Date(seconds * 1000);
  return Number.isFinite(date.getTime()) ? date.toISOString() : text;
}

export class FeedFetcher {
  private parser: Parser<Record<string, unknown>, NyaaItemFields>;

  constructor(
    private readonly http: AxiosInstance = axios.create({ timeout: config.feeds.timeoutMs }),
    private readonly urls: FeedUrls = config.feeds
  ) {
    this.parser = new Parser<Record<string, unknown>, NyaaItemFields>({
      customFields: {
        item: [
          ['nyaa:infoHash', 'infoHash'],
          ['nyaa:seeders', 'seeders'],
          ['nyaa:size', 'size'],
        ],
      },
    });
  }

  request(source: FeedSourceConfig, show: TrackedShow): FeedRequest {
    switch (source.kind) {
      case 'subsplease_rss': {
        const quality = show.quality.replace(/p$/i, '') || '1080';
        return {
          key: `subsplease_rss:${quality}`,
          url: `${this.urls.subsPleaseBaseUrl}/rss/?t&r=${encodeURIComponent(quality)}`,
          source,
        };
      }
      case 'nyaa_rss':
      case 'nyaa_html': {
        const query = [source.uploader, searchTerm(show)].filter(Boolean).join(' ');
        const page = source.kind === 'nyaa_rss' ? 'page=rss&' : '';
        return {
          key: `${source.kind}:${query.toLowerCase()}`,
          url: `${this.urls.nyaaBaseUrl}/?${page}q=${encodeURIComponent(query)}&c=1_2&f=0`,
          source,
        };
      }
    }
  }

  /**
   * Items of one feed source relevant to one show. Direct feeds list every show,
   * so their items are narrowed to titles that mention one of the show's names.
   */
  async fetch(source: FeedSourceConfig, show: TrackedShow, cache?: FeedCache): Promise<FetchResult> {
    const request = this.request(source, show);
    let pending = cache?.get(request.key);
    if (!pending) {
      pending = this.fetchRequest(request);
      cache?.set(request.key, pending);
    }
    const result = await pending;
    if (source.kind !== 'subsplease_rss') {
      return result;
    }
    return { ...result, items: result.items.filter((item) => titleMentionsShow(item.title, show)) };
  }

  async fetchRequest(request: FeedRequest): Promise<FetchResult> {
    logger.debug('feeds', `Fetching ${request.key} (${request.url})`);
    let body: string;
    try {
      const response = await this.http.get<string>(request.url, { responseType: 'text' });
      body = typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      if (isAxiosError(error)) {
        const status = error.response?.status;
        const reason = status ? `HTTP ${status}` : error.code || error.message;
        throw new FetchError(`Feed ${request.key} request failed: ${reason}`, request.url, error);
      }
      throw new FetchError(`Feed ${request.key} request failed`, request.url, error);
    }

    const result =
      request.source.kind === 'nyaa_html'
        ? this.parseNyaaHtml(body, request.key)
        : await this.parseRss(body, request.key, request.url);

    logger.debug('feeds', `Feed ${request.key}: ${result.items.length} items, ${result.skipped} skipped`);
    return result;
  }

  async parseRss(xml: string, feed: string, url = feed): Promise<FetchResult> {
    let parsed: Parser.Output<NyaaItemFields>;
    try {
      parsed = await this.parser.parseString(xml);
    } catch (error) {
      throw new FetchError(`Feed ${feed} is not a readable RSS document`, url, error);
    }

    const items: RawItem[] = [];
    let skipped = 0;

    for (const entry of parsed.items || []) {
      const title = entry.title?.trim();
      const link = entry.link?.trim() || '';
      if (!title || !link) {
        skipped++;
        continue;
      }

      const item: RawItem = {
        title,
        link,
        guid: entry.guid || link,
        publishedAt: entry.isoDate || entry.pubDate || '',
        origin: 'rss',
        feed,
        group: detectReleaseGroup(title),
        seeders: parseCount(entry.seeders),
        size: entry.size?.trim() || undefined,
      };

      if (entry.infoHash) {
        item.infoHash = entry.infoHash.trim().toLowerCase();
      }

      const viewMatch = link.match(/\/view\/(\d+)/);
      if (link.startsWith('magnet:')) {
        item.magnetUrl = link;
        item.infoHash = item.infoHash || extractInfoHash(link);
      } else if (viewMatch) {
        // Direct feeds link to the tracker page rather than the torrent
        item.viewUrl = link;
        item.torrentUrl = `${this.urls.nyaaBaseUrl}/download/${viewMatch[1]}.torrent`;
      } else {
        item.torrentUrl = link;
        if (entry.guid && entry.guid.includes('/view/')) {
          item.viewUrl = entry.guid;
        }
      }

      items.push(item);
    }

    if (skipped > 0) {
      logger.warn('feeds', `Skipped ${skipped} malformed items in ${feed}`);
    }

    return { feed, items, skipped };
  }

  parseNyaaHtml(html: string, feed: string): FetchResult {
    const $ = cheerio.load(html);
    const items: RawItem[] = [];
    let skipped = 0;

    $('tr').each((_, row) => {
      const $row = $(row);
      const $view = $row.find('a[href^="/view/"]').not('[href*="#comments"]').first();
      if ($view.length === 0) {
        // Header and layout rows
        return;
      }

      try {
        const title = ($view.attr('title') || $view.text()).trim();
        const viewPath = $view.attr('href') || '';
        const magnetUrl = $row.find('a[href^="magnet:"]').first().attr('href');
        const torrentPath = $row.find('a[href$=".torrent"]').first().attr('href');

        if (!title || (!magnetUrl && !torrentPath)) {
          skipped++;
          return;
        }

        const cells = $row.find('td');
        const viewUrl = `${this.urls.nyaaBaseUrl}${viewPath}`;
        const torrentUrl = torrentPath
          ? torrentPath.startsWith('http')
            ? torrentPath
            : `${this.urls.nyaaBaseUrl}${torrentPath}`
          : undefined;

        items.push({
          title,
          link: magnetUrl || torrentUrl || viewUrl,
          guid: viewUrl,
          publishedAt: listingDate(cells.eq(4).attr('data-timestamp'), cells.eq(4).text().trim()),
          origin: 'scrape',
          feed,
          group: detectReleaseGroup(title),
          infoHash: magnetUrl ? extractInfoHash(magnetUrl) : undefined,
          magnetUrl,
          torrentUrl,
          viewUrl,
          size: cells.eq(3).text().trim() || undefined,
          seeders: parseCount(cells.eq(5).text()),
        });
      } catch (error) {
        skipped++;
        logger.debug('feeds', `Unreadable row in ${feed}: ${errorMessage(error)}`);
      }
    });

    if (skipped > 0) {
      logger.warn('feeds', `Skipped ${skipped} malformed rows in ${feed}`);
    }

    return { feed, items, skipped };
  }
}

export const feedFetcher = new FeedFetcher();
