import type { ParsedRelease } from '../types/Release';
import { ParseError } from '../utils/errors';

export const UNKNOWN_GROUP = 'unknown';

const groupPattern = /^\s*\[([^\]]+)\]\s*/;
const tagPattern = /[[(]([^\])]*)[\])]/g;
const extensionPattern = /\.(mkv|mp4|avi|ts)$/i;
const hashPattern = /^[0-9A-F]{8}$/i;
const rangePattern = /^\s*\d{1,4}\s*[-~]\s*\d{1,4}\s*$/;
// Only a batch marker in a tag or after the episode; show names may use the words
const batchWordPattern = /\b(?:batch|complete)\b/i;
const resolutionTagPattern = /^(?:\d{3,4}[pi]|4K|UHD|\d{3,4}x\d{3,4})$/i;

const resolutionPatterns = [
  { pattern: /\b(?:2160[pi]|4K|UHD)\b/i, value: () => '2160p' },
  { pattern: /\b\d{3,4}x(\d{3,4})\b/i, value: (m: RegExpMatchArray) => `${m[1]}p` },
  { pattern: /\b(\d{3,4})[pi]\b/i, value: (m: RegExpMatchArray) => `${m[1]}p` },
];

const episodePatterns = [
  // Show S02E05, Show.S02E05v2
  {
    pattern: /^(.*?)[\s.]+S(\d{1,2})E(\d{1,4})(?:v(\d))?(?:\s+(.*))?$/i,
    read: (m: RegExpMatchArray) => ({ show: m[1], season: m[2], episode: m[3], version: m[4], rest: m[5] }),
  },
  // Show - 05, Show S2 - 05v2 END
  {
    pattern: /^(.*?)\s+-\s+(\d{1,4})(?:v(\d))?(?:\s+(.*))?$/,
    read: (m: RegExpMatchArray) => ({ show: m[1], season: undefined, episode: m[2], version: m[3], rest: m[4] }),
  },
  // Show E05, Show Ep 5, Show Episode 5
  {
    pattern: /^(.*?)\s+(?:E|Ep\.?|Episode)\s*(\d{1,4})(?:v(\d))?(?:\s+(.*))?$/i,
    read: (m: RegExpMatchArray) => ({ show: m[1], season: undefined, episode: m[2], version: m[3], rest: m[4] }),
  },
];

const seasonSuffixPatterns = [
  /^(.*?)\s+S(\d{1,2})$/i,
  /^(.*?)\s+(\d{1,2})(?:st|nd|rd|th)\s+Season$/i,
  /^(.*?)\s+Season\s+(\d{1,2})$/i,
];

const searchSuffixPatterns = [
  /\s+(?:2nd|3rd|[4-9]th)\s+Season\s*$/i,
  /\s+Season\s+\d+\s*$/i,
  /\s+S\d+\s*$/i,
  /\s+Part\s+\d+\s*$/i,
  /\s+(?:II|III|IV|V|VI|VII|VIII|IX|X)\s*$/,
  /\s+Cour\s+\d+\s*$/i,
];

export function detectResolution(text: string): string {
  for (const { pattern, value } of resolutionPatterns) {
    const match = text.match(pattern);
    if (match) {
      return value(match);
    }
  }
  return '';
}

export function resolutionToNumber(resolution: string): number {
  if (/^(4K|UHD)$/i.test(resolution.trim())) return 2160;
  const match = resolution.match(/(\d{3,4})/);
  return match ? parseInt(match[1], 10) : 0;
}

/** Leading `[Group]` tag of a release title, or "unknown". */
export function detectReleaseGroup(title: string): string {
  const match = title.match(groupPattern);
  const group = match?.[1].trim();
  return group ? group : UNKNOWN_GROUP;
}

function splitSeason(showPart: string): { show: string; season: number | null } {
  for (const pattern of seasonSuffixPatterns) {
    const match = showPart.match(pattern);
    if (match) {
      return { show: match[1].trim(), season: parseInt(match[2], 10) };
    }
  }
  return { show: showPart.trim(), season: null };
}

/**
 * Extracts show, season, episode and release metadata from a fansub-style title,
 * e.g. `[SubsPlease] Sousou no Frieren S2 - 05v2 (1080p) [ABCD1234].mkv`.
 * Throws ParseError when there is no single episode number.
 */
export function parseReleaseFromTitle(title: string): ParsedRelease {
  const trimmed = title.trim().replace(extensionPattern, '');

  const groupMatch = trimmed.match(groupPattern);
  const group = groupMatch ? groupMatch[1].trim() : '';
  const remainder = groupMatch ? trimmed.slice(groupMatch[0].length) : trimmed;

  const resolution = detectResolution(remainder);
  let hash = '';
  const extras: string[] = [];

  for (const match of remainder.matchAll(tagPattern)) {
    const tag = match[1].trim();
    if (!tag) continue;
    if (rangePattern.test(tag) || batchWordPattern.test(tag)) {
      throw new ParseError(`Batch release: ${title}`, 'batch', title);
    }
    if (hashPattern.test(tag)) {
      hash = tag.toUpperCase();
    } else if (!resolutionTagPattern.test(tag)) {
      extras.push(tag);
    }
  }

  const body = remainder
    .replace(tagPattern, ' ')
    .replace(/\b(?:\d{3,4}[pi]|4K)\b/gi, ' ')
    .replace(/_/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (/(?:\s-\s+\d{1,4}\s*[-~]|\s\d{1,4}\s*~)\s*\d{1,4}(?:\s|$)/.test(` ${body}`)) {
    throw new ParseError(`Batch release: ${title}`, 'batch', title);
  }

  for (const { pattern, read } of episodePatterns) {
    const match = body.match(pattern);
    if (!match) continue;

    const fields = read(match);
    const split = splitSeason(fields.show.replace(/\./g, ' '));
    const season = fields.season !== undefined ? parseInt(fields.season, 10) : split.season;
    const rest = fields.rest?.trim();
    if (rest && batchWordPattern.test(rest)) {
      throw new ParseError(`Batch release: ${title}`, 'batch', title);
    }
    if (rest) {
      extras.push(...rest.split(/\s+/));
    }

    return {
      showGuess: split.show,
      season,
      episode: parseInt(fields.episode, 10),
      version: fields.version ? parseInt(fields.version, 10) : 1,
      resolution,
      resolutionValue: resolutionToNumber(resolution),
      group,
      hash,
      extras,
    };
  }

  if (batchWordPattern.test(body)) {
    throw new ParseError(`Batch release: ${title}`, 'batch', title);
  }
  throw new ParseError(`No episode number in title: ${title}`, 'no-episode', title);
}

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\w\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Strips season suffixes that feeds do not use in titles:
 * "Sousou no Frieren 2nd Season" -> "Sousou no Frieren".
 */
export function normalizeTitleForSearch(title: string): string {
  let result = title;
  for (const pattern of searchSuffixPatterns) {
    result = result.replace(pattern, '');
  }
  return result.trim();
}
