import { Response } from 'express';
import type { NewFilterRule, RuleScope } from '../types/Filter';
import type { NewTrackedShow } from '../types/Show';
import { parseFeedSources } from '../rss/feedSources';
import { parseFilterAction, parsePredicate } from '../scoring/predicates';
import { detectResolution } from '../scoring/parseFromTitle';
import { ConfigError, DuplicateDownloadError, TrackerError, errorMessage } from '../utils/errors';
import { logger } from '../services/structuredLogging';

type Body = Record<string, unknown>;

export function asBody(raw: unknown): Body {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Request body must be a JSON object', 'body');
  }
  return { ...raw };
}

export function parseId(value: string, name = 'id'): number {
  const id = parseInt(value, 10);
  if (!Number.isInteger(id) || id <= 0 || String(id) !== value) {
    throw new ConfigError(`${name} must be a positive integer`, name);
  }
  return id;
}

function requireString(body: Body, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`${key} must be a non-empty string`, key);
  }
  return value.trim();
}

function optionalString(body: Body, key: string): string | null {
  const value = body[key];
  if (value === undefined || value === null || value === '') return null;
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string`, key);
  }
  return value.trim() || null;
}

function integer(body: Body, key: string, min: number): number {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}`, key);
  }
  return value;
}

function boolean(body: Body, key: string): boolean {
  const value = body[key];
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be a boolean`, key);
  }
  return value;
}

function aliases(body: Body): string[] {
  const value = body.aliases;
  if (!Array.isArray(value) || !value.every((a): a is string => typeof a === 'string')) {
    throw new ConfigError('aliases must be an array of strings', 'aliases');
  }
  return value.map((a) => a.trim()).filter((a) => a.length > 0);
}

function quality(body: Body): string {
  const value = requireString(body, 'quality');
  const resolution = detectResolution(value);
  if (!resolution) {
    throw new ConfigError(`quality "${value}" is not a resolution such as 720p or 1080p`, 'quality');
  }
  return resolution;
}

export function parseNewShow(raw: unknown): NewTrackedShow {
  const body = asBody(raw);
  return {
    title: requireString(body, 'title'),
    aliases: body.aliases === undefined ? [] : aliases(body),
    season: body.season === undefined ? 1 : integer(body, 'season', 1),
    sources: parseFeedSources(body.sources),
    quality: body.quality === undefined ? '1080p' : quality(body),
    preferredGroup: optionalString(body, 'preferredGroup'),
    downloadPath: optionalString(body, 'downloadPath'),
    isTracked: body.isTracked === undefined ? true : boolean(body, 'isTracked'),
    lastDownloadedEpisode: body.lastDownloadedEpisode === undefined ? 0 : integer(body, 'lastDownloadedEpisode', 0),
  };
}

export function parseShowUpdate(raw: unknown): Partial<NewTrackedShow> {
  const body = asBody(raw);
  const update: Partial<NewTrackedShow> = {};
  if (body.title !== undefined) update.title = requireString(body, 'title');
  if (body.aliases !== undefined) update.aliases = aliases(body);
  if (body.season !== undefined) update.season = integer(body, 'season', 1);
  if (body.sources !== undefined) update.sources = parseFeedSources(body.sources);
  if (body.quality !== undefined) update.quality = quality(body);
  if (body.preferredGroup !== undefined) update.preferredGroup = optionalString(body, 'preferredGroup');
  if (body.downloadPath !== undefined) update.downloadPath = optionalString(body, 'downloadPath');
  if (body.isTracked !== undefined) update.isTracked = boolean(body, 'isTracked');
  if (body.lastDownloadedEpisode !== undefined) {
    update.lastDownloadedEpisode = integer(body, 'lastDownloadedEpisode', 0);
  }
  return update;
}

function scope(body: Body): RuleScope {
  const value = body.showId;
  if (value === undefined || value === null) return { kind: 'global' };
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError('showId must be a positive integer or null', 'showId');
  }
  return { kind: 'show', showId: value };
}

export function parseNewRule(raw: unknown): NewFilterRule {
  const body = asBody(raw);
  return {
    name: requireString(body, 'name'),
    predicate: parsePredicate(body.predicate),
    action: parseFilterAction(body.action),
    priority: body.priority === undefined ? 0 : integer(body, 'priority', Number.MIN_SAFE_INTEGER),
    scope: scope(body),
    enabled: body.enabled === undefined ? true : boolean(body, 'enabled'),
  };
}

export function parseRuleUpdate(raw: unknown): Partial<NewFilterRule> {
  const body = asBody(raw);
  const update: Partial<NewFilterRule> = {};
  if (body.name !== undefined) update.name = requireString(body, 'name');
  if (body.predicate !== undefined) update.predicate = parsePredicate(body.predicate);
  if (body.action !== undefined) update.action = parseFilterAction(body.action);
  if (body.priority !== undefined) update.priority = integer(body, 'priority', Number.MIN_SAFE_INTEGER);
  if (body.showId !== undefined) update.scope = scope(body);
  if (body.enabled !== undefined) update.enabled = boolean(body, 'enabled');
  return update;
}

export function sendError(res: Response, error: unknown, action: string) {
  if (error instanceof ConfigError) {
    return res.status(400).json({ error: error.message });
  }
  if (error instanceof DuplicateDownloadError) {
    return res.status(409).json({ error: error.message });
  }
  logger.error('api', `${action} failed: ${errorMessage(error)}`, { error });
  const message = error instanceof TrackerError ? error.message : `Failed to ${action}`;
  return res.status(500).json({ error: message });
}
