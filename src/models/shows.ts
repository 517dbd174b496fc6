import db from '../db';
import type { NewTrackedShow, TrackedShow } from '../types/Show';
import { parseFeedSources, DEFAULT_SOURCES } from '../rss/feedSources';

interface ShowRow {
  id: number;
  title: string;
  aliases: string;
  season: number;
  sources: string;
  quality: string;
  preferred_group: string | null;
  download_path: string | null;
  last_downloaded_episode: number;
  last_downloaded_hash: string | null;
  is_tracked: number;
  created_at: string;
  updated_at: string;
}

function parseJsonList(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

function convertShow(row: ShowRow): TrackedShow {
  const aliases = parseJsonList(row.aliases);
  let sources = DEFAULT_SOURCES;
  try {
    sources = parseFeedSources(parseJsonList(row.sources));
  } catch (error) {
    console.warn(`Show ${row.id} has invalid feed sources, using defaults:`, error);
  }
  return {
    id: row.id,
    title: row.title,
    aliases: Array.isArray(aliases) ? aliases.filter((a): a is string => typeof a === 'string') : [],
    season: row.season,
    sources,
    quality: row.quality,
    preferredGroup: row.preferred_group,
    downloadPath: row.download_path,
    lastDownloadedEpisode: row.last_downloaded_episode,
    lastDownloadedHash: row.last_downloaded_hash,
    isTracked: Boolean(row.is_tracked),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export const showsModel = {
  getAll: (): TrackedShow[] => {
    const rows = db.prepare('SELECT * FROM shows ORDER BY title').all() as ShowRow[];
    return rows.map(convertShow);
  },

  getTracked: (): TrackedShow[] => {
    const rows = db.prepare('SELECT * FROM shows WHERE is_tracked = 1 ORDER BY id').all() as ShowRow[];
    return rows.map(convertShow);
  },

  getById: (id: number): TrackedShow | undefined => {
    const row = db.prepare('SELECT * FROM shows WHERE id = ?').get(id) as ShowRow | undefined;
    return row ? convertShow(row) : undefined;
  },

  create: (show: NewTrackedShow): TrackedShow => {
    const result = db
      .prepare(
        `INSERT INTO shows (
          title, aliases, season, sources, quality, preferred_group, download_path,
          last_downloaded_episode, is_tracked
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        show.title,
        JSON.stringify(show.aliases),
        show.season,
        JSON.stringify(show.sources),
        show.quality,
        show.preferredGroup ?? null,
        show.downloadPath ?? null,
        show.lastDownloadedEpisode ?? 0,
        show.isTracked ? 1 : 0
      );
    const created = showsModel.getById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error(`Show ${show.title} was not persisted`);
    }
    return created;
  },

  update: (id: number, show: Partial<NewTrackedShow>): TrackedShow | undefined => {
    const updates: string[] = [];
    const values: Array<string | number | null> = [];

    if (show.title !== undefined) {
      updates.push('title = ?');
      values.push(show.title);
    }
    if (show.aliases !== undefined) {
      updates.push('aliases = ?');
      values.push(JSON.stringify(show.aliases));
    }
    if (show.season !== undefined) {
      updates.push('season = ?');
      values.push(show.season);
    }
    if (show.sources !== undefined) {
      updates.push('sources = ?');
      values.push(JSON.stringify(show.sources));
    }
    if (show.quality !== undefined) {
      updates.push('quality = ?');
      values.push(show.quality);
    }
    if (show.preferredGroup !== undefined) {
      updates.push('preferred_group = ?');
      values.push(show.preferredGroup);
    }
    if (show.downloadPath !== undefined) {
      updates.push('download_path = ?');
      values.push(show.downloadPath);
    }
    if (show.isTracked !== undefined) {
      updates.push('is_tracked = ?');
      values.push(show.isTracked ? 1 : 0);
    }
    // Manual watermark corrections only; the dispatcher advances it through historyModel
    if (show.lastDownloadedEpisode !== undefined) {
      updates.push('last_downloaded_episode = ?');
      values.push(show.lastDownloadedEpisode);
    }

    if (updates.length === 0) {
      return showsModel.getById(id);
    }

    updates.push("updated_at = datetime('now')");
    values.push(id);

    db.prepare(`UPDATE shows SET ${updates.join(', ')} WHERE id = ?`).run(...values);
    return showsModel.getById(id);
  },
};
