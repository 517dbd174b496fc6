import db from '../db';
import type { DownloadRecord, NewDownloadRecord } from '../types/Download';
import { DuplicateDownloadError } from '../utils/errors';

interface DownloadRow {
  id: number;
  show_id: number;
  episode: number;
  content_id: string;
  download_url: string;
  title: string;
  outcome: 'success' | 'failed';
  error: string | null;
  created_at: string;
}

function convertRecord(row: DownloadRow): DownloadRecord {
  return {
    id: row.id,
    showId: row.show_id,
    episode: row.episode,
    contentId: row.content_id,
    downloadUrl: row.download_url,
    title: row.title,
    outcome: row.outcome,
    error: row.error,
    createdAt: row.created_at,
  };
}

function insert(record: NewDownloadRecord): DownloadRecord {
  const result = db
    .prepare(
      `INSERT INTO download_history (show_id, episode, content_id, download_url, title, outcome, error)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      record.showId,
      record.episode,
      record.contentId,
      record.downloadUrl,
      record.title,
      record.outcome,
      record.error
    );
  const row = db
    .prepare('SELECT * FROM download_history WHERE id = ?')
    .get(Number(result.lastInsertRowid)) as DownloadRow;
  return convertRecord(row);
}

const recordSuccessTx = db.transaction((record: NewDownloadRecord): DownloadRecord => {
  const saved = insert(record);
  db.prepare(
    `UPDATE shows SET
       last_downloaded_episode = MAX(last_downloaded_episode, ?),
       last_downloaded_hash = CASE WHEN ? >= last_downloaded_episode THEN ? ELSE last_downloaded_hash END,
       updated_at = datetime('now')
     WHERE id = ?`
  ).run(record.episode, record.episode, record.contentId, record.showId);
  return saved;
});

export const historyModel = {
  getAll: (limit: number = 200): DownloadRecord[] => {
    const rows = db
      .prepare('SELECT * FROM download_history ORDER BY id DESC LIMIT ?')
      .all(limit) as DownloadRow[];
    return rows.map(convertRecord);
  },

  getByShow: (showId: number): DownloadRecord[] => {
    const rows = db
      .prepare('SELECT * FROM download_history WHERE show_id = ? ORDER BY episode DESC, id DESC')
      .all(showId) as DownloadRow[];
    return rows.map(convertRecord);
  },

  findSuccess: (showId: number, episode: number): DownloadRecord | undefined => {
    const row = db
      .prepare("SELECT * FROM download_history WHERE show_id = ? AND episode = ? AND outcome = 'success'")
      .get(showId, episode) as DownloadRow | undefined;
    return row ? convertRecord(row) : undefined;
  },

  findSuccessByContentId: (contentId: string): DownloadRecord | undefined => {
    const row = db
      .prepare("SELECT * FROM download_history WHERE content_id = ? AND outcome = 'success' LIMIT 1")
      .get(contentId) as DownloadRow | undefined;
    return row ? convertRecord(row) : undefined;
  },

  recordSuccess: (record: Omit<NewDownloadRecord, 'outcome' | 'error'>): DownloadRecord => {
    try {
      return recordSuccessTx({ ...record, outcome: 'success', error: null });
    } catch (error) {
      const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
      if (code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new DuplicateDownloadError(
          `Episode ${record.episode} of show ${record.showId} already has a successful download`,
          record.showId,
          record.episode
        );
      }
      throw error;
    }
  },

  recordFailure: (record: Omit<NewDownloadRecord, 'outcome'>): DownloadRecord => {
    return insert({ ...record, outcome: 'failed' });
  },
};
