import Database from 'better-sqlite3';
import { config } from '../config';
import * as fs from 'fs';
import * as path from 'path';

const inMemory = config.db.path === ':memory:';

if (!inMemory) {
  const dbDir = path.dirname(config.db.path);
  if (!fs.existsSync(dbDir)) {
    fs.mkdirSync(dbDir, { recursive: true });
  }
}

const db: Database.Database = new Database(config.db.path);
if (!inMemory) {
  db.pragma('journal_mode = WAL');
}
db.pragma('foreign_keys = ON');

// Initialize schema
db.exec(`
  CREATE TABLE IF NOT EXISTS shows (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    aliases TEXT NOT NULL DEFAULT '[]',
    season INTEGER NOT NULL DEFAULT 1,
    sources TEXT NOT NULL DEFAULT '[{"kind":"nyaa_rss","uploader":"subsplease"}]',
    quality TEXT NOT NULL DEFAULT '1080p',
    preferred_group TEXT,
    download_path TEXT,
    last_downloaded_episode INTEGER NOT NULL DEFAULT 0,
    last_downloaded_hash TEXT,
    is_tracked INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE INDEX IF NOT EXISTS idx_shows_is_tracked ON shows(is_tracked);

  CREATE TABLE IF NOT EXISTS filter_rules (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    predicate TEXT NOT NULL,
    action TEXT NOT NULL CHECK(action IN ('accept', 'reject', 'prefer')),
    priority INTEGER NOT NULL DEFAULT 0,
    show_id INTEGER,
    enabled INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (show_id) REFERENCES shows(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_filter_rules_show_id ON filter_rules(show_id);

  CREATE TABLE IF NOT EXISTS show_rule_overrides (
    show_id INTEGER NOT NULL,
    rule_id INTEGER NOT NULL,
    PRIMARY KEY (show_id, rule_id),
    FOREIGN KEY (show_id) REFERENCES shows(id) ON DELETE CASCADE,
    FOREIGN KEY (rule_id) REFERENCES filter_rules(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS download_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    show_id INTEGER NOT NULL,
    episode INTEGER NOT NULL,
    content_id TEXT NOT NULL,
    download_url TEXT NOT NULL,
    title TEXT NOT NULL,
    outcome TEXT NOT NULL CHECK(outcome IN ('success', 'failed')),
    error TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (show_id) REFERENCES shows(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_download_history_show_episode ON download_history(show_id, episode);
  CREATE INDEX IF NOT EXISTS idx_download_history_content_id ON download_history(content_id);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_download_history_success
    ON download_history(show_id, episode) WHERE outcome = 'success';

  CREATE TABLE IF NOT EXISTS app_settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS structured_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL DEFAULT (datetime('now')),
    level TEXT NOT NULL CHECK(level IN ('DEBUG', 'INFO', 'WARN', 'ERROR')),
    source TEXT NOT NULL,
    message TEXT NOT NULL,
    details TEXT,
    release_title TEXT,
    job_id TEXT,
    error_stack TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE INDEX IF NOT EXISTS idx_logs_timestamp ON structured_logs(timestamp DESC);
  CREATE INDEX IF NOT EXISTS idx_logs_level ON structured_logs(level);
  CREATE INDEX IF NOT EXISTS idx_logs_source ON structured_logs(source);
  CREATE INDEX IF NOT EXISTS idx_logs_job_id ON structured_logs(job_id);
`);

export default db;
