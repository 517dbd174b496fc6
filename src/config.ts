import dotenv from 'dotenv';

dotenv.config();

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  port: parseIntOr(process.env.PORT, 8085),
  db: {
    path: process.env.DB_PATH || './data/tracker.db',
  },
  logLevel: (process.env.LOG_LEVEL || 'INFO').toUpperCase(),
  transmission: {
    url: process.env.TRANSMISSION_URL || '',
    username: process.env.TRANSMISSION_USERNAME || '',
    password: process.env.TRANSMISSION_PASSWORD || '',
    downloadRoot: process.env.TRANSMISSION_DOWNLOAD_ROOT || '/data/Anime',
    timeoutMs: parseIntOr(process.env.RPC_TIMEOUT_MS, 15000),
  },
  feeds: {
    nyaaBaseUrl: process.env.NYAA_BASE_URL || 'https://nyaa.si',
    subsPleaseBaseUrl: process.env.SUBSPLEASE_BASE_URL || 'https://subsplease.org',
    timeoutMs: parseIntOr(process.env.FEED_TIMEOUT_MS, 20000),
  },
};

if (!config.transmission.url) {
  console.warn('Warning: TRANSMISSION_URL must be set for downloads to be dispatched');
}
