import db from '../db';
import { config } from '../config';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
export type LogSource =
  | 'feeds'
  | 'parser'
  | 'filter-engine'
  | 'match-selector'
  | 'dispatcher'
  | 'transmission'
  | 'tracker'
  | 'api';

export interface StructuredLogEntry {
  id?: number;
  timestamp: Date;
  level: LogLevel;
  source: LogSource;
  message: string;
  details?: unknown;
  releaseTitle?: string;
  jobId?: string;
  errorStack?: string;
}

export type LogOptions = {
  details?: unknown;
  releaseTitle?: string;
  jobId?: string;
  error?: unknown;
};

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

function consoleThreshold(): number {
  const configured = config.logLevel;
  if (configured === 'DEBUG' || configured === 'INFO' || configured === 'WARN' || configured === 'ERROR') {
    return LEVEL_ORDER[configured];
  }
  return LEVEL_ORDER.INFO;
}

// Keep in-memory buffer for fast writes (batch insert)
const LOG_BUFFER: StructuredLogEntry[] = [];
const BUFFER_SIZE = 50;
const FLUSH_INTERVAL = 5000;

let flushTimer: NodeJS.Timeout | null = null;

function flushLogs() {
  if (LOG_BUFFER.length === 0) return;

  const logsToInsert = LOG_BUFFER.splice(0, LOG_BUFFER.length);

  try {
    const stmt = db.prepare(`
      INSERT INTO structured_logs (
        timestamp, level, source, message, details, release_title, job_id, error_stack
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const insertMany = db.transaction((logs: StructuredLogEntry[]) => {
      for (const log of logs) {
        stmt.run(
          log.timestamp.toISOString(),
          log.level,
          log.source,
          log.message,
          log.details !== undefined ? JSON.stringify(log.details) : null,
          log.releaseTitle || null,
          log.jobId || null,
          log.errorStack || null
        );
      }
    });

    insertMany(logsToInsert);
  } catch (error) {
    console.error('Error flushing logs to database:', error);
    // Put logs back in buffer to retry later
    LOG_BUFFER.unshift(...logsToInsert);
  }
}

function scheduleFlush() {
  if (flushTimer) return;
  flushTimer = setTimeout(() => {
    flushTimer = null;
    flushLogs();
    if (LOG_BUFFER.length > 0) {
      scheduleFlush();
    }
  }, FLUSH_INTERVAL);
  flushTimer.unref();
}

export function log(level: LogLevel, source: LogSource, message: string, options?: LogOptions) {
  const error = options?.error;
  const entry: StructuredLogEntry = {
    timestamp: new Date(),
    level,
    source,
    message,
    details: options?.details,
    releaseTitle: options?.releaseTitle,
    jobId: options?.jobId,
    errorStack: error instanceof Error ? error.stack : error !== undefined ? String(error) : undefined,
  };

  LOG_BUFFER.push(entry);

  if (LOG_BUFFER.length >= BUFFER_SIZE) {
    flushLogs();
  } else {
    scheduleFlush();
  }

  if (LEVEL_ORDER[level] < consoleThreshold()) return;

  const consoleMethod =
    level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : level === 'INFO' ? console.info : console.log;

  const prefix = `[${level}] [${source}]`;
  if (error !== undefined) {
    consoleMethod(prefix, message, error);
  } else if (options?.details !== undefined) {
    consoleMethod(prefix, message, options.details);
  } else {
    consoleMethod(prefix, message);
  }
}

export const logger = {
  debug: (source: LogSource, message: string, options?: LogOptions) => {
    log('DEBUG', source, message, options);
  },
  info: (source: LogSource, message: string, options?: LogOptions) => {
    log('INFO', source, message, options);
  },
  warn: (source: LogSource, message: string, options?: LogOptions) => {
    log('WARN', source, message, options);
  },
  error: (source: LogSource, message: string, options?: LogOptions) => {
    log('ERROR', source, message, options);
  },
};

interface LogRow {
  id: number;
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
  details: string | null;
  release_title: string | null;
  job_id: string | null;
  error_stack: string | null;
}

export function getRecentLogs(options: { limit?: number; level?: LogLevel; jobId?: string } = {}): LogRow[] {
  flush();
  const conditions: string[] = [];
  const params: Array<string | number> = [];
  if (options.level) {
    conditions.push('level = ?');
    params.push(options.level);
  }
  if (options.jobId) {
    conditions.push('job_id = ?');
    params.push(options.jobId);
  }
  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  params.push(options.limit ?? 200);
  return db
    .prepare(`SELECT * FROM structured_logs ${where} ORDER BY id DESC LIMIT ?`)
    .all(...params) as LogRow[];
}

// Flush logs on process exit
process.on('beforeExit', () => {
  flush();
});

export function flush() {
  if (flushTimer) {
    clearTimeout(flushTimer);
    flushTimer = null;
  }
  flushLogs();
}
