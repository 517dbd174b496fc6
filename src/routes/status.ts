import { Router, Request, Response } from 'express';
import { historyModel } from '../models/history';
import type { Tracker } from '../services/tracker';
import { getRecentLogs, LogLevel } from '../services/structuredLogging';
import { parseId, sendError } from './validation';

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createStatusRouter(tracker: Pick<Tracker, 'status' | 'recentCycles'>) {
  const router = Router();

  // GET /api/history?showId=1
  router.get('/history', (req: Request, res: Response) => {
    try {
      const showId = queryString(req.query.showId);
      const records = showId ? historyModel.getByShow(parseId(showId, 'showId')) : historyModel.getAll();
      res.json({ history: records });
    } catch (error) {
      sendError(res, error, 'load download history');
    }
  });

  router.get('/status', (req: Request, res: Response) => {
    try {
      res.json(tracker.status());
    } catch (error) {
      sendError(res, error, 'load tracker status');
    }
  });

  router.get('/cycles', (req: Request, res: Response) => {
    res.json({ cycles: tracker.recentCycles() });
  });

  // GET /api/logs?level=ERROR&jobId=...&limit=100
  router.get('/logs', (req: Request, res: Response) => {
    try {
      const level = queryString(req.query.level)?.toUpperCase();
      const limit = Math.min(parseInt(queryString(req.query.limit) || '', 10) || 100, 500);
      const logs = getRecentLogs({
        limit,
        level: level && isLogLevel(level) ? level : undefined,
        jobId: queryString(req.query.jobId),
      });
      res.json({ logs });
    } catch (error) {
      sendError(res, error, 'load logs');
    }
  });

  return router;
}
