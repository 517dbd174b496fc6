import { Router, Request, Response } from 'express';
import type { Tracker } from '../services/tracker';
import { settingsModel, parseTrackerSettings } from '../models/settings';
import { logger } from '../services/structuredLogging';
import { errorMessage } from '../utils/errors';
import { asBody, sendError } from './validation';

export function createActionsRouter(tracker: Pick<Tracker, 'runNow' | 'reload'>) {
  const router = Router();

  // POST /actions/poll - starts a cycle in the background unless one is running
  router.post('/poll', (req: Request, res: Response) => {
    const run = tracker.runNow();
    if (run.started) {
      run.result.catch((error) => {
        logger.error('tracker', `Manual poll failed: ${errorMessage(error)}`, { error });
      });
      return res.status(202).json({ started: true, message: 'Poll cycle started' });
    }
    res.status(409).json({ started: false, message: 'A poll cycle is already running' });
  });

  // POST /actions/reload - optional body updates the stored settings first
  router.post('/reload', (req: Request, res: Response) => {
    try {
      const body = req.body === undefined ? {} : asBody(req.body);
      if (Object.keys(body).length > 0) {
        settingsModel.setTrackerSettings(parseTrackerSettings(body));
      }
      const settings = tracker.reload();
      res.json({ success: true, settings });
    } catch (error) {
      sendError(res, error, 'reload settings');
    }
  });

  return router;
}
