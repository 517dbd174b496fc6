import express, { ErrorRequestHandler } from 'express';
import showsRouter from './routes/shows';
import filtersRouter from './routes/filters';
import { createStatusRouter } from './routes/status';
import { createActionsRouter } from './routes/actions';
import type { Tracker } from './services/tracker';
import { logger } from './services/structuredLogging';
import { errorMessage } from './utils/errors';

const jsonErrors: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }
  // body-parser marks malformed JSON with a 4xx status
  const status = typeof err === 'object' && err !== null && 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return res.status(status).json({ error: errorMessage(err) });
  }
  logger.error('api', `Unhandled error on ${req.method} ${req.path}: ${errorMessage(err)}`, { error: err });
  res.status(500).json({ error: 'Internal server error' });
};

export function createApp(tracker: Pick<Tracker, 'status' | 'recentCycles' | 'runNow' | 'reload'>) {
  const app = express();

  app.use(express.json());

  app.use('/api/shows', showsRouter);
  app.use('/api/filters', filtersRouter);
  app.use('/api', createStatusRouter(tracker));
  app.use('/actions', createActionsRouter(tracker));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(jsonErrors);

  return app;
}
