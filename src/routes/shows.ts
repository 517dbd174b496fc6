import { Router, Request, Response } from 'express';
import { showsModel } from '../models/shows';
import { historyModel } from '../models/history';
import { parseId, parseNewShow, parseShowUpdate, sendError } from './validation';
import { logger } from '../services/structuredLogging';

const router = Router();

// GET /api/shows
router.get('/', (req: Request, res: Response) => {
  try {
    res.json({ shows: showsModel.getAll() });
  } catch (error) {
    sendError(res, error, 'list shows');
  }
});

router.get('/:id', (req: Request, res: Response) => {
  try {
    const show = showsModel.getById(parseId(req.params.id));
    if (!show) {
      return res.status(404).json({ error: 'Show not found' });
    }
    res.json({ show, history: historyModel.getByShow(show.id) });
  } catch (error) {
    sendError(res, error, 'load show');
  }
});

router.post('/', (req: Request, res: Response) => {
  try {
    const show = showsModel.create(parseNewShow(req.body));
    logger.info('api', `Now tracking ${show.title} (season ${show.season}, ${show.quality})`);
    res.status(201).json({ show });
  } catch (error) {
    sendError(res, error, 'create show');
  }
});

router.patch('/:id', (req: Request, res: Response) => {
  try {
    const id = parseId(req.params.id);
    if (!showsModel.getById(id)) {
      return res.status(404).json({ error: 'Show not found' });
    }
    const show = showsModel.update(id, parseShowUpdate(req.body));
    res.json({ show });
  } catch (error) {
    sendError(res, error, 'update show');
  }
});

export default router;
