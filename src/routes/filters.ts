import { Router, Request, Response } from 'express';
import { filtersModel } from '../models/filters';
import { showsModel } from '../models/shows';
import type { RuleScope } from '../types/Filter';
import { ConfigError } from '../utils/errors';
import { parseId, parseNewRule, parseRuleUpdate, sendError } from './validation';

const router = Router();

function assertShowExists(scope: RuleScope | undefined) {
  if (scope?.kind === 'show' && !showsModel.getById(scope.showId)) {
    throw new ConfigError(`Show ${scope.showId} does not exist`, 'showId');
  }
}

// GET /api/filters - rules that fail validation are listed separately
router.get('/', (req: Request, res: Response) => {
  try {
    const { rules, overrides, invalid } = filtersModel.load();
    res.json({
      rules,
      overrides,
      invalid: invalid.map((e) => ({ subject: e.subject, error: e.message })),
    });
  } catch (error) {
    sendError(res, error, 'list filter rules');
  }
});

router.post('/', (req: Request, res: Response) => {
  try {
    const rule = parseNewRule(req.body);
    assertShowExists(rule.scope);
    res.status(201).json({ rule: filtersModel.create(rule) });
  } catch (error) {
    sendError(res, error, 'create filter rule');
  }
});

router.patch('/:id', (req: Request, res: Response) => {
  try {
    const id = parseId(req.params.id);
    if (!filtersModel.getById(id)) {
      return res.status(404).json({ error: 'Filter rule not found' });
    }
    const update = parseRuleUpdate(req.body);
    assertShowExists(update.scope);
    res.json({ rule: filtersModel.update(id, update) });
  } catch (error) {
    sendError(res, error, 'update filter rule');
  }
});

router.delete('/:id', (req: Request, res: Response) => {
  try {
    if (!filtersModel.delete(parseId(req.params.id))) {
      return res.status(404).json({ error: 'Filter rule not found' });
    }
    res.status(204).end();
  } catch (error) {
    sendError(res, error, 'delete filter rule');
  }
});

router.post('/:id/shows/:showId/disable', (req: Request, res: Response) => {
  try {
    const rule = filtersModel.getById(parseId(req.params.id));
    const show = showsModel.getById(parseId(req.params.showId, 'showId'));
    if (!rule || !show) {
      return res.status(404).json({ error: rule ? 'Show not found' : 'Filter rule not found' });
    }
    if (rule.scope.kind !== 'global') {
      return res.status(400).json({ error: 'Only global rules can be disabled per show' });
    }
    filtersModel.disableForShow(rule.id, show.id);
    res.json({ success: true, overrides: filtersModel.getOverrides() });
  } catch (error) {
    sendError(res, error, 'disable filter rule');
  }
});

router.delete('/:id/shows/:showId/disable', (req: Request, res: Response) => {
  try {
    const removed = filtersModel.enableForShow(parseId(req.params.id), parseId(req.params.showId, 'showId'));
    if (!removed) {
      return res.status(404).json({ error: 'Override not found' });
    }
    res.json({ success: true, overrides: filtersModel.getOverrides() });
  } catch (error) {
    sendError(res, error, 'enable filter rule');
  }
});

export default router;
