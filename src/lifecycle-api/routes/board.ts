import { Router } from 'express';
import { groupByLabel } from '@core/labels';
import { computeTrackerSummary } from '@core/metrics';
import type { LifecycleTracker } from '@core/tracker';
import { ok } from '../responses';

export function boardRouter(tracker: LifecycleTracker): Router {
  const router = Router();

  router.get('/board', (_req, res) => {
    res.json(ok(groupByLabel(tracker.list())));
  });

  router.get('/summary', (_req, res) => {
    res.json(ok(computeTrackerSummary(tracker.list())));
  });

  return router;
}
