import { Router } from 'express';
import type { LifecycleTracker } from '@core/tracker';
import healthRouter from './health';
import { itemsRouter } from './items';
import { transitionRouter } from './transition';
import { boardRouter } from './board';

export function apiRouter(tracker: LifecycleTracker): Router {
  const router = Router();
  router.use(healthRouter);
  router.use(itemsRouter(tracker));
  router.use(transitionRouter(tracker));
  router.use(boardRouter(tracker));
  return router;
}
