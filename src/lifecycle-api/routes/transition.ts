import { Router } from 'express';
import type { LifecycleTracker } from '@core/tracker';
import { transitionRequestSchema, validateRequest } from '@core/validation';
import { fail, ok } from '../responses';

export function transitionRouter(tracker: LifecycleTracker): Router {
  const router = Router();

  router.post('/items/:id/transition', (req, res) => {
    // --- Validate required fields ---
    const body = validateRequest(transitionRequestSchema, req.body);
    if (!body.success) {
      return res.status(400).json(fail(body.error));
    }

    // --- Apply transition (throws LifecycleError on rejection) ---
    const { targetState, actor } = body.data;
    const fromState = tracker.currentState(req.params.id);
    const item = tracker.transition(req.params.id, targetState, actor);

    console.warn(`[TRACKER] '${item.id}' ${fromState} -> ${item.state} by ${actor}`);

    res.json(ok({ fromState, toState: item.state, item }));
  });

  return router;
}
