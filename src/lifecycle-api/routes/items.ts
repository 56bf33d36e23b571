import { Router } from 'express';
import { labelFor } from '@core/labels';
import type { LifecycleTracker } from '@core/tracker';
import {
  createItemSchema,
  listItemsQuerySchema,
  validateRequest,
} from '@core/validation';
import { fail, ok } from '../responses';

export function itemsRouter(tracker: LifecycleTracker): Router {
  const router = Router();

  // List items, optionally filtered by state, kind or assignee
  router.get('/items', (req, res) => {
    const query = validateRequest(listItemsQuerySchema, req.query);
    if (!query.success) {
      return res.status(400).json(fail(query.error));
    }
    res.json(ok(tracker.list(query.data)));
  });

  // Create an item in BACKLOG or READY
  router.post('/items', (req, res) => {
    const body = validateRequest(createItemSchema, req.body);
    if (!body.success) {
      return res.status(400).json(fail(body.error));
    }

    const { kind, initialState, id } = body.data;
    const item = tracker.create(kind, initialState, { id });
    console.warn(`[TRACKER] Created ${kind} '${item.id}' in ${item.state}`);
    res.status(201).json(ok(item));
  });

  // Get one item with its label and the transitions open to it
  router.get('/items/:id', (req, res) => {
    const item = tracker.get(req.params.id);
    res.json(
      ok({
        ...item,
        label: labelFor(item.state),
        allowedTransitions: tracker.allowedTransitions(item.id),
      }),
    );
  });

  router.get('/items/:id/history', (req, res) => {
    res.json(ok(tracker.history(req.params.id)));
  });

  router.get('/items/:id/blocked-from', (req, res) => {
    res.json(ok({ state: tracker.blockedFrom(req.params.id) }));
  });

  return router;
}
