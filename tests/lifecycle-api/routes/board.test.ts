import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { makeApp } from './helpers';

describe('GET /api/board', () => {
  it('groups items into one column per state', async () => {
    const { app, tracker } = makeApp();
    tracker.create('ISSUE', 'READY', { id: 'gh-1' });
    tracker.create('PULL_REQUEST', 'READY', { id: 'gh-2' });
    tracker.transition('gh-2', 'IN_PROGRESS', 'alice');
    tracker.transition('gh-2', 'BLOCKED', 'alice');

    const res = await request(app).get('/api/board');

    expect(res.status).toBe(200);
    expect(res.body.data).toHaveLength(7);
    expect(res.body.data[1].label).toBe('ready');
    expect(res.body.data[1].items[0].id).toBe('gh-1');
    expect(res.body.data[5].label).toBe('blocked');
    expect(res.body.data[5].items[0].id).toBe('gh-2');
  });
});

describe('GET /api/summary', () => {
  it('summarises the tracker', async () => {
    const { app, tracker } = makeApp();
    tracker.create('ISSUE', 'BACKLOG', { id: 'gh-1' });
    tracker.create('ISSUE', 'READY', { id: 'gh-2' });
    tracker.transition('gh-2', 'IN_PROGRESS', 'alice');
    tracker.transition('gh-2', 'READY_FOR_REVIEW', 'alice');
    tracker.transition('gh-2', 'DONE', 'reviewer');

    const res = await request(app).get('/api/summary');

    expect(res.status).toBe(200);
    expect(res.body.data.totalItems).toBe(2);
    expect(res.body.data.doneItems).toBe(1);
    expect(res.body.data.openItems).toBe(1);
    expect(res.body.data.averageTransitionsToDone).toBe(3);
  });
});
