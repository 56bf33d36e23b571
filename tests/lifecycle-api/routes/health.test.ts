import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { makeApp } from './helpers';

describe('health router', () => {
  it('reports the service version', async () => {
    const { app } = makeApp();
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, data: { status: 'ok', version: '0.1.0' } });
  });
});
