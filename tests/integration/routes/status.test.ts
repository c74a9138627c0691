import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { buildTestApp } from '../../fixtures/app.js';
import { seedDraft } from '../../fixtures/db.js';

describe('GET /', () => {
  it('responds to health checks', async () => {
    const { app } = buildTestApp();

    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'Post approval bot' });
  });
});

describe('GET /status', () => {
  it('reports an idle scheduler with empty stores', async () => {
    const { app } = buildTestApp();

    const res = await request(app).get('/status');

    expect(res.body).toEqual({
      state: 'idle',
      busy: false,
      wakePending: false,
      pendingDrafts: 0,
      publishedPosts: 0,
    });
  });

  it('reflects the cycle state and store contents', async () => {
    const { app, store, history, tracker } = buildTestApp();
    seedDraft(store);
    history.append('one');
    history.append('two');
    tracker.transition('generating');
    tracker.transition('awaiting_approval');

    const res = await request(app).get('/status');

    expect(res.body).toEqual({
      state: 'awaiting_approval',
      busy: true,
      wakePending: false,
      pendingDrafts: 1,
      publishedPosts: 2,
    });
  });
});
