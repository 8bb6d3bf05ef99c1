import { describe, it, expect, beforeEach } from 'vitest';
import { createApp, errorCodeToHttpStatus } from '../server.js';
import { SyncJob } from '../../sync/job.js';
import type { ArticleSource } from '../../source/adapter.js';
import { MemoryArticleStore } from '../../store/memory.js';
import { ConfigSchema, generateDefaultConfig } from '../../shared/config.js';

const source: ArticleSource = {
  fetchByTimeframe: async () => [
    {
      id: 5,
      title: { rendered: 'Five' },
      content: { rendered: '' },
      excerpt: { rendered: '' },
      slug: 'five',
      link: 'https://blog.example.com/five',
      date: '2024-03-09T10:00:00',
      modified: '2024-03-09T10:00:00',
    },
  ],
};

let app: ReturnType<typeof createApp>;

beforeEach(() => {
  const job = new SyncJob({ source, store: new MemoryArticleStore() });
  app = createApp({ job, config: generateDefaultConfig() });
});

describe('sync routes', () => {
  it('POST /api/sync runs a sync and returns the result', async () => {
    const res = await app.request('/api/sync', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      total_stored: 1,
      results: {
        day: { fetched: 1, stored: 1 },
        week: { fetched: 1, stored: 0 },
        month: { fetched: 1, stored: 0 },
      },
    });
  });

  it('GET /api/sync/status is 404 before any run', async () => {
    const res = await app.request('/api/sync/status');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ message: 'No sync has been run yet', running: false });
  });

  it('GET /api/sync/status returns the last result', async () => {
    await app.request('/api/sync', { method: 'POST' });

    const res = await app.request('/api/sync/status');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ running: false, result: { total_stored: 1 } });
  });
});

describe('system routes', () => {
  it('GET /api/health reports the default schedule', async () => {
    const res = await app.request('/api/health');
    expect(await res.json()).toEqual({
      status: 'ok',
      schedule: { enabled: false, sync_cron: '0 * * * *' },
    });
  });

  it('GET /api/health reports a configured schedule', async () => {
    const config = ConfigSchema.parse({ schedule: { enabled: true, sync_cron: '*/30 * * * *' } });
    const job = new SyncJob({ source, store: new MemoryArticleStore() });
    const scheduled = createApp({ job, config });

    const res = await scheduled.request('/api/health');

    expect(await res.json()).toEqual({
      status: 'ok',
      schedule: { enabled: true, sync_cron: '*/30 * * * *' },
    });
  });

  it('unknown routes are 404', async () => {
    const res = await app.request('/api/nope');
    expect(res.status).toBe(404);
  });
});

describe('errorCodeToHttpStatus', () => {
  it('maps error codes', () => {
    expect(errorCodeToHttpStatus('CONFIG_ERROR')).toBe(400);
    expect(errorCodeToHttpStatus('FETCH_ERROR')).toBe(502);
    expect(errorCodeToHttpStatus('RESPONSE_PARSE_ERROR')).toBe(502);
    expect(errorCodeToHttpStatus('WRITE_ERROR')).toBe(500);
  });
});
