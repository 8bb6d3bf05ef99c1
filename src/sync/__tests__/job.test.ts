import { describe, it, expect, vi } from 'vitest';
import { SyncJob, buildSyncDeps } from '../job.js';
import type { ArticleSource } from '../../source/adapter.js';
import { WordPressSource } from '../../source/wordpress.js';
import { MemoryArticleStore } from '../../store/memory.js';
import { AppwriteArticleStore } from '../../store/appwrite.js';
import { generateDefaultConfig, type SyncEnv } from '../../shared/config.js';

const ENV: SyncEnv = {
  endpoint: '',
  projectId: 'project',
  apiKey: 'test-secret',
  wordpressUrl: 'https://blog.example.com',
  databaseId: 'db-main',
  collectionId: 'articles',
};

describe('buildSyncDeps', () => {
  it('wires WordPress and Appwrite', () => {
    const deps = buildSyncDeps(ENV, generateDefaultConfig());
    expect(deps.source).toBeInstanceOf(WordPressSource);
    expect(deps.store).toBeInstanceOf(AppwriteArticleStore);
  });

  it('uses an in-memory store for dry runs', () => {
    const deps = buildSyncDeps(ENV, generateDefaultConfig(), { dryRun: true });
    expect(deps.store).toBeInstanceOf(MemoryArticleStore);
  });
});

describe('SyncJob', () => {
  it('joins a run already in flight', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetchByTimeframe = vi.fn(async () => {
      await gate;
      return [];
    });
    const source: ArticleSource = { fetchByTimeframe };
    const job = new SyncJob({ source, store: new MemoryArticleStore() });

    const first = job.run();
    const second = job.run();
    expect(job.running).toBe(true);

    release();
    const [a, b] = await Promise.all([first, second]);

    expect(a).toBe(b);
    expect(fetchByTimeframe).toHaveBeenCalledTimes(3);
    expect(job.running).toBe(false);
  });

  it('keeps the last result', async () => {
    const source: ArticleSource = { fetchByTimeframe: async () => [] };
    const job = new SyncJob({ source, store: new MemoryArticleStore() });

    expect(job.lastRun).toBeNull();
    const result = await job.run();

    expect(job.lastRun?.result).toBe(result);
    expect(job.lastRun?.finishedAt).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });
});
