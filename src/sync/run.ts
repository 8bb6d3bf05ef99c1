import type { ArticleSource, Timeframe } from '../source/adapter.js';
import { TIMEFRAMES } from '../source/adapter.js';
import { WpPostSchema } from '../source/article.js';
import type { ArticleStore } from '../store/adapter.js';
import type { StoredArticleSet } from '../store/tracker.js';
import { upsertArticle } from './upsert.js';
import { errorMessage } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export type TimeframeResult = { fetched: number; stored: number } | { error: string };

export interface SyncResult {
  success: true;
  total_stored: number;
  results: Record<Timeframe, TimeframeResult>;
}

export interface SyncFailure {
  success: false;
  message: string;
}

export type SyncResponse = SyncResult | SyncFailure;

export interface SyncDeps {
  source: ArticleSource;
  store: ArticleStore;
}

async function syncTimeframe(
  timeframe: Timeframe,
  deps: SyncDeps,
  storedIds: StoredArticleSet,
): Promise<TimeframeResult> {
  let articles: unknown[];
  try {
    articles = await deps.source.fetchByTimeframe(timeframe);
  } catch (err) {
    const error = errorMessage(err);
    logger.error({ timeframe, error }, 'Failed to fetch timeframe');
    return { error };
  }

  let stored = 0;
  for (const [index, entry] of articles.entries()) {
    const parsed = WpPostSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn(
        {
          timeframe,
          index,
          issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        },
        'Skipping malformed article',
      );
      continue;
    }

    const article = parsed.data;
    try {
      const record = await upsertArticle(article, storedIds, deps.store);
      if (record) stored++;
    } catch (err) {
      logger.error({ timeframe, articleId: article.id, error: errorMessage(err) }, 'Error processing article');
    }
  }

  return { fetched: articles.length, stored };
}

/**
 * One pass over every timeframe. Windows overlap, so the same article is seen
 * up to three times; the run-scoped id set keeps it to a single write.
 */
export async function runSync(deps: SyncDeps): Promise<SyncResult> {
  const startTime = Date.now();
  const storedIds: StoredArticleSet = new Set();

  const results: Record<Timeframe, TimeframeResult> = {
    day: { fetched: 0, stored: 0 },
    week: { fetched: 0, stored: 0 },
    month: { fetched: 0, stored: 0 },
  };
  let totalStored = 0;

  for (const timeframe of TIMEFRAMES) {
    const result = await syncTimeframe(timeframe, deps, storedIds);
    results[timeframe] = result;
    if ('stored' in result) totalStored += result.stored;
  }

  logger.info(
    { totalStored, seen: storedIds.size, durationMs: Date.now() - startTime },
    'Sync complete',
  );

  return { success: true, total_stored: totalStored, results };
}
