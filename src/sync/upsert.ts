import type { ArticleStore } from '../store/adapter.js';
import type { NormalizedArticle, RawArticle } from '../source/article.js';
import { documentKey } from '../source/article.js';
import { normalizeArticle } from '../source/normalize.js';
import { existsInStore, isSessionDuplicate, type StoredArticleSet } from '../store/tracker.js';
import { errorMessage } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/**
 * Store one article unless it was already handled this run or already exists.
 *
 * Returns the written record, or `null` when skipped or when the write failed.
 * `storedIds` gains the id on the "exists" and "written" paths only.
 * A malformed date throws out of here; the caller skips the article.
 */
export async function upsertArticle(
  article: RawArticle,
  storedIds: StoredArticleSet,
  store: ArticleStore,
): Promise<NormalizedArticle | null> {
  const articleId = String(article.id);

  if (isSessionDuplicate(articleId, storedIds)) {
    logger.debug({ articleId }, 'Skipping article, already stored in this run');
    return null;
  }

  if (await existsInStore(store, articleId)) {
    logger.debug({ articleId }, 'Skipping article, already exists in store');
    storedIds.add(articleId);
    return null;
  }

  const record = normalizeArticle(article);

  try {
    await store.create(documentKey(articleId), record);
  } catch (err) {
    logger.error({ articleId, error: errorMessage(err) }, 'Failed to store article');
    return null;
  }

  logger.info({ articleId }, 'Stored article');
  storedIds.add(articleId);
  return record;
}
