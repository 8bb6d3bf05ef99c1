import type { ArticleStore } from './adapter.js';
import { documentKey } from '../source/article.js';
import { logger } from '../shared/logger.js';

/**
 * Ids already stored or found during the current run. Created per run and
 * passed down explicitly.
 */
export type StoredArticleSet = Set<string>;

export function isSessionDuplicate(id: string, storedIds: StoredArticleSet): boolean {
  return storedIds.has(id);
}

/**
 * True only when the document is known to exist. A failed lookup counts as
 * absent so the run keeps going; a real duplicate is then rejected by the
 * store on key collision.
 */
export async function existsInStore(store: ArticleStore, id: string): Promise<boolean> {
  const result = await store.lookup(documentKey(id));
  switch (result.kind) {
    case 'found':
      return true;
    case 'not_found':
      return false;
    case 'lookup_failed':
      logger.warn({ articleId: id, reason: result.reason }, 'Existence check failed, treating as absent');
      return false;
  }
}
