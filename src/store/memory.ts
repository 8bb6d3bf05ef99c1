import type { ArticleStore, LookupResult } from './adapter.js';
import type { NormalizedArticle } from '../source/article.js';
import { WriteError } from '../shared/errors.js';

/**
 * In-process store used by `wpsync run --dry-run`. Rejects duplicate keys the
 * way an Appwrite collection does.
 */
export class MemoryArticleStore implements ArticleStore {
  readonly documents = new Map<string, NormalizedArticle>();

  async lookup(documentId: string): Promise<LookupResult> {
    return this.documents.has(documentId) ? { kind: 'found', documentId } : { kind: 'not_found' };
  }

  async create(documentId: string, data: NormalizedArticle): Promise<void> {
    if (this.documents.has(documentId)) {
      throw new WriteError(`Document with the requested ID already exists: ${documentId}`, {
        documentId,
        code: 409,
      });
    }
    this.documents.set(documentId, data);
  }
}
