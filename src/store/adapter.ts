import type { NormalizedArticle } from '../source/article.js';

/**
 * Outcome of a point lookup. `lookup_failed` covers every error other than
 * a definite not-found (network, auth, server).
 */
export type LookupResult =
  | { kind: 'found'; documentId: string }
  | { kind: 'not_found' }
  | { kind: 'lookup_failed'; reason: string };

/**
 * Destination of normalized articles, keyed by document id.
 */
export interface ArticleStore {
  lookup(documentId: string): Promise<LookupResult>;
  /**
   * Create a publicly readable document.
   * @throws WriteError when the document is not created
   */
  create(documentId: string, data: NormalizedArticle): Promise<void>;
}
