import { AppwriteException, Client, Databases, Permission, Role, type Models } from 'node-appwrite';
import type { ArticleStore, LookupResult } from './adapter.js';
import type { NormalizedArticle } from '../source/article.js';
import type { SyncEnv } from '../shared/config.js';
import { WriteError } from '../shared/errors.js';
import { errorMessage } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/**
 * The slice of the Appwrite `Databases` service the sync calls.
 */
export interface DocumentsApi {
  getDocument(databaseId: string, collectionId: string, documentId: string): Promise<Models.Document>;
  createDocument(
    databaseId: string,
    collectionId: string,
    documentId: string,
    data: NormalizedArticle,
    permissions?: string[],
  ): Promise<Models.Document>;
}

export class AppwriteArticleStore implements ArticleStore {
  constructor(
    private readonly databases: DocumentsApi,
    private readonly databaseId: string,
    private readonly collectionId: string,
  ) {}

  async lookup(documentId: string): Promise<LookupResult> {
    try {
      const doc = await this.databases.getDocument(this.databaseId, this.collectionId, documentId);
      return { kind: 'found', documentId: doc.$id };
    } catch (err) {
      if (err instanceof AppwriteException && err.code === 404) {
        return { kind: 'not_found' };
      }
      return { kind: 'lookup_failed', reason: errorMessage(err) };
    }
  }

  async create(documentId: string, data: NormalizedArticle): Promise<void> {
    try {
      await this.databases.createDocument(this.databaseId, this.collectionId, documentId, data, [
        Permission.read(Role.any()),
      ]);
      logger.debug({ documentId }, 'Document created');
    } catch (err) {
      throw new WriteError(`Failed to create document ${documentId}: ${errorMessage(err)}`, {
        documentId,
        code: err instanceof AppwriteException ? err.code : undefined,
      });
    }
  }
}

export function createAppwriteStore(env: SyncEnv): AppwriteArticleStore {
  const client = new Client();
  // An empty endpoint leaves the SDK default in place.
  if (env.endpoint) client.setEndpoint(env.endpoint);
  client.setProject(env.projectId);
  client.setKey(env.apiKey);
  return new AppwriteArticleStore(new Databases(client), env.databaseId, env.collectionId);
}
