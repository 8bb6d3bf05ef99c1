import { generateDefaultConfig, resolveSyncEnv, type SyncEnv, type Variables } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { buildSyncDeps } from '../sync/job.js';
import { runSync, type SyncDeps, type SyncFailure } from '../sync/run.js';
import { logger } from '../shared/logger.js';

/**
 * The parts of the Appwrite function context the handler touches.
 * `req.variables` is absent on runtimes that expose variables as env vars.
 */
export interface FunctionContext {
  req: { variables?: Variables };
  res: { json(body: unknown, statusCode?: number): unknown };
  log?: (message: string) => void;
  error?: (message: string) => void;
}

export type DepsFactory = (env: SyncEnv) => SyncDeps;

const defaultDeps: DepsFactory = (env) => buildSyncDeps(env, generateDefaultConfig());

export function createHandler(makeDeps: DepsFactory = defaultDeps) {
  return async function main(context: FunctionContext): Promise<unknown> {
    const variables = context.req.variables ?? process.env;

    let env: SyncEnv;
    try {
      env = resolveSyncEnv(variables);
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      logger.error({ missing: err.details?.['missing'] }, err.message);
      context.error?.(err.message);
      const failure: SyncFailure = { success: false, message: err.message };
      return context.res.json(failure);
    }

    const result = await runSync(makeDeps(env));
    context.log?.(`Stored ${result.total_stored} new articles`);
    return context.res.json(result);
  };
}

export default createHandler();
