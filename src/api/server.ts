import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import { loadConfig, resolveSyncEnv } from '../shared/config.js';
import { SyncError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SyncJob, buildSyncDeps } from '../sync/job.js';
import { startScheduler, stopScheduler } from '../sync/scheduler.js';
import { syncRoutes } from './routes/sync.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  job: SyncJob;
  config: Config;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.route('/api', syncRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof SyncError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'INVALID_TIMEFRAME':
      return 400;
    case 'FETCH_ERROR':
    case 'RESPONSE_PARSE_ERROR':
      return 502;
    default:
      return 500;
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  const config = await loadConfig();
  const env = resolveSyncEnv(process.env);
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const job = new SyncJob(buildSyncDeps(env, config));
  const app = createApp({ job, config });

  logger.info({ port, host }, 'Starting wpsync server');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Listening');
  });

  if (config.schedule.enabled) {
    startScheduler(job, config);
  }

  const shutdown = () => {
    logger.info('Shutting down...');
    stopScheduler();
    server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
