import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health — liveness plus the configured schedule
  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      schedule: {
        enabled: ctx.config.schedule.enabled,
        sync_cron: ctx.config.schedule.sync_cron,
      },
    }),
  );

  return app;
}
