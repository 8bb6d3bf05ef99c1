import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function syncRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sync — run one sync pass
  app.post('/sync', async (c) => {
    const result = await ctx.job.run();
    return c.json(result);
  });

  // GET /api/sync/status — last finished run
  app.get('/sync/status', (c) => {
    const last = ctx.job.lastRun;
    if (!last) {
      return c.json({ message: 'No sync has been run yet', running: ctx.job.running }, 404);
    }
    return c.json({ ...last, running: ctx.job.running });
  });

  return app;
}
