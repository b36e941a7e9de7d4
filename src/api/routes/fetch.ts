import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import type { FetchSummary } from '../../source/aggregator.js';

interface FetchRun {
  finished_at: string;
  duration_ms: number;
  results: FetchSummary;
}

export function fetchRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  let lastRun: FetchRun | null = null;

  // POST /api/fetch: run a fetch pass, or join the one in flight
  app.post('/fetch', async (c) => {
    const started = Date.now();
    const results = await ctx.scheduler.trigger();

    lastRun = {
      finished_at: new Date().toISOString(),
      duration_ms: Date.now() - started,
      results,
    };
    return c.json(lastRun);
  });

  // GET /api/fetch/last: result of the last pass triggered over HTTP
  app.get('/fetch/last', (c) => {
    if (!lastRun) {
      return c.json({ message: 'No fetch has been run yet' }, 404);
    }
    return c.json(lastRun);
  });

  return app;
}
