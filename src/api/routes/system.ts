import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { getDatabaseStats, pruneContentRecords } from '../../source/sourceDb.js';
import { errorMessage } from '../../shared/errors.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
    });
  });

  // GET /api/doctor: database and adapter checks
  app.get('/doctor', (c) => {
    const checks: Record<string, string> = {};

    try {
      ctx.db.prepare('SELECT 1').get();
      checks['db'] = 'ok';
    } catch (err) {
      checks['db'] = `error: ${errorMessage(err)}`;
    }

    checks['adapters'] = ctx.registry
      .list()
      .map((a) => a.name)
      .join(', ');
    checks['scheduler'] = ctx.scheduler.started ? 'running' : 'stopped';

    return c.json(checks);
  });

  // GET /api/stats: row counts per table
  app.get('/stats', (c) => {
    return c.json(getDatabaseStats(ctx.db));
  });

  // POST /api/prune: drop records older than the retention window
  app.post('/prune', async (c) => {
    const body = await c.req.json<{ days?: unknown }>().catch((): { days?: unknown } => ({}));
    const days = body.days ?? ctx.config.retention.days;
    if (typeof days !== 'number') {
      return c.json({ error: 'days must be a number' }, 400);
    }
    const deleted = pruneContentRecords(ctx.db, days);
    return c.json({ deleted, days });
  });

  return app;
}
