import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { deleteContentRecord, getContentRecord, listContentRecords } from '../../source/sourceDb.js';

const MAX_PAGE_SIZE = 500;

function parseCount(raw: string | undefined, fallback: number): number {
  const n = raw === undefined ? NaN : Number.parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function itemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/items?source=&source_type=&limit=&offset=
  app.get('/items', (c) => {
    const limit = Math.min(parseCount(c.req.query('limit'), 50), MAX_PAGE_SIZE);
    const offset = parseCount(c.req.query('offset'), 0);

    const items = listContentRecords(ctx.db, {
      source: c.req.query('source'),
      sourceType: c.req.query('source_type'),
      limit,
      offset,
    });
    return c.json({ items, limit, offset });
  });

  app.get('/items/:id', (c) => {
    const record = getContentRecord(ctx.db, c.req.param('id'));
    if (!record) {
      return c.json({ error: 'Item not found' }, 404);
    }
    return c.json(record);
  });

  app.delete('/items/:id', (c) => {
    if (!deleteContentRecord(ctx.db, c.req.param('id'))) {
      return c.json({ error: 'Item not found' }, 404);
    }
    return c.json({ ok: true });
  });

  return app;
}
