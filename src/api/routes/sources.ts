import { Hono, type Context } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { RecordError, errorMessage } from '../../shared/errors.js';
import {
  deleteSourceConfiguration,
  getSourceConfiguration,
  saveSourceConfiguration,
} from '../../source/sourceDb.js';
import { parseSourceConfiguration } from '../../source/records.js';
import { buildAdapterOptions } from '../../source/aggregator.js';
import { getSourceStatus, listSourceStatuses } from '../../source/status.js';

const PatchBodySchema = z.record(z.unknown());

async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch (err) {
    throw new RecordError(`Invalid JSON body: ${errorMessage(err)}`);
  }
}

export function sourceRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sources: add a source configuration
  app.post('/sources', async (c) => {
    const config = parseSourceConfiguration(await readJsonBody(c));

    if (!ctx.registry.forType(config.source_type)) {
      return c.json(
        {
          error: `No adapter handles source type "${config.source_type}"`,
          supported: ctx.registry.capabilities(),
        },
        400,
      );
    }
    if (getSourceConfiguration(ctx.db, config.name)) {
      return c.json({ error: 'Source already exists', name: config.name }, 409);
    }

    saveSourceConfiguration(ctx.db, config);
    return c.json(config, 201);
  });

  // GET /api/sources: configurations with fetch status
  app.get('/sources', (c) => {
    return c.json(listSourceStatuses(ctx.db));
  });

  // GET /api/status: scheduler state plus per-source fetch status
  app.get('/status', (c) => {
    return c.json({
      fetching: ctx.scheduler.running,
      scheduled: ctx.scheduler.started,
      sources: listSourceStatuses(ctx.db),
    });
  });

  // GET /api/sources/:name
  app.get('/sources/:name', (c) => {
    const name = c.req.param('name');
    const config = getSourceConfiguration(ctx.db, name);
    if (!config) {
      return c.json({ error: 'Source not found' }, 404);
    }
    return c.json({ ...config, status: getSourceStatus(ctx.db, name) });
  });

  // PATCH /api/sources/:name: merge fields over the stored configuration
  app.patch('/sources/:name', async (c) => {
    const name = c.req.param('name');
    const existing = getSourceConfiguration(ctx.db, name);
    if (!existing) {
      return c.json({ error: 'Source not found' }, 404);
    }

    const body = PatchBodySchema.safeParse(await readJsonBody(c));
    if (!body.success) {
      return c.json({ error: 'Expected a JSON object' }, 400);
    }
    const updated = parseSourceConfiguration({ ...existing, ...body.data, name });

    if (!ctx.registry.forType(updated.source_type)) {
      return c.json({ error: `No adapter handles source type "${updated.source_type}"` }, 400);
    }

    saveSourceConfiguration(ctx.db, updated);
    return c.json(updated);
  });

  // DELETE /api/sources/:name: stored records are kept
  app.delete('/sources/:name', (c) => {
    const deleted = deleteSourceConfiguration(ctx.db, c.req.param('name'));
    if (!deleted) {
      return c.json({ error: 'Source not found' }, 404);
    }
    return c.json({ ok: true });
  });

  // POST /api/sources/:name/test: configure the adapter and probe the source
  app.post('/sources/:name/test', async (c) => {
    const config = getSourceConfiguration(ctx.db, c.req.param('name'));
    if (!config) {
      return c.json({ error: 'Source not found' }, 404);
    }

    const adapter = ctx.registry.forType(config.source_type);
    if (!adapter) {
      return c.json({ ok: false, error: `No adapter handles source type "${config.source_type}"` });
    }
    if (!adapter.configure(buildAdapterOptions(config))) {
      return c.json({ ok: false, adapter: adapter.name, error: 'Adapter rejected configuration' });
    }

    const ok = await adapter.testConnection();
    return c.json({ ok, adapter: adapter.name });
  });

  return app;
}
