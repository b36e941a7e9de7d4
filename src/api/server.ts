import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { loadConfig } from '../shared/config.js';
import { FeedloomError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { resolvePath } from '../shared/utils.js';
import { ContentAggregator } from '../source/aggregator.js';
import { createDefaultRegistry, type AdapterRegistry } from '../source/registry.js';
import { createSqliteGateway } from '../source/sourceDb.js';
import { FetchScheduler } from '../schedule/scheduler.js';
import { sourceRoutes } from './routes/sources.js';
import { fetchRoutes } from './routes/fetch.js';
import { itemRoutes } from './routes/items.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  db: Database.Database;
  config: Config;
  registry: AdapterRegistry;
  scheduler: FetchScheduler;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', sourceRoutes(ctx));
  app.route('/api', fetchRoutes(ctx));
  app.route('/api', itemRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof FeedloomError) {
      const status = errorCodeToHttpStatus(err.code);
      return c.json({ error: err.message, code: err.code, details: err.details }, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'RECORD_ERROR':
      return 400;
    case 'SOURCE_ERROR':
    case 'FETCH_ERROR':
      return 502;
    default:
      return 500;
  }
}

/**
 * Wire the database, adapters and aggregator for a long-running process.
 */
export function createContext(db: Database.Database, config: Config): AppContext {
  const registry = createDefaultRegistry(config.fetch);
  const aggregator = new ContentAggregator({ registry, gateway: createSqliteGateway(db) });
  return { db, config, registry, scheduler: new FetchScheduler(aggregator) };
}

export async function startServer(opts: { port?: number; schedule?: boolean } = {}): Promise<void> {
  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);

  const ctx = createContext(db, config);
  const app = createApp(ctx);

  logger.info({ port, host }, 'Starting Feedloom server');
  serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Server listening');
  });

  if (opts.schedule ?? true) {
    ctx.scheduler.start({
      cronExpression: config.schedule.fetch_cron,
      runOnStart: config.schedule.run_on_start,
    });
  }

  const shutdown = (): void => {
    logger.info('Shutting down...');
    ctx.scheduler.stop();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
