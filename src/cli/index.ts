#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { getFeedloomDir, resolvePath } from '../shared/utils.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import {
  deleteSourceConfiguration,
  getDatabaseStats,
  getSourceConfiguration,
  listContentRecords,
  listSourceConfigurations,
  pruneContentRecords,
  saveSourceConfiguration,
  setSourceEnabled,
} from '../source/sourceDb.js';
import { parseSourceConfiguration } from '../source/records.js';
import { buildAdapterOptions } from '../source/aggregator.js';
import { listSourceStatuses } from '../source/status.js';
import { createContext, startServer } from '../api/server.js';
import { createDefaultRegistry } from '../source/registry.js';

const program = new Command();

program
  .name('feedloom')
  .description('Scheduled content fetching from RSS, Hacker News, Reddit and web pages')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = path.join(getFeedloomDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig(true);
    const dbPath = resolvePath(config.db.path);
    const db = initDb(dbPath);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${dbPath} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${dbPath} already up to date`);
    }

    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and adapters')
  .action(async () => {
    const results: string[] = [];

    try {
      const config = await loadConfig();
      results.push('Config: ok');

      const dbPath = resolvePath(config.db.path);
      if (!fs.existsSync(dbPath)) {
        results.push('DB: missing (run feedloom init)');
      } else {
        try {
          const db = initDb(dbPath);
          runMigrations(db);
          results.push('DB: ok');
          results.push(`Sources: ${listSourceConfigurations(db).length}`);
        } catch (err) {
          results.push(`DB: error (${errorMessage(err)})`);
        } finally {
          closeDb();
        }
      }

      const registry = createDefaultRegistry(config.fetch);
      results.push(`Adapters: ${registry.list().length} (${registry.capabilities().join(', ')})`);
    } catch (err) {
      results.push(`Config: error (${errorMessage(err)})`);
      process.exitCode = 1;
    }

    log(results.join(' | '));
  });

// === source ===
const sourceCmd = program.command('source').description('Manage source configurations');

sourceCmd
  .command('add <name> <type> [url]')
  .description('Add a source configuration')
  .option('-i, --interval <seconds>', 'Fetch interval in seconds', '300')
  .option('-t, --tag <tag>', 'Tag (repeatable)', collect, [])
  .option('-o, --option <key=value>', 'Adapter option, value parsed as JSON when possible (repeatable)', collect, [])
  .option('--disabled', 'Add the source disabled')
  .action(
    async (
      name: string,
      type: string,
      url: string | undefined,
      opts: { interval: string; tag: string[]; option: string[]; disabled?: boolean },
    ) => {
      const { db, config, cleanup } = await getDb();
      try {
        const source = parseSourceConfiguration({
          name,
          source_type: type,
          url,
          enabled: !opts.disabled,
          fetch_interval: parseInt(opts.interval, 10),
          tags: opts.tag,
          config: parseOptionPairs(opts.option),
        });

        const registry = createDefaultRegistry(config.fetch);
        if (!registry.forType(source.source_type)) {
          log(`No adapter handles source type "${source.source_type}".`);
          log(`Supported: ${registry.capabilities().join(', ')}`);
          process.exitCode = 1;
          return;
        }
        if (getSourceConfiguration(db, source.name)) {
          log(`Source already exists: ${source.name}`);
          process.exitCode = 1;
          return;
        }

        saveSourceConfiguration(db, source);
        log(`✓ Source added: ${source.name} (${source.source_type})`);
      } finally {
        cleanup();
      }
    },
  );

sourceCmd
  .command('list')
  .description('List source configurations with fetch status')
  .action(async () => {
    const { db, cleanup } = await getDb();
    try {
      const statuses = listSourceStatuses(db);
      if (statuses.length === 0) {
        log('No sources configured. Use: feedloom source add <name> <type> [url]');
        return;
      }

      for (const s of statuses) {
        const marker = s.enabled ? '●' : '○';
        const next = s.next_fetch_at ?? 'now';
        const errors = s.consecutive_errors > 0 ? `  errors: ${s.consecutive_errors} (${s.last_error ?? ''})` : '';
        log(
          `${marker} ${s.name.padEnd(24)} ${s.source_type.padEnd(12)} ${String(s.record_count).padStart(5)} items  next: ${next}${errors}`,
        );
      }
      log(`\n${statuses.length} sources total`);
    } finally {
      cleanup();
    }
  });

sourceCmd
  .command('remove <name>')
  .description('Remove a source configuration (stored items are kept)')
  .action(async (name: string) => {
    const { db, cleanup } = await getDb();
    try {
      if (deleteSourceConfiguration(db, name)) {
        log(`✓ Source removed: ${name}`);
      } else {
        log(`Source not found: ${name}`);
        process.exitCode = 1;
      }
    } finally {
      cleanup();
    }
  });

for (const [command, enabled] of [
  ['enable', true],
  ['disable', false],
] as const) {
  sourceCmd
    .command(`${command} <name>`)
    .description(`${enabled ? 'Enable' : 'Disable'} a source`)
    .action(async (name: string) => {
      const { db, cleanup } = await getDb();
      try {
        if (setSourceEnabled(db, name, enabled)) {
          log(`✓ Source ${command}d: ${name}`);
        } else {
          log(`Source not found: ${name}`);
          process.exitCode = 1;
        }
      } finally {
        cleanup();
      }
    });
}

sourceCmd
  .command('test <name>')
  .description('Check that a source is reachable')
  .action(async (name: string) => {
    const { db, config, cleanup } = await getDb();
    try {
      const source = getSourceConfiguration(db, name);
      if (!source) {
        log(`Source not found: ${name}`);
        process.exitCode = 1;
        return;
      }

      const adapter = createDefaultRegistry(config.fetch).forType(source.source_type);
      if (!adapter) {
        log(`No adapter handles source type "${source.source_type}"`);
        process.exitCode = 1;
        return;
      }
      if (!adapter.configure(buildAdapterOptions(source))) {
        log(`✗ ${adapter.name} rejected the configuration of ${name}`);
        process.exitCode = 1;
        return;
      }

      const ok = await adapter.testConnection();
      log(ok ? `✓ ${name} reachable via ${adapter.name}` : `✗ ${name} unreachable via ${adapter.name}`);
      if (!ok) process.exitCode = 1;
    } finally {
      cleanup();
    }
  });

// === fetch ===
program
  .command('fetch')
  .description('Run one fetch pass over all due sources')
  .action(async () => {
    const { db, config, cleanup } = await getDb();
    try {
      log('Fetching due sources...');
      const started = Date.now();
      const results = await createContext(db, config).scheduler.trigger();

      const names = Object.keys(results);
      if (names.length === 0) {
        log('No sources were due.');
        return;
      }
      for (const name of names) {
        log(`  ${name.padEnd(24)} ${results[name] ?? 0} new`);
      }
      const total = Object.values(results).reduce((a, b) => a + b, 0);
      log(`\nFetch complete: ${names.length} sources, ${total} new items, ${Date.now() - started}ms`);
    } finally {
      cleanup();
    }
  });

// === items ===
program
  .command('items')
  .description('List stored items, newest first')
  .option('-s, --source <name>', 'Filter by source name')
  .option('-t, --type <type>', 'Filter by source type')
  .option('-l, --limit <n>', 'Max items', '20')
  .option('--json', 'Print as JSON')
  .action(async (opts: { source?: string; type?: string; limit: string; json?: boolean }) => {
    const { db, cleanup } = await getDb();
    try {
      const items = listContentRecords(db, {
        source: opts.source,
        sourceType: opts.type,
        limit: parseInt(opts.limit, 10),
      });

      if (opts.json) {
        log(JSON.stringify(items, null, 2));
        return;
      }
      if (items.length === 0) {
        log('No items.');
        return;
      }
      for (const item of items) {
        log(`${item.timestamp.toISOString().slice(0, 16)}  [${item.source}] ${item.title}`);
        log(`                  ${item.url}`);
      }
    } finally {
      cleanup();
    }
  });

// === prune ===
program
  .command('prune')
  .description('Delete items older than the retention window')
  .option('-d, --days <n>', 'Retention in days (defaults to retention.days)')
  .action(async (opts: { days?: string }) => {
    const { db, config, cleanup } = await getDb();
    try {
      const days = opts.days !== undefined ? Number(opts.days) : config.retention.days;
      const deleted = pruneContentRecords(db, days);
      log(`✓ ${deleted} items older than ${days} days deleted`);
    } finally {
      cleanup();
    }
  });

// === stats ===
program
  .command('stats')
  .description('Show row counts')
  .action(async () => {
    const { db, cleanup } = await getDb();
    try {
      for (const [table, count] of Object.entries(getDatabaseStats(db))) {
        log(`${table.padEnd(24)} ${count}`);
      }
    } finally {
      cleanup();
    }
  });

// === server ===
program
  .command('server')
  .description('Start the API server and the fetch scheduler')
  .option('-p, --port <n>', 'Port number')
  .option('--no-schedule', 'Serve the API without the periodic fetch')
  .action(async (opts: { port?: string; schedule: boolean }) => {
    await startServer({
      port: opts.port ? parseInt(opts.port, 10) : undefined,
      schedule: opts.schedule,
    });
  });

// === Helper to get DB connection ===
async function getDb(): Promise<{
  db: ReturnType<typeof initDb>;
  config: Awaited<ReturnType<typeof loadConfig>>;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    log('Database not found. Run feedloom init first.');
    process.exit(1);
  }

  const db = initDb(dbPath);
  runMigrations(db);

  return { db, config, cleanup: closeDb };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseOptionPairs(pairs: string[]): Record<string, unknown> {
  const options: Record<string, unknown> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Expected key=value, got "${pair}"`);
    }
    const raw = pair.slice(eq + 1);
    options[pair.slice(0, eq)] = parseOptionValue(raw);
  }
  return options;
}

function parseOptionValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
