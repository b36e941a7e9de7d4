import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../migrate.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
});

afterEach(() => {
  db.close();
});

describe('runMigrations', () => {
  it('creates all tables from 001_init.sql', () => {
    const { applied } = runMigrations(db);
    expect(applied).toContain('001_init.sql');

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(tables.map((t) => t.name)).toEqual([
      '_migrations',
      'content_records',
      'source_configurations',
      'source_metadata',
    ]);
  });

  it('is idempotent (second run applies nothing)', () => {
    const first = runMigrations(db);
    expect(first.applied.length).toBeGreaterThan(0);

    const second = runMigrations(db);
    expect(second.applied).toEqual([]);
    expect(second.skipped).toContain('001_init.sql');
  });

  it('records applied migrations in _migrations table', () => {
    runMigrations(db);

    const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
    expect(rows.some((r) => r.name === '001_init.sql')).toBe(true);
  });

  it('creates lookup indexes', () => {
    runMigrations(db);

    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND name LIKE 'idx_%' ORDER BY name")
      .all() as Array<{ name: string }>;

    expect(indexes.map((i) => i.name)).toEqual([
      'idx_records_source',
      'idx_records_source_type',
      'idx_records_timestamp',
      'idx_source_configurations_type',
    ]);
  });
});
