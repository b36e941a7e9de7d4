import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { PersistenceGateway } from './gateway.js';
import {
  ContentRecordSchema,
  SourceConfigurationSchema,
  type ContentRecord,
  type SourceConfiguration,
  type SourceMetadata,
} from './records.js';
import { DbError, RecordError, errorMessage } from '../shared/errors.js';
import { parseDate } from '../shared/utils.js';

// ================================================================
// Row shapes
// ================================================================

interface SourceConfigurationRow {
  name: string;
  source_type: string;
  url: string | null;
  enabled: number;
  fetch_interval: number;
  tags: string;
  config: string;
}

interface SourceMetadataRow {
  source_id: string;
  last_fetch_attempt: string;
  last_fetch_success: string | null;
  last_item_count: number;
  total_items_fetched: number;
  error_count: number;
  consecutive_errors: number;
  last_error: string | null;
}

interface ContentRecordRow {
  id: string;
  source: string;
  source_type: string;
  title: string;
  content: string;
  author: string | null;
  timestamp: string;
  url: string;
  tags: string;
  media_urls: string;
  metadata: string;
  relevance_score: number;
  embedding: string;
}

const StringListColumn = z.array(z.string());
const NumberListColumn = z.array(z.number());
const ObjectColumn = z.record(z.unknown());

function parseJsonColumn<T>(text: string, schema: z.ZodType<T>, column: string): T {
  try {
    return schema.parse(JSON.parse(text));
  } catch (err) {
    throw new DbError(`Corrupt JSON in column ${column}`, { column, cause: errorMessage(err) });
  }
}

function toSourceConfiguration(row: SourceConfigurationRow): SourceConfiguration {
  return SourceConfigurationSchema.parse({
    name: row.name,
    source_type: row.source_type,
    url: row.url,
    enabled: row.enabled === 1,
    fetch_interval: row.fetch_interval,
    tags: parseJsonColumn(row.tags, StringListColumn, 'tags'),
    config: parseJsonColumn(row.config, ObjectColumn, 'config'),
  });
}

function toSourceMetadata(row: SourceMetadataRow): SourceMetadata {
  const attempt = parseDate(row.last_fetch_attempt);
  if (!attempt) {
    throw new DbError(`Invalid last_fetch_attempt for source ${row.source_id}`, {
      source_id: row.source_id,
    });
  }
  return {
    source_id: row.source_id,
    last_fetch_attempt: attempt,
    last_fetch_success: parseDate(row.last_fetch_success),
    last_item_count: row.last_item_count,
    total_items_fetched: row.total_items_fetched,
    error_count: row.error_count,
    consecutive_errors: row.consecutive_errors,
    last_error: row.last_error,
  };
}

function toContentRecord(row: ContentRecordRow): ContentRecord {
  return ContentRecordSchema.parse({
    id: row.id,
    source: row.source,
    source_type: row.source_type,
    title: row.title,
    content: row.content,
    author: row.author,
    timestamp: new Date(row.timestamp),
    url: row.url,
    tags: parseJsonColumn(row.tags, StringListColumn, 'tags'),
    media_urls: parseJsonColumn(row.media_urls, StringListColumn, 'media_urls'),
    metadata: parseJsonColumn(row.metadata, ObjectColumn, 'metadata'),
    relevance_score: row.relevance_score,
    embedding: parseJsonColumn(row.embedding, NumberListColumn, 'embedding'),
  });
}

function wrap<T>(action: string, details: Record<string, unknown>, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof DbError) throw err;
    throw new DbError(`Failed to ${action}: ${errorMessage(err)}`, details);
  }
}

// ================================================================
// Source configurations
// ================================================================

export function saveSourceConfiguration(db: Database.Database, config: SourceConfiguration): boolean {
  return wrap('save source configuration', { name: config.name }, () => {
    const result = db
      .prepare(
        `INSERT INTO source_configurations (name, source_type, url, enabled, fetch_interval, tags, config)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET
           source_type = excluded.source_type,
           url = excluded.url,
           enabled = excluded.enabled,
           fetch_interval = excluded.fetch_interval,
           tags = excluded.tags,
           config = excluded.config,
           updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`,
      )
      .run(
        config.name,
        config.source_type,
        config.url,
        config.enabled ? 1 : 0,
        config.fetch_interval,
        JSON.stringify(config.tags),
        JSON.stringify(config.config),
      );
    return result.changes > 0;
  });
}

export function getSourceConfiguration(db: Database.Database, name: string): SourceConfiguration | null {
  const row = db.prepare('SELECT * FROM source_configurations WHERE name = ?').get(name) as
    | SourceConfigurationRow
    | undefined;
  return row ? toSourceConfiguration(row) : null;
}

export function listSourceConfigurations(
  db: Database.Database,
  opts: { enabledOnly?: boolean } = {},
): SourceConfiguration[] {
  const where = opts.enabledOnly ? 'WHERE enabled = 1' : '';
  const rows = db
    .prepare(`SELECT * FROM source_configurations ${where} ORDER BY name`)
    .all() as SourceConfigurationRow[];
  return rows.map(toSourceConfiguration);
}

export function getSourceConfigurationsByType(
  db: Database.Database,
  sourceType: string,
): SourceConfiguration[] {
  const rows = db
    .prepare('SELECT * FROM source_configurations WHERE source_type = ? ORDER BY name')
    .all(sourceType) as SourceConfigurationRow[];
  return rows.map(toSourceConfiguration);
}

export function setSourceEnabled(db: Database.Database, name: string, enabled: boolean): boolean {
  const result = db
    .prepare(
      `UPDATE source_configurations
       SET enabled = ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
       WHERE name = ?`,
    )
    .run(enabled ? 1 : 0, name);
  return result.changes > 0;
}

/**
 * Remove a configuration and its statistics. Stored records are kept.
 */
export function deleteSourceConfiguration(db: Database.Database, name: string): boolean {
  const remove = db.transaction(() => {
    db.prepare('DELETE FROM source_metadata WHERE source_id = ?').run(name);
    return db.prepare('DELETE FROM source_configurations WHERE name = ?').run(name).changes > 0;
  });
  return remove();
}

// ================================================================
// Source metadata
// ================================================================

export function saveSourceMetadata(db: Database.Database, metadata: SourceMetadata): boolean {
  return wrap('save source metadata', { source_id: metadata.source_id }, () => {
    const result = db
      .prepare(
        `INSERT INTO source_metadata
           (source_id, last_fetch_attempt, last_fetch_success, last_item_count,
            total_items_fetched, error_count, consecutive_errors, last_error)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(source_id) DO UPDATE SET
           last_fetch_attempt = excluded.last_fetch_attempt,
           last_fetch_success = excluded.last_fetch_success,
           last_item_count = excluded.last_item_count,
           total_items_fetched = excluded.total_items_fetched,
           error_count = excluded.error_count,
           consecutive_errors = excluded.consecutive_errors,
           last_error = excluded.last_error,
           updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`,
      )
      .run(
        metadata.source_id,
        metadata.last_fetch_attempt.toISOString(),
        metadata.last_fetch_success?.toISOString() ?? null,
        metadata.last_item_count,
        metadata.total_items_fetched,
        metadata.error_count,
        metadata.consecutive_errors,
        metadata.last_error,
      );
    return result.changes > 0;
  });
}

export function getSourceMetadata(db: Database.Database, sourceId: string): SourceMetadata | null {
  const row = db.prepare('SELECT * FROM source_metadata WHERE source_id = ?').get(sourceId) as
    | SourceMetadataRow
    | undefined;
  return row ? toSourceMetadata(row) : null;
}

export function listSourceMetadata(db: Database.Database): SourceMetadata[] {
  const rows = db.prepare('SELECT * FROM source_metadata ORDER BY source_id').all() as SourceMetadataRow[];
  return rows.map(toSourceMetadata);
}

// ================================================================
// Content records
// ================================================================

export function saveContentRecord(db: Database.Database, record: ContentRecord): boolean {
  return wrap('save content record', { id: record.id }, () => {
    const result = db
      .prepare(
        `INSERT INTO content_records
           (id, source, source_type, title, content, author, timestamp, url,
            tags, media_urls, metadata, relevance_score, embedding)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           source = excluded.source,
           source_type = excluded.source_type,
           title = excluded.title,
           content = excluded.content,
           author = excluded.author,
           timestamp = excluded.timestamp,
           url = excluded.url,
           tags = excluded.tags,
           media_urls = excluded.media_urls,
           metadata = excluded.metadata,
           relevance_score = excluded.relevance_score,
           embedding = excluded.embedding`,
      )
      .run(
        record.id,
        record.source,
        record.source_type,
        record.title,
        record.content,
        record.author,
        record.timestamp.toISOString(),
        record.url,
        JSON.stringify(record.tags),
        JSON.stringify(record.media_urls),
        JSON.stringify(record.metadata),
        record.relevance_score,
        JSON.stringify(record.embedding),
      );
    return result.changes > 0;
  });
}

export function getContentRecord(db: Database.Database, id: string): ContentRecord | null {
  const row = db.prepare('SELECT * FROM content_records WHERE id = ?').get(id) as
    | ContentRecordRow
    | undefined;
  return row ? toContentRecord(row) : null;
}

export interface ListRecordsOptions {
  source?: string;
  sourceType?: string;
  limit?: number;
  offset?: number;
}

/**
 * Records newest first, optionally filtered by source name and/or type.
 */
export function listContentRecords(db: Database.Database, opts: ListRecordsOptions = {}): ContentRecord[] {
  const conditions: string[] = [];
  const params: Array<string | number> = [];

  if (opts.source) {
    conditions.push('source = ?');
    params.push(opts.source);
  }
  if (opts.sourceType) {
    conditions.push('source_type = ?');
    params.push(opts.sourceType);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  params.push(opts.limit ?? 100, opts.offset ?? 0);

  const rows = db
    .prepare(`SELECT * FROM content_records ${where} ORDER BY timestamp DESC, id LIMIT ? OFFSET ?`)
    .all(...params) as ContentRecordRow[];
  return rows.map(toContentRecord);
}

export function deleteContentRecord(db: Database.Database, id: string): boolean {
  return db.prepare('DELETE FROM content_records WHERE id = ?').run(id).changes > 0;
}

/**
 * Delete records whose timestamp is more than `days` days before `now`.
 */
/** Whole days, capped so the cutoff stays a valid date. */
const RetentionDaysSchema = z.number().int().min(0).max(36_500);

export function pruneContentRecords(db: Database.Database, days: number, now: Date = new Date()): number {
  const parsed = RetentionDaysSchema.safeParse(days);
  if (!parsed.success) {
    throw new RecordError(`Invalid retention days: ${days}`, { days });
  }
  const cutoff = new Date(now.getTime() - days * 86_400_000).toISOString();
  return db.prepare('DELETE FROM content_records WHERE timestamp < ?').run(cutoff).changes;
}

export function getSourceRecordCounts(db: Database.Database): Array<{ source: string; count: number }> {
  return db
    .prepare('SELECT source, COUNT(*) AS count FROM content_records GROUP BY source ORDER BY source')
    .all() as Array<{ source: string; count: number }>;
}

export function getDatabaseStats(db: Database.Database): Record<string, number> {
  const stats: Record<string, number> = {};
  for (const table of ['content_records', 'source_configurations', 'source_metadata']) {
    const row = db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number };
    stats[table] = row.count;
  }
  return stats;
}

// ================================================================
// Gateway
// ================================================================

export function createSqliteGateway(db: Database.Database): PersistenceGateway {
  return {
    getSourceConfigurationsByType: (sourceType) => getSourceConfigurationsByType(db, sourceType),
    getSourceMetadata: (sourceId) => getSourceMetadata(db, sourceId),
    saveSourceMetadata: (metadata) => saveSourceMetadata(db, metadata),
    getContentRecord: (id) => getContentRecord(db, id),
    saveContentRecord: (record) => saveContentRecord(db, record),
  };
}
