import type Database from 'better-sqlite3';
import { nextFetchAt, type SourceConfiguration, type SourceMetadata } from './records.js';
import {
  getSourceConfiguration,
  getSourceMetadata,
  getSourceRecordCounts,
  listSourceConfigurations,
  listSourceMetadata,
} from './sourceDb.js';

export interface SourceStatus {
  name: string;
  source_type: string;
  enabled: boolean;
  fetch_interval: number;
  record_count: number;
  last_fetch_attempt: string | null;
  last_fetch_success: string | null;
  next_fetch_at: string | null;
  last_item_count: number;
  total_items_fetched: number;
  error_count: number;
  consecutive_errors: number;
  last_error: string | null;
}

export function toSourceStatus(
  config: SourceConfiguration,
  metadata: SourceMetadata | null,
  recordCount: number,
): SourceStatus {
  return {
    name: config.name,
    source_type: config.source_type,
    enabled: config.enabled,
    fetch_interval: config.fetch_interval,
    record_count: recordCount,
    last_fetch_attempt: metadata?.last_fetch_attempt.toISOString() ?? null,
    last_fetch_success: metadata?.last_fetch_success?.toISOString() ?? null,
    next_fetch_at: nextFetchAt(config, metadata)?.toISOString() ?? null,
    last_item_count: metadata?.last_item_count ?? 0,
    total_items_fetched: metadata?.total_items_fetched ?? 0,
    error_count: metadata?.error_count ?? 0,
    consecutive_errors: metadata?.consecutive_errors ?? 0,
    last_error: metadata?.last_error ?? null,
  };
}

/** Status of every configured source, ordered by name. */
export function listSourceStatuses(db: Database.Database): SourceStatus[] {
  const metadata = new Map(listSourceMetadata(db).map((m) => [m.source_id, m]));
  const counts = new Map(getSourceRecordCounts(db).map((row) => [row.source, row.count]));

  return listSourceConfigurations(db).map((config) =>
    toSourceStatus(config, metadata.get(config.name) ?? null, counts.get(config.name) ?? 0),
  );
}

export function getSourceStatus(db: Database.Database, name: string): SourceStatus | null {
  const config = getSourceConfiguration(db, name);
  if (!config) return null;
  const count = getSourceRecordCounts(db).find((row) => row.source === name)?.count ?? 0;
  return toSourceStatus(config, getSourceMetadata(db, name), count);
}
