import type { ContentRecord, SourceConfiguration, SourceMetadata } from './records.js';

/**
 * Storage operations the aggregator depends on.
 */
export interface PersistenceGateway {
  getSourceConfigurationsByType(sourceType: string): SourceConfiguration[];
  getSourceMetadata(sourceId: string): SourceMetadata | null;
  saveSourceMetadata(metadata: SourceMetadata): boolean;
  /** Existence check used for dedup accounting. */
  getContentRecord(id: string): ContentRecord | null;
  /** Insert-or-replace by id. */
  saveContentRecord(record: ContentRecord): boolean;
}
