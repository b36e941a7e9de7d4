import type { AdapterOptions, SourceAdapter } from './adapter.js';
import type { PersistenceGateway } from './gateway.js';
import type { AdapterRegistry } from './registry.js';
import {
  isDue,
  newSourceMetadata,
  type ContentRecord,
  type SourceConfiguration,
  type SourceMetadata,
} from './records.js';
import { errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface AggregatorDeps {
  registry: AdapterRegistry;
  gateway: PersistenceGateway;
  /** Injectable clock. */
  now?: () => Date;
}

/** Configuration name → number of newly inserted records. */
export type FetchSummary = Record<string, number>;

/**
 * Merge a configuration's adapter-specific options with its url and interval.
 */
export function buildAdapterOptions(config: SourceConfiguration): AdapterOptions {
  const options: AdapterOptions = { ...config.config };
  if (config.url) {
    options['url'] = config.url;
  }
  options['fetch_interval'] = config.fetch_interval;
  return options;
}

/**
 * Drives due sources through their adapters, one at a time.
 *
 * A failure in one source is recorded in that source's metadata and never
 * reaches the caller or the sources after it. Concurrent `fetchAll` calls are
 * not coordinated here; see FetchScheduler.
 */
export class ContentAggregator {
  private readonly registry: AdapterRegistry;
  private readonly gateway: PersistenceGateway;
  private readonly now: () => Date;

  constructor(deps: AggregatorDeps) {
    this.registry = deps.registry;
    this.gateway = deps.gateway;
    this.now = deps.now ?? (() => new Date());
  }

  async fetchAll(): Promise<FetchSummary> {
    const runLog = logger.child({ run: generateId(8) });
    const startTime = Date.now();
    const results: FetchSummary = {};
    const processed = new Set<string>();
    let skipped = 0;

    for (const adapter of this.registry.list()) {
      const matching: SourceConfiguration[] = [];
      for (const cap of adapter.capabilities) {
        matching.push(...this.gateway.getSourceConfigurationsByType(cap));
      }

      for (const config of matching) {
        if (processed.has(config.name)) continue;
        if (!config.enabled) continue;

        const count = await this.processSource(config, adapter);
        if (count !== null) {
          results[config.name] = count;
        } else {
          skipped++;
        }
        processed.add(config.name);
      }
    }

    runLog.info(
      {
        sources: Object.keys(results).length,
        skipped,
        itemsNew: Object.values(results).reduce((a, b) => a + b, 0),
        durationMs: Date.now() - startTime,
      },
      'Fetch pass complete',
    );
    return results;
  }

  /**
   * Returns the number of new records, 0 on failure, or null when the source
   * is not due yet.
   */
  async processSource(config: SourceConfiguration, adapter: SourceAdapter): Promise<number | null> {
    const log = logger.child({ source: config.name, sourceType: config.source_type });
    let metadata: SourceMetadata | null = null;
    const now = this.now();

    try {
      metadata = this.gateway.getSourceMetadata(config.name);
      if (!isDue(config, metadata, now)) {
        return null;
      }

      log.info({ adapter: adapter.name }, 'Fetching source');

      if (!adapter.configure(buildAdapterOptions(config))) {
        log.error({ adapter: adapter.name }, 'Adapter rejected source configuration');
        this.recordFailure(config, metadata, now, `Adapter ${adapter.name} rejected configuration`);
        return 0;
      }

      // The aggregator owns scheduling; the adapter's own interval gate must not apply.
      adapter.resetThrottle?.();

      if (metadata) {
        metadata.last_fetch_attempt = now;
      } else {
        metadata = newSourceMetadata(config.name, now);
      }
      this.gateway.saveSourceMetadata(metadata);

      const records = await adapter.fetch();
      const saved = this.saveItems(records, config);

      metadata.last_fetch_success = now;
      metadata.last_item_count = records.length;
      metadata.total_items_fetched += records.length;
      metadata.error_count = 0;
      metadata.consecutive_errors = 0;
      metadata.last_error = null;
      this.gateway.saveSourceMetadata(metadata);

      log.info({ fetched: records.length, new: saved }, 'Source fetched');
      return saved;
    } catch (err) {
      const message = errorMessage(err);
      log.error({ error: message }, 'Error processing source');
      try {
        this.recordFailure(config, metadata, now, message);
      } catch (saveErr) {
        log.error({ error: errorMessage(saveErr) }, 'Failed to record source error');
      }
      return 0;
    }
  }

  /**
   * Upsert every record under the configuration's name. Returns how many did
   * not exist before; existing records are still overwritten.
   */
  saveItems(records: ContentRecord[], config: SourceConfiguration): number {
    let count = 0;
    for (const record of records) {
      record.source = config.name;
      const existed = this.gateway.getContentRecord(record.id) !== null;
      if (this.gateway.saveContentRecord(record) && !existed) {
        count++;
      }
    }
    return count;
  }

  private recordFailure(
    config: SourceConfiguration,
    metadata: SourceMetadata | null,
    now: Date,
    message: string,
  ): void {
    const updated = metadata ?? newSourceMetadata(config.name, now);
    updated.last_fetch_attempt = now;
    updated.error_count++;
    updated.consecutive_errors++;
    updated.last_error = message;
    this.gateway.saveSourceMetadata(updated);
  }
}
