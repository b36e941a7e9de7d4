import type { z } from 'zod';
import type { Logger } from 'pino';
import type { AdapterOptions, SourceAdapter } from './adapter.js';
import type { ContentRecord } from './records.js';
import { DEFAULT_FETCH_INTERVAL_SEC } from './records.js';
import { FetchThrottle } from './throttle.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface AdapterRuntime {
  timeoutMs: number;
  userAgent: string;
  backoffFactor: number;
  /** Clock in epoch seconds, for the throttle. */
  now?: () => number;
}

/**
 * Shared plumbing for the built-in adapters: option validation with a zod
 * schema, the local interval/backoff gate, and failure containment so that
 * `fetch()` resolves to `[]` on ordinary errors.
 */
export abstract class BaseSourceAdapter<TOptions> implements SourceAdapter {
  abstract readonly name: string;
  abstract readonly capabilities: readonly string[];
  protected abstract readonly optionsSchema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;

  protected options: TOptions | null = null;
  protected readonly throttle: FetchThrottle;
  protected readonly log: Logger;

  constructor(protected readonly runtime: AdapterRuntime) {
    this.throttle = new FetchThrottle({
      intervalSec: DEFAULT_FETCH_INTERVAL_SEC,
      backoffFactor: runtime.backoffFactor,
      now: runtime.now,
    });
    this.log = logger.child({ adapter: this.constructor.name });
  }

  configure(raw: AdapterOptions): boolean {
    const parsed = this.optionsSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ errors: parsed.error.flatten().fieldErrors }, 'Adapter rejected configuration');
      return false;
    }
    this.options = parsed.data;

    const interval = raw['fetch_interval'];
    this.throttle.setInterval(
      typeof interval === 'number' && interval > 0 ? interval : DEFAULT_FETCH_INTERVAL_SEC,
    );
    return true;
  }

  async fetch(): Promise<ContentRecord[]> {
    const options = this.options;
    if (!options) {
      this.log.error('Adapter not configured');
      return [];
    }
    if (!this.throttle.isDue()) {
      this.log.debug({ lastFetchAt: this.throttle.lastFetchAt }, 'Adapter throttled');
      return [];
    }

    try {
      const records = await this.fetchRecords(options);
      this.throttle.recordSuccess();
      return records;
    } catch (err) {
      const delaySec = this.throttle.recordFailure();
      this.log.error(
        { error: errorMessage(err), errors: this.throttle.errors, backoffSec: delaySec },
        'Fetch failed, backing off',
      );
      return [];
    }
  }

  async testConnection(): Promise<boolean> {
    if (!this.options) return false;
    try {
      return await this.probe(this.options);
    } catch (err) {
      this.log.warn({ error: errorMessage(err) }, 'Connection test failed');
      return false;
    }
  }

  resetThrottle(): void {
    this.throttle.reset();
  }

  protected abstract fetchRecords(options: TOptions): Promise<ContentRecord[]>;

  protected abstract probe(options: TOptions): Promise<boolean>;
}
