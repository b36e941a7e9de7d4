import type { SourceAdapter } from './adapter.js';
import type { AdapterRuntime } from './baseAdapter.js';
import type { FetchConfig } from '../shared/config.js';
import { RssAdapter } from './rss.js';
import { HackerNewsAdapter } from './hackernews.js';
import { RedditAdapter } from './reddit.js';
import { WebScraperAdapter } from './scraper.js';
import { SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Explicit adapter registry: maps capability tags to adapter instances.
 * Iteration order is registration order.
 */
export class AdapterRegistry {
  private readonly adapters: SourceAdapter[] = [];
  private readonly byCapability = new Map<string, SourceAdapter>();

  register(adapter: SourceAdapter): this {
    for (const cap of adapter.capabilities) {
      const owner = this.byCapability.get(cap);
      if (owner) {
        throw new SourceError(`Capability "${cap}" already registered by ${owner.name}`, {
          capability: cap,
          adapter: adapter.name,
        });
      }
    }
    for (const cap of adapter.capabilities) {
      this.byCapability.set(cap, adapter);
    }
    this.adapters.push(adapter);
    logger.debug({ adapter: adapter.name, capabilities: adapter.capabilities }, 'Adapter registered');
    return this;
  }

  list(): readonly SourceAdapter[] {
    return this.adapters;
  }

  forType(sourceType: string): SourceAdapter | undefined {
    return this.byCapability.get(sourceType);
  }

  capabilities(): string[] {
    return [...this.byCapability.keys()];
  }
}

export function createDefaultRegistry(fetchConfig: FetchConfig): AdapterRegistry {
  const runtime: AdapterRuntime = {
    timeoutMs: fetchConfig.timeout_ms,
    userAgent: fetchConfig.user_agent,
    backoffFactor: fetchConfig.backoff_factor,
  };

  return new AdapterRegistry()
    .register(new RssAdapter(runtime))
    .register(new HackerNewsAdapter(runtime))
    .register(new RedditAdapter(runtime))
    .register(new WebScraperAdapter(runtime));
}
