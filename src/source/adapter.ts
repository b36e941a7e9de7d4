import type { ContentRecord } from './records.js';

/**
 * Options handed to an adapter: the configuration's adapter-specific `config`
 * overlaid with its `url` and `fetch_interval`.
 */
export type AdapterOptions = Record<string, unknown>;

/**
 * Source adapter interface. Implement for each external system.
 */
export interface SourceAdapter {
  /** Display name, used in logs. */
  readonly name: string;
  /** Tags matched against `SourceConfiguration.source_type`. */
  readonly capabilities: readonly string[];
  /** Apply settings; returns false when the options are invalid. */
  configure(options: AdapterOptions): boolean;
  /**
   * One fetch cycle. Ordinary network/parse failures resolve to an empty
   * list; callers still guard against rejections.
   */
  fetch(): Promise<ContentRecord[]>;
  testConnection(): Promise<boolean>;
  /** Clear the adapter's own interval gate so the next fetch runs. */
  resetThrottle?(): void;
}
