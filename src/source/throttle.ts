export interface FetchThrottleOptions {
  intervalSec: number;
  backoffFactor?: number;
  /** Clock in epoch seconds. */
  now?: () => number;
}

const epochSeconds = (): number => Date.now() / 1000;

/**
 * Adapter-local interval gate with exponential backoff.
 *
 * After the n-th consecutive failure the next fetch waits
 * `interval * backoffFactor^n` seconds instead of `interval`. This is done by
 * pushing the "last fetch" marker forward, so `isDue()` stays a plain
 * interval comparison.
 */
export class FetchThrottle {
  private intervalSec: number;
  private readonly backoffFactor: number;
  private readonly now: () => number;
  private lastFetch = 0;
  private errorCount = 0;

  constructor(opts: FetchThrottleOptions) {
    this.intervalSec = opts.intervalSec;
    this.backoffFactor = opts.backoffFactor ?? 2;
    this.now = opts.now ?? epochSeconds;
  }

  get interval(): number {
    return this.intervalSec;
  }

  get errors(): number {
    return this.errorCount;
  }

  /** Epoch seconds; 0 when never fetched or reset. */
  get lastFetchAt(): number {
    return this.lastFetch;
  }

  setInterval(intervalSec: number): void {
    this.intervalSec = intervalSec;
  }

  isDue(): boolean {
    return this.now() - this.lastFetch >= this.intervalSec;
  }

  recordSuccess(): void {
    this.lastFetch = this.now();
    this.errorCount = 0;
  }

  /**
   * Register a failed fetch and return the backoff delay in seconds.
   */
  recordFailure(): number {
    this.errorCount++;
    const delay = this.intervalSec * this.backoffFactor ** this.errorCount;
    this.lastFetch = this.now() + delay - this.intervalSec;
    return delay;
  }

  reset(): void {
    this.lastFetch = 0;
  }
}
