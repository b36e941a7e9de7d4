/**
 * Periodic trigger for fetch passes. Started by `feedloom server`.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { ContentAggregator, FetchSummary } from '../source/aggregator.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface SchedulerOptions {
  cronExpression: string;
  runOnStart?: boolean;
}

/**
 * Wraps an aggregator so that at most one fetch pass runs at a time. A trigger
 * that arrives while a pass is in flight receives that pass's result.
 */
export class FetchScheduler {
  private inFlight: Promise<FetchSummary> | null = null;
  private task: ScheduledTask | null = null;

  constructor(private readonly aggregator: ContentAggregator) {}

  get running(): boolean {
    return this.inFlight !== null;
  }

  get started(): boolean {
    return this.task !== null;
  }

  trigger(): Promise<FetchSummary> {
    if (this.inFlight) {
      logger.debug('Fetch pass already running, joining it');
      return this.inFlight;
    }

    this.inFlight = this.aggregator.fetchAll().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  start(opts: SchedulerOptions): void {
    if (this.task) return;

    if (!cron.validate(opts.cronExpression)) {
      throw new ConfigError(`Invalid fetch_cron expression: ${opts.cronExpression}`, {
        fetch_cron: opts.cronExpression,
      });
    }

    this.task = cron.schedule(opts.cronExpression, () => {
      void this.runScheduled();
    });

    logger.info({ fetch_cron: opts.cronExpression }, 'Scheduler started');

    if (opts.runOnStart) {
      void this.runScheduled();
    }
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info('Scheduler stopped');
  }

  private async runScheduled(): Promise<void> {
    try {
      const summary = await this.trigger();
      logger.debug({ summary }, 'Scheduled fetch complete');
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Scheduled fetch failed');
    }
  }
}
