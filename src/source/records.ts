import { z } from 'zod';
import { RecordError } from '../shared/errors.js';

/** Lower bound on `fetch_interval`, in seconds. */
export const MIN_FETCH_INTERVAL_SEC = 60;
export const DEFAULT_FETCH_INTERVAL_SEC = 300;

const requiredText = (field: string) =>
  z.string({ required_error: `${field} is required` }).min(1, `${field} cannot be empty`);

const stringList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

export const ContentRecordSchema = z.object({
  id: requiredText('id'),
  source: requiredText('source'),
  source_type: requiredText('source_type'),
  title: requiredText('title'),
  content: z.string().default(''),
  timestamp: z.coerce
    .date()
    .optional()
    .transform((d) => d ?? new Date()),
  url: requiredText('url'),
  author: z
    .string()
    .nullish()
    .transform((v) => v ?? null),
  tags: stringList,
  media_urls: stringList,
  metadata: z
    .record(z.unknown())
    .nullish()
    .transform((v) => v ?? {}),
  relevance_score: z.number().default(0),
  embedding: z
    .array(z.number())
    .nullish()
    .transform((v) => v ?? []),
});

/** Normalized unit of content produced by any source adapter. */
export type ContentRecord = z.output<typeof ContentRecordSchema>;
export type ContentRecordInput = z.input<typeof ContentRecordSchema>;

export const SourceConfigurationSchema = z.object({
  name: requiredText('name'),
  source_type: requiredText('source_type'),
  url: z
    .string()
    .url()
    .nullish()
    .transform((v) => v ?? null),
  enabled: z.boolean().default(true),
  fetch_interval: z
    .number()
    .int()
    .min(MIN_FETCH_INTERVAL_SEC, `fetch_interval must be an integer >= ${MIN_FETCH_INTERVAL_SEC}`)
    .default(DEFAULT_FETCH_INTERVAL_SEC),
  tags: z.array(z.string()).default([]),
  config: z.record(z.unknown()).default({}),
});

export type SourceConfiguration = z.output<typeof SourceConfigurationSchema>;
export type SourceConfigurationInput = z.input<typeof SourceConfigurationSchema>;

/**
 * Runtime statistics for one source, keyed by the configuration name.
 * Only the aggregator writes these.
 */
export interface SourceMetadata {
  source_id: string;
  last_fetch_attempt: Date;
  last_fetch_success: Date | null;
  last_item_count: number;
  total_items_fetched: number;
  error_count: number;
  consecutive_errors: number;
  last_error: string | null;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function createContentRecord(input: ContentRecordInput): ContentRecord {
  const parsed = ContentRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new RecordError(`Invalid content record: ${describeIssues(parsed.error)}`, {
      id: input.id,
    });
  }
  return parsed.data;
}

export function parseSourceConfiguration(input: unknown): SourceConfiguration {
  const parsed = SourceConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    throw new RecordError(`Invalid source configuration: ${describeIssues(parsed.error)}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export function newSourceMetadata(sourceId: string, attemptedAt: Date): SourceMetadata {
  return {
    source_id: sourceId,
    last_fetch_attempt: attemptedAt,
    last_fetch_success: null,
    last_item_count: 0,
    total_items_fetched: 0,
    error_count: 0,
    consecutive_errors: 0,
    last_error: null,
  };
}

/**
 * When the source next becomes due. Sources without metadata are due now.
 */
export function nextFetchAt(config: SourceConfiguration, metadata: SourceMetadata | null): Date | null {
  if (!metadata) return null;
  return new Date(metadata.last_fetch_attempt.getTime() + config.fetch_interval * 1000);
}

export function isDue(config: SourceConfiguration, metadata: SourceMetadata | null, now: Date): boolean {
  const next = nextFetchAt(config, metadata);
  return next === null || now.getTime() >= next.getTime();
}
