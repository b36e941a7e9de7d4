import { describe, it, expect } from 'vitest';
import {
  createContentRecord,
  parseSourceConfiguration,
  newSourceMetadata,
  nextFetchAt,
  isDue,
} from '../records.js';
import { RecordError } from '../../shared/errors.js';

const base = {
  id: 'r1',
  source: 'feed',
  source_type: 'rss',
  title: 'Hello',
  url: 'https://example.com/r1',
};

describe('createContentRecord', () => {
  it('fills defaults for optional fields', () => {
    const record = createContentRecord({ ...base, timestamp: new Date('2024-01-01T00:00:00Z') });
    expect(record.content).toBe('');
    expect(record.author).toBeNull();
    expect(record.tags).toEqual([]);
    expect(record.media_urls).toEqual([]);
    expect(record.metadata).toEqual({});
    expect(record.relevance_score).toBe(0);
    expect(record.embedding).toEqual([]);
    expect(record.timestamp.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('uses the current time when timestamp is absent', () => {
    const before = Date.now();
    const record = createContentRecord(base);
    expect(record.timestamp.getTime()).toBeGreaterThanOrEqual(before);
  });

  it('keeps explicit values', () => {
    const record = createContentRecord({
      ...base,
      author: 'ada',
      tags: ['a'],
      metadata: { score: 3 },
      relevance_score: 0.5,
    });
    expect(record.author).toBe('ada');
    expect(record.tags).toEqual(['a']);
    expect(record.metadata).toEqual({ score: 3 });
    expect(record.relevance_score).toBe(0.5);
  });

  it('rejects an empty title', () => {
    expect(() => createContentRecord({ ...base, title: '' })).toThrow(
      'Invalid content record: title: title cannot be empty',
    );
  });

  it('rejects an empty id with RecordError', () => {
    expect(() => createContentRecord({ ...base, id: '' })).toThrow(RecordError);
  });

  it('rejects an unparseable timestamp', () => {
    expect(() => createContentRecord({ ...base, timestamp: new Date('yesterday-ish') })).toThrow(RecordError);
  });
});

describe('parseSourceConfiguration', () => {
  it('applies defaults', () => {
    const config = parseSourceConfiguration({ name: 'hn', source_type: 'hackernews' });
    expect(config).toEqual({
      name: 'hn',
      source_type: 'hackernews',
      url: null,
      enabled: true,
      fetch_interval: 300,
      tags: [],
      config: {},
    });
  });

  it('rejects intervals below 60 seconds', () => {
    expect(() => parseSourceConfiguration({ name: 'x', source_type: 'rss', fetch_interval: 30 })).toThrow(
      'fetch_interval: fetch_interval must be an integer >= 60',
    );
  });

  it('rejects non-integer intervals', () => {
    expect(() => parseSourceConfiguration({ name: 'x', source_type: 'rss', fetch_interval: 90.5 })).toThrow(
      RecordError,
    );
  });

  it('rejects an invalid url', () => {
    expect(() => parseSourceConfiguration({ name: 'x', source_type: 'rss', url: 'not a url' })).toThrow(
      RecordError,
    );
  });

  it('rejects a missing name', () => {
    expect(() => parseSourceConfiguration({ source_type: 'rss' })).toThrow('name: name is required');
  });
});

describe('scheduling helpers', () => {
  const config = parseSourceConfiguration({ name: 'feed', source_type: 'rss', fetch_interval: 300 });
  const attempt = new Date('2024-06-01T12:00:00.000Z');

  it('treats a source without metadata as due', () => {
    expect(nextFetchAt(config, null)).toBeNull();
    expect(isDue(config, null, attempt)).toBe(true);
  });

  it('is due once the interval has elapsed since the last attempt', () => {
    const metadata = newSourceMetadata('feed', attempt);
    expect(nextFetchAt(config, metadata)?.toISOString()).toBe('2024-06-01T12:05:00.000Z');
    expect(isDue(config, metadata, new Date('2024-06-01T12:04:59.999Z'))).toBe(false);
    expect(isDue(config, metadata, new Date('2024-06-01T12:05:00.000Z'))).toBe(true);
  });

  it('starts metadata with zeroed counters', () => {
    expect(newSourceMetadata('feed', attempt)).toEqual({
      source_id: 'feed',
      last_fetch_attempt: attempt,
      last_fetch_success: null,
      last_item_count: 0,
      total_items_fetched: 0,
      error_count: 0,
      consecutive_errors: 0,
      last_error: null,
    });
  });
});
