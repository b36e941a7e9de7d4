import { describe, it, expect, vi, afterEach } from 'vitest';
import { RssAdapter } from '../rss.js';
import { stalledBody } from './fakes.js';

const SAMPLE_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Test Feed</title>
    <link>https://example.com</link>
    <item>
      <title>Article One</title>
      <link>https://example.com/article-1</link>
      <guid>guid-1</guid>
      <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
      <description>First article excerpt</description>
      <dc:creator>Ada</dc:creator>
      <category>tech</category>
      <enclosure url="https://example.com/episode.mp3" type="audio/mpeg" length="1"/>
    </item>
    <item>
      <title>Article Two</title>
      <link>https://example.com/article-2</link>
      <guid>guid-2</guid>
      <description>Second article excerpt</description>
      <content:encoded><![CDATA[<p>Full content of article two</p>]]></content:encoded>
    </item>
    <item>
      <title></title>
      <link>https://example.com/no-title</link>
    </item>
    <item>
      <title>No Link Or Guid</title>
    </item>
  </channel>
</rss>`;

const SAMPLE_ATOM = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Feed</title>
  <entry>
    <title>Atom Entry</title>
    <link href="https://example.com/atom-1"/>
    <id>atom-1</id>
    <updated>2024-01-15T10:00:00Z</updated>
    <summary>Atom summary</summary>
  </entry>
</feed>`;

const FEED_URL = 'https://example.com/feed';

function makeAdapter(options: Record<string, unknown> = {}): RssAdapter {
  const adapter = new RssAdapter({ timeoutMs: 1000, userAgent: 'test-agent', backoffFactor: 2 });
  adapter.configure({ url: FEED_URL, fetch_interval: 300, ...options });
  return adapter;
}

describe('RssAdapter', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('maps RSS items to records', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response(SAMPLE_RSS, { status: 200, headers: { 'Content-Type': 'application/rss+xml' } }),
    );

    const records = await makeAdapter().fetch();

    // The item without guid or link is skipped
    expect(records.map((r) => r.id)).toEqual(['guid-1', 'guid-2', 'https://example.com/no-title']);

    const [first, second, third] = records;
    expect(first?.title).toBe('Article One');
    expect(first?.url).toBe('https://example.com/article-1');
    expect(first?.content).toBe('First article excerpt');
    expect(first?.timestamp.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(first?.author).toBe('Ada');
    expect(first?.tags).toEqual(['tech']);
    expect(first?.media_urls).toEqual(['https://example.com/episode.mp3']);
    expect(first?.source).toBe(FEED_URL);
    expect(first?.source_type).toBe('rss');
    expect(first?.metadata).toEqual({ feed_url: FEED_URL });

    expect(second?.content).toBe('<p>Full content of article two</p>');
    expect(third?.title).toBe('No Title');
  });

  it('parses Atom feeds', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(SAMPLE_ATOM, { status: 200 }));

    const records = await makeAdapter().fetch();

    expect(records).toHaveLength(1);
    expect(records[0]?.id).toBe('atom-1');
    expect(records[0]?.title).toBe('Atom Entry');
    expect(records[0]?.url).toBe('https://example.com/atom-1');
    expect(records[0]?.content).toBe('Atom summary');
    expect(records[0]?.timestamp.toISOString()).toBe('2024-01-15T10:00:00.000Z');
  });

  it('honours max_items', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(SAMPLE_RSS, { status: 200 }));

    const records = await makeAdapter({ max_items: 1 }).fetch();
    expect(records.map((r) => r.id)).toEqual(['guid-1']);
  });

  it('sends the configured user agent', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(SAMPLE_RSS, { status: 200 }));
    globalThis.fetch = mockFetch;

    await makeAdapter().fetch();

    expect(mockFetch.mock.calls[0][0]).toBe(FEED_URL);
    expect(mockFetch.mock.calls[0][1].headers['User-Agent']).toBe('test-agent');
  });

  it('returns no records on a non-ok response', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Not Found', { status: 404 }));
    expect(await makeAdapter().fetch()).toEqual([]);
  });

  it('returns no records on a network error', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));
    expect(await makeAdapter().fetch()).toEqual([]);
  });

  it('gives up on a feed whose body stalls', async () => {
    globalThis.fetch = vi.fn().mockImplementation((_url: string, init?: RequestInit) => {
      return Promise.resolve(new Response(stalledBody('<rss>', init?.signal), { status: 200 }));
    });
    const adapter = new RssAdapter({ timeoutMs: 20, userAgent: 'test-agent', backoffFactor: 2 });
    adapter.configure({ url: FEED_URL });

    expect(await adapter.fetch()).toEqual([]);
  });

  it('returns no records for malformed XML', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<<not xml', { status: 200 }));
    expect(await makeAdapter().fetch()).toEqual([]);
  });

  it('rejects non-http urls', () => {
    const adapter = new RssAdapter({ timeoutMs: 1000, userAgent: 'test-agent', backoffFactor: 2 });
    expect(adapter.configure({ url: 'ftp://example.com/feed' })).toBe(false);
    expect(adapter.configure({})).toBe(false);
  });

  it('tests the connection with a HEAD request', async () => {
    const mockFetch = vi.fn().mockImplementation(() => Promise.resolve(new Response(null, { status: 200 })));
    globalThis.fetch = mockFetch;

    expect(await makeAdapter().testConnection()).toBe(true);
    expect(mockFetch.mock.calls[0][1].method).toBe('HEAD');
  });
});
