import { describe, it, expect, vi, afterEach } from 'vitest';
import { JSDOM } from 'jsdom';
import { WebScraperAdapter, elementText, extractRecords } from '../scraper.js';
import { sha1 } from '../../shared/utils.js';

const PAGE = `<!DOCTYPE html>
<html>
  <head><title>Blog</title></head>
  <body>
    <article>
      <h2>First</h2>
      <p>Alpha text</p>
    </article>
    <article>
      <p>No heading here</p>
    </article>
    <article>   </article>
  </body>
</html>`;

const PAGE_URL = 'https://example.com/blog';

describe('elementText', () => {
  it('trims lines and drops blank ones', () => {
    const { document } = new JSDOM('<div>\n   one  \n\n  two\n</div>').window;
    const div = document.querySelector('div');
    expect(div ? elementText(div) : null).toBe('one\ntwo');
  });
});

describe('extractRecords', () => {
  it('creates a record per matching element with text', () => {
    const records = extractRecords(PAGE, { url: PAGE_URL, content_selector: 'article', title_selector: 'h2' });

    expect(records).toHaveLength(2);
    expect(records[0]).toMatchObject({
      id: `${PAGE_URL}#0-${sha1('First\nAlpha text').slice(0, 12)}`,
      source: PAGE_URL,
      source_type: 'web_scraper',
      title: 'First',
      content: 'First\nAlpha text',
      url: PAGE_URL,
      metadata: { selector: 'article' },
    });
  });

  it('falls back to the page title', () => {
    const records = extractRecords(PAGE, { url: PAGE_URL, content_selector: 'article', title_selector: 'h2' });
    expect(records[1]?.title).toBe('Blog');
    expect(records[1]?.id).toBe(`${PAGE_URL}#1-${sha1('No heading here').slice(0, 12)}`);
  });

  it('uses "No Title" when the page has no title either', () => {
    const records = extractRecords('<p>Just text</p>', {
      url: PAGE_URL,
      content_selector: 'p',
      title_selector: 'title',
    });
    expect(records[0]?.title).toBe('No Title');
  });

  it('returns nothing when no element matches', () => {
    expect(extractRecords(PAGE, { url: PAGE_URL, content_selector: '.missing', title_selector: 'title' })).toEqual(
      [],
    );
  });
});

describe('WebScraperAdapter', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('fetches the page and extracts records', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(PAGE, { status: 200 }));

    const adapter = new WebScraperAdapter({ timeoutMs: 1000, userAgent: 'test-agent', backoffFactor: 2 });
    expect(adapter.configure({ url: PAGE_URL, content_selector: 'article', fetch_interval: 300 })).toBe(true);

    const records = await adapter.fetch();
    expect(records.map((r) => r.title)).toEqual(['Blog', 'Blog']);
  });

  it('requires a content selector', () => {
    const adapter = new WebScraperAdapter({ timeoutMs: 1000, userAgent: 'test-agent', backoffFactor: 2 });
    expect(adapter.configure({ url: PAGE_URL })).toBe(false);
  });
});
