import { JSDOM } from 'jsdom';
import { z } from 'zod';
import { BaseSourceAdapter } from './baseAdapter.js';
import { createContentRecord, type ContentRecord } from './records.js';
import { requestOk, probeUrl } from './http.js';
import { sha1 } from '../shared/utils.js';

const ScraperOptionsSchema = z.object({
  url: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//.test(u), 'url must be http(s)'),
  content_selector: z.string().min(1),
  title_selector: z.string().min(1).default('title'),
});

export type ScraperOptions = z.infer<typeof ScraperOptionsSchema>;

/**
 * Text of a node with blank lines dropped and each line trimmed.
 */
export function elementText(el: Element): string {
  return (el.textContent ?? '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Scrapes a page and turns every element matching `content_selector` into a
 * record. `title_selector` is tried inside each element first, then against
 * the page's <title>.
 */
export class WebScraperAdapter extends BaseSourceAdapter<ScraperOptions> {
  readonly name = 'Web Scraper';
  readonly capabilities = ['html', 'scraping'] as const;
  protected readonly optionsSchema = ScraperOptionsSchema;

  protected async fetchRecords(options: ScraperOptions): Promise<ContentRecord[]> {
    this.log.info({ url: options.url }, 'Scraping page');
    const response = await requestOk(options.url, {
      timeoutMs: this.runtime.timeoutMs,
      userAgent: this.runtime.userAgent,
    });
    return extractRecords(response.body, options);
  }

  protected probe(options: ScraperOptions): Promise<boolean> {
    return probeUrl(options.url, {
      timeoutMs: this.runtime.timeoutMs,
      userAgent: this.runtime.userAgent,
    });
  }
}

export function extractRecords(html: string, options: ScraperOptions): ContentRecord[] {
  const { document } = new JSDOM(html).window;
  const pageTitleEl = document.querySelector('title');
  const pageTitle = pageTitleEl ? elementText(pageTitleEl) : '';

  const records: ContentRecord[] = [];
  const elements = Array.from(document.querySelectorAll(options.content_selector));

  elements.forEach((el, index) => {
    const text = elementText(el);
    if (!text) return;

    const titleEl = el.querySelector(options.title_selector);
    const title = (titleEl ? elementText(titleEl) : '') || pageTitle || 'No Title';

    records.push(
      createContentRecord({
        id: `${options.url}#${index}-${sha1(text.slice(0, 50)).slice(0, 12)}`,
        source: options.url,
        source_type: 'web_scraper',
        title,
        content: text,
        url: options.url,
        metadata: { selector: options.content_selector },
      }),
    );
  });

  return records;
}
