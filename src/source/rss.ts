import Parser from 'rss-parser';
import { z } from 'zod';
import { BaseSourceAdapter } from './baseAdapter.js';
import { createContentRecord, type ContentRecord } from './records.js';
import { requestOk, probeUrl } from './http.js';
import { FetchError, errorMessage } from '../shared/errors.js';
import { parseDate } from '../shared/utils.js';

interface MediaContent {
  $?: { url?: string };
}

interface CustomItem {
  id?: string;
  author?: string;
  contentEncoded?: string;
  mediaContent?: MediaContent[];
}

const parser = new Parser<Record<string, unknown>, CustomItem>({
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['media:content', 'mediaContent', { keepArray: true }],
    ],
  },
});

const RssOptionsSchema = z.object({
  url: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//.test(u), 'url must be http(s)'),
  max_items: z.number().int().positive().optional(),
});

export type RssOptions = z.infer<typeof RssOptionsSchema>;

type FeedEntry = Parser.Item & CustomItem;

export class RssAdapter extends BaseSourceAdapter<RssOptions> {
  readonly name = 'RSS Source';
  readonly capabilities = ['rss', 'atom', 'xml'] as const;
  protected readonly optionsSchema = RssOptionsSchema;

  protected async fetchRecords(options: RssOptions): Promise<ContentRecord[]> {
    this.log.info({ url: options.url }, 'Fetching RSS feed');
    const response = await requestOk(options.url, {
      timeoutMs: this.runtime.timeoutMs,
      userAgent: this.runtime.userAgent,
      headers: {
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      },
    });

    const xml = response.body;
    let feed: Parser.Output<CustomItem>;
    try {
      feed = await parser.parseString(xml);
    } catch (err) {
      throw new FetchError(`Failed to parse feed: ${errorMessage(err)}`, {
        url: options.url,
      });
    }

    const entries = options.max_items ? feed.items.slice(0, options.max_items) : feed.items;
    const records: ContentRecord[] = [];
    for (const entry of entries) {
      const record = this.toRecord(entry, options.url);
      if (record) records.push(record);
    }

    this.log.debug({ url: options.url, count: records.length }, 'RSS fetched');
    return records;
  }

  protected probe(options: RssOptions): Promise<boolean> {
    return probeUrl(options.url, {
      timeoutMs: this.runtime.timeoutMs,
      userAgent: this.runtime.userAgent,
    });
  }

  private toRecord(entry: FeedEntry, feedUrl: string): ContentRecord | null {
    const link = entry.link?.trim();
    const id = entry.guid?.trim() || entry.id?.trim() || link;
    if (!id) return null;

    const mediaUrls: string[] = [];
    for (const media of entry.mediaContent ?? []) {
      if (media.$?.url) mediaUrls.push(media.$.url);
    }
    if (entry.enclosure?.url) mediaUrls.push(entry.enclosure.url);

    return createContentRecord({
      id,
      source: feedUrl,
      source_type: 'rss',
      title: entry.title?.trim() || 'No Title',
      content: entry.contentEncoded ?? entry.content ?? entry.summary ?? entry.title ?? '',
      timestamp: parseDate(entry.isoDate ?? entry.pubDate) ?? new Date(),
      url: link || feedUrl,
      author: entry.creator ?? entry.author ?? null,
      tags: (entry.categories ?? []).filter((c): c is string => typeof c === 'string'),
      media_urls: mediaUrls,
      metadata: { feed_url: feedUrl },
    });
  }
}
