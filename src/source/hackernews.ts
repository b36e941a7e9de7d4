import { z } from 'zod';
import { BaseSourceAdapter } from './baseAdapter.js';
import { createContentRecord, type ContentRecord } from './records.js';
import { readJson, request, requestOk } from './http.js';
import { errorMessage } from '../shared/errors.js';

const API_BASE = 'https://hacker-news.firebaseio.com/v0';
const MAX_ITEMS_CAP = 50;

const HackerNewsOptionsSchema = z.object({
  max_items: z
    .number()
    .int()
    .positive()
    .default(20)
    .transform((n) => Math.min(n, MAX_ITEMS_CAP)),
});

export type HackerNewsOptions = z.infer<typeof HackerNewsOptionsSchema>;

const StoryIdsSchema = z.array(z.number().int());

const StorySchema = z.object({
  id: z.number().int(),
  type: z.string(),
  title: z.string().optional(),
  text: z.string().optional(),
  url: z.string().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  score: z.number().optional(),
  descendants: z.number().optional(),
});

type Story = z.infer<typeof StorySchema>;

export class HackerNewsAdapter extends BaseSourceAdapter<HackerNewsOptions> {
  readonly name = 'Hacker News Source';
  readonly capabilities = ['hackernews', 'tech'] as const;
  protected readonly optionsSchema = HackerNewsOptionsSchema;

  protected async fetchRecords(options: HackerNewsOptions): Promise<ContentRecord[]> {
    this.log.info({ maxItems: options.max_items }, 'Fetching Hacker News top stories');
    const http = { timeoutMs: this.runtime.timeoutMs, userAgent: this.runtime.userAgent };

    const idsResponse = await requestOk(`${API_BASE}/topstories.json`, http);
    const ids = StoryIdsSchema.parse(readJson(idsResponse)).slice(0, options.max_items);

    const records: ContentRecord[] = [];
    for (const id of ids) {
      try {
        const response = await request(`${API_BASE}/item/${id}.json`, http);
        if (!response.ok) continue;

        const story = StorySchema.safeParse(readJson(response));
        if (!story.success || story.data.type !== 'story') continue;

        records.push(toRecord(story.data));
      } catch (err) {
        this.log.warn({ storyId: id, error: errorMessage(err) }, 'Failed to fetch Hacker News item');
      }
    }
    return records;
  }

  protected async probe(): Promise<boolean> {
    const response = await request(`${API_BASE}/maxitem.json`, {
      timeoutMs: this.runtime.timeoutMs,
      userAgent: this.runtime.userAgent,
    });
    return response.ok;
  }
}

function toRecord(story: Story): ContentRecord {
  const discussionUrl = `https://news.ycombinator.com/item?id=${story.id}`;
  return createContentRecord({
    id: `hn_${story.id}`,
    source: 'Hacker News',
    source_type: 'hackernews',
    title: story.title || 'No Title',
    content: story.text || story.url || '',
    timestamp: story.time !== undefined ? new Date(story.time * 1000) : new Date(),
    url: story.url || discussionUrl,
    author: story.by ?? null,
    tags: ['tech', 'hackernews'],
    metadata: {
      score: story.score ?? null,
      descendants: story.descendants ?? null,
      discussion_url: discussionUrl,
    },
  });
}
