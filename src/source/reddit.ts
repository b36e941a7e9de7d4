import { z } from 'zod';
import { BaseSourceAdapter } from './baseAdapter.js';
import { createContentRecord, type ContentRecord } from './records.js';
import { readJson, request, requestOk } from './http.js';
import { errorMessage } from '../shared/errors.js';

const AUTH_URL = 'https://www.reddit.com/api/v1/access_token';
const API_URL = 'https://oauth.reddit.com';
const PUBLIC_URL = 'https://www.reddit.com';
const IMAGE_EXTENSIONS = ['.jpg', '.png', '.gif'];

const RedditOptionsSchema = z.object({
  subreddits: z.array(z.string().regex(/^[A-Za-z0-9_]+$/, 'Invalid subreddit name')).min(1),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  user_agent: z.string().optional(),
  limit: z.number().int().positive().max(100).default(10),
});

export type RedditOptions = z.infer<typeof RedditOptionsSchema>;

const TokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().default(3600),
});

const PostSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  selftext: z.string().optional(),
  url: z.string().optional(),
  permalink: z.string(),
  author: z.string().optional(),
  created_utc: z.number().optional(),
  over_18: z.boolean().optional(),
  spoiler: z.boolean().optional(),
  is_self: z.boolean().optional(),
  ups: z.number().optional(),
  num_comments: z.number().optional(),
  preview: z
    .object({
      images: z.array(z.object({ source: z.object({ url: z.string() }).optional() })).default([]),
    })
    .optional(),
});

interface CachedToken {
  token: string;
  expiresAt: number;
}

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: z.unknown() })).default([]),
  }),
});

type Post = z.infer<typeof PostSchema>;

export class RedditAdapter extends BaseSourceAdapter<RedditOptions> {
  readonly name = 'Reddit Source';
  readonly capabilities = ['reddit', 'social'] as const;
  protected readonly optionsSchema = RedditOptionsSchema;

  /** Access tokens keyed by `client_id:client_secret`. */
  private readonly tokens = new Map<string, CachedToken>();

  protected async fetchRecords(options: RedditOptions): Promise<ContentRecord[]> {
    const userAgent = options.user_agent ?? this.runtime.userAgent;
    const token = await this.authenticate(options, userAgent);
    const records: ContentRecord[] = [];

    for (const subreddit of options.subreddits) {
      const url = token
        ? `${API_URL}/r/${subreddit}/new?limit=${options.limit}`
        : `${PUBLIC_URL}/r/${subreddit}/new.json?limit=${options.limit}`;
      const headers: Record<string, string> = token ? { Authorization: `bearer ${token}` } : {};

      try {
        this.log.info({ subreddit, authenticated: token !== null }, 'Fetching Reddit posts');
        const response = await request(url, { timeoutMs: this.runtime.timeoutMs, userAgent, headers });

        if (response.status === 429) {
          this.log.warn({ subreddit }, 'Reddit rate limit exceeded');
          break;
        }
        if (!response.ok) {
          this.log.warn({ subreddit, status: response.status }, 'Reddit request failed');
          continue;
        }

        const listing = ListingSchema.parse(readJson(response));
        for (const child of listing.data.children) {
          const post = PostSchema.safeParse(child.data);
          if (post.success) records.push(toRecord(post.data, subreddit));
        }
      } catch (err) {
        this.log.error({ subreddit, error: errorMessage(err) }, 'Error fetching subreddit');
      }
    }

    return records;
  }

  protected async probe(options: RedditOptions): Promise<boolean> {
    const response = await request(`${PUBLIC_URL}/r/all/about.json`, {
      timeoutMs: this.runtime.timeoutMs,
      userAgent: options.user_agent ?? this.runtime.userAgent,
      method: 'HEAD',
    });
    return response.ok;
  }

  /**
   * Client-credentials OAuth. Returns null when no credentials are set or the
   * token request fails, in which case the public JSON endpoints are used.
   */
  private async authenticate(options: RedditOptions, userAgent: string): Promise<string | null> {
    if (!options.client_id || !options.client_secret) return null;

    const key = `${options.client_id}:${options.client_secret}`;
    const nowMs = Date.now();
    const cached = this.tokens.get(key);
    if (cached && nowMs < cached.expiresAt) return cached.token;

    try {
      const basic = Buffer.from(key).toString('base64');
      const response = await requestOk(AUTH_URL, {
        method: 'POST',
        timeoutMs: this.runtime.timeoutMs,
        userAgent,
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: 'grant_type=client_credentials',
      });
      const token = TokenSchema.parse(readJson(response));
      // Refresh a minute early.
      this.tokens.set(key, { token: token.access_token, expiresAt: nowMs + (token.expires_in - 60) * 1000 });
      return token.access_token;
    } catch (err) {
      this.log.error({ error: errorMessage(err) }, 'Reddit authentication failed');
      this.tokens.delete(key);
      return null;
    }
  }
}

function toRecord(post: Post, subreddit: string): ContentRecord {
  const link = post.url ?? '';

  const tags = [subreddit, 'reddit'];
  if (post.over_18) tags.push('nsfw');
  if (post.spoiler) tags.push('spoiler');

  const mediaUrls: string[] = [];
  for (const image of post.preview?.images ?? []) {
    if (image.source) mediaUrls.push(image.source.url.replace(/&amp;/g, '&'));
  }
  if (IMAGE_EXTENSIONS.some((ext) => link.endsWith(ext)) && !mediaUrls.includes(link)) {
    mediaUrls.push(link);
  }

  let content = post.selftext ?? '';
  if (!content && !post.is_self) content = `[Link Post] ${link}`;

  return createContentRecord({
    id: `reddit_${post.id}`,
    source: `r/${subreddit}`,
    source_type: 'reddit',
    title: post.title || 'No Title',
    content,
    timestamp: post.created_utc !== undefined ? new Date(post.created_utc * 1000) : new Date(),
    url: `https://reddit.com${post.permalink}`,
    author: post.author ?? 'unknown',
    tags,
    media_urls: mediaUrls,
    metadata: { upvotes: post.ups ?? null, comments: post.num_comments ?? null },
  });
}
