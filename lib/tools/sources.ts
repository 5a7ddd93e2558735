/**
 * Source adapters - each turns one upstream into raw source records
 */

import { FeedReader } from './feed';
import { HttpTool, TextFetcher } from './http';
import { Logger, errorMessage } from '../utils';
import { RawSourceRecord } from '../types';

export interface SourceAdapter {
  name: string;
  fetch(): Promise<RawSourceRecord[]>;
}

export class RssSourceAdapter implements SourceAdapter {
  readonly name = 'RSS';

  constructor(private feeds: FeedReader, private urls: string[]) {}

  async fetch(): Promise<RawSourceRecord[]> {
    return this.feeds.parseMultipleFeeds(this.urls, this.name);
  }
}

export function googleNewsTopicUrl(topic: string, language: string, country: string): string {
  const hl = `${language}-${country}`;
  const ceid = `${country}:${language}`;
  return (
    `https://news.google.com/news/rss/headlines/section/topic/${encodeURIComponent(topic.toUpperCase())}` +
    `?hl=${encodeURIComponent(hl)}&gl=${encodeURIComponent(country)}&ceid=${encodeURIComponent(ceid)}`
  );
}

export class GoogleNewsAdapter implements SourceAdapter {
  readonly name = 'GoogleNews';

  constructor(
    private feeds: FeedReader,
    private options: { topic: string; language: string; country: string; maxResults: number }
  ) {}

  async fetch(): Promise<RawSourceRecord[]> {
    const { topic, language, country, maxResults } = this.options;
    const records = await this.feeds.parseFeed(googleNewsTopicUrl(topic, language, country), this.name);
    return records.slice(0, Math.max(0, maxResults));
  }
}

interface RedditPost {
  title: string;
  selftext: string;
  url: string;
  created_utc: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRedditPost(child: unknown): RedditPost | null {
  if (!isRecord(child) || !isRecord(child.data)) {
    return null;
  }
  const { title, selftext, url, created_utc } = child.data;
  if (typeof title !== 'string' || typeof created_utc !== 'number') {
    return null;
  }
  return {
    title,
    selftext: typeof selftext === 'string' ? selftext : '',
    url: typeof url === 'string' ? url : '',
    created_utc,
  };
}

/**
 * Pulls the `data.children[].data` posts out of a listing; anything else is skipped.
 */
export function parseRedditListing(body: unknown): RedditPost[] {
  if (!isRecord(body) || !isRecord(body.data) || !Array.isArray(body.data.children)) {
    return [];
  }
  return body.data.children
    .map(toRedditPost)
    .filter((post): post is RedditPost => post !== null);
}

export class RedditSourceAdapter implements SourceAdapter {
  readonly name = 'reddit';

  constructor(
    private options: { subreddits: string[]; limit: number },
    private fetcher: TextFetcher = HttpTool.fetch
  ) {}

  async fetch(): Promise<RawSourceRecord[]> {
    const records: RawSourceRecord[] = [];

    for (const subreddit of this.options.subreddits) {
      const url = `https://www.reddit.com/r/${encodeURIComponent(subreddit)}/hot.json?limit=${this.options.limit}`;
      try {
        const body = await HttpTool.fetchJson(url, { maxRetries: 2 }, this.fetcher);
        for (const post of parseRedditListing(body)) {
          records.push({
            title: post.title,
            description: post.selftext,
            link: post.url,
            published_at: post.created_utc,
            source: this.name,
          });
        }
      } catch (error) {
        Logger.error('Reddit fetch error', { subreddit, error: errorMessage(error) });
      }
    }

    return records;
  }
}

/**
 * Runs every adapter in turn and concatenates in adapter order.
 * A failing adapter is logged and contributes nothing.
 */
export async function collectFromSources(adapters: SourceAdapter[]): Promise<RawSourceRecord[]> {
  const records: RawSourceRecord[] = [];

  for (const adapter of adapters) {
    try {
      const fetched = await adapter.fetch();
      Logger.info(`Fetched ${fetched.length} from ${adapter.name}`);
      records.push(...fetched);
    } catch (error) {
      Logger.error(`${adapter.name} fetch error`, { error: errorMessage(error) });
    }
  }

  return records;
}
