/**
 * Feed Tool - Parse RSS/Atom feeds into raw source records
 */

import Parser from 'rss-parser';
import { USER_AGENT } from './http';
import { Logger, errorMessage } from '../utils';
import { RawSourceRecord } from '../types';

type FeedParser = Parser<Record<string, unknown>, Record<string, unknown>>;
type FeedOutput = Parser.Output<Record<string, unknown>>;

export interface FeedReader {
  parseFeed(url: string, source: string): Promise<RawSourceRecord[]>;
  parseMultipleFeeds(urls: string[], source: string): Promise<RawSourceRecord[]>;
}

export class FeedTool implements FeedReader {
  private parser: FeedParser;

  constructor(timeoutMs = 15000) {
    this.parser = new Parser({
      timeout: timeoutMs,
      headers: {
        'User-Agent': USER_AGENT,
      },
    });
  }

  /**
   * Published-at stays as the feed wrote it; date parsing happens during filtering.
   */
  static toRecords(feed: FeedOutput, source: string): RawSourceRecord[] {
    return (feed.items || []).map(item => ({
      title: item.title ?? '',
      description: item.contentSnippet ?? item.content ?? '',
      link: item.link ?? item.guid ?? '',
      published_at: item.isoDate ?? item.pubDate ?? null,
      source,
    }));
  }

  async parseFeed(url: string, source: string): Promise<RawSourceRecord[]> {
    Logger.debug('Parsing feed', { url });
    const feed = await this.parser.parseURL(url);
    return FeedTool.toRecords(feed, source);
  }

  async parseXml(xml: string, source: string): Promise<RawSourceRecord[]> {
    const feed = await this.parser.parseString(xml);
    return FeedTool.toRecords(feed, source);
  }

  /**
   * Reads every feed; one failing feed is logged and contributes nothing.
   * Output keeps the order of `urls`.
   */
  async parseMultipleFeeds(urls: string[], source: string): Promise<RawSourceRecord[]> {
    const results = await Promise.allSettled(urls.map(url => this.parseFeed(url, source)));

    const records: RawSourceRecord[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        records.push(...result.value);
      } else {
        Logger.error('Failed to parse feed', {
          url: urls[index],
          error: errorMessage(result.reason),
        });
      }
    });

    return records;
  }
}
