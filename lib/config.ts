/**
 * Configuration management for the narration pipeline
 */

import { PipelineSettings } from './types';

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(Boolean);
}

export type StorageBackend = 'local' | 'vercel-blob' | 's3';

function parseBackend(value: string | undefined): StorageBackend {
  return value === 'vercel-blob' || value === 's3' ? value : 'local';
}

export const DEFAULT_SETTINGS: PipelineSettings = {
  language: 'en',
  country: 'US',
  max_age_hours: 24,
  max_results: 50,
  retention_cap: 1000,
  max_refine_iterations: 3,
  top_count: 9,
  brand_name: 'Veritas Lens',
  reddit_limit: 15,
};

export class Config {
  // OpenAI
  static OPENAI_API_KEY = process.env.OPENAI_API_KEY || '';
  static RANKING_MODEL = process.env.RANKING_MODEL || 'gpt-4o-mini';
  static WRITER_MODEL = process.env.WRITER_MODEL || 'gpt-4o';
  static CRITIC_MODEL = process.env.CRITIC_MODEL || 'gpt-4o-mini';
  static REVISER_MODEL = process.env.REVISER_MODEL || 'gpt-4o';
  static TTS_MODEL = process.env.TTS_MODEL || 'tts-1-hd';
  static TTS_VOICE = process.env.TTS_VOICE || 'onyx';
  static ORACLE_TIMEOUT_MS = parseNumber(process.env.ORACLE_TIMEOUT_MS, 60000);

  // Storage
  static STORAGE_BACKEND: StorageBackend = parseBackend(process.env.STORAGE_BACKEND);
  static DATA_DIR = process.env.DATA_DIR || './data';
  static BLOB_READ_WRITE_TOKEN = process.env.BLOB_READ_WRITE_TOKEN || '';
  static S3_ENDPOINT = process.env.S3_ENDPOINT || '';
  static S3_BUCKET = process.env.S3_BUCKET || '';
  static S3_ACCESS_KEY = process.env.S3_ACCESS_KEY || '';
  static S3_SECRET_KEY = process.env.S3_SECRET_KEY || '';
  static S3_REGION = process.env.S3_REGION || 'auto';

  // Sources
  static RSS_FEEDS = parseList(process.env.RSS_FEEDS, [
    'https://rss.nytimes.com/services/xml/rss/nyt/World.xml',
    'http://feeds.bbci.co.uk/news/world/rss.xml',
  ]);
  static REDDIT_SUBREDDITS = parseList(process.env.REDDIT_SUBREDDITS, ['worldnews', 'news']);
  static GOOGLE_NEWS_TOPIC = process.env.GOOGLE_NEWS_TOPIC || 'WORLD';

  // Operational
  static CRON_SECRET = process.env.CRON_SECRET || '';

  /**
   * Build the settings object for one run. Environment first, then overrides.
   */
  static getPipelineSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
    const env = process.env;
    return {
      language: overrides.language ?? (env.NEWS_LANGUAGE || DEFAULT_SETTINGS.language),
      country: overrides.country ?? (env.NEWS_COUNTRY || DEFAULT_SETTINGS.country),
      max_age_hours:
        overrides.max_age_hours ?? parseNumber(env.MAX_AGE_HOURS, DEFAULT_SETTINGS.max_age_hours),
      max_results:
        overrides.max_results ?? parseNumber(env.MAX_RESULTS, DEFAULT_SETTINGS.max_results),
      retention_cap:
        overrides.retention_cap ?? parseNumber(env.RETENTION_CAP, DEFAULT_SETTINGS.retention_cap),
      max_refine_iterations:
        overrides.max_refine_iterations ??
        parseNumber(env.MAX_REFINE_ITERATIONS, DEFAULT_SETTINGS.max_refine_iterations),
      top_count: overrides.top_count ?? parseNumber(env.TOP_COUNT, DEFAULT_SETTINGS.top_count),
      brand_name: overrides.brand_name ?? (env.BRAND_NAME || DEFAULT_SETTINGS.brand_name),
      reddit_limit:
        overrides.reddit_limit ?? parseNumber(env.REDDIT_LIMIT, DEFAULT_SETTINGS.reddit_limit),
    };
  }
}
