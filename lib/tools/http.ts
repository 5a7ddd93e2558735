/**
 * HTTP Tool - GET text and JSON with timeout and retry
 */

import { Logger, retry } from '../utils';

export const USER_AGENT = 'Mozilla/5.0 (compatible; NewsNarrationBot/1.0)';

export interface HttpResponse {
  status: number;
  text: string;
  contentType: string;
  url: string;
}

export interface HttpOptions {
  headers?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
}

/**
 * Anything that can turn a URL into a response body. Source adapters depend
 * on this rather than on HttpTool so they can be driven by in-memory fakes.
 */
export type TextFetcher = (url: string, options?: HttpOptions) => Promise<HttpResponse>;

export class HttpTool {
  static async fetch(url: string, options: HttpOptions = {}): Promise<HttpResponse> {
    const { headers = {}, timeout = 15000, maxRetries = 3 } = options;

    Logger.debug('HTTP fetch', { url });

    return retry(
      async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
          const response = await fetch(url, {
            headers: {
              'User-Agent': USER_AGENT,
              ...headers,
            },
            signal: controller.signal,
          });

          if (!response.ok) {
            throw new Error(`HTTP ${response.status}: ${response.statusText}`);
          }

          return {
            status: response.status,
            text: await response.text(),
            contentType: response.headers.get('content-type') || 'text/plain',
            url: response.url || url,
          };
        } finally {
          clearTimeout(timeoutId);
        }
      },
      {
        maxRetries,
        delayMs: 1000,
        backoff: true,
        onError: (error, attempt) => {
          Logger.warn(`HTTP fetch failed (attempt ${attempt})`, { url, error: error.message });
        },
      }
    );
  }

  /**
   * Fetches and parses a JSON body. The result is `unknown`; callers narrow it.
   */
  static async fetchJson(
    url: string,
    options: HttpOptions = {},
    fetcher: TextFetcher = HttpTool.fetch
  ): Promise<unknown> {
    const response = await fetcher(url, {
      ...options,
      headers: { Accept: 'application/json', ...options.headers },
    });
    return JSON.parse(response.text);
  }
}
