/**
 * Freshness + duplicate filter over one batch of normalized items
 */

import { FreshnessCounts, NewsItem, NormalizedItem } from '../types';
import { Clock, Logger } from '../utils';
import { parsePublishedAt } from './dates';
import { fingerprintItem } from './fingerprint';
import { FingerprintLedger } from './ledger';

export interface FreshnessOptions {
  maxAgeHours: number;
  now: Date;
}

export interface FreshnessResult {
  items: NewsItem[];
  counts: FreshnessCounts;
}

/**
 * Filters in input order. An item published exactly at `now - maxAgeHours` is admitted;
 * anything earlier is old. Admitted fingerprints are added to the ledger, so a second
 * pass over the same batch admits nothing.
 */
export function filterFreshItems(
  items: NormalizedItem[],
  ledger: FingerprintLedger,
  options: FreshnessOptions
): FreshnessResult {
  const cutoff = Clock.addHours(options.now, -options.maxAgeHours);
  const counts: FreshnessCounts = { admitted: 0, old: 0, duplicate: 0, missing_date: 0 };
  const admitted: NewsItem[] = [];

  for (const item of items) {
    const published = parsePublishedAt(item.published_at);
    if (!published) {
      counts.missing_date++;
      continue;
    }

    if (published.getTime() < cutoff.getTime()) {
      counts.old++;
      continue;
    }

    const fingerprint = fingerprintItem(item);
    if (!ledger.add(fingerprint)) {
      counts.duplicate++;
      continue;
    }

    admitted.push({
      title: item.title,
      description: item.description,
      link: item.link,
      published_at: published.toISOString(),
      source: item.source,
      fingerprint,
    });
    counts.admitted++;
  }

  Logger.info('Filtered news', {
    input: items.length,
    cutoff: cutoff.toISOString(),
    ...counts,
  });

  return { items: admitted, counts };
}
