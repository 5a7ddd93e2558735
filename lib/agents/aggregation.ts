/**
 * Aggregation Agent - Fetches, normalizes, filters and snapshots one batch of news
 */

import { BaseAgent } from './base';
import { FreshnessCounts, NewsItem } from '../types';
import { SourceAdapter, collectFromSources } from '../tools/sources';
import { normalizeRecords } from '../tools/normalize';
import { filterFreshItems } from '../tools/dedupe';
import { LedgerStore } from '../tools/ledger';
import { StorageTool } from '../tools/storage';
import { Logger } from '../utils';

export interface AggregationInput {
  max_age_hours: number;
  retention_cap: number;
  now: string; // ISO-8601
  run_timestamp: string; // YYYYMMDD_HHMMSS
}

export interface AggregationOutput {
  items: NewsItem[];
  fetched: number;
  counts: FreshnessCounts;
  snapshot_path: string | null;
}

export class AggregationAgent extends BaseAgent<AggregationInput, AggregationOutput> {
  constructor(
    storage: StorageTool,
    private sources: SourceAdapter[],
    private ledgerStore: LedgerStore = new LedgerStore(storage)
  ) {
    // Refetching on a ledger write failure would filter against a ledger that
    // already holds this batch, so there is a single attempt.
    super({ name: 'AggregationAgent', retries: 1 }, storage);
  }

  protected async process(input: AggregationInput): Promise<AggregationOutput> {
    const records = await collectFromSources(this.sources);
    const normalized = normalizeRecords(records);

    Logger.info('📰 Aggregated raw records', { fetched: records.length });

    // The ledger is fully loaded before the first decision and written back only
    // after the whole batch has been filtered.
    const ledger = await this.ledgerStore.load();
    const { items, counts } = filterFreshItems(normalized, ledger, {
      maxAgeHours: input.max_age_hours,
      now: new Date(input.now),
    });

    const snapshot_path = await this.writeSnapshot(
      `news/all_news_${input.run_timestamp}.json`,
      JSON.stringify(items, null, 2)
    );

    await this.ledgerStore.save(ledger, input.retention_cap);

    return { items, fetched: records.length, counts, snapshot_path };
  }
}
