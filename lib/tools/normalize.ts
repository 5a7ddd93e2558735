/**
 * Item normalizer - one canonical shape for every source
 */

import { NormalizedItem, RawSourceRecord } from '../types';
import { cleanText } from '../utils';

export function normalizeRecord(record: RawSourceRecord, fallbackSource = 'unknown'): NormalizedItem {
  const link = typeof record.link === 'string' ? record.link.trim() : '';
  const source = cleanText(record.source) || fallbackSource;

  return {
    title: cleanText(record.title),
    description: cleanText(record.description),
    link,
    published_at: record.published_at ?? null,
    source,
  };
}

export function normalizeRecords(records: RawSourceRecord[], fallbackSource?: string): NormalizedItem[] {
  return records.map(record => normalizeRecord(record, fallbackSource));
}
