/**
 * Tests for identity hashing and the freshness/duplicate filter
 */

import { describe, it, expect } from 'vitest';
import { fingerprintItem } from '../lib/tools/fingerprint';
import { filterFreshItems } from '../lib/tools/dedupe';
import { FingerprintLedger } from '../lib/tools/ledger';
import { normalizeRecord } from '../lib/tools/normalize';
import { NormalizedItem } from '../lib/types';
import { Clock, Crypto } from '../lib/utils';

const NOW = new Date('2024-06-01T12:00:00Z');

function item(title: string, hoursAgo: number | null, overrides: Partial<NormalizedItem> = {}): NormalizedItem {
  return {
    title,
    description: `${title} description`,
    link: `https://news.example.com/${encodeURIComponent(title)}`,
    published_at: hoursAgo === null ? null : Clock.addHours(NOW, -hoursAgo).toISOString(),
    source: 'test',
    ...overrides,
  };
}

describe('fingerprintItem', () => {
  it('should hash the lower-cased, trimmed fields joined by spaces', () => {
    expect(fingerprintItem({ title: ' A ', description: 'B', link: 'c ' })).toBe(Crypto.sha256('a b c'));
  });

  it('should be equal for items that only differ in case and surrounding whitespace', () => {
    const a = fingerprintItem({ title: 'Rates Hold', description: 'The bank paused.', link: 'https://x.test/1' });
    const b = fingerprintItem({ title: '  rates hold ', description: 'THE BANK PAUSED.', link: 'https://X.TEST/1  ' });
    expect(a).toBe(b);
  });

  it('should differ when any single field differs', () => {
    const base = { title: 'Storm nears coast', description: 'Residents evacuate.', link: 'https://x.test/storm' };
    const variants = [
      { ...base, title: 'Storm reaches coast' },
      { ...base, description: 'Residents stay.' },
      { ...base, link: 'https://x.test/storm-2' },
    ];
    const fingerprints = new Set([base, ...variants].map(fingerprintItem));
    expect(fingerprints.size).toBe(4);
  });
});

describe('normalizeRecord', () => {
  it('should clean text fields and keep the raw published-at value', () => {
    expect(
      normalizeRecord({ title: '  Big\n news ', description: null, link: ' https://x.test/a ', published_at: 1700000000 })
    ).toEqual({
      title: 'Big news',
      description: '',
      link: 'https://x.test/a',
      published_at: 1700000000,
      source: 'unknown',
    });
  });
});

describe('filterFreshItems', () => {
  it('should admit nothing the second time over the same batch', () => {
    const ledger = new FingerprintLedger();
    const batch = [item('One', 1), item('Two', 2)];

    const first = filterFreshItems(batch, ledger, { maxAgeHours: 24, now: NOW });
    const second = filterFreshItems(batch, ledger, { maxAgeHours: 24, now: NOW });

    expect(first.items.map(i => i.title)).toEqual(['One', 'Two']);
    expect(second.items).toEqual([]);
    expect(second.counts).toEqual({ admitted: 0, old: 0, duplicate: 2, missing_date: 0 });
  });

  it('should admit an item published exactly at the cutoff and reject one a second older', () => {
    const atCutoff = item('Edge', null, { published_at: '2024-05-31T12:00:00Z' });
    const justBefore = item('Stale', null, { published_at: '2024-05-31T11:59:59Z' });

    const result = filterFreshItems([atCutoff, justBefore], new FingerprintLedger(), { maxAgeHours: 24, now: NOW });

    expect(result.items.map(i => i.title)).toEqual(['Edge']);
    expect(result.counts).toEqual({ admitted: 1, old: 1, duplicate: 0, missing_date: 0 });
  });

  it('should count 12 items over 30 hours with 2 fresh duplicates exactly', () => {
    const hours = [1, 2, 3, 5, 8, 10, 12, 20, 23, 25, 28, 30];
    const batch = hours.map((h, i) => item(`Story ${i}`, h));
    // Same triple as stories 0 and 1, published later in the window
    batch[3] = item('Story 0', 5);
    batch[6] = item('Story 1', 12);

    const result = filterFreshItems(batch, new FingerprintLedger(), { maxAgeHours: 24, now: NOW });

    // 9 items within 24h, minus 2 duplicates
    expect(result.items).toHaveLength(7);
    expect(result.items.map(i => i.title)).toEqual([
      'Story 0',
      'Story 1',
      'Story 2',
      'Story 4',
      'Story 5',
      'Story 7',
      'Story 8',
    ]);
    expect(result.counts).toEqual({ admitted: 7, old: 3, duplicate: 2, missing_date: 0 });
  });

  it('should drop items without a usable date', () => {
    const batch = [item('No date', null), item('Garbage date', null, { published_at: 'sometime soon' }), item('Fine', 4)];
    const result = filterFreshItems(batch, new FingerprintLedger(), { maxAgeHours: 24, now: NOW });

    expect(result.items.map(i => i.title)).toEqual(['Fine']);
    expect(result.counts.missing_date).toBe(2);
  });

  it('should count a millisecond epoch string as missing a date', () => {
    const batch = [item('Millis', null, { published_at: String(NOW.getTime()) })];
    const result = filterFreshItems(batch, new FingerprintLedger(), { maxAgeHours: 24, now: NOW });

    expect(result.items).toEqual([]);
    expect(result.counts).toEqual({ admitted: 0, old: 0, duplicate: 0, missing_date: 1 });
  });

  it('should attach the fingerprint and an ISO timestamp to admitted items', () => {
    const fresh = item('Epoch', null, { published_at: String(NOW.getTime() / 1000 - 3600) });
    const [admitted] = filterFreshItems([fresh], new FingerprintLedger(), { maxAgeHours: 24, now: NOW }).items;

    expect(admitted.published_at).toBe('2024-06-01T11:00:00.000Z');
    expect(admitted.fingerprint).toBe(fingerprintItem(fresh));
  });

  it('should not count old items against the ledger', () => {
    const ledger = new FingerprintLedger();
    filterFreshItems([item('Old', 48)], ledger, { maxAgeHours: 24, now: NOW });
    expect(ledger.size).toBe(0);
  });
});
