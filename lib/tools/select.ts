import { NewsItem, RankScore, RankedItem } from '../types';
import { Logger } from '../utils';
import { placeholderScore } from './rank-parser';

/**
 * Sort by combined score, descending, and keep the first `count`.
 * Ties keep their original order: the comparator falls back to input position
 * instead of relying on the engine's sort stability.
 */
export function selectTopItems(
  items: NewsItem[],
  scores: Map<number, RankScore>,
  count: number
): RankedItem[] {
  let limit = Math.max(0, Math.floor(count));
  if (items.length < limit) {
    Logger.warn(`Only ${items.length} stories available. Expected ${limit}. Proceeding with available stories.`);
    limit = items.length;
  }

  const decorated = items.map((item, position) => ({
    position,
    item: { ...item, rank: scores.get(position + 1) ?? placeholderScore() },
  }));

  decorated.sort((a, b) => {
    const delta = b.item.rank.combined - a.item.rank.combined;
    return delta !== 0 ? delta : a.position - b.position;
  });

  return decorated.slice(0, limit).map(entry => entry.item);
}
