/**
 * Ranking Agent - Scores the filtered batch with the ranking oracle and keeps the top stories
 */

import { BaseAgent } from './base';
import { NewsItem, RankedItem } from '../types';
import { Oracle, callSafely } from '../tools/oracle';
import { buildRankingPrompt, parseRankBlocks, parseRankResponse } from '../tools/rank-parser';
import { selectTopItems } from '../tools/select';
import { StorageTool } from '../tools/storage';
import { Logger } from '../utils';

export interface RankingInput {
  items: NewsItem[];
  target_count: number;
  run_timestamp: string;
}

export interface RankingOutput {
  picks: RankedItem[];
  scored: number;
  parsed_blocks: number;
  snapshot_path: string | null;
}

export class RankingAgent extends BaseAgent<RankingInput, RankingOutput> {
  constructor(storage: StorageTool, private oracle: Oracle) {
    super({ name: 'RankingAgent', retries: 1 }, storage);
  }

  protected async process(input: RankingInput): Promise<RankingOutput> {
    const { items, target_count, run_timestamp } = input;

    if (items.length === 0) {
      Logger.warn('No stories to rank');
      return { picks: [], scored: 0, parsed_blocks: 0, snapshot_path: null };
    }

    Logger.info('Ranking stories', { count: items.length, target: target_count });

    // An oracle failure reads as an empty response: every item gets a placeholder
    // score and selection falls back to input order.
    const response = await callSafely(this.oracle, buildRankingPrompt(items), 'Ranking');
    this.apiCallCount++;

    const scores = parseRankResponse(response, items.length);
    const parsedBlocks = [...parseRankBlocks(response).keys()].filter(index => scores.has(index)).length;
    if (parsedBlocks < items.length) {
      Logger.warn('Ranking response incomplete, using placeholder scores', {
        parsed: parsedBlocks,
        expected: items.length,
      });
    }

    const picks = selectTopItems(items, scores, target_count);

    const snapshot_path = await this.writeSnapshot(
      `top_news/top_stories_${run_timestamp}.json`,
      JSON.stringify(picks, null, 2)
    );

    Logger.info('🏆 Top stories selected', {
      picks: picks.length,
      top: picks.slice(0, 3).map(pick => ({ title: pick.title, combined: pick.rank.combined })),
    });

    return { picks, scored: scores.size, parsed_blocks: parsedBlocks, snapshot_path };
  }
}
