/**
 * Tolerant parser for the ranking oracle's free-text response.
 *
 * Expected grammar, repeated per story, keys in any order:
 *
 *   STORY 3
 *   Importance: 7
 *   Entertainment: 4
 *   Combined: 62
 *   Reasoning: ...
 *
 * Nothing here throws. Unreadable numbers become 0 and stories the oracle
 * skipped get a placeholder score.
 */

import { NewsItem, RankScore } from '../types';

export const NO_RANKING_REASON = 'No ranking data';

// A marker line holds only the marker, e.g. "STORY 3" or "**STORY 3:**"
const STORY_MARKER = /^[#*\s>-]*STORY\s*#?\s*(\d+)\s*:?[*\s]*$/;
const NUMBER_PATTERN = /-?\d+(?:\.\d+)?/;

type NumericKey = 'importance' | 'entertainment' | 'combined';

function isNumericKey(key: string): key is NumericKey {
  return key === 'importance' || key === 'entertainment' || key === 'combined';
}

export function placeholderScore(): RankScore {
  return { importance: 0, entertainment: 0, combined: 0, reasoning: NO_RANKING_REASON };
}

/**
 * First number found in the text, or 0.
 */
export function extractNumber(text: string): number {
  const match = NUMBER_PATTERN.exec(text);
  if (!match) {
    return 0;
  }
  const value = parseFloat(match[0]);
  return Number.isFinite(value) ? value : 0;
}

// "**Combined rating**" -> "combined"
function normalizeKey(raw: string): string {
  const words = raw.replace(/[*_#>`-]/g, ' ').trim().toLowerCase().split(/\s+/);
  return words[0] ?? '';
}

/**
 * Scores keyed by the 1-based story index found in the response.
 */
export function parseRankBlocks(response: string): Map<number, RankScore> {
  const parsed = new Map<number, RankScore>();
  let current: { index: number; score: RankScore } | null = null;

  const flush = () => {
    if (current) {
      parsed.set(current.index, current.score);
    }
  };

  for (const rawLine of response.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const marker = STORY_MARKER.exec(line);
    if (marker) {
      flush();
      current = {
        index: parseInt(marker[1], 10),
        score: { importance: 0, entertainment: 0, combined: 0, reasoning: '' },
      };
      continue;
    }

    if (!current) {
      continue;
    }

    const colon = line.indexOf(':');
    if (colon === -1) {
      continue;
    }

    const key = normalizeKey(line.slice(0, colon));
    const value = line.slice(colon + 1).trim();

    if (isNumericKey(key)) {
      current.score[key] = extractNumber(value);
    } else if (key === 'reasoning') {
      current.score.reasoning = value;
    }
  }
  flush();

  return parsed;
}

/**
 * One score per item index 1..itemCount, placeholders where the response had none.
 */
export function parseRankResponse(response: string, itemCount: number): Map<number, RankScore> {
  const blocks = parseRankBlocks(response);
  const scores = new Map<number, RankScore>();
  for (let index = 1; index <= itemCount; index++) {
    scores.set(index, blocks.get(index) ?? placeholderScore());
  }
  return scores;
}

export function buildRankingPrompt(items: NewsItem[]): string {
  const stories = items
    .map(
      (item, i) => `STORY ${i + 1}:
Title: ${item.title || 'No Title'}
Description: ${item.description || 'No Description'}
`
    )
    .join('\n');

  return `We have ${items.length} news stories. For each story, assign:
- Importance score (0-10)
- Entertainment score (0-10)
- Combined rating (0-100)

Provide a short reasoning for each assignment.

Format EXACTLY:

STORY X
Importance: #
Entertainment: #
Combined: #
Reasoning: ...
STORY X
...

${stories}`;
}
