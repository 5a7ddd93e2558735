/**
 * Final script assembly and narration ordering
 */

import { FinalScript } from '../types';
import { sanitizeForSpeech } from './sanitize';

export const SECTION_ORDER: readonly string[] = [
  'hook',
  'headlines',
  ...Array.from({ length: 9 }, (_, i) => `main_story_${i + 1}`),
  'outro',
];

/**
 * Known keys in broadcast order, then any others in the order they appear.
 */
export function orderSectionKeys(keys: string[]): string[] {
  const known = SECTION_ORDER.filter(key => keys.includes(key));
  const unknown = keys.filter(key => !SECTION_ORDER.includes(key));
  return [...known, ...unknown];
}

export interface FinalScriptOptions {
  brand: string;
  generatedAt: Date;
  refinementIterations: number;
}

/**
 * Sanitizes every section independently. Sections keep their draft order.
 */
export function buildFinalScript(sections: Record<string, string>, options: FinalScriptOptions): FinalScript {
  const cleaned: Record<string, string> = {};
  for (const [key, text] of Object.entries(sections)) {
    cleaned[key] = sanitizeForSpeech(text);
  }

  return {
    metadata: {
      brand: options.brand,
      generated_at: options.generatedAt.toISOString(),
      refinement_iterations: options.refinementIterations,
    },
    sections: cleaned,
  };
}

/**
 * Non-empty sections in broadcast order, separated by blank lines, then sanitized
 * once more as a whole.
 */
export function assembleNarration(script: FinalScript): string {
  const parts = orderSectionKeys(Object.keys(script.sections))
    .map(key => script.sections[key]?.trim() ?? '')
    .filter(Boolean);

  return sanitizeForSpeech(parts.join('\n\n'));
}
