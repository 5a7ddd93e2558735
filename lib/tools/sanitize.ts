/**
 * Speech sanitization for TTS
 * Turns whatever prose the oracles produced into text a voice can read as-is.
 */

import { Logger, errorMessage } from '../utils';

const THINK_BLOCK = /<\s*think\s*>[\s\S]*?<\s*\/\s*think\s*>|\[\s*think\s*\][\s\S]*?\[\s*\/\s*think\s*\]/gi;
const THINK_CLOSE = /<\s*\/\s*think\s*>|\[\s*\/\s*think\s*\]/gi;
const THINK_TAG = /<\s*\/?\s*think\s*>|\[\s*\/?\s*think\s*\]/gi;

/**
 * Removes <think>...</think> (and [think]...[/think]) blocks, any case.
 * A closing tag with no opener means the reasoning ran from the start of the
 * text, so everything up to it goes too.
 */
export function stripThinkBlocks(text: string): string {
  let result = text.replace(THINK_BLOCK, ' ');

  let lastClose: RegExpMatchArray | null = null;
  for (const match of result.matchAll(THINK_CLOSE)) {
    lastClose = match;
  }
  if (lastClose) {
    result = result.slice((lastClose.index ?? 0) + lastClose[0].length);
  }

  return result.replace(THINK_TAG, ' ');
}

/**
 * Drops *emphasised* or **bold** spans, lines opened or closed by a stray
 * asterisk, and [bracketed] or (parenthetical) asides. Bullet markers at the
 * start of a line are not emphasis: the bullet text stays.
 */
export function stripAsides(text: string): string {
  return text
    .replace(/^[ \t]*[*\-•][ \t]+/gm, '')
    .replace(/\*+(?!\s)[^*\n]*?\*+/g, ' ')
    .replace(/^\*+.*$/gm, '')
    .replace(/^.*\*+$/gm, '')
    .replace(/\[[^\]]*\]/g, ' ')
    .replace(/\([^)]*\)/g, ' ');
}

/**
 * Letters, digits, whitespace, . , ! ? and apostrophes survive.
 */
export function stripDisallowedCharacters(text: string): string {
  return text.replace(/[^\p{L}\p{N}\s.,!?'’]/gu, ' ');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Capitalizes each sentence and makes sure it ends in . ! or ?
 */
export function normalizeSentences(text: string): string {
  return text
    .split(/(?<=[.!?])\s+/)
    .map(sentence => sentence.trim())
    .filter(Boolean)
    .map(sentence => {
      const first = sentence.charAt(0);
      const upper = first.toUpperCase();
      // Some letters upper-case into a base plus a combining mark (ǰ -> J̌); keep those as written
      const head = stripDisallowedCharacters(upper) === upper ? upper : first;
      const capitalized = head + sentence.slice(1);
      return /[.!?]$/.test(capitalized) ? capitalized : `${capitalized}.`;
    })
    .join(' ');
}

const PIPELINE: Array<(text: string) => string> = [
  stripThinkBlocks,
  stripAsides,
  stripDisallowedCharacters,
  collapseWhitespace,
  normalizeSentences,
];

/**
 * Runs the passes in order. Never throws; a failure yields ''.
 * Running it on its own output returns that output unchanged.
 */
export function sanitizeForSpeech(text: string): string {
  if (typeof text !== 'string') {
    return '';
  }
  try {
    return PIPELINE.reduce((current, pass) => pass(current), text);
  } catch (error) {
    Logger.error('Script cleaning failed', { error: errorMessage(error) });
    return '';
  }
}
