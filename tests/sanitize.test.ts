import { describe, it, expect } from 'vitest';
import {
  normalizeSentences,
  sanitizeForSpeech,
  stripAsides,
  stripDisallowedCharacters,
  stripThinkBlocks,
} from '../lib/tools/sanitize';

describe('stripThinkBlocks', () => {
  it('should remove paired blocks in either bracket style, any case', () => {
    expect(stripThinkBlocks('Intro <think>secret</think> body')).toBe('Intro   body');
    expect(stripThinkBlocks('A [THINK]x[/THINK] B')).toBe('A   B');
    expect(stripThinkBlocks('A <Think>\nmulti\nline\n</THINK>B')).toBe('A  B');
  });

  it('should drop everything before a closing tag that has no opener', () => {
    expect(stripThinkBlocks('reasoning here</think>The answer.')).toBe('The answer.');
  });
});

describe('stripAsides', () => {
  it('should keep bullet text but drop emphasis and bracketed asides', () => {
    expect(stripAsides('- first point\n* second point')).toBe('first point\nsecond point');
    expect(stripAsides('rates rise (again) [music] today')).toBe('rates rise     today');
    expect(stripAsides('a *quiet* day')).toBe('a   day');
  });
});

describe('stripDisallowedCharacters', () => {
  it('should keep letters, digits, terminal punctuation and apostrophes', () => {
    expect(stripDisallowedCharacters("déjà vu, it’s 5 o'clock! #news")).toBe("déjà vu, it’s 5 o'clock!  news");
  });
});

describe('normalizeSentences', () => {
  it('should capitalize sentences and add a missing period', () => {
    expect(normalizeSentences('hello world! what now? yes')).toBe('Hello world! What now? Yes.');
  });
});

describe('sanitizeForSpeech', () => {
  it('should run every pass in order', () => {
    const raw = '- **Breaking:** markets rally (again) today [music]\n*Note to producer*\nstocks rose 5% on Monday';
    expect(sanitizeForSpeech(raw)).toBe('Markets rally today stocks rose 5 on Monday.');
  });

  it('should replace symbols with spaces before collapsing', () => {
    expect(sanitizeForSpeech("It’s 5 o'clock — déjà vu! #news @home")).toBe("It’s 5 o'clock déjà vu! News home.");
  });

  it('should leave already sanitized text unchanged', () => {
    const inputs = [
      '- **Breaking:** markets rally (again) today [music]',
      'first. second',
      '<think>plan</think> The vote passed 52 to 48. what happens next?',
      "It’s 5 o'clock — déjà vu! #news @home",
      'ǰust now',
    ];
    for (const input of inputs) {
      const once = sanitizeForSpeech(input);
      expect(sanitizeForSpeech(once)).toBe(once);
    }
  });

  it('should keep a first letter whose capital needs a combining mark', () => {
    expect(sanitizeForSpeech('ǰust now')).toBe('ǰust now.');
    expect(sanitizeForSpeech('ǰust now.')).toBe('ǰust now.');
  });

  it('should return empty text for blank input', () => {
    expect(sanitizeForSpeech('')).toBe('');
    expect(sanitizeForSpeech('   \n ')).toBe('');
    expect(sanitizeForSpeech('*** ### ***')).toBe('');
  });
});
