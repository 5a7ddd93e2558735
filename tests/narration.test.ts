import { describe, it, expect } from 'vitest';
import { assembleNarration, buildFinalScript, orderSectionKeys } from '../lib/tools/narration';
import { chunkForSpeech } from '../lib/tools/tts';

describe('orderSectionKeys', () => {
  it('should put known sections in broadcast order and unknown ones after', () => {
    expect(orderSectionKeys(['outro', 'custom', 'main_story_2', 'hook', 'main_story_10'])).toEqual([
      'hook',
      'main_story_2',
      'outro',
      'custom',
      'main_story_10',
    ]);
  });
});

describe('buildFinalScript', () => {
  it('should sanitize each section and fill metadata', () => {
    const script = buildFinalScript(
      { hook: '*wink* hello there', outro: 'bye' },
      { brand: 'Test Brand', generatedAt: new Date('2024-01-01T00:00:00Z'), refinementIterations: 3 }
    );

    expect(script).toEqual({
      metadata: {
        brand: 'Test Brand',
        generated_at: '2024-01-01T00:00:00.000Z',
        refinement_iterations: 3,
      },
      sections: { hook: 'Hello there.', outro: 'Bye.' },
    });
  });
});

describe('assembleNarration', () => {
  it('should join non-empty sections in order', () => {
    const text = assembleNarration({
      metadata: { brand: 'Test Brand', generated_at: '2024-01-01T00:00:00.000Z', refinement_iterations: 3 },
      sections: { outro: 'Bye.', hook: 'Hello there.', headlines: '' },
    });

    expect(text).toBe('Hello there. Bye.');
  });
});

describe('chunkForSpeech', () => {
  it('should pack sentences up to the limit', () => {
    expect(chunkForSpeech('One. Two. Three.', 9)).toEqual(['One. Two.', 'Three.']);
  });

  it('should cut a sentence longer than the limit', () => {
    expect(chunkForSpeech('abcdefghijk', 5)).toEqual(['abcde', 'fghij', 'k']);
  });
});
