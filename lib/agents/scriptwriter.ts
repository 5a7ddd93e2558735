/**
 * Scriptwriter Agent - Drafts the bracket-delimited broadcast script and splits it into sections
 */

import { BaseAgent } from './base';
import { RankedItem, ScriptDraft } from '../types';
import { Oracle, callSafely } from '../tools/oracle';
import { splitSections } from '../tools/sections';
import { StorageTool } from '../tools/storage';
import { Logger } from '../utils';

export interface ScriptwriterInput {
  stories: RankedItem[];
  brand_name: string;
}

export interface ScriptwriterOutput {
  draft: ScriptDraft;
  section_keys: string[];
  raw_length: number;
}

export const MAX_MAIN_STORIES = 3;

export function draftSectionLabels(storyCount: number): string[] {
  const mainStories = Math.min(MAX_MAIN_STORIES, Math.max(0, storyCount));
  return [
    'HOOK',
    'HEADLINES',
    ...Array.from({ length: mainStories }, (_, i) => `MAIN_STORY_${i + 1}`),
    'OUTRO',
  ];
}

export function buildDraftPrompt(stories: RankedItem[], brandName: string): string {
  const labels = draftSectionLabels(stories.length);
  const storyDetails = stories
    .map(story => `- ${story.title}: ${story.description}`)
    .join('\n');

  return `You are a professional news scriptwriter for "${brandName}". Write a spoken news broadcast script.

STRICT RULES:
1. Use ONLY these sections, each header alone on its own line: ${labels.map(label => `[${label}]`).join(', ')}
2. Output ONLY the narration that will be read aloud
3. NEVER include reasoning, visual directions, production notes or revision comments
4. Use concise spoken English with proper punctuation
5. Keep a neutral tone with clear subject-verb-object sentences
6. The main stories cover the top stories in the order given

TOP STORIES:
${storyDetails}

FORMAT:
${labels.map(label => `[${label}]\n...`).join('\n\n')}`;
}

export class ScriptwriterAgent extends BaseAgent<ScriptwriterInput, ScriptwriterOutput> {
  constructor(storage: StorageTool, private writer: Oracle) {
    super({ name: 'ScriptwriterAgent', retries: 2 }, storage);
  }

  protected async process(input: ScriptwriterInput): Promise<ScriptwriterOutput> {
    const { stories, brand_name } = input;

    Logger.info('✍️ Drafting script', { stories: stories.length });

    const raw = await callSafely(this.writer, buildDraftPrompt(stories, brand_name), 'Draft');
    this.apiCallCount++;

    const draft = splitSections(raw);
    const section_keys = Object.keys(draft);

    // An empty split is retried, then fails the stage
    if (section_keys.length === 0) {
      throw new Error('Draft script contained no sections');
    }

    const expected = draftSectionLabels(stories.length).map(label => label.toLowerCase());
    const missing = expected.filter(key => !(key in draft));
    if (missing.length > 0) {
      Logger.warn('Draft is missing expected sections', { missing });
    }

    return { draft, section_keys, raw_length: raw.length };
  }
}
