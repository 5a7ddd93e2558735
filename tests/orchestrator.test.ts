/**
 * End-to-end pipeline runs against fake sources, oracles and speech, with local storage
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { Orchestrator, OrchestratorDeps, PipelineOracles } from '../lib/orchestrator';
import { DEFAULT_SETTINGS } from '../lib/config';
import { DEFAULT_LEDGER_PATH } from '../lib/tools/ledger';
import { SourceAdapter } from '../lib/tools/sources';
import { StorageTool } from '../lib/tools/storage';
import { PipelineSettings, RawSourceRecord } from '../lib/types';
import { FailingWriteStorage, RecordingSynthesizer, ScriptedOracle, fixedOracle, localStorage, makeTempDir, removeDir } from './fakes';

const NOW = new Date('2024-06-01T12:00:00Z');
const TS = '20240601_120000';

const SETTINGS: PipelineSettings = { ...DEFAULT_SETTINGS, top_count: 2, brand_name: 'Test Brand' };

const RECORDS: RawSourceRecord[] = [
  { title: 'Story A', description: 'About A', link: 'https://x.test/a', published_at: '2024-06-01T11:00:00Z' },
  { title: 'Story B', description: 'About B', link: 'https://x.test/b', published_at: '2024-06-01T10:00:00Z' },
  { title: 'Story C', description: 'About C', link: 'https://x.test/c', published_at: 1717228800 },
  { title: 'Story D', description: 'About D', link: 'https://x.test/d', published_at: '2024-05-30T20:00:00Z' },
];

const RANKING = `STORY 1
Importance: 5
Entertainment: 4
Combined: 40
Reasoning: Local interest.
STORY 2
Importance: 9
Entertainment: 8
Combined: 90
Reasoning: National impact.`;

const DRAFT = `[HOOK]
Good evening.
[HEADLINES]
Two stories tonight.
[MAIN_STORY_1]
Story B leads.
[OUTRO]
That is all.`;

function titles(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((entry: unknown) =>
    typeof entry === 'object' && entry !== null && 'title' in entry ? entry.title : undefined
  );
}

function staticSource(records: RawSourceRecord[]): SourceAdapter {
  return { name: 'static', fetch: async () => records.map(record => ({ ...record, source: 'static' })) };
}

// Rewrites each section once, then returns the same text so the loop stalls
function sectionReviser(): ScriptedOracle {
  return new ScriptedOracle(request => {
    const key = /revising the "([^"]+)" segment/.exec(request)?.[1] ?? 'unknown';
    return `Revised ${key} text.`;
  });
}

function oracles(overrides: Partial<PipelineOracles> = {}): PipelineOracles {
  return {
    ranking: fixedOracle(RANKING),
    writer: fixedOracle(DRAFT),
    critic: fixedOracle('Make it crisper.'),
    reviser: sectionReviser(),
    ...overrides,
  };
}

describe('Orchestrator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function deps(storage: StorageTool, extra: Partial<OrchestratorDeps> = {}): OrchestratorDeps {
    return {
      storage,
      sources: [staticSource(RECORDS)],
      oracles: oracles(),
      synthesizer: new RecordingSynthesizer(),
      clock: () => NOW,
      ...extra,
    };
  }

  async function readJson(relative: string): Promise<unknown> {
    return JSON.parse(await fs.readFile(path.join(dir, relative), 'utf-8'));
  }

  it('should run every stage and write each snapshot', async () => {
    const synthesizer = new RecordingSynthesizer();
    const writer = fixedOracle(DRAFT);
    const result = await new Orchestrator(SETTINGS, deps(localStorage(dir), { synthesizer, oracles: oracles({ writer }) })).run();

    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.metrics.fetched).toBe(4);
    expect(result.metrics.freshness).toEqual({ admitted: 3, old: 1, duplicate: 0, missing_date: 0 });
    expect(result.metrics.selected).toBe(2);

    expect(result.script).toEqual({
      metadata: { brand: 'Test Brand', generated_at: '2024-06-01T12:00:00.000Z', refinement_iterations: 3 },
      sections: {
        hook: 'Revised hook text.',
        headlines: 'Revised headlines text.',
        main_story_1: 'Revised main story 1 text.',
        outro: 'Revised outro text.',
      },
    });

    // Highest combined score first; the unscored story keeps its place after
    const top = await readJson(`top_news/top_stories_${TS}.json`);
    expect(titles(top)).toEqual(['Story B', 'Story A']);
    expect(writer.requests[0]).toContain('- Story B: About B\n- Story A: About A');

    const news = await readJson(`news/all_news_${TS}.json`);
    expect(titles(news)).toHaveLength(3);

    expect(result.script_path).toBe(path.join(dir, 'narration', `final_narration_${TS}.json`));
    expect(await readJson(`narration/final_narration_${TS}.json`)).toEqual(result.script);

    expect(await fs.readFile(path.join(dir, 'temp_refine', 'section_hook', 'iteration_1.txt'), 'utf-8')).toBe(
      'Revised hook text.'
    );

    expect(synthesizer.texts).toEqual([
      'Revised hook text. Revised headlines text. Revised main story 1 text. Revised outro text.',
    ]);
    expect(result.audio_path).toBe(path.join(dir, 'speech', `${TS}_speech.mp3`));
    expect(await fs.readFile(path.join(dir, 'speech', `${TS}_speech.mp3`), 'utf-8')).toBe('mp3-bytes');

    const ledger = await readJson(DEFAULT_LEDGER_PATH);
    expect(Array.isArray(ledger) && ledger.length).toBe(3);

    expect(result.metrics.api_calls).toEqual({
      AggregationAgent: 0,
      RankingAgent: 1,
      ScriptwriterAgent: 1,
      RefinementAgent: 16,
      NarratorAgent: 1,
    });
    expect(await fs.readFile(path.join(dir, 'runs', result.run_id, 'agents', 'RankingAgent.json'), 'utf-8')).toContain(
      '"agent": "RankingAgent"'
    );
  });

  it('should find nothing new on a second run over the same items', async () => {
    const storage = localStorage(dir);
    expect((await new Orchestrator(SETTINGS, deps(storage)).run()).success).toBe(true);

    const second = await new Orchestrator(SETTINGS, deps(storage)).run();

    expect(second.success).toBe(false);
    expect(second.failed_stage).toBe('aggregation');
    expect(second.error).toBe('No fresh news items after filtering');
    expect(second.metrics.freshness).toEqual({ admitted: 0, old: 1, duplicate: 3, missing_date: 0 });
  });

  it('should fail aggregation when the ledger cannot be written', async () => {
    const storage = new FailingWriteStorage(dir, 'state/');
    const ranking = fixedOracle(RANKING);

    const result = await new Orchestrator(SETTINGS, deps(storage, { oracles: oracles({ ranking }) })).run();

    expect(result.success).toBe(false);
    expect(result.failed_stage).toBe('aggregation');
    expect(result.error).toContain(`Failed to write fingerprint ledger at ${DEFAULT_LEDGER_PATH}`);
    expect(ranking.calls).toBe(0);
  });

  it('should still rank every item when the ranking oracle fails', async () => {
    const ranking = new ScriptedOracle(() => {
      throw new Error('request timed out');
    });

    const result = await new Orchestrator(SETTINGS, deps(localStorage(dir), { oracles: oracles({ ranking }) })).run();

    expect(result.success).toBe(true);
    const top = await readJson(`top_news/top_stories_${TS}.json`);
    expect(titles(top)).toEqual(['Story A', 'Story B']);
  });

  it('should fail the scripting stage when the draft has no sections', { timeout: 10000 }, async () => {
    const result = await new Orchestrator(
      SETTINGS,
      deps(localStorage(dir), { oracles: oracles({ writer: fixedOracle('I cannot help with that.') }) })
    ).run();

    expect(result.success).toBe(false);
    expect(result.failed_stage).toBe('scripting');
    expect(result.error).toBe('Draft script contained no sections');
  });

  it('should keep the script when speech synthesis fails', async () => {
    const result = await new Orchestrator(
      SETTINGS,
      deps(localStorage(dir), { synthesizer: new RecordingSynthesizer(true) })
    ).run();

    expect(result.success).toBe(true);
    expect(result.audio_path).toBeUndefined();
    expect(result.script_path).toBe(path.join(dir, 'narration', `final_narration_${TS}.json`));
  });
});
