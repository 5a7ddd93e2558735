/**
 * Orchestrator - Coordinates the agent pipeline
 *
 *   aggregation -> ranking -> scripting -> refinement -> narration
 */

import { Config } from './config';
import { Logger, Clock, Crypto, errorMessage } from './utils';
import { FinalScript, FreshnessCounts, PipelineSettings } from './types';
import { PipelineError, PipelineStage } from './errors';
import { StorageTool } from './tools/storage';
import { Oracle, OpenAIOracle } from './tools/oracle';
import { SpeechSynthesizer, TtsTool } from './tools/tts';
import { SourceAdapter, GoogleNewsAdapter, RssSourceAdapter, RedditSourceAdapter } from './tools/sources';
import { FeedTool } from './tools/feed';
import { LedgerStore } from './tools/ledger';
import { BaseAgent } from './agents/base';
import { AggregationAgent } from './agents/aggregation';
import { RankingAgent } from './agents/ranking';
import { ScriptwriterAgent } from './agents/scriptwriter';
import { RefinementAgent } from './agents/refinement';
import { NarratorAgent } from './agents/narrator';

export interface PipelineOracles {
  ranking: Oracle;
  writer: Oracle;
  critic: Oracle;
  reviser: Oracle;
}

export interface OrchestratorDeps {
  storage: StorageTool;
  sources: SourceAdapter[];
  oracles: PipelineOracles;
  synthesizer: SpeechSynthesizer;
  /** Reference time for the run; defaults to the wall clock */
  clock?: () => Date;
}

export interface OrchestratorOutput {
  success: boolean;
  run_id: string;
  script?: FinalScript;
  script_path?: string;
  audio_path?: string;
  error?: string;
  failed_stage?: PipelineStage;
  metrics: {
    total_time_ms: number;
    agent_times: Record<string, number>;
    api_calls: Record<string, number>;
    fetched: number;
    freshness?: FreshnessCounts;
    selected: number;
  };
}

/**
 * Production wiring: configured feeds, Google News, Reddit, OpenAI oracles and TTS
 */
export function createDefaultDeps(settings: PipelineSettings): OrchestratorDeps {
  const feeds = new FeedTool();

  return {
    storage: new StorageTool(),
    sources: [
      new GoogleNewsAdapter(feeds, {
        topic: Config.GOOGLE_NEWS_TOPIC,
        language: settings.language,
        country: settings.country,
        maxResults: settings.max_results,
      }),
      new RssSourceAdapter(feeds, Config.RSS_FEEDS),
      new RedditSourceAdapter({ subreddits: Config.REDDIT_SUBREDDITS, limit: settings.reddit_limit }),
    ],
    oracles: {
      ranking: new OpenAIOracle({ name: 'Ranking', model: Config.RANKING_MODEL, temperature: 0.2 }),
      writer: new OpenAIOracle({ name: 'Writer', model: Config.WRITER_MODEL, temperature: 0.7 }),
      critic: new OpenAIOracle({ name: 'Critic', model: Config.CRITIC_MODEL, temperature: 0.3 }),
      reviser: new OpenAIOracle({ name: 'Reviser', model: Config.REVISER_MODEL, temperature: 0.5 }),
    },
    synthesizer: new TtsTool(),
  };
}

export class Orchestrator {
  private storage: StorageTool;
  private clock: () => Date;

  private aggregationAgent: AggregationAgent;
  private rankingAgent: RankingAgent;
  private scriptwriterAgent: ScriptwriterAgent;
  private refinementAgent: RefinementAgent;
  private narratorAgent: NarratorAgent;

  constructor(private settings: PipelineSettings, deps: OrchestratorDeps = createDefaultDeps(settings)) {
    this.storage = deps.storage;
    this.clock = deps.clock ?? Clock.nowUtc;

    this.aggregationAgent = new AggregationAgent(deps.storage, deps.sources, new LedgerStore(deps.storage));
    this.rankingAgent = new RankingAgent(deps.storage, deps.oracles.ranking);
    this.scriptwriterAgent = new ScriptwriterAgent(deps.storage, deps.oracles.writer);
    this.refinementAgent = new RefinementAgent(deps.storage, deps.oracles.critic, deps.oracles.reviser);
    this.narratorAgent = new NarratorAgent(deps.storage, deps.synthesizer);
  }

  /**
   * Runs every stage in order. Never throws: failures come back as `success: false`.
   */
  async run(): Promise<OrchestratorOutput> {
    const startTime = Date.now();
    const now = this.clock();
    const runTimestamp = Clock.runTimestamp(now);
    const runId = `${runTimestamp}_${Crypto.uuid().slice(0, 8)}`;
    const agentTimes: Record<string, number> = {};
    const { settings } = this;

    const output: OrchestratorOutput = {
      success: false,
      run_id: runId,
      metrics: {
        total_time_ms: 0,
        agent_times: agentTimes,
        api_calls: {},
        fetched: 0,
        selected: 0,
      },
    };

    Logger.info('🚀 ORCHESTRATOR START', { runId, storage: this.storage.backend, settings });

    let stage: PipelineStage = 'aggregation';

    const timed = async <I, O>(agent: BaseAgent<I, O>, input: I): Promise<O> => {
      const message = await agent.execute(runId, input);
      agentTimes[agent.name] = message.duration_ms ?? 0;
      if (message.output === undefined) {
        throw new PipelineError(stage, `${agent.name} produced no output`);
      }
      return message.output;
    };

    try {
      // Stage 1: aggregation
      const aggregation = await timed(this.aggregationAgent, {
        max_age_hours: settings.max_age_hours,
        retention_cap: settings.retention_cap,
        now: now.toISOString(),
        run_timestamp: runTimestamp,
      });
      output.metrics.fetched = aggregation.fetched;
      output.metrics.freshness = aggregation.counts;

      if (aggregation.items.length === 0) {
        throw new PipelineError('aggregation', 'No fresh news items after filtering');
      }

      // Stage 2: ranking
      stage = 'ranking';
      const ranking = await timed(this.rankingAgent, {
        items: aggregation.items,
        target_count: settings.top_count,
        run_timestamp: runTimestamp,
      });
      output.metrics.selected = ranking.picks.length;

      // Stage 3: draft
      stage = 'scripting';
      const draft = await timed(this.scriptwriterAgent, {
        stories: ranking.picks,
        brand_name: settings.brand_name,
      });

      // Stage 4: refinement + sanitization
      stage = 'refinement';
      const refinement = await timed(this.refinementAgent, {
        draft: draft.draft,
        max_iterations: settings.max_refine_iterations,
        brand_name: settings.brand_name,
        generated_at: now.toISOString(),
        run_timestamp: runTimestamp,
      });
      output.script = refinement.script;
      output.script_path = refinement.script_path ?? undefined;

      // Stage 5: speech
      stage = 'narration';
      const narration = await timed(this.narratorAgent, {
        script: refinement.script,
        run_timestamp: runTimestamp,
      });
      output.audio_path = narration.audio_path ?? undefined;

      output.success = true;
    } catch (error) {
      output.error = errorMessage(error);
      output.failed_stage = error instanceof PipelineError ? error.stage : stage;
      Logger.error('❌ Pipeline failed', { runId, stage: output.failed_stage, error: output.error });
    }

    output.metrics.api_calls = BaseAgent.getApiCalls(runId);
    output.metrics.total_time_ms = Date.now() - startTime;
    BaseAgent.clearApiCalls(runId);

    Logger.info(output.success ? '✅ ORCHESTRATOR COMPLETE' : '🛑 ORCHESTRATOR STOPPED', {
      runId,
      success: output.success,
      total_time_ms: output.metrics.total_time_ms,
      script_path: output.script_path,
      audio_path: output.audio_path,
    });

    return output;
  }
}
