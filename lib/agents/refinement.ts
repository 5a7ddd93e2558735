/**
 * Refinement Agent - Runs every draft section through critique/revision, then builds the final script
 */

import { BaseAgent } from './base';
import { FinalScript, ScriptDraft } from '../types';
import { Oracle } from '../tools/oracle';
import { RefinementOutcome, StallReason, refineSection } from '../tools/refinement-loop';
import { buildFinalScript } from '../tools/narration';
import { StorageTool } from '../tools/storage';
import { Logger, errorMessage } from '../utils';

export interface RefinementInput {
  draft: ScriptDraft;
  max_iterations: number;
  brand_name: string;
  generated_at: string; // ISO-8601
  run_timestamp: string;
}

export interface SectionReport {
  key: string;
  iterations: number;
  outcome: RefinementOutcome | 'FAILED';
  reason?: StallReason;
}

export interface RefinementOutput {
  script: FinalScript;
  sections: SectionReport[];
  script_path: string | null;
}

export function refinementSnapshotPath(key: string, iteration: number): string {
  return `temp_refine/section_${key}/iteration_${iteration}.txt`;
}

export class RefinementAgent extends BaseAgent<RefinementInput, RefinementOutput> {
  constructor(
    storage: StorageTool,
    private critic: Oracle,
    private reviser: Oracle
  ) {
    super({ name: 'RefinementAgent', retries: 1 }, storage);
  }

  protected async process(input: RefinementInput): Promise<RefinementOutput> {
    const refined: Record<string, string> = {};
    const reports: SectionReport[] = [];

    for (const [key, text] of Object.entries(input.draft)) {
      Logger.info(`🔁 Refining section ${key}`, { length: text.length });

      // One section failing must not take the others down with it
      try {
        const result = await refineSection(text, {
          key,
          critic: this.critic,
          reviser: this.reviser,
          maxIterations: input.max_iterations,
          onIteration: async ({ iteration, text: accepted }) => {
            await this.storage.put(refinementSnapshotPath(key, iteration), accepted, 'text/plain');
          },
        });

        refined[key] = result.text;
        reports.push({ key, iterations: result.iterations, outcome: result.outcome, reason: result.reason });
        this.apiCallCount += result.transitions.filter(
          phase => phase === 'CRITIQUING' || phase === 'REVISING'
        ).length;
      } catch (error) {
        Logger.error(`Refinement of ${key} failed, keeping draft text`, { error: errorMessage(error) });
        refined[key] = text;
        reports.push({ key, iterations: 0, outcome: 'FAILED' });
      }
    }

    const script = buildFinalScript(refined, {
      brand: input.brand_name,
      generatedAt: new Date(input.generated_at),
      refinementIterations: input.max_iterations,
    });

    const script_path = await this.writeSnapshot(
      `narration/final_narration_${input.run_timestamp}.json`,
      JSON.stringify(script, null, 2)
    );

    return { script, sections: reports, script_path };
  }
}
