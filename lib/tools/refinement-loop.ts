/**
 * Refinement loop - per-section critique -> revise -> accept/stop state machine
 *
 *   DRAFTED -> CRITIQUING -> REVISING -> IMPROVED (back to CRITIQUING)
 *                                     -> STALLED   (terminal)
 *                                     -> EXHAUSTED (terminal)
 */

import { Oracle, callSafely } from './oracle';
import { Logger } from '../utils';

export type RefinementPhase = 'DRAFTED' | 'CRITIQUING' | 'REVISING' | 'IMPROVED' | 'STALLED' | 'EXHAUSTED';
export type RefinementOutcome = Extract<RefinementPhase, 'STALLED' | 'EXHAUSTED'>;

export type StallReason = 'empty_text' | 'empty_critique' | 'empty_revision' | 'no_change';

export interface RefinementIteration {
  key: string;
  iteration: number;
  critique: string;
  text: string;
}

export interface RefinementOptions {
  key: string;
  critic: Oracle;
  reviser: Oracle;
  maxIterations: number;
  /**
   * Called after each accepted improvement. Errors are logged, never propagated.
   */
  onIteration?: (iteration: RefinementIteration) => Promise<void> | void;
}

export interface RefinementResult {
  key: string;
  text: string;
  iterations: number;
  outcome: RefinementOutcome;
  reason?: StallReason;
  /** Texts that were current before each accepted improvement, oldest first */
  history: string[];
  transitions: RefinementPhase[];
}

function normalizeForComparison(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * A revision counts only if it is non-empty and differs from the current text
 * once both are trimmed and case-folded.
 */
export function isImproved(current: string, candidate: string): boolean {
  if (!candidate || !candidate.trim()) {
    return false;
  }
  return normalizeForComparison(candidate) !== normalizeForComparison(current);
}

export function buildCritiquePrompt(key: string, text: string): string {
  return `You are a broadcast news editor reviewing the "${key}" segment of a spoken news script.

SEGMENT:
${text}

List the concrete problems with this segment: factual vagueness, awkward phrasing for speech, pacing, redundancy, or tone.
Be specific and brief. If the segment needs no changes, reply with nothing at all.`;
}

export function buildRevisionPrompt(key: string, text: string, critique: string): string {
  return `You are revising the "${key}" segment of a spoken news script.

CURRENT SEGMENT:
${text}

EDITOR CRITIQUE:
${critique}

Rewrite the segment to address the critique. Limit your changes to what the critique asks for and keep everything else as it is.
Return only the revised segment text, with no headings, notes or commentary.`;
}

export async function refineSection(initialText: string, options: RefinementOptions): Promise<RefinementResult> {
  const { key, critic, reviser, maxIterations, onIteration } = options;
  const transitions: RefinementPhase[] = ['DRAFTED'];
  const history: string[] = [];
  let current = initialText;
  let iterations = 0;

  const finish = (outcome: RefinementOutcome, reason?: StallReason): RefinementResult => {
    transitions.push(outcome);
    Logger.info(`Refinement of ${key} ${outcome.toLowerCase()}`, { key, iterations, reason });
    return { key, text: current, iterations, outcome, reason, history, transitions };
  };

  if (!current || !current.trim()) {
    return finish('STALLED', 'empty_text');
  }

  if (maxIterations <= 0) {
    return finish('EXHAUSTED');
  }

  while (iterations < maxIterations) {
    transitions.push('CRITIQUING');
    const critique = (await callSafely(critic, buildCritiquePrompt(key, current), 'Critique')).trim();
    if (!critique) {
      Logger.warn('Empty critique, stopping refinement', { key, iteration: iterations + 1 });
      return finish('STALLED', 'empty_critique');
    }

    transitions.push('REVISING');
    const revision = (await callSafely(reviser, buildRevisionPrompt(key, current, critique), 'Revision')).trim();
    if (!revision) {
      Logger.warn('Empty revision, keeping current text', { key, iteration: iterations + 1 });
      return finish('STALLED', 'empty_revision');
    }

    if (!isImproved(current, revision)) {
      return finish('STALLED', 'no_change');
    }

    transitions.push('IMPROVED');
    history.push(current);
    current = revision;
    iterations++;

    if (onIteration) {
      try {
        await onIteration({ key, iteration: iterations, critique, text: current });
      } catch (error) {
        Logger.warn('Refinement snapshot failed', {
          key,
          iteration: iterations,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  return finish('EXHAUSTED');
}
