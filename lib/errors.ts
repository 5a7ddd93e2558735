/**
 * Fatal pipeline errors. Everything else degrades to a default value.
 */

export type PipelineStage = 'aggregation' | 'ranking' | 'scripting' | 'refinement' | 'narration';

export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.stage = stage;
  }
}

/**
 * Raised when the fingerprint ledger cannot be written back.
 * Losing dedup state would let already-covered stories back in on the next run.
 */
export class LedgerWriteError extends PipelineError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('aggregation', `Failed to write fingerprint ledger at ${path}: ${reason}`, { cause });
    this.name = 'LedgerWriteError';
    this.path = path;
  }
}
