/**
 * Main API endpoint - Triggers the news narration pipeline
 *
 * POST /api/run
 * Called by the scheduler or manually; `x-cron-secret` must match CRON_SECRET when one is set
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { Config } from '../lib/config';
import { Orchestrator, OrchestratorOutput } from '../lib/orchestrator';
import { PipelineSettings } from '../lib/types';
import { Logger } from '../lib/utils';
import { ApiRequest, ApiResponse, firstValue } from '../lib/http/types';

export interface PipelineRunner {
  run(): Promise<OrchestratorOutput>;
}

export type RunnerFactory = (settings: PipelineSettings) => PipelineRunner;

const defaultFactory: RunnerFactory = settings => new Orchestrator(settings);

function positiveNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export async function handleRun(
  req: ApiRequest,
  res: ApiResponse,
  createRunner: RunnerFactory = defaultFactory,
  cronSecret: string = Config.CRON_SECRET
): Promise<ApiResponse> {
  if (req.method !== 'POST') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  if (cronSecret && firstValue(req.headers['x-cron-secret']) !== cronSecret) {
    Logger.warn('Rejected /api/run without a valid cron secret');
    return res.status(401).json({ error: 'Unauthorized' });
  }

  const settings = Config.getPipelineSettings({
    max_age_hours: positiveNumber(firstValue(req.query.window)),
    top_count: positiveNumber(firstValue(req.query.top)),
  });

  Logger.info('🌐 API /run triggered', { settings });

  const result = await createRunner(settings).run();

  if (!result.success) {
    return res.status(500).json({
      success: false,
      run_id: result.run_id,
      error: result.error,
      failed_stage: result.failed_stage,
      metrics: result.metrics,
    });
  }

  return res.status(200).json({
    success: true,
    run_id: result.run_id,
    script: result.script
      ? {
          brand: result.script.metadata.brand,
          generated_at: result.script.metadata.generated_at,
          sections: Object.keys(result.script.sections),
        }
      : null,
    script_path: result.script_path ?? null,
    audio_path: result.audio_path ?? null,
    metrics: result.metrics,
  });
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  await handleRun(req, res);
}
