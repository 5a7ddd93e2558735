/**
 * Health Check API endpoint
 *
 * GET /api/health
 * Returns storage reachability and whether OpenAI is configured
 */

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { StorageTool } from '../lib/tools/storage';
import { DEFAULT_LEDGER_PATH } from '../lib/tools/ledger';
import { Config } from '../lib/config';
import { Logger, errorMessage } from '../lib/utils';
import { ApiRequest, ApiResponse } from '../lib/http/types';

export interface HealthDeps {
  storage: StorageTool;
  openaiApiKey: string;
}

export async function handleHealth(
  req: ApiRequest,
  res: ApiResponse,
  deps: HealthDeps = { storage: new StorageTool(), openaiApiKey: Config.OPENAI_API_KEY }
): Promise<ApiResponse> {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }

  let storageOk = false;
  let lastScript: string | null = null;
  let ledgerPresent = false;

  try {
    const scripts = await deps.storage.list('narration/');
    storageOk = true;
    const latest = scripts
      .filter(obj => obj.path.endsWith('.json'))
      .sort((a, b) => b.path.localeCompare(a.path))[0];
    lastScript = latest ? latest.path : null;
    ledgerPresent = await deps.storage.exists(DEFAULT_LEDGER_PATH);
  } catch (error) {
    Logger.warn('Storage check failed', { error: errorMessage(error) });
  }

  const openaiConfigured = deps.openaiApiKey.length > 0;
  const healthy = storageOk && openaiConfigured;

  return res.status(healthy ? 200 : 503).json({
    status: healthy ? 'healthy' : 'degraded',
    timestamp: new Date().toISOString(),
    checks: {
      storage: storageOk ? 'ok' : 'error',
      storage_backend: deps.storage.backend,
      openai: openaiConfigured ? 'ok' : 'not configured',
      ledger: ledgerPresent ? 'present' : 'absent',
    },
    last_script: lastScript,
  });
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  await handleHealth(req, res);
}
