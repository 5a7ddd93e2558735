/**
 * Oracle - the single request/response contract every text-generation service sits behind
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { Logger, errorMessage } from '../utils';
import { createChatCompletion } from '../utils/openai-helper';
import { stripThinkBlocks } from './sanitize';

export interface Oracle {
  call(request: string): Promise<string>;
}

/**
 * Calls an oracle without letting it throw. Failures and timeouts read as ''.
 */
export async function callSafely(oracle: Oracle, request: string, label: string): Promise<string> {
  try {
    const response = await oracle.call(request);
    return typeof response === 'string' ? response : '';
  } catch (error) {
    Logger.warn(`${label} oracle call failed, treating as empty response`, {
      error: errorMessage(error),
    });
    return '';
  }
}

export interface OpenAIOracleOptions {
  name: string;
  model: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  client?: OpenAI;
}

export class OpenAIOracle implements Oracle {
  private client: OpenAI;
  private options: Required<Omit<OpenAIOracleOptions, 'client' | 'systemPrompt'>> & { systemPrompt?: string };

  constructor(options: OpenAIOracleOptions) {
    this.options = {
      temperature: 0.7,
      maxTokens: 4000,
      timeoutMs: Config.ORACLE_TIMEOUT_MS,
      ...options,
    };

    this.client = options.client ?? new OpenAI({
      apiKey: Config.OPENAI_API_KEY,
      maxRetries: 0, // retries happen in retryWithBackoff
    });
  }

  async call(request: string): Promise<string> {
    const { name, model, systemPrompt, temperature, maxTokens, timeoutMs } = this.options;

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: request });

    try {
      const response = await createChatCompletion(
        this.client,
        {
          model,
          messages,
          temperature,
          max_tokens: maxTokens,
        },
        {
          maxRetries: 3,
          initialDelayMs: 1000,
          maxDelayMs: 10000,
          backoffMultiplier: 2,
        },
        { timeout: timeoutMs }
      );

      const content = response.choices[0]?.message?.content || '';
      return stripThinkBlocks(content).trim();
    } catch (error) {
      Logger.warn(`${name} oracle failed, returning empty response`, {
        model,
        error: errorMessage(error),
      });
      return '';
    }
  }
}
