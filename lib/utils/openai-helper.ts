/**
 * OpenAI API Helper with Rate Limiting and Retry Logic
 */

import OpenAI from 'openai';
import { Logger, sleep } from '../utils';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

function statusOf(error: unknown): number | undefined {
  return error instanceof OpenAI.APIError ? error.status : undefined;
}

function codeOf(error: unknown): string | null | undefined {
  return error instanceof OpenAI.APIError ? error.code : undefined;
}

export function isRetryableError(error: unknown): boolean {
  const status = statusOf(error);
  const message = error instanceof Error ? error.message : '';
  const isRateLimit =
    status === 429 ||
    codeOf(error) === 'rate_limit_exceeded' ||
    message.includes('rate limit');

  return isRateLimit || status === 500 || status === 502 || status === 503 || status === 504;
}

/**
 * Retry wrapper with exponential backoff for OpenAI API calls
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    backoffMultiplier = 2,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (!isRetryableError(error)) {
        Logger.error('Non-retryable OpenAI error', {
          attempt,
          status: statusOf(error),
          code: codeOf(error),
          error: message,
        });
        throw error;
      }

      if (attempt >= maxRetries) {
        Logger.error('Max retries exceeded', {
          maxRetries,
          lastError: message,
        });
        throw error;
      }

      const delay = Math.min(
        initialDelayMs * Math.pow(backoffMultiplier, attempt),
        maxDelayMs
      );

      // Add jitter to prevent thundering herd
      const jitter = Math.random() * 0.3 * delay;
      const finalDelay = delay + jitter;

      Logger.warn('Rate limit hit, retrying with backoff', {
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(finalDelay),
        status: statusOf(error),
      });

      await sleep(finalDelay);
    }
  }
}

/**
 * Create OpenAI chat completion with retry logic
 */
export async function createChatCompletion(
  client: OpenAI,
  params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  retryOptions?: RetryOptions,
  requestOptions?: { timeout?: number }
): Promise<OpenAI.Chat.ChatCompletion> {
  return retryWithBackoff(
    () => client.chat.completions.create(params, requestOptions),
    retryOptions
  );
}

/**
 * Create OpenAI TTS with retry logic
 */
export async function createSpeech(
  client: OpenAI,
  params: OpenAI.Audio.SpeechCreateParams,
  retryOptions?: RetryOptions,
  requestOptions?: { timeout?: number }
) {
  return retryWithBackoff(
    () => client.audio.speech.create(params, requestOptions),
    retryOptions
  );
}
