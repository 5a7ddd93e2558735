/**
 * TTS Tool - Text-to-speech using OpenAI
 */

import OpenAI from 'openai';
import { Config } from '../config';
import { Logger, errorMessage } from '../utils';
import { createSpeech } from '../utils/openai-helper';

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<Buffer>;
}

export type TtsVoice = OpenAI.Audio.SpeechCreateParams['voice'];

export interface TtsOptions {
  model?: string;
  voice?: TtsVoice;
  speed?: number;
  client?: OpenAI;
}

// OpenAI's speech endpoint takes at most 4096 characters per request
export const TTS_CHUNK_LIMIT = 4000;

/**
 * Splits on sentence boundaries so no chunk exceeds `limit` characters.
 * A single sentence longer than the limit is cut hard.
 */
export function chunkForSpeech(text: string, limit = TTS_CHUNK_LIMIT): string[] {
  const sentences = text.split(/(?<=[.!?])\s+/).filter(Boolean);
  const chunks: string[] = [];
  let current = '';

  for (const sentence of sentences) {
    if (sentence.length > limit) {
      if (current) {
        chunks.push(current);
        current = '';
      }
      for (let i = 0; i < sentence.length; i += limit) {
        chunks.push(sentence.slice(i, i + limit));
      }
      continue;
    }

    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length > limit) {
      chunks.push(current);
      current = sentence;
    } else {
      current = candidate;
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

function isVoice(value: string): value is TtsVoice {
  return ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'].includes(value);
}

export class TtsTool implements SpeechSynthesizer {
  private client: OpenAI;
  private model: string;
  private voice: TtsVoice;
  private speed: number;

  constructor(options: TtsOptions = {}) {
    this.client = options.client ?? new OpenAI({
      apiKey: Config.OPENAI_API_KEY,
      maxRetries: 0,
    });
    this.model = options.model ?? Config.TTS_MODEL;
    this.voice = options.voice ?? (isVoice(Config.TTS_VOICE) ? Config.TTS_VOICE : 'onyx');
    this.speed = options.speed ?? 0.95; // Slightly slower for a natural newsreader pace
  }

  async synthesize(text: string): Promise<Buffer> {
    const chunks = chunkForSpeech(text);

    Logger.info('🔊 Starting TTS synthesis', {
      voice: this.voice,
      textLength: text.length,
      chunks: chunks.length,
    });

    const buffers: Buffer[] = [];
    for (const chunk of chunks) {
      try {
        const response = await createSpeech(
          this.client,
          {
            model: this.model,
            voice: this.voice,
            input: chunk,
            response_format: 'mp3',
            speed: this.speed,
          },
          {
            maxRetries: 3,
            initialDelayMs: 2000,
            maxDelayMs: 15000,
            backoffMultiplier: 2,
          },
          { timeout: Config.ORACLE_TIMEOUT_MS }
        );

        const arrayBuffer = await response.arrayBuffer();
        buffers.push(Buffer.from(arrayBuffer));
      } catch (error) {
        Logger.error('❌ TTS synthesis error', {
          error: errorMessage(error),
          voice: this.voice,
          chunkLength: chunk.length,
        });
        throw error;
      }
    }

    const audio = Buffer.concat(buffers);
    if (audio.length === 0) {
      throw new Error('OpenAI TTS returned empty audio buffer');
    }

    Logger.info('✅ TTS synthesis complete', { bufferSize: audio.length });
    return audio;
  }
}
