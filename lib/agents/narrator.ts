/**
 * Narrator Agent - Reads the final script aloud through the speech oracle
 */

import { BaseAgent } from './base';
import { FinalScript } from '../types';
import { SpeechSynthesizer } from '../tools/tts';
import { assembleNarration } from '../tools/narration';
import { StorageTool } from '../tools/storage';
import { Logger, errorMessage, estimateReadingTime } from '../utils';

export interface NarratorInput {
  script: FinalScript;
  run_timestamp: string;
}

export interface NarratorOutput {
  audio_path: string | null;
  characters: number;
  estimated_seconds: number;
  skipped_reason?: 'empty_text' | 'synthesis_failed';
}

export function speechPath(runTimestamp: string): string {
  return `speech/${runTimestamp}_speech.mp3`;
}

export class NarratorAgent extends BaseAgent<NarratorInput, NarratorOutput> {
  constructor(storage: StorageTool, private synthesizer: SpeechSynthesizer) {
    super({ name: 'NarratorAgent', retries: 1 }, storage);
  }

  protected async process(input: NarratorInput): Promise<NarratorOutput> {
    const text = assembleNarration(input.script);
    const estimated_seconds = estimateReadingTime(text);

    if (!text) {
      Logger.warn('Narration text is empty, skipping speech');
      return { audio_path: null, characters: 0, estimated_seconds, skipped_reason: 'empty_text' };
    }

    // A speech failure skips audio; the script snapshot is already written
    let audio: Buffer;
    try {
      audio = await this.synthesizer.synthesize(text);
      this.apiCallCount++;
    } catch (error) {
      Logger.error('🔇 Speech synthesis failed, skipping audio', { error: errorMessage(error) });
      return { audio_path: null, characters: text.length, estimated_seconds, skipped_reason: 'synthesis_failed' };
    }

    const audio_path = await this.writeSnapshot(speechPath(input.run_timestamp), audio, 'audio/mpeg');
    return { audio_path, characters: text.length, estimated_seconds };
  }
}
