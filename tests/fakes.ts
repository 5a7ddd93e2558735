/**
 * In-process stand-ins for oracles, speech and storage used across suites
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Oracle } from '../lib/tools/oracle';
import { SpeechSynthesizer } from '../lib/tools/tts';
import { StorageTool } from '../lib/tools/storage';

export class ScriptedOracle implements Oracle {
  readonly requests: string[] = [];

  constructor(private respond: (request: string, call: number) => string | Promise<string>) {}

  get calls(): number {
    return this.requests.length;
  }

  async call(request: string): Promise<string> {
    this.requests.push(request);
    return this.respond(request, this.requests.length);
  }
}

export function fixedOracle(response: string): ScriptedOracle {
  return new ScriptedOracle(() => response);
}

export class RecordingSynthesizer implements SpeechSynthesizer {
  readonly texts: string[] = [];

  constructor(private fail = false) {}

  async synthesize(text: string): Promise<Buffer> {
    this.texts.push(text);
    if (this.fail) {
      throw new Error('speech service unavailable');
    }
    return Buffer.from('mp3-bytes');
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'narration-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function localStorage(rootDir: string): StorageTool {
  return new StorageTool({ backend: 'local', rootDir });
}

/**
 * Local storage that refuses writes under one prefix
 */
export class FailingWriteStorage extends StorageTool {
  constructor(rootDir: string, private failingPrefix: string) {
    super({ backend: 'local', rootDir });
  }

  async put(storagePath: string, data: Buffer | string, contentType: string): Promise<string> {
    if (storagePath.startsWith(this.failingPrefix)) {
      throw new Error(`EACCES: permission denied, open '${storagePath}'`);
    }
    return super.put(storagePath, data, contentType);
  }
}
