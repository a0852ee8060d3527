import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { SpeechSynthesizer } from '@/lib/processors/speech';

export async function makeTempDir(prefix = 'speakdoc-test-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface SynthesisCall {
  text: string;
  outPath: string;
}

export interface FakeSynthesizerOptions {
  /** 1-based call number (across the shared log) that throws */
  failOnCall?: number;
  failWith?: () => Error;
  delayFor?: (text: string) => number;
  /** Write nothing, leaving an empty file */
  emptyOutput?: boolean;
  /** Never settle until the timeout signal fires */
  hang?: boolean;
  onCall?: (call: SynthesisCall) => void;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Writes `[<trimmed text>]` to the output path instead of audio
 */
export class FakeSynthesizer implements SpeechSynthesizer {
  constructor(
    private readonly options: FakeSynthesizerOptions = {},
    readonly calls: SynthesisCall[] = []
  ) {}

  async synthesize(text: string, outPath: string, signal?: AbortSignal): Promise<void> {
    const call = { text, outPath };
    this.calls.push(call);
    this.options.onCall?.(call);

    if (this.options.failOnCall === this.calls.length) {
      throw this.options.failWith?.() ?? new Error('engine crashed');
    }

    if (this.options.hang) {
      await new Promise<void>((_, reject) => {
        signal?.addEventListener('abort', () => {
          setTimeout(() => reject(new Error('aborted')), 10);
        });
      });
    }

    const delay = this.options.delayFor?.(text) ?? 0;
    if (delay > 0) {
      await sleep(delay);
    }

    await writeFile(outPath, this.options.emptyOutput ? '' : FakeSynthesizer.render(text));
  }

  static render(text: string): string {
    return `[${text.trim()}]`;
  }
}
