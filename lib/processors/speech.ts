/**
 * Speech synthesis using the OpenAI speech API
 * Renders text to an MP3 file; long text is split into request-sized pieces
 */

import OpenAI from 'openai';
import type { SpeechCreateParams } from 'openai/resources/audio/speech';
import { writeFile } from 'fs/promises';
import type { SpeakdocConfig, SpeechVoice } from '@/lib/config';
import { SynthesisError, errorMessage } from '@/lib/errors';

export interface SpeechSynthesizer {
  /**
   * Resolves once the audio file at `outPath` is completely written.
   */
  synthesize(text: string, outPath: string, signal?: AbortSignal): Promise<void>;
}

/**
 * The slice of the OpenAI client this module needs
 */
export interface SpeechClient {
  audio: {
    speech: {
      create(
        body: SpeechCreateParams,
        options?: { signal?: AbortSignal }
      ): PromiseLike<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
}

// The API rejects inputs over 4096 characters
export const MAX_SPEECH_INPUT_CHARS = 4000;

/**
 * Split text at whitespace into pieces no longer than `maxChars`.
 * A single word longer than the limit is hard-split.
 */
export function splitSpeechInput(text: string, maxChars: number = MAX_SPEECH_INPUT_CHARS): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (word.length > maxChars) {
      if (current) {
        pieces.push(current);
        current = '';
      }
      for (let i = 0; i < word.length; i += maxChars) {
        pieces.push(word.slice(i, i + maxChars));
      }
      continue;
    }

    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= maxChars) {
      current = candidate;
    } else {
      pieces.push(current);
      current = word;
    }
  }

  if (current) {
    pieces.push(current);
  }

  return pieces;
}

export interface OpenAISpeechOptions {
  model: string;
  voice: SpeechVoice;
}

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  constructor(
    private readonly client: SpeechClient,
    private readonly options: OpenAISpeechOptions
  ) {}

  async synthesize(text: string, outPath: string, signal?: AbortSignal): Promise<void> {
    const pieces = splitSpeechInput(text);
    if (pieces.length === 0) {
      throw new SynthesisError('Nothing to synthesize: text has no words');
    }

    const buffers: Buffer[] = [];
    try {
      for (const piece of pieces) {
        const response = await this.client.audio.speech.create(
          {
            model: this.options.model,
            voice: this.options.voice,
            input: piece,
            response_format: 'mp3',
          },
          { signal }
        );
        buffers.push(Buffer.from(await response.arrayBuffer()));
      }
    } catch (error) {
      console.error('[Speech] Error synthesizing speech:', error);
      throw new SynthesisError(`Failed to synthesize speech: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    // MP3 is frame-based, so request outputs can be joined byte-wise
    try {
      await writeFile(outPath, Buffer.concat(buffers));
    } catch (error) {
      throw new SynthesisError(`Failed to write audio: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * A fresh synthesizer with its own client. Instances are never shared between
 * concurrently running jobs or workers.
 */
export function createSpeechSynthesizer(config: SpeakdocConfig): SpeechSynthesizer {
  if (!config.openaiApiKey) {
    throw new SynthesisError('OPENAI_API_KEY is not set');
  }

  const client = new OpenAI({ apiKey: config.openaiApiKey });
  return new OpenAISpeechSynthesizer(client, {
    model: config.ttsModel,
    voice: config.ttsVoice,
  });
}
