/**
 * Runtime configuration read from environment variables
 * Next.js loads .env files for the app; scripts load them via dotenv
 */

import { InvalidInputError } from '@/lib/errors';

export const SPEECH_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type SpeechVoice = (typeof SPEECH_VOICES)[number];

export interface SpeakdocConfig {
  openaiApiKey: string | undefined;
  ttsModel: string;
  ttsVoice: SpeechVoice;
  ttsTimeoutMs: number;
  wordBudget: number;
  synthesisConcurrency: number;
  workDir: string | undefined;
}

export const DEFAULT_WORD_BUDGET = 4096;
export const DEFAULT_TTS_TIMEOUT_MS = 5 * 60 * 1000;

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readVoice(): SpeechVoice {
  const raw = process.env.TTS_VOICE?.trim().toLowerCase();
  if (!raw) return 'alloy';

  const voice = SPEECH_VOICES.find((v) => v === raw);
  if (!voice) {
    throw new InvalidInputError(
      `TTS_VOICE must be one of ${SPEECH_VOICES.join(', ')}, got "${raw}"`
    );
  }
  return voice;
}

export function loadConfig(): SpeakdocConfig {
  return {
    openaiApiKey: process.env.OPENAI_API_KEY,
    ttsModel: process.env.TTS_MODEL || 'tts-1',
    ttsVoice: readVoice(),
    ttsTimeoutMs: readPositiveInt('TTS_TIMEOUT_MS', DEFAULT_TTS_TIMEOUT_MS),
    wordBudget: readPositiveInt('WORD_BUDGET', DEFAULT_WORD_BUDGET),
    synthesisConcurrency: readPositiveInt('SYNTHESIS_CONCURRENCY', 1),
    workDir: process.env.WORK_DIR || undefined,
  };
}
