/**
 * Conversion pipeline: extract → chunk → synthesize each chunk → merge
 * One invocation owns one job directory; nothing outside it is written
 * except the final artifact at `targetPath`.
 */

import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import type { AudioSegment, MergedAudio, PipelineProgress, TextChunk } from '@/types';
import { planChunks, DEFAULT_WORD_BUDGET } from '@/lib/chunking';
import { mergeAudioSegments } from '@/lib/audio/merge';
import { mapWithConcurrency, withTimeout } from '@/lib/concurrency';
import { DEFAULT_TTS_TIMEOUT_MS } from '@/lib/config';
import {
  ConversionCancelledError,
  InvalidInputError,
  SpeakdocError,
  SynthesisError,
  errorMessage,
} from '@/lib/errors';
import { getTextExtractor, type TextExtractor } from './document';
import type { SpeechSynthesizer } from './speech';

export interface ConversionPipelineDeps {
  /** Called once per job, and once per worker when synthesis runs concurrently */
  createSynthesizer: () => SpeechSynthesizer;
  getExtractor?: (filename: string) => TextExtractor;
  wordBudget?: number;
  concurrency?: number;
  synthesisTimeoutMs?: number;
}

export interface ConversionRequest {
  jobId: string;
  sourcePath: string;
  targetPath: string;
  jobDir: string;
  signal?: AbortSignal;
  onProgress?: (progress: PipelineProgress) => void;
}

export const SOURCE_TEXT_FILE = 'source.txt';

export function segmentFileName(index: number): string {
  return `segment-${String(index).padStart(5, '0')}.mp3`;
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ConversionCancelledError();
  }
}

function seconds(since: number): string {
  return ((Date.now() - since) / 1000).toFixed(2);
}

export class ConversionPipeline {
  private readonly getExtractor: (filename: string) => TextExtractor;
  private readonly wordBudget: number;
  private readonly concurrency: number;
  private readonly synthesisTimeoutMs: number;

  constructor(private readonly deps: ConversionPipelineDeps) {
    this.getExtractor = deps.getExtractor ?? getTextExtractor;
    this.wordBudget = deps.wordBudget ?? DEFAULT_WORD_BUDGET;
    this.concurrency = Math.max(1, deps.concurrency ?? 1);
    this.synthesisTimeoutMs = deps.synthesisTimeoutMs ?? DEFAULT_TTS_TIMEOUT_MS;
  }

  async convert(request: ConversionRequest): Promise<MergedAudio> {
    const { jobId, sourcePath, targetPath, jobDir, signal } = request;
    const logPrefix = `[ConversionPipeline:${jobId}]`;
    const startTime = Date.now();
    const progress: PipelineProgress = { state: 'idle', totalChunks: 0, completedChunks: 0 };

    const report = (update: Partial<PipelineProgress>) => {
      Object.assign(progress, update);
      request.onProgress?.({ ...progress });
    };

    try {
      throwIfCancelled(signal);
      await mkdir(jobDir, { recursive: true });

      // Step 1: Extract text
      report({ state: 'extracting' });
      const extractor = this.getExtractor(path.basename(sourcePath));
      const text = await extractor.extract(sourcePath);
      throwIfCancelled(signal);

      // Step 2: Chunk the content
      report({ state: 'chunking' });
      if (text.trim().length === 0) {
        throw new InvalidInputError('Document contains no text');
      }
      await writeFile(path.join(jobDir, SOURCE_TEXT_FILE), text, 'utf-8');

      const chunks = planChunks(text, this.wordBudget);
      // A trailing run of blank lines can form its own chunk; it has nothing to say
      const speakable = chunks.filter((chunk) => chunk.wordCount > 0);
      console.log(
        `${logPrefix} Created ${chunks.length} chunks (${speakable.length} with speech) from ${text.length} characters`
      );

      // Step 3: Synthesize every chunk
      report({ state: 'synthesizing', totalChunks: speakable.length });
      const segments = await this.synthesizeAll(speakable, jobDir, signal, () =>
        report({ completedChunks: progress.completedChunks + 1 })
      );
      throwIfCancelled(signal);

      // Step 4: Merge strictly by chunk index, never by completion order
      report({ state: 'merging' });
      const ordered = [...segments].sort((a, b) => a.index - b.index);
      const size = await mergeAudioSegments(
        ordered.map((segment) => segment.path),
        targetPath
      );

      await rm(jobDir, { recursive: true, force: true });
      report({ state: 'done' });
      console.log(`${logPrefix} Conversion complete in ${seconds(startTime)}s: ${targetPath}`);

      return {
        filename: path.basename(targetPath),
        path: targetPath,
        size,
        chunkCount: chunks.length,
        segmentCount: ordered.length,
      };
    } catch (error) {
      await rm(jobDir, { recursive: true, force: true });
      const cancelled = error instanceof ConversionCancelledError;
      report({ state: cancelled ? 'cancelled' : 'failed' });

      if (cancelled) {
        console.warn(`${logPrefix} Conversion cancelled after ${seconds(startTime)}s`);
      } else {
        console.error(`${logPrefix} Conversion failed after ${seconds(startTime)}s:`, error);
      }
      throw error;
    }
  }

  private async synthesizeAll(
    chunks: TextChunk[],
    jobDir: string,
    signal: AbortSignal | undefined,
    onSegment: () => void
  ): Promise<AudioSegment[]> {
    const synthesizers = new Map<number, SpeechSynthesizer>();
    const synthesizerFor = (workerId: number): SpeechSynthesizer => {
      let synthesizer = synthesizers.get(workerId);
      if (!synthesizer) {
        synthesizer = this.deps.createSynthesizer();
        synthesizers.set(workerId, synthesizer);
      }
      return synthesizer;
    };

    return mapWithConcurrency(
      chunks,
      this.concurrency,
      async (chunk, workerId) => {
        const segment = await this.synthesizeChunk(synthesizerFor(workerId), chunk, jobDir);
        onSegment();
        return segment;
      },
      signal
    );
  }

  /**
   * The engine writes to a `.partial` path under a timeout; only a complete,
   * non-empty file is renamed to its segment name.
   */
  private async synthesizeChunk(
    synthesizer: SpeechSynthesizer,
    chunk: TextChunk,
    jobDir: string
  ): Promise<AudioSegment> {
    const segmentPath = path.join(jobDir, segmentFileName(chunk.index));
    const partialPath = `${segmentPath}.partial`;
    const startTime = Date.now();

    try {
      await withTimeout(
        (timeoutSignal) => synthesizer.synthesize(chunk.content, partialPath, timeoutSignal),
        this.synthesisTimeoutMs,
        () =>
          new SynthesisError(
            `Synthesis of chunk ${chunk.index} timed out after ${this.synthesisTimeoutMs}ms`
          )
      );

      const { size } = await stat(partialPath);
      if (size === 0) {
        throw new SynthesisError(`Synthesizer produced an empty file for chunk ${chunk.index}`);
      }
      await rename(partialPath, segmentPath);

      console.log(
        `[ConversionPipeline] Chunk ${chunk.index} (${chunk.wordCount} words) synthesized in ${seconds(startTime)}s`
      );
      return { index: chunk.index, path: segmentPath, size };
    } catch (error) {
      await rm(partialPath, { force: true });
      if (error instanceof SpeakdocError) throw error;
      throw new SynthesisError(
        `Failed to synthesize chunk ${chunk.index}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
