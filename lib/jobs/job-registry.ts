/**
 * Background conversion jobs
 * A job is keyed by its target artifact name; at most one active job per target.
 */

import { randomUUID } from 'crypto';
import path from 'path';
import type { ConversionJob, MergedAudio } from '@/types';
import { getFileStore, type FileStore } from '@/lib/storage/file-store';
import { loadConfig } from '@/lib/config';
import {
  ConflictError,
  ConversionCancelledError,
  NotFoundError,
  errorMessage,
} from '@/lib/errors';
import { getTextExtractor } from '@/lib/processors/document';
import { ConversionPipeline } from '@/lib/processors/conversion-pipeline';
import { createSpeechSynthesizer } from '@/lib/processors/speech';

// Settled jobs kept for status polling; the longest-finished go first
export const MAX_SETTLED_JOBS = 100;

interface JobEntry {
  job: ConversionJob;
  controller: AbortController;
  done: Promise<void>;
}

/**
 * `report.pdf` → `report.mp3`
 */
export function targetNameFor(sourceFilename: string): string {
  const ext = path.extname(sourceFilename);
  const base = ext ? sourceFilename.slice(0, -ext.length) : sourceFilename;
  return `${base}.mp3`;
}

export class ConversionJobRegistry {
  private readonly jobs = new Map<string, JobEntry>();

  constructor(
    private readonly store: FileStore,
    private readonly createPipeline: () => ConversionPipeline,
    private readonly maxSettledJobs: number = MAX_SETTLED_JOBS
  ) {}

  /**
   * Validate the upload and launch its conversion in the background
   */
  async start(sourceFilename: string): Promise<ConversionJob> {
    const document = await this.store.getUpload(sourceFilename);
    // Unsupported formats fail here, before any job state exists
    getTextExtractor(document.filename);
    const pipeline = this.createPipeline();

    const target = targetNameFor(document.filename);
    const existing = this.jobs.get(target);
    if (existing && existing.job.status === 'processing') {
      throw new ConflictError(`A conversion for ${target} is already running`);
    }

    const jobId = randomUUID().substring(0, 12);
    const jobDir = this.store.jobDirPath(jobId);
    const controller = new AbortController();
    const job: ConversionJob = {
      id: jobId,
      source: document.filename,
      target,
      status: 'processing',
      state: 'idle',
      totalChunks: 0,
      completedChunks: 0,
      startedAt: new Date().toISOString(),
    };

    console.log(`[Job:${jobId}] Converting ${document.filename} → ${target}`);

    const run = pipeline.convert({
      jobId,
      sourcePath: this.store.uploadPath(document.filename),
      targetPath: this.store.convertedPath(target),
      jobDir,
      signal: controller.signal,
      onProgress: (progress) => {
        job.state = progress.state;
        job.totalChunks = progress.totalChunks;
        job.completedChunks = progress.completedChunks;
      },
    });

    const done = run.then(
      (audio: MergedAudio) => {
        job.status = 'completed';
        job.size = audio.size;
        job.finishedAt = new Date().toISOString();
        console.log(`[Job:${jobId}] ✓ Completed: ${audio.filename} (${audio.size} bytes)`);
        this.evictSettled();
      },
      (error: unknown) => {
        job.status = error instanceof ConversionCancelledError ? 'cancelled' : 'failed';
        job.error = errorMessage(error);
        job.finishedAt = new Date().toISOString();
        console.error(`[Job:${jobId}] ✗ ${job.status}: ${job.error}`);
        this.evictSettled();
      }
    );

    this.jobs.set(target, { job, controller, done });
    return { ...job };
  }

  get(target: string): ConversionJob | undefined {
    const entry = this.jobs.get(target);
    return entry ? { ...entry.job } : undefined;
  }

  list(): ConversionJob[] {
    return [...this.jobs.values()].map((entry) => ({ ...entry.job }));
  }

  /**
   * Resolves once the job has settled and its partial files are gone
   */
  async cancel(target: string): Promise<ConversionJob> {
    const entry = this.jobs.get(target);
    if (!entry) {
      throw new NotFoundError(`No conversion job for ${target}`);
    }

    if (entry.job.status === 'processing') {
      console.log(`[Job:${entry.job.id}] Cancelling`);
      entry.controller.abort();
    }
    await entry.done;
    return { ...entry.job };
  }

  /**
   * Wait for a job to settle without cancelling it
   */
  async wait(target: string): Promise<ConversionJob> {
    const entry = this.jobs.get(target);
    if (!entry) {
      throw new NotFoundError(`No conversion job for ${target}`);
    }
    await entry.done;
    return { ...entry.job };
  }

  async cancelAll(): Promise<void> {
    await Promise.all([...this.jobs.keys()].map((target) => this.cancel(target)));
  }

  private evictSettled(): void {
    const settled = [...this.jobs.entries()]
      .filter(([, entry]) => entry.job.status !== 'processing')
      .sort(([, a], [, b]) => (a.job.finishedAt ?? '').localeCompare(b.job.finishedAt ?? ''));
    for (const [target] of settled.slice(0, Math.max(0, settled.length - this.maxSettledJobs))) {
      this.jobs.delete(target);
    }
  }

  forget(target: string): void {
    const entry = this.jobs.get(target);
    if (entry && entry.job.status !== 'processing') {
      this.jobs.delete(target);
    }
  }
}

let registry: Promise<ConversionJobRegistry> | null = null;

/**
 * Process-wide registry backed by the shared file store and the OpenAI synthesizer
 */
export function getJobRegistry(): Promise<ConversionJobRegistry> {
  if (!registry) {
    registry = getFileStore().then(
      (store) =>
        new ConversionJobRegistry(store, () => {
          const config = loadConfig();
          return new ConversionPipeline({
            createSynthesizer: () => createSpeechSynthesizer(config),
            wordBudget: config.wordBudget,
            concurrency: config.synthesisConcurrency,
            synthesisTimeoutMs: config.ttsTimeoutMs,
          });
        })
    );
    registry.catch(() => {
      registry = null;
    });
  }
  return registry;
}
