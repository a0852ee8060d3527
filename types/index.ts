// Core types for document conversion

export type SourceType = 'pdf' | 'text';

export type Severity = 'INFO' | 'ERROR';

export interface ApiMessage {
  message: string;
  severity: Severity;
}

export interface StoredDocument {
  filename: string;
  extension: string;
  size: number;
}

export interface TextChunk {
  index: number;
  content: string;
  wordCount: number;
}

export interface AudioSegment {
  index: number;
  path: string;
  size: number;
}

export interface MergedAudio {
  filename: string;
  path: string;
  size: number;
  chunkCount: number;
  segmentCount: number;
}

export interface ConvertedFileEntry {
  file: string;
  size: string;
}

export type PipelineState =
  | 'idle'
  | 'extracting'
  | 'chunking'
  | 'synthesizing'
  | 'merging'
  | 'done'
  | 'failed'
  | 'cancelled';

export interface PipelineProgress {
  state: PipelineState;
  totalChunks: number;
  completedChunks: number;
}

export type JobStatus = 'processing' | 'completed' | 'failed' | 'cancelled';

export interface ConversionJob {
  id: string;
  source: string;
  target: string;
  status: JobStatus;
  state: PipelineState;
  totalChunks: number;
  completedChunks: number;
  size?: number;
  error?: string;
  startedAt: string;
  finishedAt?: string;
}
