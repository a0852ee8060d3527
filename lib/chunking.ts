/**
 * Chunking utilities for text content
 * Splits normalized text into line-aligned chunks bounded by a word budget
 */

import type { TextChunk } from '@/types';
import { InvalidInputError } from '@/lib/errors';
import { DEFAULT_WORD_BUDGET } from '@/lib/config';

export { DEFAULT_WORD_BUDGET };

/**
 * Word count approximation: whitespace-separated runs
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Split text into physical lines, each keeping its terminator
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Decode bytes as strict UTF-8; strings pass through untouched
 */
export function decodeText(input: string | Uint8Array): string {
  if (typeof input === 'string') return input;

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch (error) {
    throw new InvalidInputError('Input is not valid UTF-8 text', { cause: error });
  }
}

/**
 * Split text into ordered chunks.
 * A line is never split; the current chunk is sealed once it has reached the
 * budget, so one long line can overshoot it.
 */
export function planChunks(
  input: string | Uint8Array,
  wordBudget: number = DEFAULT_WORD_BUDGET
): TextChunk[] {
  if (!Number.isInteger(wordBudget) || wordBudget <= 0) {
    throw new InvalidInputError(`Word budget must be a positive integer, got ${wordBudget}`);
  }

  const text = decodeText(input);
  const chunks: TextChunk[] = [];

  let content = '';
  let wordCount = 0;

  for (const line of splitLines(text)) {
    if (content && wordCount >= wordBudget) {
      chunks.push({ index: chunks.length, content, wordCount });
      content = '';
      wordCount = 0;
    }

    content += line;
    wordCount += countWords(line);
  }

  if (content) {
    chunks.push({ index: chunks.length, content, wordCount });
  }

  return chunks;
}
