/**
 * Document processing for PDF and plain-text files
 * Extracts normalized text ahead of speech synthesis
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { extractText } from 'unpdf';
import type { SourceType } from '@/types';
import {
  ExtractionError,
  UnsupportedFormatError,
  errorMessage,
} from '@/lib/errors';

export interface TextExtractor {
  readonly kind: SourceType;
  extract(filePath: string): Promise<string>;
}

async function readSource(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    throw new ExtractionError(`Failed to read document: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Pass-through normalization: strips a byte-order mark and unifies line endings.
 * Line content is left untouched.
 */
export function cleanText(text: string): string {
  return text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}

export const pdfExtractor: TextExtractor = {
  kind: 'pdf',
  async extract(filePath) {
    console.log(`[DocumentProcessor] Processing PDF file: ${filePath}`);
    const dataBuffer = await readSource(filePath);

    let pages: string[];
    let totalPages: number;
    try {
      // unpdf requires a Uint8Array
      ({ text: pages, totalPages } = await extractText(new Uint8Array(dataBuffer)));
    } catch (error) {
      console.error('[DocumentProcessor] Error parsing PDF:', error);
      throw new UnsupportedFormatError(`Failed to parse PDF file: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const text = cleanText(pages.join('\n\n'));
    console.log(
      `[DocumentProcessor] PDF parsed. Pages: ${totalPages}, Text length: ${text.length}`
    );
    return text;
  },
};

export const plainTextExtractor: TextExtractor = {
  kind: 'text',
  async extract(filePath) {
    console.log(`[DocumentProcessor] Processing text file: ${filePath}`);
    const dataBuffer = await readSource(filePath);

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(dataBuffer);
    } catch (error) {
      throw new ExtractionError('Failed to decode text file: not valid UTF-8', {
        cause: error,
      });
    }

    const cleaned = cleanText(text);
    console.log(`[DocumentProcessor] Text read. Text length: ${cleaned.length}`);
    return cleaned;
  },
};

const EXTRACTORS: Record<string, TextExtractor> = {
  pdf: pdfExtractor,
  txt: plainTextExtractor,
  text: plainTextExtractor,
};

function extensionOf(filename: string): string {
  return path.extname(filename).slice(1).toLowerCase();
}

export function getTextExtractor(filename: string): TextExtractor {
  const extractor = EXTRACTORS[extensionOf(filename)];
  if (!extractor) {
    const ext = extensionOf(filename) || '(none)';
    console.error(`[DocumentProcessor] Unable to convert extension: ${ext}`);
    throw new UnsupportedFormatError(
      `Unsupported file type "${ext}". Supported: PDF (.pdf), text (.txt, .text)`
    );
  }
  return extractor;
}
