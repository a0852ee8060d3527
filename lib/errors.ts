/**
 * Error taxonomy for the conversion service
 * Every stage raises one of these so the API layer can map it to a status code
 */

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'UNSUPPORTED_FORMAT'
  | 'EXTRACTION_FAILED'
  | 'SYNTHESIS_FAILED'
  | 'MERGE_FAILED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'CANCELLED';

export class SpeakdocError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends SpeakdocError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, options);
  }
}

export class UnsupportedFormatError extends SpeakdocError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UNSUPPORTED_FORMAT', message, options);
  }
}

export class ExtractionError extends SpeakdocError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options);
  }
}

export class SynthesisError extends SpeakdocError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYNTHESIS_FAILED', message, options);
  }
}

export class MergeError extends SpeakdocError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MERGE_FAILED', message, options);
  }
}

export class NotFoundError extends SpeakdocError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, options);
  }
}

export class ConflictError extends SpeakdocError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFLICT', message, options);
  }
}

export class ConversionCancelledError extends SpeakdocError {
  constructor(message = 'Conversion cancelled') {
    super('CANCELLED', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Node fs errors carry a string code, e.g. ENOENT
 */
export function isNodeError(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
