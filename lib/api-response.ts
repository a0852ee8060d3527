/**
 * JSON response helpers shared by the route handlers
 * Every message body has the shape { message, severity }
 */

import { NextResponse } from 'next/server';
import type { ApiMessage, Severity } from '@/types';
import { SpeakdocError, errorMessage } from '@/lib/errors';

export function statusForError(error: unknown): number {
  if (!(error instanceof SpeakdocError)) return 500;

  switch (error.code) {
    case 'NOT_FOUND':
      return 404;
    case 'INVALID_INPUT':
    case 'UNSUPPORTED_FORMAT':
      return 400;
    case 'CONFLICT':
      return 409;
    default:
      return 500;
  }
}

export function messageResponse(
  message: string,
  severity: Severity = 'INFO',
  status = 200
): NextResponse<ApiMessage> {
  return NextResponse.json({ message, severity }, { status });
}

/**
 * Our own errors carry user-facing messages; anything else gets the fallback
 */
export function errorResponse(error: unknown, fallback: string): NextResponse<ApiMessage> {
  const status = statusForError(error);
  const message =
    error instanceof SpeakdocError ? error.message : `${fallback}: ${errorMessage(error)}`;
  return messageResponse(message, 'ERROR', status);
}
