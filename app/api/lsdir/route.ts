/**
 * API endpoint listing converted audio
 * GET /api/lsdir - [{ file, size }]
 */

import { NextResponse } from 'next/server';
import { getFileStore } from '@/lib/storage/file-store';
import { errorResponse } from '@/lib/api-response';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const store = await getFileStore();
    const files = await store.listConverted();
    return NextResponse.json(files);
  } catch (error) {
    console.error('[Lsdir API] Error:', error);
    return errorResponse(error, 'Failed to list converted files');
  }
}
