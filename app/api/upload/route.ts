/**
 * API endpoint for uploading documents
 * POST /api/upload - multipart form with a `file` field
 */

import { NextRequest } from 'next/server';
import { getFileStore } from '@/lib/storage/file-store';
import { errorResponse, messageResponse } from '@/lib/api-response';

export const runtime = 'nodejs';
export const maxDuration = 30;

export async function POST(request: NextRequest) {
  try {
    const formData = await request.formData();
    const file = formData.get('file');

    if (file === null || typeof file === 'string') {
      return messageResponse('No file provided', 'ERROR', 400);
    }

    console.log(`[Upload API] Received file: ${file.name} (${file.size} bytes)`);

    const store = await getFileStore();
    const bytes = new Uint8Array(await file.arrayBuffer());
    await store.saveUpload(file.name, bytes);

    return messageResponse('upload ok');
  } catch (error) {
    console.error('[Upload API] Error:', error);
    return errorResponse(error, 'Failed to upload file');
  }
}
