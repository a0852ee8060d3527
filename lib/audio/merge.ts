/**
 * Ordered, lossless concatenation of audio segments.
 * Byte-wise joining is valid for MP3 (MPEG-1/2 Layer III), which is frame-based
 * and is the only format the synthesizer produces.
 */

import { randomUUID } from 'crypto';
import { open, readFile, rename, rm, stat } from 'fs/promises';
import path from 'path';
import { MergeError, errorMessage, isNodeError } from '@/lib/errors';

async function assertSegment(segmentPath: string): Promise<void> {
  let size: number;
  try {
    size = (await stat(segmentPath)).size;
  } catch (error) {
    if (isNodeError(error, 'ENOENT')) {
      throw new MergeError(`Audio segment is missing: ${path.basename(segmentPath)}`, {
        cause: error,
      });
    }
    throw new MergeError(`Failed to inspect audio segment: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (size === 0) {
    throw new MergeError(`Audio segment is empty: ${path.basename(segmentPath)}`);
  }
}

/**
 * Hidden temp file beside the destination, so the final rename stays on one filesystem
 */
export function partialPathFor(outPath: string): string {
  return path.join(
    path.dirname(outPath),
    `.${path.basename(outPath)}.${randomUUID().slice(0, 8)}.partial`
  );
}

/**
 * Concatenate `segmentPaths` in the given order into `outPath`.
 * Returns the number of bytes written. Nothing is left at `outPath` on failure.
 */
export async function mergeAudioSegments(
  segmentPaths: readonly string[],
  outPath: string
): Promise<number> {
  if (segmentPaths.length === 0) {
    throw new MergeError('No audio segments to merge');
  }

  for (const segmentPath of segmentPaths) {
    await assertSegment(segmentPath);
  }

  const tempPath = partialPathFor(outPath);
  let written = 0;

  try {
    const handle = await open(tempPath, 'wx');
    try {
      for (const segmentPath of segmentPaths) {
        const data = await readFile(segmentPath);
        await handle.writeFile(data);
        written += data.length;
      }
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, outPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    console.error(`[AudioMerger] Failed to merge into ${outPath}:`, error);
    throw new MergeError(`Failed to merge audio: ${errorMessage(error)}`, { cause: error });
  }

  console.log(
    `[AudioMerger] Merged ${segmentPaths.length} segments into ${path.basename(outPath)} (${written} bytes)`
  );
  return written;
}
