/**
 * Local file storage for uploaded documents and converted audio
 * One working directory per server process: uploads/, converted/, jobs/
 */

import { randomUUID } from 'crypto';
import { mkdir, mkdtemp, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ConvertedFileEntry, StoredDocument } from '@/types';
import { InvalidInputError, NotFoundError, isNodeError } from '@/lib/errors';
import { loadConfig } from '@/lib/config';

export const UPLOADS_DIR = 'uploads';
export const CONVERTED_DIR = 'converted';
export const JOBS_DIR = 'jobs';

const SIZE_UNITS = ['bytes', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human-readable size with one decimal, e.g. "512.0 bytes", "1.5 KB"
 */
export function formatBytes(size: number): string {
  let value = size;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${(value * 1024).toFixed(1)} TB`;
}

export function getContentType(fileName: string): string {
  const ext = fileName.split('.').pop()?.toLowerCase();
  const contentTypes: Record<string, string> = {
    // Audio
    mp3: 'audio/mpeg',
    // Documents
    pdf: 'application/pdf',
    txt: 'text/plain; charset=utf-8',
    text: 'text/plain; charset=utf-8',
  };
  return contentTypes[ext || ''] || 'application/octet-stream';
}

/**
 * Reject names that could escape the working directory, and hidden names,
 * which are reserved for in-progress temp files
 */
export function assertSafeFilename(filename: string): string {
  const name = filename.trim();
  if (
    !name ||
    name.startsWith('.') ||
    name.includes('/') ||
    name.includes('\\') ||
    name.includes('\0')
  ) {
    throw new InvalidInputError(`Invalid file name: "${filename}"`);
  }
  return name;
}

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : null;
  } catch (error) {
    if (isNodeError(error, 'ENOENT')) return null;
    throw error;
  }
}

export class FileStore {
  constructor(readonly root: string) {}

  static async create(workDir?: string): Promise<FileStore> {
    const root = workDir
      ? path.resolve(workDir)
      : await mkdtemp(path.join(os.tmpdir(), 'speakdoc-'));
    const store = new FileStore(root);
    await store.prepare();
    console.log(`[FileStore] Working directory: ${root}`);
    return store;
  }

  async prepare(): Promise<void> {
    await mkdir(path.join(this.root, UPLOADS_DIR), { recursive: true });
    await mkdir(path.join(this.root, CONVERTED_DIR), { recursive: true });
    await mkdir(path.join(this.root, JOBS_DIR), { recursive: true });
  }

  uploadPath(filename: string): string {
    return path.join(this.root, UPLOADS_DIR, assertSafeFilename(filename));
  }

  convertedPath(filename: string): string {
    return path.join(this.root, CONVERTED_DIR, assertSafeFilename(filename));
  }

  /**
   * Directory owned by one conversion job; the pipeline creates and removes it
   */
  jobDirPath(jobId: string): string {
    return path.join(this.root, JOBS_DIR, assertSafeFilename(jobId));
  }

  async saveUpload(filename: string, data: Uint8Array): Promise<StoredDocument> {
    const target = this.uploadPath(filename);
    const partial = path.join(
      path.dirname(target),
      `.${path.basename(target)}.${randomUUID().slice(0, 8)}.partial`
    );

    try {
      await writeFile(partial, data);
      await rename(partial, target);
    } catch (error) {
      await rm(partial, { force: true });
      throw error;
    }

    const name = path.basename(target);
    console.log(`[FileStore] Saved upload ${name} (${data.byteLength} bytes)`);
    return {
      filename: name,
      extension: path.extname(name).slice(1).toLowerCase(),
      size: data.byteLength,
    };
  }

  async getUpload(filename: string): Promise<StoredDocument> {
    const filePath = this.uploadPath(filename);
    const size = await fileSize(filePath);
    if (size === null) {
      throw new NotFoundError(`Document not found: ${filename}`);
    }
    const name = path.basename(filePath);
    return { filename: name, extension: path.extname(name).slice(1).toLowerCase(), size };
  }

  /**
   * Converted artifacts take precedence over uploads of the same name
   */
  async resolveDownload(filename: string): Promise<{ path: string; size: number }> {
    for (const candidate of [this.convertedPath(filename), this.uploadPath(filename)]) {
      const size = await fileSize(candidate);
      if (size !== null) {
        return { path: candidate, size };
      }
    }
    throw new NotFoundError(`File not found: ${filename}`);
  }

  /**
   * Delete the named file from uploads and converted. Fails only if it is in neither.
   */
  async remove(filename: string): Promise<string[]> {
    const removed: string[] = [];
    for (const [area, candidate] of [
      [UPLOADS_DIR, this.uploadPath(filename)],
      [CONVERTED_DIR, this.convertedPath(filename)],
    ] as const) {
      if ((await fileSize(candidate)) !== null) {
        await rm(candidate);
        removed.push(area);
      }
    }

    if (removed.length === 0) {
      throw new NotFoundError(`File not found: ${filename}`);
    }
    console.log(`[FileStore] Removed ${filename} from ${removed.join(', ')}`);
    return removed;
  }

  async listConverted(): Promise<ConvertedFileEntry[]> {
    const dir = path.join(this.root, CONVERTED_DIR);
    const entries = await readdir(dir, { withFileTypes: true });

    const files = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();

    return Promise.all(
      files.map(async (file) => ({
        file,
        size: formatBytes((await stat(path.join(dir, file))).size),
      }))
    );
  }

  async teardown(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
    console.log(`[FileStore] Removed working directory: ${this.root}`);
  }
}

let fileStore: Promise<FileStore> | null = null;

/**
 * Process-wide store, created on first use
 */
export function getFileStore(): Promise<FileStore> {
  if (!fileStore) {
    fileStore = FileStore.create(loadConfig().workDir);
    fileStore.catch(() => {
      fileStore = null;
    });
  }
  return fileStore;
}
