import { writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { NextRequest } from 'next/server';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { POST as upload } from '@/app/api/upload/route';
import { GET as download } from '@/app/api/download/[filename]/route';
import { GET as remove } from '@/app/api/remove/[filename]/route';
import { GET as lsdir } from '@/app/api/lsdir/route';
import { GET as convert } from '@/app/api/convert/[filename]/route';
import { GET as status } from '@/app/api/status/[filename]/route';
import { POST as cancel } from '@/app/api/cancel/[filename]/route';
import { getFileStore } from '@/lib/storage/file-store';
import { getJobRegistry } from '@/lib/jobs/job-registry';
import { makeTempDir, removeDir } from './helpers';

let workDir: string;

function params(filename: string) {
  return { params: Promise.resolve({ filename }) };
}

function get(pathname: string): NextRequest {
  return new NextRequest(`http://localhost${pathname}`);
}

function uploadRequest(form: FormData): NextRequest {
  return new NextRequest('http://localhost/api/upload', { method: 'POST', body: form });
}

function fileForm(name: string, content: string): FormData {
  const form = new FormData();
  form.append('file', new File([content], name, { type: 'text/plain' }));
  return form;
}

beforeAll(async () => {
  workDir = await makeTempDir();
  vi.stubEnv('WORK_DIR', workDir);
  vi.stubEnv('OPENAI_API_KEY', '');
  await getFileStore();
});

afterAll(async () => {
  vi.unstubAllEnvs();
  await removeDir(workDir);
});

describe('upload and download', () => {
  it('stores an uploaded file', async () => {
    const response = await upload(uploadRequest(fileForm('hello.txt', 'hello world\n')));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ message: 'upload ok', severity: 'INFO' });
    expect(existsSync(path.join(workDir, 'uploads', 'hello.txt'))).toBe(true);
  });

  it('requires a file field', async () => {
    const form = new FormData();
    form.append('note', 'no file here');
    const response = await upload(uploadRequest(form));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ message: 'No file provided', severity: 'ERROR' });
  });

  it('sends a stored file as an attachment', async () => {
    const response = await download(get('/api/download/hello.txt'), params('hello.txt'));

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(response.headers.get('content-disposition')).toBe(
      "attachment; filename*=UTF-8''hello.txt"
    );
    expect(await response.text()).toBe('hello world\n');
  });

  it('answers 404 for an unknown file', async () => {
    const response = await download(get('/api/download/nope.mp3'), params('nope.mp3'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      message: 'File not found: nope.mp3',
      severity: 'ERROR',
    });
  });
});

describe('lsdir and remove', () => {
  it('lists converted audio', async () => {
    await writeFile(path.join(workDir, 'converted', 'talk.mp3'), Buffer.alloc(2048));

    const response = await lsdir();

    expect(await response.json()).toEqual([{ file: 'talk.mp3', size: '2.0 KB' }]);
  });

  it('removes a file', async () => {
    const response = await remove(get('/api/remove/talk.mp3'), params('talk.mp3'));

    expect(await response.json()).toEqual({ message: 'file talk.mp3 removed.', severity: 'INFO' });
    expect(existsSync(path.join(workDir, 'converted', 'talk.mp3'))).toBe(false);
  });

  it('answers 404 when removing an unknown file', async () => {
    const response = await remove(get('/api/remove/talk.mp3'), params('talk.mp3'));

    expect(response.status).toBe(404);
  });
});

describe('convert, status and cancel', () => {
  it('answers 404 for a document that was never uploaded', async () => {
    const response = await convert(get('/api/convert/ghost.txt'), params('ghost.txt'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      message: 'Document not found: ghost.txt',
      severity: 'ERROR',
    });
  });

  it('answers 400 for an unsupported document', async () => {
    await upload(uploadRequest(fileForm('deck.pptx', 'binary')));

    const response = await convert(get('/api/convert/deck.pptx'), params('deck.pptx'));

    expect(response.status).toBe(400);
  });

  it('starts a job and reports its outcome', async () => {
    const response = await convert(get('/api/convert/hello.txt'), params('hello.txt'));

    expect(response.status).toBe(202);
    expect(await response.json()).toBe('hello.mp3');

    // No API key is configured, so synthesis fails
    await (await getJobRegistry()).wait('hello.mp3');
    const result = await status(get('/api/status/hello.mp3'), params('hello.mp3'));
    expect(await result.json()).toMatchObject({
      target: 'hello.mp3',
      status: 'failed',
      message: 'Conversion failed: OPENAI_API_KEY is not set',
    });
    expect(existsSync(path.join(workDir, 'converted', 'hello.mp3'))).toBe(false);
  });

  it('answers 404 for the status of an unknown job', async () => {
    const response = await status(get('/api/status/none.mp3'), params('none.mp3'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      message: 'No conversion job for none.mp3',
      severity: 'ERROR',
    });
  });

  it('answers 404 when cancelling an unknown job', async () => {
    const response = await cancel(
      new NextRequest('http://localhost/api/cancel/none.mp3', { method: 'POST' }),
      params('none.mp3')
    );

    expect(response.status).toBe(404);
  });
});
