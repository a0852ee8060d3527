import { readFile, readdir, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mergeAudioSegments, partialPathFor } from '@/lib/audio/merge';
import { MergeError } from '@/lib/errors';
import { makeTempDir, removeDir } from './helpers';

describe('mergeAudioSegments', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFile(path.join(dir, 'a.mp3'), 'AAA');
    await writeFile(path.join(dir, 'b.mp3'), 'BB');
    await writeFile(path.join(dir, 'c.mp3'), 'C');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const seg = (name: string) => path.join(dir, name);

  it('concatenates segments in the order given', async () => {
    const out = seg('out.mp3');
    const size = await mergeAudioSegments([seg('c.mp3'), seg('a.mp3'), seg('b.mp3')], out);

    expect(size).toBe(6);
    expect(await readFile(out, 'utf-8')).toBe('CAAABB');
  });

  it('leaves no temporary files behind', async () => {
    await mergeAudioSegments([seg('a.mp3'), seg('b.mp3')], seg('out.mp3'));

    expect((await readdir(dir)).sort()).toEqual(['a.mp3', 'b.mp3', 'c.mp3', 'out.mp3']);
  });

  it('replaces an existing destination', async () => {
    const out = seg('out.mp3');
    await writeFile(out, 'stale');

    await mergeAudioSegments([seg('b.mp3')], out);

    expect(await readFile(out, 'utf-8')).toBe('BB');
  });

  it('rejects an empty segment list', async () => {
    await expect(mergeAudioSegments([], seg('out.mp3'))).rejects.toThrow(
      'No audio segments to merge'
    );
  });

  it('fails on a missing segment without writing output', async () => {
    const out = seg('out.mp3');
    const merge = mergeAudioSegments([seg('a.mp3'), seg('missing.mp3')], out);

    await expect(merge).rejects.toBeInstanceOf(MergeError);
    await expect(merge).rejects.toThrow('Audio segment is missing: missing.mp3');
    expect(existsSync(out)).toBe(false);
  });

  it('fails on a zero-length segment without writing output', async () => {
    const out = seg('out.mp3');
    await writeFile(seg('empty.mp3'), '');

    await expect(mergeAudioSegments([seg('a.mp3'), seg('empty.mp3')], out)).rejects.toThrow(
      'Audio segment is empty: empty.mp3'
    );
    expect(existsSync(out)).toBe(false);
  });

  it('fails when the destination directory does not exist', async () => {
    const out = path.join(dir, 'nowhere', 'out.mp3');

    await expect(mergeAudioSegments([seg('a.mp3')], out)).rejects.toBeInstanceOf(MergeError);
    expect((await readdir(dir)).sort()).toEqual(['a.mp3', 'b.mp3', 'c.mp3']);
  });
});

describe('partialPathFor', () => {
  it('places a hidden temp file beside the destination', () => {
    const partial = partialPathFor('/data/converted/book.mp3');

    expect(path.dirname(partial)).toBe('/data/converted');
    expect(path.basename(partial)).toMatch(/^\.book\.mp3\.[0-9a-f]{8}\.partial$/);
  });
});
