import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { scanInputs } from '../inputs.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'asset-inputs-'));
  await mkdir(join(root, 'materials', 'lit'), { recursive: true });
  await writeFile(join(root, 'materials', 'unlit.mat'), '');
  await writeFile(join(root, 'materials', 'lit', 'opaque.mat'), '');
  await writeFile(join(root, 'materials', 'lit', 'notes.txt'), '');
  await writeFile(join(root, 'materials', '.DS_Store'), '');
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('scanInputs', () => {
  it('lists every non-hidden file of a directory by relative path', async () => {
    const files = await scanInputs({ root: join(root, 'materials') });
    expect(files.map((f) => f.key)).toEqual(['lit/notes.txt', 'lit/opaque.mat', 'unlit.mat']);
  });

  it('filters files with the pattern', async () => {
    const files = await scanInputs({ root: join(root, 'materials'), pattern: '**/*.mat' });
    expect(files).toEqual([
      { key: 'lit/opaque.mat', path: join(root, 'materials', 'lit', 'opaque.mat') },
      { key: 'unlit.mat', path: join(root, 'materials', 'unlit.mat') },
    ]);
  });

  it('matches a single-star pattern against the top level only', async () => {
    const files = await scanInputs({ root: join(root, 'materials'), pattern: '*.mat' });
    expect(files.map((f) => f.key)).toEqual(['unlit.mat']);
  });

  it('returns a file root as its only input, keyed by name', async () => {
    const file = join(root, 'materials', 'unlit.mat');
    expect(await scanInputs({ root: file, pattern: '*.ignored' })).toEqual([
      { key: 'unlit.mat', path: file },
    ]);
  });

  it('returns nothing for an empty directory', async () => {
    await mkdir(join(root, 'empty'));
    expect(await scanInputs({ root: join(root, 'empty') })).toEqual([]);
  });

  it('throws INPUT_MISSING when the root does not exist', async () => {
    await expect(scanInputs({ root: join(root, 'missing') })).rejects.toMatchObject({
      code: 'INPUT_MISSING',
      message: `Input ${join(root, 'missing')} does not exist`,
    });
  });
});
