import type { Stats } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, join, relative, sep } from 'node:path';
import picomatch from 'picomatch';
import { AssetTaskError, isErrnoException } from './errors.js';
import type { InputDescriptor, InputFile } from './types.js';

export const DEFAULT_INPUT_PATTERN = '**/*';

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

async function walk(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) return walk(full);
      return entry.isFile() ? [full] : [];
    }),
  );
  return nested.flat();
}

/** List the files an input descriptor covers, sorted by key */
export async function scanInputs(descriptor: InputDescriptor): Promise<InputFile[]> {
  let stats: Stats;
  try {
    stats = await stat(descriptor.root);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new AssetTaskError('INPUT_MISSING', `Input ${descriptor.root} does not exist`);
    }
    throw err;
  }

  if (stats.isFile()) {
    return [{ key: basename(descriptor.root), path: descriptor.root }];
  }

  const isMatch = picomatch(descriptor.pattern ?? DEFAULT_INPUT_PATTERN);
  const files = await walk(descriptor.root);
  return files
    .map((path) => ({ key: toPosix(relative(descriptor.root, path)), path }))
    .filter((file) => isMatch(file.key))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}
