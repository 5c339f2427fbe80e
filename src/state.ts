import { createHash } from 'node:crypto';
import { readFile, writeFile, mkdir, open, unlink } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { AssetTaskError, errorMessage, isErrnoException } from './errors.js';
import type { DeltaResult, InputFile, Snapshot, StateFile, TaskConfig } from './types.js';

const snapshotSchema = z.object({
  configKey: z.string(),
  fingerprints: z.record(z.string()),
});

/** Acquire an exclusive file lock, run fn(), then release the lock.
 *  Retries on contention (EEXIST) with a short random back-off. */
async function withFileLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  const maxRetries = 20;
  const baseDelayMs = 10;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    let fd: Awaited<ReturnType<typeof open>> | undefined;
    try {
      fd = await open(lockPath, 'wx'); // atomic: throws EEXIST if lock exists
      return await fn();
    } catch (err: unknown) {
      if (fd === undefined && isErrnoException(err) && err.code === 'EEXIST') {
        if (attempt < maxRetries - 1) {
          await new Promise<void>((resolve) =>
            setTimeout(resolve, baseDelayMs + Math.random() * baseDelayMs),
          );
          continue;
        }
        throw new AssetTaskError(
          'STATE_LOCKED',
          `Could not acquire state file lock at ${lockPath} after ${maxRetries} attempts`,
        );
      }
      throw err;
    } finally {
      if (fd !== undefined) {
        await fd.close();
        await unlink(lockPath);
      }
    }
  }
  throw new Error('Unexpected end of withFileLock loop');
}

/** Compute SHA-256 hash of a file's content on disk */
export async function computeFileHash(absolutePath: string): Promise<string> {
  const content = await readFile(absolutePath);
  return createHash('sha256').update(content).digest('hex');
}

export interface FingerprintResult {
  fingerprints: Record<string, string>;
  /** Inputs that could not be read, keyed by input key */
  unreadable: Record<string, string>;
}

/** Compute fingerprints for all inputs in parallel */
export async function fingerprintInputs(files: InputFile[]): Promise<FingerprintResult> {
  const entries = await Promise.all(
    files.map(async (file): Promise<{ key: string; hash: string } | { key: string; error: string }> => {
      try {
        return { key: file.key, hash: await computeFileHash(file.path) };
      } catch (err: unknown) {
        return { key: file.key, error: errorMessage(err) };
      }
    }),
  );

  const result: FingerprintResult = { fingerprints: {}, unreadable: {} };
  for (const entry of entries) {
    if ('hash' in entry) {
      result.fingerprints[entry.key] = entry.hash;
    } else {
      result.unreadable[entry.key] = entry.error;
    }
  }
  return result;
}

/** Hash of everything that, when changed, invalidates previously built outputs */
export function computeConfigKey(task: TaskConfig): string {
  const key = JSON.stringify({
    toolPath: task.toolPath,
    invocations: task.binding.invocations,
    outputDir: task.outputDir,
    inputRoot: task.input.root,
    pattern: task.input.pattern ?? null,
  });
  return createHash('sha256').update(key).digest('hex');
}

/** Load the previous snapshot for a task; missing or malformed state reads as none */
export function loadState(statePath: string, taskName: string): Snapshot | null {
  try {
    const raw = readFileSync(statePath, 'utf-8');
    const stateFile: unknown = JSON.parse(raw);
    if (typeof stateFile !== 'object' || stateFile === null) return null;
    const parsed = snapshotSchema.safeParse(Reflect.get(stateFile, taskName));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Save the snapshot of a task to the state file (safe across processes via file lock) */
export async function saveState(
  statePath: string,
  taskName: string,
  snapshot: Snapshot,
): Promise<void> {
  const lockPath = `${statePath}.lock`;

  await mkdir(dirname(statePath), { recursive: true });

  await withFileLock(lockPath, async () => {
    let stateFile: StateFile = {};

    try {
      const raw = await readFile(statePath, 'utf-8');
      const parsed = z.record(z.unknown()).safeParse(JSON.parse(raw));
      if (parsed.success) {
        for (const [name, entry] of Object.entries(parsed.data)) {
          const snap = snapshotSchema.safeParse(entry);
          if (snap.success) stateFile[name] = snap.data;
        }
      }
    } catch {
      // File doesn't exist yet, start fresh
      stateFile = {};
    }

    stateFile[taskName] = snapshot;
    await writeFile(statePath, JSON.stringify(stateFile, null, 2) + '\n');
  });
}

/** Split the difference between two fingerprint maps into changed and removed keys */
export function findDelta(
  previous: Record<string, string>,
  current: Record<string, string>,
): DeltaResult {
  const changed: string[] = [];
  const removed: string[] = [];

  // Files that are new or have different hashes
  for (const [path, hash] of Object.entries(current)) {
    if (previous[path] !== hash) {
      changed.push(path);
    }
  }

  // Files that were in the previous snapshot but not in the current one
  for (const path of Object.keys(previous)) {
    if (!Object.hasOwn(current, path)) {
      removed.push(path);
    }
  }

  return { changed: changed.sort(), removed: removed.sort() };
}
