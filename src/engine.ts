import { mkdir, readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import picomatch from 'picomatch';
import { MissingToolError, errorMessage, isErrnoException } from './errors.js';
import {
  describeFailure,
  interpolateArgs,
  invokeTool,
  succeeded,
  type InvokeOptions,
} from './executor.js';
import { scanInputs } from './inputs.js';
import { createLogger, createToolSink, type Logger } from './logger.js';
import { computeConfigKey, findDelta, fingerprintInputs } from './state.js';
import type {
  InputFailure,
  InputFile,
  LogSink,
  RunOutcome,
  Snapshot,
  TaskConfig,
  TaskRunResult,
  ToolResult,
} from './types.js';

export type ToolInvoker = (
  executable: string,
  args: string[],
  sink: LogSink,
  options?: InvokeOptions,
) => Promise<ToolResult>;

export interface RunOptions {
  /** Ignore the previous snapshot and rebuild everything */
  full?: boolean;
  /** Maximum number of inputs processed concurrently */
  jobs?: number;
  /** Per-invocation timeout in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
  /** Replaces the real process runner, mainly for tests */
  invoke?: ToolInvoker;
}

type InputResult =
  | { key: string; ok: true; fingerprint: string }
  | { key: string; ok: false; failure: InputFailure };

async function assertToolExists(toolPath: string): Promise<void> {
  try {
    const stats = await stat(toolPath);
    if (stats.isFile()) return;
  } catch (err: unknown) {
    if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
  }
  throw new MissingToolError(toolPath);
}

/** Remove top-level entries of the output directory matching the clean pattern */
export async function cleanOutputs(outputDir: string, pattern: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(outputDir);
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw err;
  }

  const isMatch = picomatch(pattern, { dot: true });
  const doomed = names.filter((name) => isMatch(name)).sort();
  await Promise.all(
    doomed.map((name) => rm(join(outputDir, name), { recursive: true, force: true })),
  );
  return doomed;
}

async function removeOutputs(outputs: string[]): Promise<void> {
  for (const output of outputs) {
    await rm(output, { recursive: true, force: true });
  }
}

/** Run fn over items with at most `limit` calls in flight, keeping result order */
async function mapWithLimit<T, R>(
  items: T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

/**
 * Bring a task's outputs up to date with its inputs.
 *
 * Only inputs whose fingerprint differs from `previous` are recompiled, and
 * outputs of inputs that disappeared are deleted without running the tool.
 * Without a usable previous snapshot every output matching the task's clean
 * pattern is removed first and every input is compiled.
 *
 * A failing input never aborts the others; it is reported in the outcome and
 * left out of the returned snapshot so the next run retries it. A missing
 * tool or input root throws before anything is touched.
 */
export async function runTask(
  task: TaskConfig,
  previous: Snapshot | null,
  options: RunOptions = {},
): Promise<TaskRunResult> {
  const logger = options.logger ?? createLogger();
  const invoke = options.invoke ?? invokeTool;
  const { binding, outputDir } = task;

  await assertToolExists(task.toolPath);
  const files = await scanInputs(task.input);

  const configKey = computeConfigKey(task);
  const incremental = previous !== null && previous.configKey === configKey && !options.full;
  if (!incremental) {
    const cleaned = await cleanOutputs(outputDir, binding.cleanPattern);
    logger.debug(`${task.name}: full rebuild, removed ${cleaned.length} stale output(s)`);
  }
  await mkdir(outputDir, { recursive: true });

  const previousFingerprints = incremental ? previous.fingerprints : {};
  const { fingerprints, unreadable } = await fingerprintInputs(files);
  const delta = findDelta(previousFingerprints, fingerprints);
  const byKey = new Map(files.map((file): [string, InputFile] => [file.key, file]));

  const failures: InputFailure[] = Object.entries(unreadable).map(([input, message]) => ({
    input,
    kind: 'filesystem',
    message: `Cannot read input: ${message}`,
    stderr: [],
  }));
  const nextFingerprints: Record<string, string> = {};
  const skipped: string[] = [];
  for (const [key, hash] of Object.entries(fingerprints)) {
    if (previousFingerprints[key] === hash) {
      nextFingerprints[key] = hash;
      skipped.push(key);
    }
  }

  // Unreadable inputs are still on disk; their old outputs and entries stay until they can be rebuilt
  for (const key of Object.keys(unreadable)) {
    if (Object.hasOwn(previousFingerprints, key)) {
      nextFingerprints[key] = previousFingerprints[key];
    }
  }
  const removedKeys = delta.removed.filter((key) => !Object.hasOwn(unreadable, key));
  const removed: string[] = [];
  for (const key of removedKeys) {
    const outputs = binding.mapOutputs(join(task.input.root, key), outputDir);
    try {
      await removeOutputs(outputs);
      removed.push(key);
      logger.debug(`${task.name}: removed outputs of ${key}`);
    } catch (err: unknown) {
      nextFingerprints[key] = previousFingerprints[key];
      failures.push({
        input: key,
        kind: 'filesystem',
        message: `Cannot delete outputs: ${errorMessage(err)}`,
        stderr: [],
      });
    }
  }

  const sink = createToolSink(logger, binding.tool);
  const processInput = async (key: string): Promise<InputResult> => {
    const file = byKey.get(key);
    const fingerprint = fingerprints[key];
    if (file === undefined) {
      return {
        key,
        ok: false,
        failure: { input: key, kind: 'filesystem', message: 'Input disappeared during the run', stderr: [] },
      };
    }

    const outputs = binding.mapOutputs(file.path, outputDir);
    const vars = { INPUT: file.path, OUTPUT: outputs[0] ?? outputDir, OUTPUT_DIR: outputDir };
    logger.info(`${binding.label} ${file.path}`);

    for (const template of binding.invocations) {
      const result = await invoke(task.toolPath, interpolateArgs(template, vars), sink, {
        timeoutMs: options.timeoutMs,
      });
      if (!succeeded(result)) {
        const failure: InputFailure = {
          input: key,
          kind: 'tool',
          message: describeFailure(result),
          stderr: result.stderr,
        };
        try {
          await removeOutputs(outputs);
        } catch (err: unknown) {
          failure.message += `; partial outputs could not be removed: ${errorMessage(err)}`;
        }
        return { key, ok: false, failure };
      }
    }
    return { key, ok: true, fingerprint };
  };

  const results = await mapWithLimit(delta.changed, options.jobs ?? 1, processInput);
  const processed: string[] = [];
  for (const result of results) {
    if (result.ok) {
      nextFingerprints[result.key] = result.fingerprint;
      processed.push(result.key);
    } else {
      failures.push(result.failure);
    }
  }

  const outcome: RunOutcome = {
    task: task.name,
    status: failures.length > 0 ? 'failed' : 'succeeded',
    fullRebuild: !incremental,
    processed,
    skipped,
    removed,
    failures,
  };
  logger.info(
    `${task.name}: ${processed.length} compiled, ${skipped.length} up to date, ${removed.length} removed, ${failures.length} failed`,
  );

  return { snapshot: { configKey, fingerprints: nextFingerprints }, outcome };
}
