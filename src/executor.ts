import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Logger } from './logger.js';
import type { InputFailure, LogSink, ToolResult } from './types.js';

export interface InvokeOptions {
  /** Kill the tool after this many milliseconds; 0 or undefined waits forever */
  timeoutMs?: number;
  cwd?: string;
}

/** Replace {{VAR}} placeholders in a string with values from vars */
export function interpolateTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}

/** Interpolate every argument of an argument template */
export function interpolateArgs(
  template: readonly string[],
  vars: Record<string, string>,
): string[] {
  return template.map((arg) => interpolateTemplate(arg, vars));
}

export function succeeded(result: ToolResult): boolean {
  return result.exitCode === 0 && result.error === undefined;
}

/** Run an executable to completion, streaming its output line by line into sink.
 *  Never rejects: start failures, timeouts and non-zero exits are reported in the result. */
export function invokeTool(
  executable: string,
  args: string[],
  sink: LogSink,
  options: InvokeOptions = {},
): Promise<ToolResult> {
  return new Promise<ToolResult>((resolve) => {
    const stderr: string[] = [];
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    const finish = (result: Omit<ToolResult, 'executable' | 'args' | 'stderr'>): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      resolve({ executable, args, stderr, ...result });
    };

    const child = spawn(executable, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, options.timeoutMs);
    }

    if (child.stdout) {
      createInterface({ input: child.stdout, crlfDelay: Infinity }).on('line', (line) =>
        sink.stdout(line),
      );
    }
    if (child.stderr) {
      createInterface({ input: child.stderr, crlfDelay: Infinity }).on('line', (line) => {
        stderr.push(line);
        sink.stderr(line);
      });
    }

    child.on('error', (err: Error) => {
      finish({ exitCode: null, signal: null, error: `Could not start ${executable}: ${err.message}` });
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (timedOut) {
        finish({ exitCode: code, signal, error: `Timed out after ${options.timeoutMs}ms` });
        return;
      }
      finish({ exitCode: code, signal });
    });
  });
}

/** Describe why an invocation failed, for failure reports */
export function describeFailure(result: ToolResult): string {
  if (result.error !== undefined) return result.error;
  if (result.exitCode === null) return `${result.executable} was killed by ${result.signal ?? 'a signal'}`;
  return `${result.executable} exited with code ${result.exitCode}`;
}

/** Print details of failed inputs */
export function printFailures(task: string, failures: InputFailure[], logger: Logger): void {
  for (const f of failures) {
    logger.error(`\n--- FAILED: ${task} ${f.input} (${f.kind}) ---`);
    logger.error(f.message);
    if (f.stderr.length > 0) {
      logger.error(`[stderr]\n${f.stderr.join('\n')}`);
    }
  }
}
