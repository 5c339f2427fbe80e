import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { createTask } from './tasks.js';
import type { TaskConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'asset-tasks.json';
export const DEFAULT_STATE_FILE = '.asset-tasks/state.json';

const taskSchema = z.object({
  kind: z.enum(['material', 'ibl', 'mesh']),
  input: z.string().min(1),
  pattern: z.string().min(1).optional(),
  outputDir: z.string().min(1),
});

const projectSchema = z.object({
  toolsDir: z.string().min(1).optional(),
  stateFile: z.string().min(1).default(DEFAULT_STATE_FILE),
  jobs: z.number().int().min(1).default(1),
  execTimeout: z.number().min(0).default(0),
  tasks: z.record(taskSchema).refine((tasks) => Object.keys(tasks).length > 0, {
    message: 'At least one task must be configured',
  }),
});

export type ProjectFile = z.infer<typeof projectSchema>;

/** Values that take precedence over the project file, from the CLI */
export interface ConfigOverrides {
  toolsDir?: string;
  stateFile?: string;
  jobs?: number;
  execTimeout?: number;
}

export interface ProjectConfig {
  stateFile: string;
  jobs: number;
  /** Seconds, 0 for no timeout */
  execTimeout: number;
  tasks: Readonly<TaskConfig>[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseProjectFile(raw: unknown): ProjectFile {
  const parsed = projectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid project file: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Resolve a project file into task configurations. Precedence for the tools
 * directory and state file: overrides, then ASSET_TASKS_TOOLS_DIR /
 * ASSET_TASKS_STATE_FILE, then the file. Relative paths in the file resolve
 * against its directory; override and environment paths against the cwd.
 */
export function resolveConfig(
  file: ProjectFile,
  baseDir: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ProjectConfig {
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(baseDir, path);

  const toolsDir = overrides.toolsDir ?? env.ASSET_TASKS_TOOLS_DIR ?? fromFile(file.toolsDir);
  if (toolsDir === undefined || toolsDir === '') {
    throw new ConfigError(
      'No tools directory configured: set "toolsDir", ASSET_TASKS_TOOLS_DIR or --tools-dir',
    );
  }
  const stateFile =
    overrides.stateFile ?? env.ASSET_TASKS_STATE_FILE ?? resolve(baseDir, file.stateFile);

  const tasks = Object.entries(file.tasks).map(([name, entry]) =>
    createTask(entry.kind, {
      name,
      toolsDir,
      input: { root: resolve(baseDir, entry.input), pattern: entry.pattern },
      outputDir: resolve(baseDir, entry.outputDir),
    }),
  );

  return {
    stateFile: resolve(stateFile),
    jobs: overrides.jobs ?? file.jobs,
    execTimeout: overrides.execTimeout ?? file.execTimeout,
    tasks,
  };
}

/** Read, validate and resolve a project file from disk */
export function loadConfig(
  configPath: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ProjectConfig {
  const absolute = resolve(configPath);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf-8'));
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read project file ${absolute}: ${errorMessage(err)}`);
  }
  return resolveConfig(parseProjectFile(raw), dirname(absolute), overrides, env);
}

/** Pick the named tasks, in the order given; all tasks when names is empty */
export function selectTasks(
  tasks: Readonly<TaskConfig>[],
  names: string[],
): Readonly<TaskConfig>[] {
  if (names.length === 0) return tasks;
  return names.map((name) => {
    const task = tasks.find((t) => t.name === name);
    if (task === undefined) {
      const known = tasks.map((t) => t.name).join(', ');
      throw new ConfigError(`Unknown task "${name}" (configured: ${known})`);
    }
    return task;
  });
}
