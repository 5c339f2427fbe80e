#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import type { CliArgs } from './types.js';
import { DEFAULT_CONFIG_FILE, loadConfig, selectTasks } from './config.js';
import { runTask } from './engine.js';
import { printFailures } from './executor.js';
import { createLogger } from './logger.js';
import { loadState, saveState } from './state.js';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseCliArgs(argv: string[] = process.argv): CliArgs {
  const program = new Command();
  program
    .name('asset-tasks')
    .description('Incrementally compile materials, IBLs and meshes with their external tools')
    .argument('[tasks...]', 'Tasks to run (default: every configured task)')
    .option('-c, --config <path>', 'Project file', DEFAULT_CONFIG_FILE)
    .option('--tools-dir <dir>', 'Tools install directory containing bin/')
    .option('--state-file <path>', 'Where incremental state is kept')
    .option('--full', 'Ignore previous state and rebuild everything', false)
    .option('-j, --jobs <n>', 'Inputs processed concurrently per task', parseInteger)
    .option('--exec-timeout <seconds>', 'Timeout per tool invocation in seconds (0 = none)', parseInteger)
    .option('-v, --verbose', 'Debug logging', false)
    .parse(argv);

  const opts = program.opts<{
    config: string;
    toolsDir?: string;
    stateFile?: string;
    full: boolean;
    jobs?: number;
    execTimeout?: number;
    verbose: boolean;
  }>();
  return {
    config: opts.config,
    tasks: program.args,
    toolsDir: opts.toolsDir,
    stateFile: opts.stateFile,
    full: opts.full,
    jobs: opts.jobs,
    execTimeout: opts.execTimeout,
    verbose: opts.verbose,
  };
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  const logger = createLogger({ verbose: args.verbose });

  const config = loadConfig(args.config, {
    toolsDir: args.toolsDir,
    stateFile: args.stateFile,
    jobs: args.jobs,
    execTimeout: args.execTimeout,
  });
  const tasks = selectTasks(config.tasks, args.tasks);

  let failed = false;
  for (const task of tasks) {
    const previous = loadState(config.stateFile, task.name);
    if (!previous) {
      logger.debug(`asset-tasks: no previous state for "${task.name}"`);
    }

    const { snapshot, outcome } = await runTask(task, previous, {
      full: args.full,
      jobs: config.jobs,
      timeoutMs: config.execTimeout * 1000,
      logger,
    });

    // Save even on failure so successfully compiled inputs are not redone
    await saveState(config.stateFile, task.name, snapshot);

    if (outcome.status === 'failed') {
      printFailures(task.name, outcome.failures, logger);
      failed = true;
    }
  }

  process.exit(failed ? 1 : 0);
}

main().catch((err: unknown) => {
  process.stderr.write(`asset-tasks: fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
