import { join, resolve } from 'node:path';
import { iblOutputs, materialOutputs, meshOutputs } from './output-mapper.js';
import type { InputDescriptor, TaskBinding, TaskConfig, TaskKind } from './types.js';

export const TASK_BINDINGS: Readonly<Record<TaskKind, TaskBinding>> = {
  material: {
    kind: 'material',
    tool: 'matc',
    label: 'Compiling material',
    invocations: [['-O', '-p', 'mobile', '-o', '{{OUTPUT}}', '{{INPUT}}']],
    mapOutputs: materialOutputs,
    cleanPattern: '*.filamat',
  },
  ibl: {
    kind: 'ibl',
    tool: 'cmgen',
    label: 'Generating IBL',
    invocations: [
      ['-x', '{{OUTPUT_DIR}}', '{{INPUT}}'],
      ['--format=rgbm', '--extract-blur=0.08', '--extract={{OUTPUT_DIR}}', '{{INPUT}}'],
    ],
    mapOutputs: iblOutputs,
    cleanPattern: '*',
  },
  mesh: {
    kind: 'mesh',
    tool: 'filamesh',
    label: 'Compiling mesh',
    invocations: [['{{INPUT}}', '{{OUTPUT}}']],
    mapOutputs: meshOutputs,
    cleanPattern: '*.filamesh',
  },
};

export interface TaskOptions {
  name: string;
  /** Install directory holding bin/<tool> */
  toolsDir: string;
  input: InputDescriptor;
  outputDir: string;
}

export function toolPathFor(kind: TaskKind, toolsDir: string): string {
  return resolve(join(toolsDir, 'bin', TASK_BINDINGS[kind].tool));
}

/** Build the frozen configuration of one task instance */
export function createTask(kind: TaskKind, options: TaskOptions): Readonly<TaskConfig> {
  const input: InputDescriptor = { root: resolve(options.input.root) };
  if (options.input.pattern !== undefined) input.pattern = options.input.pattern;

  return Object.freeze({
    name: options.name,
    binding: TASK_BINDINGS[kind],
    toolPath: toolPathFor(kind, options.toolsDir),
    input: Object.freeze(input),
    outputDir: resolve(options.outputDir),
  });
}
