import { basename, join } from 'node:path';
import type { OutputMapper, TaskKind } from './types.js';

export const MATERIAL_EXTENSION = 'filamat';
export const MESH_EXTENSION = 'filamesh';

/** File name without its last extension. A name with no dot past the first
 *  character (`Makefile`, `.hidden`) is its own base name. */
export function baseName(inputPath: string): string {
  const name = basename(inputPath);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

export const materialOutputs: OutputMapper = (inputPath, outputDir) => [
  join(outputDir, `${baseName(inputPath)}.${MATERIAL_EXTENSION}`),
];

/** The generator decides which files it writes; only the directory it populates is known */
export const iblOutputs: OutputMapper = (inputPath, outputDir) => [
  join(outputDir, baseName(inputPath)),
];

export const meshOutputs: OutputMapper = (inputPath, outputDir) => [
  join(outputDir, `${baseName(inputPath)}.${MESH_EXTENSION}`),
];

const MAPPERS: Record<TaskKind, OutputMapper> = {
  material: materialOutputs,
  ibl: iblOutputs,
  mesh: meshOutputs,
};

export function mapOutputs(inputPath: string, outputDir: string, kind: TaskKind): string[] {
  return MAPPERS[kind](inputPath, outputDir);
}
