export { runTask, cleanOutputs } from './engine.js';
export type { RunOptions, ToolInvoker } from './engine.js';
export { invokeTool, interpolateArgs, interpolateTemplate, succeeded, printFailures } from './executor.js';
export type { InvokeOptions } from './executor.js';
export { baseName, mapOutputs, materialOutputs, iblOutputs, meshOutputs } from './output-mapper.js';
export { TASK_BINDINGS, createTask, toolPathFor } from './tasks.js';
export type { TaskOptions } from './tasks.js';
export { scanInputs } from './inputs.js';
export { computeConfigKey, computeFileHash, findDelta, loadState, saveState } from './state.js';
export { loadConfig, resolveConfig, parseProjectFile, selectTasks } from './config.js';
export type { ConfigOverrides, ProjectConfig } from './config.js';
export { createLogger, createToolSink } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { AssetTaskError, ConfigError, MissingToolError } from './errors.js';
export type { ErrorCode } from './errors.js';
export type * from './types.js';
