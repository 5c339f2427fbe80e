export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'TOOL_MISSING'
  | 'INPUT_MISSING'
  | 'STATE_LOCKED';

/** Fatal error: aborts the whole task run */
export class AssetTaskError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'AssetTaskError';
    this.code = code;
  }
}

export class MissingToolError extends AssetTaskError {
  readonly toolPath: string;

  constructor(toolPath: string) {
    super(
      'TOOL_MISSING',
      `No binary could be found at ${toolPath}. Ensure the tools have been built/installed before running this task.`,
    );
    this.name = 'MissingToolError';
    this.toolPath = toolPath;
  }
}

export class ConfigError extends AssetTaskError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
    this.name = 'ConfigError';
  }
}

/** Narrow an unknown thrown value to a Node system error */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
