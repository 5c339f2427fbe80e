/** The three kinds of asset task */
export type TaskKind = 'material' | 'ibl' | 'mesh';

/** A build input: a single file, or a directory scanned for files matching a glob */
export interface InputDescriptor {
  /** Absolute path to a file or directory */
  root: string;
  /** Glob matched against paths relative to root (directory roots only) */
  pattern?: string;
}

/** One file found under an input descriptor */
export interface InputFile {
  /** Path relative to the input root, POSIX separators */
  key: string;
  /** Absolute path on disk */
  path: string;
}

/** Persisted per-task state from the previous build */
export interface Snapshot {
  /** Hash of the task configuration that produced this snapshot */
  configKey: string;
  /** Map of input key -> content hash (SHA-256 hex) */
  fingerprints: Record<string, string>;
}

/** Root state file shape, keyed by task name */
export interface StateFile {
  [taskName: string]: Snapshot;
}

/** Inputs to act on, derived by diffing fingerprints against the previous snapshot */
export interface DeltaResult {
  /** New or modified input keys */
  changed: string[];
  /** Input keys present in the previous snapshot but gone from disk */
  removed: string[];
}

/** Derives output paths from an input path; must be pure */
export type OutputMapper = (inputPath: string, outputDir: string) => string[];

/** Static description of how one kind of task drives its tool */
export interface TaskBinding {
  kind: TaskKind;
  /** Executable name looked up under `<toolsDir>/bin` */
  tool: string;
  /** Header logged before each input, followed by the input path */
  label: string;
  /** Argument templates, one per tool invocation, run in order */
  invocations: readonly (readonly string[])[];
  mapOutputs: OutputMapper;
  /** Glob of top-level output entries removed on a full rebuild */
  cleanPattern: string;
}

/** Immutable configuration of one task instance */
export interface TaskConfig {
  name: string;
  binding: TaskBinding;
  toolPath: string;
  input: InputDescriptor;
  outputDir: string;
}

/** Receives tool output one line at a time */
export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

/** Result of running an external tool once */
export interface ToolResult {
  executable: string;
  args: string[];
  /** Exit status, null when the process never started or was killed */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Captured standard error lines */
  stderr: string[];
  /** Set when the process could not be started or timed out */
  error?: string;
}

/** A single input that could not be processed */
export interface InputFailure {
  input: string;
  kind: 'tool' | 'filesystem';
  message: string;
  stderr: string[];
}

export interface RunOutcome {
  task: string;
  status: 'succeeded' | 'failed';
  fullRebuild: boolean;
  /** Inputs compiled successfully during this run */
  processed: string[];
  /** Inputs left untouched because their fingerprint matched */
  skipped: string[];
  /** Inputs whose outputs were deleted */
  removed: string[];
  failures: InputFailure[];
}

export interface TaskRunResult {
  snapshot: Snapshot;
  outcome: RunOutcome;
}

/** Parsed CLI arguments */
export interface CliArgs {
  config: string;
  tasks: string[];
  toolsDir?: string;
  stateFile?: string;
  full: boolean;
  jobs?: number;
  execTimeout?: number;
  verbose: boolean;
}
