import chalk from 'chalk';
import type { LogSink } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to process.stderr */
  write?: (text: string) => void;
}

const PAINT: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: (text) => text,
  warn: chalk.yellow,
  error: chalk.red,
};

/** Line-oriented logger writing to stderr, colored when the terminal supports it */
export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((text: string) => process.stderr.write(text));
  const emit = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !options.verbose) return;
    write(`${PAINT[level](message)}\n`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

/** Route a tool's stdout to info and its stderr to error, each line tagged with the tool name */
export function createToolSink(logger: Logger, tool: string): LogSink {
  const prefix = chalk.cyan(`[${tool}]`);
  return {
    stdout: (line) => logger.info(`${prefix} ${line}`),
    stderr: (line) => logger.error(`${prefix} ${line}`),
  };
}
