import { describe, it, expect } from 'vitest';
import { createLogger, createToolSink } from '../logger.js';

function capture(verbose = false) {
  const out: string[] = [];
  const logger = createLogger({ verbose, write: (text) => out.push(text) });
  return { logger, out };
}

describe('createLogger', () => {
  it('writes one line per message', () => {
    const { logger, out } = capture();
    logger.info('Compiling material a.mat');
    expect(out).toEqual(['Compiling material a.mat\n']);
  });

  it('drops debug messages unless verbose', () => {
    const quiet = capture();
    quiet.logger.debug('hidden');
    expect(quiet.out).toEqual([]);

    const verbose = capture(true);
    verbose.logger.debug('shown');
    expect(verbose.out).toHaveLength(1);
    expect(verbose.out[0]).toContain('shown');
  });

  it('keeps warnings and errors', () => {
    const { logger, out } = capture();
    logger.warn('careful');
    logger.error('broken');
    expect(out).toHaveLength(2);
    expect(out[1]).toContain('broken');
  });
});

describe('createToolSink', () => {
  it('sends stdout lines to info and stderr lines to error, tagged with the tool', () => {
    const infos: string[] = [];
    const errors: string[] = [];
    const sink = createToolSink(
      { debug: () => {}, info: (m) => infos.push(m), warn: () => {}, error: (m) => errors.push(m) },
      'matc',
    );

    sink.stdout('Parsing material');
    sink.stderr('line 3: unknown property');

    expect(infos).toHaveLength(1);
    expect(infos[0]).toContain('[matc]');
    expect(infos[0]).toContain('Parsing material');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain('line 3: unknown property');
  });
});
