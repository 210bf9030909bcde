import { describe, expect, it } from 'vitest';

import { createCliLogger, type LineSink } from './log.js';

function captureStream(): LineSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write: (chunk: string) => lines.push(chunk),
  };
}

describe('createCliLogger', () => {
  it('prefixes info lines', () => {
    const stream = captureStream();
    createCliLogger({ stream }).info('Wrote runs.csv');

    expect(stream.lines).toEqual(['[subarray] Wrote runs.csv\n']);
  });

  it('drops debug lines unless verbose', () => {
    const quiet = captureStream();
    createCliLogger({ stream: quiet }).debug('run 1');
    const verbose = captureStream();
    createCliLogger({ stream: verbose, verbose: true }).debug('run 1');

    expect(quiet.lines).toEqual([]);
    expect(verbose.lines).toEqual(['[subarray] run 1\n']);
  });
});
