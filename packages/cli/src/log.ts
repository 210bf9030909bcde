import type { BenchLogger } from '@subarray-lab/reporter';

export interface LineSink {
  write(chunk: string): unknown;
}

export interface CliLoggerOptions {
  verbose?: boolean;
  /** Defaults to process.stderr */
  stream?: LineSink;
}

const PREFIX = '[subarray]';

/**
 * Diagnostics go to stderr, one prefixed line each; debug lines only with
 * --verbose.
 */
export function createCliLogger(options: CliLoggerOptions = {}): BenchLogger {
  const stream = options.stream ?? process.stderr;
  const write = (message: string): void => {
    stream.write(`${PREFIX} ${message}\n`);
  };
  return {
    info: write,
    debug: options.verbose === true ? write : () => undefined,
  };
}
