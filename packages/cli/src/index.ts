#!/usr/bin/env node

// CLI entry point
// - Command name: `subarray` with subcommands `scan` and `bench`.
// - `scan` reads a sequence from --values or --file, runs one engine variant and
//   prints the result (and with --metrics the operation counts) as JSON.
// - `bench` layers defaults, --config file, environment and flags into a
//   BenchConfig, runs the reporter's benchmark and prints the tables.

import { Command } from 'commander';
import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorPresenter,
  InternalError,
  MetricsCollector,
  RunHistory,
  RunRecorder,
  SCAN_VARIANTS,
  isSubarrayError,
  loadBenchConfigFile,
  measureScan,
  resolveBenchConfig,
  resolveIterationOverridesFromEnv,
  type SubarrayError,
} from '@subarray-lab/core';
import { runBench } from '@subarray-lab/reporter';

import {
  benchOverridesFromFlags,
  parseSequenceText,
  resolveAccumulator,
  resolveScanVariant,
  type BenchCliOptions,
  type ScanCliOptions,
} from './flags.js';
import { createCliLogger } from './log.js';
import { buildScanOutput, formatBenchOutput } from './output.js';
import { renderCLIView } from './render.js';

const program = new Command();

program
  .name('subarray')
  .description('Maximum subarray engine and benchmark harness')
  .version('0.1.0');

program
  .command('scan')
  .description('Find the maximum-sum contiguous subarray of a sequence')
  .option('--values <list>', 'Comma or space separated integers')
  .option(
    '--file <path>',
    'File holding the integers (plain list or JSON array)'
  )
  .option('--variant <name>', 'Engine variant: baseline|optimized', 'baseline')
  .option('--accumulator <width>', 'Running-sum width: int32|int64', 'int32')
  .option('--metrics', 'Include operation counts and timing', false)
  .action(async (options: ScanCliOptions) => {
    try {
      const sequence = await readSequence(options);
      const variant = resolveScanVariant(options.variant);
      const accumulator = resolveAccumulator(options.accumulator);

      if (options.metrics === true) {
        const { result, record } = measureScan({
          sequence,
          variant,
          accumulator,
          collector: new MetricsCollector(),
          recorder: new RunRecorder({ history: new RunHistory() }),
        });
        printJson(buildScanOutput(sequence, result, record));
        return;
      }

      const result = SCAN_VARIANTS[variant].run(sequence, { accumulator });
      printJson(buildScanOutput(sequence, result));
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

program
  .command('bench')
  .description('Benchmark the engine over synthetic input distributions')
  .option('--config <file>', 'JSON bench config file')
  .option('--sizes <list>', 'Input sizes, e.g. 100,1000,10000')
  .option('--distributions <list>', 'Input distributions, e.g. random,sorted')
  .option('--variants <list>', 'Engine variants: baseline,optimized')
  .option('--warmup <number>', 'Warmup iterations per warmup size')
  .option('--iterations <number>', 'Measured iterations per configuration')
  .option('--accumulator <width>', 'Running-sum width: int32|int64')
  .option('--seed <number>', 'Generator seed')
  .option('--out-dir <path>', 'Artifact directory')
  .option('--format <list>', 'Artifact formats: csv,json,markdown')
  .option('--no-export', 'Do not write artifacts')
  .option('--no-verify', 'Skip result verification')
  .option('--max-duration <ms>', 'Stop scheduling runs after this many ms')
  .option('--verbose', 'Log every run to stderr', false)
  .action(async (options: BenchCliOptions) => {
    try {
      const fileLayer =
        options.config === undefined
          ? {}
          : await loadBenchConfigFile(options.config);
      const config = resolveBenchConfig(
        fileLayer,
        resolveIterationOverridesFromEnv(),
        benchOverridesFromFlags(options)
      );
      const logger = createCliLogger({ verbose: options.verbose });
      logger.debug(`effective config: ${JSON.stringify(config)}`);

      const { summary, artifacts } = await runBench({
        config,
        logger,
        writeArtifacts: options.export !== false,
      });
      process.stdout.write(`${formatBenchOutput(summary, artifacts)}\n`);
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

async function readSequence(options: ScanCliOptions): Promise<number[]> {
  const hasValues = options.values !== undefined;
  const hasFile = options.file !== undefined;
  if (hasValues === hasFile) {
    throw new ConfigError({
      message: 'Provide exactly one of --values or --file',
      context: { setting: hasValues ? 'values' : 'file' },
    });
  }
  if (options.values !== undefined) {
    return parseSequenceText(options.values);
  }

  const file = path.resolve(process.cwd(), options.file ?? '');
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read sequence file ${file}`,
      context: { path: file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseSequenceText(text, file);
}

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: SubarrayError;
  if (isSubarrayError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
