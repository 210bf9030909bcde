import { createRequire } from 'node:module';
import { join, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';

import {
  MetricsCollector,
  RunHistory,
  RunRecorder,
  SCAN_VARIANTS,
  SequenceGenerator,
  VerificationError,
  aggregate,
  aggregateAll,
  analyzeComplexity,
  byAlgorithmSizeAndType,
  measureScan,
  verifyResult,
  type AggregateStats,
  type BenchConfig,
  type Distribution,
  type RunRecord,
  type ScanVariant,
} from '@subarray-lab/core';

import {
  renderComplexityCsv,
  renderSummaryCsv,
  type AlgorithmComplexity,
} from '../csv/summary.js';
import { renderRunsCsv } from '../csv/runs.js';
import { writeArtifact } from '../export.js';
import { renderMarkdownReport } from '../render/markdown.js';
import {
  SILENT_LOGGER,
  type BenchLogger,
  type BenchRunOptions,
  type BenchRunResult,
  type BenchRunSummary,
} from './types.js';

const requireJson = createRequire(import.meta.url);
const reporterPkg: unknown = requireJson('../../package.json');

const WARMUP_DISTRIBUTION: Distribution = 'random';

interface MeasureContext {
  config: BenchConfig;
  collector: MetricsCollector;
  recorder: RunRecorder;
  logger: BenchLogger;
}

/**
 * Warmup, then the measured sizes × distributions × variants × iterations
 * matrix, then aggregation and artifacts. Each size/distribution input is
 * generated once and shared by every variant and iteration.
 */
export async function runBench(
  options: BenchRunOptions
): Promise<BenchRunResult> {
  const { config } = options;
  const logger = options.logger ?? SILENT_LOGGER;
  const history = options.history ?? new RunHistory();
  const now = options.now ?? (() => performance.now());
  const clock = options.clock ?? (() => Date.now());
  const generator = options.generator ?? new SequenceGenerator(config.seed);
  const context: MeasureContext = {
    config,
    collector: options.collector ?? new MetricsCollector(),
    recorder: new RunRecorder({ history, clock }),
    logger,
  };

  const startedAt = now();
  const deadline =
    config.maxDurationMs === undefined
      ? Number.POSITIVE_INFINITY
      : startedAt + config.maxDurationMs;

  let warmupRuns = 0;
  for (const size of config.warmupSizes) {
    for (let i = 0; i < config.warmupIterations; i++) {
      const sequence = generator.generate(size, WARMUP_DISTRIBUTION);
      for (const variant of config.variants) {
        measureOne(context, sequence, variant, WARMUP_DISTRIBUTION);
        warmupRuns++;
      }
    }
  }
  history.clear();
  logger.info(`Warmup finished after ${warmupRuns} runs`);

  let truncated = false;
  matrix: for (const size of config.sizes) {
    for (const distribution of config.distributions) {
      const sequence = generator.generate(size, distribution);
      for (const variant of config.variants) {
        for (let i = 0; i < config.iterations; i++) {
          if (now() >= deadline) {
            truncated = true;
            break matrix;
          }
          const record = measureOne(context, sequence, variant, distribution);
          logger.debug(
            `${record.algorithm} size=${size} type=${distribution} iteration=${i + 1}: ${record.elapsedMillis.toFixed(4)}ms, ${record.comparisons} comparisons`
          );
        }
      }
    }
  }
  if (truncated) {
    logger.info(
      `Duration budget of ${config.maxDurationMs}ms exhausted; remaining runs skipped`
    );
  }

  const records = history.snapshot();
  const groups = [...aggregate(records, byAlgorithmSizeAndType).values()];
  const summary: BenchRunSummary = {
    generatedAt: new Date(clock()).toISOString(),
    toolName: readPackageField('name') ?? 'subarray-reporter',
    toolVersion: readPackageField('version') ?? '0.0.0',
    config,
    warmupRuns,
    totalRuns: records.length,
    truncated,
    durationMillis: Math.max(0, now() - startedAt),
    overall: aggregateAll(records),
    groups,
    complexity: analyzeByAlgorithm(groups),
  };
  logger.info(`Recorded ${records.length} runs in ${groups.length} groups`);

  const artifacts =
    options.writeArtifacts === false
      ? []
      : await writeBenchArtifacts(summary, records, logger);

  return { summary, records, artifacts };
}

function measureOne(
  context: MeasureContext,
  sequence: Int32Array,
  variant: ScanVariant,
  distribution: Distribution
): RunRecord {
  const { config, collector, recorder } = context;
  const { result, record } = measureScan({
    sequence,
    variant,
    accumulator: config.accumulator,
    inputType: distribution,
    collector,
    recorder,
  });

  if (config.verify) {
    const issues = verifyResult(sequence, result, config.accumulator);
    if (issues.length > 0) {
      throw new VerificationError({
        message: `${SCAN_VARIANTS[variant].label} returned an invalid result for ${distribution} input of size ${sequence.length}`,
        issues,
        context: {
          algorithm: record.algorithm,
          inputSize: sequence.length,
          inputType: distribution,
        },
      });
    }
  }
  return record;
}

function analyzeByAlgorithm(
  groups: readonly AggregateStats[]
): AlgorithmComplexity[] {
  const algorithms = [...new Set(groups.map((entry) => entry.algorithm))];
  return algorithms.map((algorithm) => ({
    algorithm,
    points: analyzeComplexity(
      groups.filter((entry) => entry.algorithm === algorithm)
    ),
  }));
}

async function writeBenchArtifacts(
  summary: BenchRunSummary,
  records: readonly RunRecord[],
  logger: BenchLogger
): Promise<string[]> {
  const outDir = resolve(summary.config.outDir);
  const formats = summary.config.formats;
  const written: string[] = [];

  const write = async (name: string, contents: string): Promise<void> => {
    const path = await writeArtifact(join(outDir, name), contents);
    logger.info(`Wrote ${path}`);
    written.push(path);
  };

  if (formats.includes('csv')) {
    await write('runs.csv', renderRunsCsv(records));
    await write('summary.csv', renderSummaryCsv(summary.groups));
    await write('complexity.csv', renderComplexityCsv(summary.complexity));
  }
  if (formats.includes('json')) {
    await write('bench-summary.json', `${JSON.stringify(summary, null, 2)}\n`);
  }
  if (formats.includes('markdown')) {
    await write('bench-report.md', `${renderMarkdownReport(summary)}\n`);
  }
  return written;
}

function readPackageField(field: 'name' | 'version'): string | undefined {
  if (typeof reporterPkg !== 'object' || reporterPkg === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(reporterPkg, field);
  return typeof value === 'string' ? value : undefined;
}
