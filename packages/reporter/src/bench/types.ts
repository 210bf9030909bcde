import type {
  AggregateStats,
  BenchConfig,
  MetricsCollector,
  RunHistory,
  RunRecord,
  SequenceGenerator,
} from '@subarray-lab/core';

import type { AlgorithmComplexity } from '../csv/summary.js';

export interface BenchLogger {
  info(message: string): void;
  debug(message: string): void;
}

export const SILENT_LOGGER: BenchLogger = Object.freeze({
  info(): void {},
  debug(): void {},
});

export interface BenchRunOptions {
  config: BenchConfig;
  /** Receives the measured records; cleared after warmup */
  history?: RunHistory;
  collector?: MetricsCollector;
  generator?: SequenceGenerator;
  logger?: BenchLogger;
  /** Skip writing artifacts even when formats are configured */
  writeArtifacts?: boolean;
  /** Wall clock for record timestamps, epoch milliseconds */
  clock?: () => number;
  /** Monotonic clock for the duration budget, milliseconds */
  now?: () => number;
}

export interface BenchRunSummary {
  generatedAt: string;
  toolName: string;
  toolVersion: string;
  config: BenchConfig;
  warmupRuns: number;
  totalRuns: number;
  /** True when maxDurationMs stopped the matrix early */
  truncated: boolean;
  durationMillis: number;
  overall?: AggregateStats;
  groups: AggregateStats[];
  complexity: AlgorithmComplexity[];
}

export interface BenchRunResult {
  summary: BenchRunSummary;
  records: readonly RunRecord[];
  /** Absolute paths of the files written, in write order */
  artifacts: string[];
}
