import {
  extractSubarray,
  type RunRecord,
  type Sequence,
  type SubarrayResult,
} from '@subarray-lab/core';
import {
  formatComplexityTable,
  formatSummaryTable,
  type BenchRunSummary,
} from '@subarray-lab/reporter';

export interface ScanOutput {
  maxSum: number;
  startIndex: number;
  endIndex: number;
  subarray: number[];
  metrics?: Pick<
    RunRecord,
    | 'comparisons'
    | 'elementAccesses'
    | 'allocations'
    | 'elapsedNanos'
    | 'elapsedMillis'
  >;
}

export function buildScanOutput(
  sequence: Sequence,
  result: SubarrayResult,
  record?: RunRecord
): ScanOutput {
  const output: ScanOutput = {
    maxSum: result.maxSum,
    startIndex: result.startIndex,
    endIndex: result.endIndex,
    subarray: extractSubarray(result, sequence) ?? [],
  };
  if (record) {
    output.metrics = {
      comparisons: record.comparisons,
      elementAccesses: record.elementAccesses,
      allocations: record.allocations,
      elapsedNanos: record.elapsedNanos,
      elapsedMillis: record.elapsedMillis,
    };
  }
  return output;
}

/**
 * Human-readable bench report for stdout: configuration, summary table,
 * complexity table, artifact paths.
 */
export function formatBenchOutput(
  summary: BenchRunSummary,
  artifacts: readonly string[]
): string {
  const { config } = summary;
  const lines = [
    `Sizes: ${config.sizes.join(', ')}`,
    `Distributions: ${config.distributions.join(', ')}`,
    `Variants: ${config.variants.join(', ')} (${config.accumulator} accumulator)`,
    `Iterations: ${config.iterations} (warmup ${config.warmupIterations})`,
    `Runs: ${summary.totalRuns}${summary.truncated ? ' (truncated by duration budget)' : ''}`,
    '',
    formatSummaryTable(summary.groups),
  ];

  if (summary.complexity.length > 0) {
    lines.push('', formatComplexityTable(summary.complexity));
  }
  if (artifacts.length > 0) {
    lines.push('', 'Artifacts:', ...artifacts.map((path) => `  ${path}`));
  }
  return lines.join('\n');
}
