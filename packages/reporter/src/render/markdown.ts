import type { AggregateStats, ComplexityPoint } from '@subarray-lab/core';

import type { BenchRunSummary } from '../bench/types.js';

function renderConfiguration(summary: BenchRunSummary): string[] {
  const { config } = summary;
  const lines = [
    `- Sizes: ${config.sizes.join(', ')}`,
    `- Distributions: ${config.distributions.join(', ')}`,
    `- Variants: ${config.variants.join(', ')}`,
    `- Accumulator: ${config.accumulator}`,
    `- Warmup: ${config.warmupIterations} iteration(s) over sizes ${config.warmupSizes.join(', ') || '—'}`,
    `- Iterations: ${config.iterations}`,
    `- Seed: ${config.seed}`,
    `- Runs recorded: ${summary.totalRuns}`,
  ];
  if (summary.truncated) {
    lines.push(
      `- Truncated: duration budget of ${config.maxDurationMs}ms reached`
    );
  }
  return lines;
}

function renderSummaryRows(groups: readonly AggregateStats[]): string[] {
  if (!groups.length) {
    return ['No runs recorded.'];
  }
  const header =
    '| Algorithm | Size | Type | Runs | Avg ms | Min ms | Max ms | StdDev ms | Avg comparisons | p95 ms |';
  const divider = '|---|---:|---|---:|---:|---:|---:|---:|---:|---:|';
  const rows = groups.map((entry) => {
    const millis = entry.fields.elapsedMillis;
    return `| ${entry.algorithm} | ${entry.inputSize} | ${entry.inputType} | ${entry.count} | ${millis.mean.toFixed(4)} | ${millis.min.toFixed(4)} | ${millis.max.toFixed(4)} | ${millis.stddev.toFixed(4)} | ${entry.fields.comparisons.mean.toFixed(1)} | ${entry.latency.p95Millis.toFixed(4)} |`;
  });
  return [header, divider, ...rows];
}

function renderComplexityRows(points: readonly ComplexityPoint[]): string[] {
  const header =
    '| Size | Avg ms | ns / element | comparisons / element | growth | expected |';
  const divider = '|---:|---:|---:|---:|---:|---:|';
  const rows = points.map(
    (point) =>
      `| ${point.inputSize} | ${point.avgTimeMillis.toFixed(4)} | ${point.timePerElementNanos.toFixed(2)} | ${point.comparisonsPerElement.toFixed(3)} | ${formatRatio(point.growthRatio)} | ${formatRatio(point.expectedGrowth)} |`
  );
  return [header, divider, ...rows];
}

function formatRatio(ratio: number | undefined): string {
  return ratio === undefined ? '—' : `${ratio.toFixed(2)}×`;
}

export function renderMarkdownReport(summary: BenchRunSummary): string {
  const lines: string[] = [
    '# Maximum subarray benchmark',
    '',
    `Generated ${summary.generatedAt} by ${summary.toolName} ${summary.toolVersion}.`,
    '',
    '## Configuration',
    '',
    ...renderConfiguration(summary),
    '',
    '## Summary',
    '',
    ...renderSummaryRows(summary.groups),
  ];

  for (const { algorithm, points } of summary.complexity) {
    lines.push('', `## Complexity: ${algorithm}`, '');
    lines.push(...renderComplexityRows(points));
  }

  return lines.join('\n');
}
