import type { AggregateStats, ComplexityPoint } from '@subarray-lab/core';

import { formatFixed, renderCsv } from './format.js';

export const SUMMARY_CSV_HEADER = [
  'algorithm',
  'inputSize',
  'inputType',
  'avgComparisons',
  'avgAccesses',
  'avgAllocations',
  'avgTimeMillis',
  'minTimeMillis',
  'maxTimeMillis',
  'stdDevTimeMillis',
  'runs',
] as const;

export const COMPLEXITY_CSV_HEADER = [
  'algorithm',
  'inputSize',
  'groups',
  'avgTimeMillis',
  'timePerElementNanos',
  'avgComparisons',
  'comparisonsPerElement',
  'growthRatio',
  'expectedGrowth',
] as const;

export function renderSummaryCsv(stats: Iterable<AggregateStats>): string {
  const rows = [...stats].map((entry) => {
    const { comparisons, elementAccesses, allocations, elapsedMillis } =
      entry.fields;
    return [
      entry.algorithm,
      entry.inputSize,
      entry.inputType,
      formatFixed(comparisons.mean, 2),
      formatFixed(elementAccesses.mean, 2),
      formatFixed(allocations.mean, 2),
      formatFixed(elapsedMillis.mean, 6),
      formatFixed(elapsedMillis.min, 6),
      formatFixed(elapsedMillis.max, 6),
      formatFixed(elapsedMillis.stddev, 6),
      entry.count,
    ];
  });
  return renderCsv(SUMMARY_CSV_HEADER, rows);
}

export interface AlgorithmComplexity {
  algorithm: string;
  points: readonly ComplexityPoint[];
}

export function renderComplexityCsv(
  analyses: readonly AlgorithmComplexity[]
): string {
  const rows = analyses.flatMap(({ algorithm, points }) =>
    points.map((point) => [
      algorithm,
      point.inputSize,
      point.groups,
      formatFixed(point.avgTimeMillis, 6),
      formatFixed(point.timePerElementNanos, 2),
      formatFixed(point.avgComparisons, 2),
      formatFixed(point.comparisonsPerElement, 4),
      formatOptional(point.growthRatio),
      formatOptional(point.expectedGrowth),
    ])
  );
  return renderCsv(COMPLEXITY_CSV_HEADER, rows);
}

function formatOptional(ratio: number | undefined): string | undefined {
  return ratio === undefined ? undefined : formatFixed(ratio, 4);
}
