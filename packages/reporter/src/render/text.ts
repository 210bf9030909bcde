import type { AggregateStats } from '@subarray-lab/core';

import type { AlgorithmComplexity } from '../csv/summary.js';
import { renderTable, type TableColumn } from './table.js';

const SUMMARY_COLUMNS: readonly TableColumn[] = [
  { title: 'Algorithm' },
  { title: 'Size', align: 'right' },
  { title: 'Type' },
  { title: 'Runs', align: 'right' },
  { title: 'Avg ms', align: 'right' },
  { title: 'Min ms', align: 'right' },
  { title: 'Max ms', align: 'right' },
  { title: 'StdDev ms', align: 'right' },
  { title: 'Avg cmp', align: 'right' },
];

const COMPLEXITY_COLUMNS: readonly TableColumn[] = [
  { title: 'Algorithm' },
  { title: 'Size', align: 'right' },
  { title: 'Avg ms', align: 'right' },
  { title: 'ns/elem', align: 'right' },
  { title: 'cmp/elem', align: 'right' },
  { title: 'Growth', align: 'right' },
  { title: 'Expected', align: 'right' },
];

export function formatSummaryTable(stats: readonly AggregateStats[]): string {
  return renderTable(
    SUMMARY_COLUMNS,
    stats.map((entry) => {
      const millis = entry.fields.elapsedMillis;
      return [
        entry.algorithm,
        String(entry.inputSize),
        entry.inputType,
        String(entry.count),
        millis.mean.toFixed(4),
        millis.min.toFixed(4),
        millis.max.toFixed(4),
        millis.stddev.toFixed(4),
        entry.fields.comparisons.mean.toFixed(1),
      ];
    })
  );
}

export function formatComplexityTable(
  analyses: readonly AlgorithmComplexity[]
): string {
  return renderTable(
    COMPLEXITY_COLUMNS,
    analyses.flatMap(({ algorithm, points }) =>
      points.map((point) => [
        algorithm,
        String(point.inputSize),
        point.avgTimeMillis.toFixed(4),
        point.timePerElementNanos.toFixed(2),
        point.comparisonsPerElement.toFixed(3),
        formatRatio(point.growthRatio),
        formatRatio(point.expectedGrowth),
      ])
    )
  );
}

function formatRatio(ratio: number | undefined): string {
  return ratio === undefined ? '-' : `${ratio.toFixed(2)}x`;
}
