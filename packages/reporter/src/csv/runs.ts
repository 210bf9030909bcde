import type { RunRecord } from '@subarray-lab/core';

import { formatFixed, renderCsv } from './format.js';

export const RUNS_CSV_HEADER = [
  'algorithm',
  'timestamp',
  'inputSize',
  'inputType',
  'comparisons',
  'elementAccesses',
  'allocations',
  'elapsedNanos',
  'elapsedMillis',
] as const;

/** One row per record, in history order. */
export function renderRunsCsv(records: readonly RunRecord[]): string {
  return renderCsv(
    RUNS_CSV_HEADER,
    records.map((record) => [
      record.algorithm,
      record.timestamp,
      record.inputSize,
      record.inputType,
      record.comparisons,
      record.elementAccesses,
      record.allocations,
      record.elapsedNanos,
      formatFixed(record.elapsedMillis, 6),
    ])
  );
}
