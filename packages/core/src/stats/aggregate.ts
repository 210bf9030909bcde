import type { RunRecord } from '../recorder/run-history.js';
import { calculatePercentile, summarize, type FieldStats } from './summary.js';

export const AGGREGATE_FIELDS = [
  'comparisons',
  'elementAccesses',
  'allocations',
  'elapsedNanos',
  'elapsedMillis',
] as const;

export type AggregateField = (typeof AGGREGATE_FIELDS)[number];

export type GroupKeyFn = (record: RunRecord) => string;

/**
 * Statistics for one group of run records. Always derived from the records on
 * demand; never stored on its own.
 */
export interface AggregateStats {
  key: string;
  count: number;
  /** Labels of the group's first record */
  algorithm: string;
  inputSize: number;
  inputType: string;
  fields: Record<AggregateField, FieldStats>;
  latency: { p50Millis: number; p95Millis: number };
}

// Keys are JSON tuples so labels containing separators never collide
export const bySizeAndType: GroupKeyFn = (record) =>
  JSON.stringify([record.inputSize, record.inputType]);

export const byAlgorithmSizeAndType: GroupKeyFn = (record) =>
  JSON.stringify([record.algorithm, record.inputSize, record.inputType]);

const ALL_RECORDS_KEY = 'all';

/**
 * Groups records by key (first-seen order) and recomputes every statistic
 * from scratch. Groups without records produce no entry.
 */
export function aggregate(
  records: readonly RunRecord[],
  groupKeyFn: GroupKeyFn = bySizeAndType
): Map<string, AggregateStats> {
  const groups = new Map<string, RunRecord[]>();
  for (const record of records) {
    const key = groupKeyFn(record);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  const result = new Map<string, AggregateStats>();
  for (const [key, group] of groups) {
    const stats = summarizeGroup(key, group);
    if (stats) {
      result.set(key, stats);
    }
  }
  return result;
}

/**
 * One summary over every record, or undefined when there are none.
 */
export function aggregateAll(
  records: readonly RunRecord[]
): AggregateStats | undefined {
  return aggregate(records, () => ALL_RECORDS_KEY).get(ALL_RECORDS_KEY);
}

function summarizeGroup(
  key: string,
  group: readonly RunRecord[]
): AggregateStats | undefined {
  const first = group[0];
  if (!first) {
    return undefined;
  }

  const fields: Partial<Record<AggregateField, FieldStats>> = {};
  for (const field of AGGREGATE_FIELDS) {
    const stats = summarize(group.map((record) => record[field]));
    if (!stats) {
      return undefined;
    }
    fields[field] = stats;
  }
  if (!isCompleteFieldSet(fields)) {
    return undefined;
  }

  const millis = group.map((record) => record.elapsedMillis);
  return {
    key,
    count: group.length,
    algorithm: first.algorithm,
    inputSize: first.inputSize,
    inputType: first.inputType,
    fields,
    latency: {
      p50Millis: calculatePercentile(millis, 0.5),
      p95Millis: calculatePercentile(millis, 0.95),
    },
  };
}

function isCompleteFieldSet(
  fields: Partial<Record<AggregateField, FieldStats>>
): fields is Record<AggregateField, FieldStats> {
  return AGGREGATE_FIELDS.every((field) => fields[field] !== undefined);
}
