import { describe, expect, it } from 'vitest';

import type { RunRecord } from '../../recorder/run-history.js';
import {
  aggregate,
  aggregateAll,
  byAlgorithmSizeAndType,
} from '../aggregate.js';
import { analyzeComplexity } from '../complexity.js';
import { calculatePercentile, summarize } from '../summary.js';

function makeRecord(overrides: Partial<RunRecord> = {}): RunRecord {
  const elapsedMillis = overrides.elapsedMillis ?? 1;
  return {
    algorithm: 'kadane',
    timestamp: 0,
    inputSize: 100,
    inputType: 'random',
    comparisons: 198,
    elementAccesses: 100,
    allocations: 1,
    elapsedMillis,
    elapsedNanos: Math.round(elapsedMillis * 1_000_000),
    ...overrides,
  };
}

describe('summarize', () => {
  it('computes population statistics', () => {
    const stats = summarize([10, 20, 30]);

    expect(stats).toMatchObject({ count: 3, mean: 20, min: 10, max: 30 });
    expect(stats?.stddev).toBeCloseTo(Math.sqrt(200 / 3), 10);
  });

  it('has zero spread for a single value', () => {
    expect(summarize([5])).toEqual({
      count: 1,
      mean: 5,
      min: 5,
      max: 5,
      stddev: 0,
    });
  });

  it('returns undefined for no values', () => {
    expect(summarize([])).toBeUndefined();
  });
});

describe('calculatePercentile', () => {
  it('uses the nearest-rank method', () => {
    expect(calculatePercentile([30, 10, 20], 0.5)).toBe(20);
    expect(calculatePercentile([30, 10, 20], 0.95)).toBe(30);
    expect(calculatePercentile([30, 10, 20], 0)).toBe(10);
  });

  it('returns 0 for no values', () => {
    expect(calculatePercentile([], 0.5)).toBe(0);
  });

  it('rejects percentiles outside [0, 1]', () => {
    expect(() => calculatePercentile([1], 1.5)).toThrow(RangeError);
  });
});

describe('aggregate', () => {
  it('groups by size and type in first-seen order', () => {
    const records = [
      makeRecord({ inputSize: 1000, inputType: 'sorted' }),
      makeRecord({ inputSize: 100 }),
      makeRecord({ inputSize: 1000, inputType: 'sorted' }),
    ];

    const groups = aggregate(records);

    expect([...groups.keys()]).toEqual(['[1000,"sorted"]', '[100,"random"]']);
    expect(groups.get('[1000,"sorted"]')?.count).toBe(2);
    expect(groups.get('[100,"random"]')?.count).toBe(1);
  });

  it('summarizes every numeric field of a group', () => {
    const records = [10, 20, 30].map((elapsedMillis) =>
      makeRecord({ elapsedMillis })
    );

    const stats = aggregate(records).get('[100,"random"]');

    expect(stats?.fields.elapsedMillis).toMatchObject({
      mean: 20,
      min: 10,
      max: 30,
    });
    expect(stats?.fields.elapsedMillis.stddev).toBeCloseTo(8.16496580927726, 10);
    expect(stats?.fields.elapsedNanos.mean).toBe(20_000_000);
    expect(stats?.fields.comparisons).toMatchObject({ mean: 198, stddev: 0 });
    expect(stats?.latency).toEqual({ p50Millis: 20, p95Millis: 30 });
  });

  it('separates algorithms with the algorithm-aware key', () => {
    const records = [
      makeRecord(),
      makeRecord({ algorithm: 'kadane-optimized' }),
    ];

    expect([...aggregate(records, byAlgorithmSizeAndType).keys()]).toEqual([
      '["kadane",100,"random"]',
      '["kadane-optimized",100,"random"]',
    ]);
  });

  it('keeps labels containing underscores in separate groups', () => {
    const records = [
      makeRecord({ algorithm: 'a_1', inputSize: 2, inputType: 'x' }),
      makeRecord({ algorithm: 'a', inputSize: 1, inputType: '2_x' }),
    ];

    const groups = aggregate(records, byAlgorithmSizeAndType);

    expect(groups.size).toBe(2);
    expect(groups.get('["a",1,"2_x"]')).toMatchObject({
      count: 1,
      algorithm: 'a',
      inputSize: 1,
      inputType: '2_x',
    });
  });

  it('returns an empty map for no records', () => {
    expect(aggregate([]).size).toBe(0);
  });

  it('is recomputed from the records on every call', () => {
    const records = [makeRecord({ elapsedMillis: 2 })];
    const first = aggregate(records);
    const second = aggregate([...records, makeRecord({ elapsedMillis: 4 })]);

    expect(first.get('[100,"random"]')?.fields.elapsedMillis.mean).toBe(2);
    expect(second.get('[100,"random"]')?.fields.elapsedMillis.mean).toBe(3);
  });
});

describe('aggregateAll', () => {
  it('summarizes every record under one key', () => {
    const stats = aggregateAll([
      makeRecord({ inputSize: 100 }),
      makeRecord({ inputSize: 200 }),
    ]);

    expect(stats?.key).toBe('all');
    expect(stats?.count).toBe(2);
  });

  it('returns undefined for no records', () => {
    expect(aggregateAll([])).toBeUndefined();
  });
});

describe('analyzeComplexity', () => {
  it('compares each size against the previous one', () => {
    const stats = aggregate([
      makeRecord({ inputSize: 200, elapsedMillis: 2, comparisons: 398 }),
      makeRecord({ inputSize: 100, elapsedMillis: 1, comparisons: 198 }),
    ]).values();

    const points = analyzeComplexity(stats);

    expect(points).toHaveLength(2);
    expect(points[0]).toEqual({
      inputSize: 100,
      groups: 1,
      avgTimeMillis: 1,
      timePerElementNanos: 10_000,
      avgComparisons: 198,
      comparisonsPerElement: 1.98,
    });
    expect(points[1]).toMatchObject({
      inputSize: 200,
      avgTimeMillis: 2,
      timePerElementNanos: 10_000,
      comparisonsPerElement: 1.99,
      growthRatio: 2,
      expectedGrowth: 2,
    });
  });

  it('leaves the growth ratio undefined after a zero-time size', () => {
    const points = analyzeComplexity(
      aggregate([
        makeRecord({ inputSize: 10, elapsedMillis: 0 }),
        makeRecord({ inputSize: 20, elapsedMillis: 1 }),
      ]).values()
    );

    expect(points[1]?.expectedGrowth).toBe(2);
    expect(points[1]?.growthRatio).toBeUndefined();
  });
});
