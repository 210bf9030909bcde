import type { AggregateStats } from './aggregate.js';

const NANOS_PER_MILLI = 1_000_000;

/**
 * Empirical growth at one input size. Ratios compare against the previous
 * (smaller) size; for a linear scan growthRatio should track expectedGrowth.
 */
export interface ComplexityPoint {
  inputSize: number;
  groups: number;
  avgTimeMillis: number;
  timePerElementNanos: number;
  avgComparisons: number;
  comparisonsPerElement: number;
  growthRatio?: number;
  expectedGrowth?: number;
}

export function analyzeComplexity(
  stats: Iterable<AggregateStats>
): ComplexityPoint[] {
  const bySize = new Map<number, AggregateStats[]>();
  for (const entry of stats) {
    const bucket = bySize.get(entry.inputSize);
    if (bucket) {
      bucket.push(entry);
    } else {
      bySize.set(entry.inputSize, [entry]);
    }
  }

  const sizes = [...bySize.keys()].sort((a, b) => a - b);
  const points: ComplexityPoint[] = [];
  let previous: ComplexityPoint | undefined;

  for (const inputSize of sizes) {
    const entries = bySize.get(inputSize) ?? [];
    const avgTimeMillis = mean(
      entries.map((entry) => entry.fields.elapsedMillis.mean)
    );
    const avgComparisons = mean(
      entries.map((entry) => entry.fields.comparisons.mean)
    );
    const point: ComplexityPoint = {
      inputSize,
      groups: entries.length,
      avgTimeMillis,
      timePerElementNanos:
        inputSize > 0 ? (avgTimeMillis * NANOS_PER_MILLI) / inputSize : 0,
      avgComparisons,
      comparisonsPerElement: inputSize > 0 ? avgComparisons / inputSize : 0,
    };

    if (previous && previous.inputSize > 0) {
      point.expectedGrowth = inputSize / previous.inputSize;
      point.growthRatio =
        previous.avgTimeMillis > 0
          ? avgTimeMillis / previous.avgTimeMillis
          : undefined;
    }

    points.push(point);
    previous = point;
  }

  return points;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}
