export interface FieldStats {
  count: number;
  mean: number;
  min: number;
  max: number;
  /** Population standard deviation (divides by count) */
  stddev: number;
}

export function summarize(values: readonly number[]): FieldStats | undefined {
  if (values.length === 0) {
    return undefined;
  }

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const mean = sum / values.length;

  let squared = 0;
  for (const value of values) {
    const delta = value - mean;
    squared += delta * delta;
  }

  return {
    count: values.length,
    mean,
    min,
    max,
    stddev: Math.sqrt(squared / values.length),
  };
}

export function calculatePercentile(
  values: readonly number[],
  percentile: number
): number {
  if (!Number.isFinite(percentile) || percentile < 0 || percentile > 1) {
    throw new RangeError('percentile must be between 0 and 1');
  }
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const rankedIndex =
    percentile <= 0 ? 0 : Math.ceil(percentile * sorted.length) - 1;
  const index = Math.min(sorted.length - 1, Math.max(0, rankedIndex));
  return sorted[index] ?? 0;
}
