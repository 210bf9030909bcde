/**
 * Maximum-subarray engine (Kadane's method with position tracking).
 *
 * Tie policy shared by every variant:
 * - extension wins ties: restart only when `x > running + x`
 * - the best range moves only on strict improvement, so the leftmost
 *   range achieving the maximum is kept
 *
 * Instrumentation: one elementAccesses per element read (each element is read
 * once), one comparisons per branch decision, one allocations for the result.
 */

import { InvalidInputError } from '../types/errors.js';
import {
  INT32_MAX,
  INT32_MIN,
  type Sequence,
  type SubarrayResult,
} from '../types/sequence.js';
import { NOOP_COUNTER, type OperationCounter } from '../util/metrics.js';
import { getAdder, type AccumulatorWidth } from './accumulator.js';

export type ScanVariant = 'baseline' | 'optimized';

export interface ScanOptions {
  counter?: OperationCounter;
  /** Defaults to int32 (wraparound) */
  accumulator?: AccumulatorWidth;
}

export type ScanFn = (
  sequence: Sequence | null | undefined,
  options?: ScanOptions
) => SubarrayResult;

export function assertSequence(
  sequence: Sequence | null | undefined
): asserts sequence is Sequence {
  if (sequence === null || sequence === undefined) {
    throw new InvalidInputError({
      message: 'Input sequence cannot be absent',
      context: { reason: 'absent' },
    });
  }
  if (sequence.length === 0) {
    throw new InvalidInputError({
      message: 'Input sequence cannot be empty',
      context: { reason: 'empty' },
    });
  }
}

export function scan(
  sequence: Sequence | null | undefined,
  options: ScanOptions = {}
): SubarrayResult {
  assertSequence(sequence);
  const counter = options.counter ?? NOOP_COUNTER;
  const add = getAdder(options.accumulator ?? 'int32');

  let runningSum = readElement(sequence, 0, counter);
  let runningStart = 0;
  let bestSum = runningSum;
  let bestStart = 0;
  let bestEnd = 0;

  for (let i = 1; i < sequence.length; i++) {
    const value = readElement(sequence, i, counter);
    const extended = add(runningSum, value);

    counter.increment('comparisons');
    if (value > extended) {
      runningSum = value;
      runningStart = i;
    } else {
      runningSum = extended;
    }

    counter.increment('comparisons');
    if (runningSum > bestSum) {
      bestSum = runningSum;
      bestStart = runningStart;
      bestEnd = i;
    }
  }

  return createResult(bestSum, bestStart, bestEnd, counter);
}

/**
 * Same contract and same results as scan(). While the prefix is strictly
 * negative each step restarts at the current element, so only the best single
 * element is tracked. The regular recurrence takes over at the first
 * non-negative element, or earlier when an int32 sum of two negatives wraps
 * and scan() would extend instead of restarting.
 */
export function scanOptimized(
  sequence: Sequence | null | undefined,
  options: ScanOptions = {}
): SubarrayResult {
  assertSequence(sequence);
  const counter = options.counter ?? NOOP_COUNTER;
  const add = getAdder(options.accumulator ?? 'int32');

  const first = readElement(sequence, 0, counter);
  let runningSum = first;
  let runningStart = 0;
  let bestSum = first;
  let bestStart = 0;
  let bestEnd = 0;

  counter.increment('comparisons');
  let negativePrefix = first < 0;

  for (let i = 1; i < sequence.length; i++) {
    const value = readElement(sequence, i, counter);

    if (negativePrefix) {
      counter.increment('comparisons');
      if (value < 0) {
        const extended = add(runningSum, value);
        counter.increment('comparisons');
        if (value > extended) {
          runningSum = value;
          runningStart = i;
          counter.increment('comparisons');
          if (value > bestSum) {
            bestSum = value;
            bestStart = i;
            bestEnd = i;
          }
          continue;
        }

        negativePrefix = false;
        runningSum = extended;
        counter.increment('comparisons');
        if (runningSum > bestSum) {
          bestSum = runningSum;
          bestStart = runningStart;
          bestEnd = i;
        }
        continue;
      }
      negativePrefix = false;
      runningSum = value;
      runningStart = i;
      bestSum = value;
      bestStart = i;
      bestEnd = i;
      continue;
    }

    const extended = add(runningSum, value);

    counter.increment('comparisons');
    if (value > extended) {
      runningSum = value;
      runningStart = i;
    } else {
      runningSum = extended;
    }

    counter.increment('comparisons');
    if (runningSum > bestSum) {
      bestSum = runningSum;
      bestStart = runningStart;
      bestEnd = i;
    }
  }

  return createResult(bestSum, bestStart, bestEnd, counter);
}

export interface ScanVariantEntry {
  label: string;
  run: ScanFn;
}

export const SCAN_VARIANTS: Readonly<Record<ScanVariant, ScanVariantEntry>> =
  Object.freeze({
    baseline: { label: 'kadane', run: scan },
    optimized: { label: 'kadane-optimized', run: scanOptimized },
  });

export const SCAN_VARIANT_NAMES: readonly ScanVariant[] = [
  'baseline',
  'optimized',
];

export function isScanVariant(value: string): value is ScanVariant {
  return Object.prototype.hasOwnProperty.call(SCAN_VARIANTS, value);
}

/**
 * Inclusive slice [startIndex, endIndex] of the original sequence, or
 * undefined when the sequence is not supplied.
 */
export function extractSubarray(
  result: SubarrayResult,
  sequence?: Sequence | null
): number[] | undefined {
  if (sequence === undefined || sequence === null) {
    return undefined;
  }
  return Array.from(sequence.slice(result.startIndex, result.endIndex + 1));
}

function readElement(
  sequence: Sequence,
  index: number,
  counter: OperationCounter
): number {
  counter.increment('elementAccesses');
  const value = sequence[index];
  if (
    value === undefined ||
    !Number.isInteger(value) ||
    value < INT32_MIN ||
    value > INT32_MAX
  ) {
    throw new InvalidInputError({
      message: `Element at index ${index} is not a signed 32-bit integer`,
      context: { index, value },
    });
  }
  return value;
}

function createResult(
  maxSum: number,
  startIndex: number,
  endIndex: number,
  counter: OperationCounter
): SubarrayResult {
  counter.increment('allocations');
  return Object.freeze({ maxSum, startIndex, endIndex });
}
