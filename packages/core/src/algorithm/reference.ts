import type { Sequence, SubarrayResult } from '../types/sequence.js';
import { getAdder, sumRange, type AccumulatorWidth } from './accumulator.js';
import { assertSequence } from './kadane.js';

/**
 * O(n²) reference: every (start, end) pair in lexicographic order, keeping
 * the first range that reaches the maximum.
 */
export function bruteForceMaxSubarray(
  sequence: Sequence | null | undefined,
  width: AccumulatorWidth = 'int64'
): SubarrayResult {
  assertSequence(sequence);
  const add = getAdder(width);
  let best: SubarrayResult | undefined;

  for (let start = 0; start < sequence.length; start++) {
    let total = 0;
    for (let end = start; end < sequence.length; end++) {
      total = add(total, sequence[end] ?? 0);
      if (best === undefined || total > best.maxSum) {
        best = { maxSum: total, startIndex: start, endIndex: end };
      }
    }
  }

  return best ?? { maxSum: 0, startIndex: 0, endIndex: 0 };
}

/**
 * Lists every invariant a result violates for the given sequence; an empty
 * list means the result is a valid subarray whose sum is maxSum.
 */
export function verifyResult(
  sequence: Sequence,
  result: SubarrayResult,
  width: AccumulatorWidth = 'int32'
): string[] {
  const issues: string[] = [];
  const { startIndex, endIndex, maxSum } = result;

  if (!Number.isInteger(startIndex) || startIndex < 0) {
    issues.push(`start index ${startIndex} is out of range`);
  }
  if (!Number.isInteger(endIndex) || endIndex >= sequence.length) {
    issues.push(`end index ${endIndex} is out of range`);
  }
  if (endIndex < startIndex) {
    issues.push(`end index ${endIndex} precedes start index ${startIndex}`);
  }
  if (issues.length > 0) {
    return issues;
  }

  const actual = sumRange(sequence, startIndex, endIndex, width);
  if (actual !== maxSum) {
    issues.push(
      `sum of [${startIndex}..${endIndex}] is ${actual}, reported ${maxSum}`
    );
  }
  return issues;
}
