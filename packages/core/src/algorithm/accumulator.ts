import type { Sequence } from '../types/sequence.js';

/**
 * Accumulator widths.
 * - int32: wraps around like fixed-width 32-bit arithmetic (the element width)
 * - int64: plain number arithmetic, exact while |sum| <= Number.MAX_SAFE_INTEGER
 *
 * Overflow is never signaled. Callers that cannot tolerate wraparound pick int64.
 */
export type AccumulatorWidth = 'int32' | 'int64';

export const ACCUMULATOR_WIDTHS: readonly AccumulatorWidth[] = [
  'int32',
  'int64',
];

export type AddFn = (a: number, b: number) => number;

const addInt32: AddFn = (a, b) => (a + b) | 0;
const addInt64: AddFn = (a, b) => a + b;

export function getAdder(width: AccumulatorWidth): AddFn {
  return width === 'int32' ? addInt32 : addInt64;
}

export function isAccumulatorWidth(value: string): value is AccumulatorWidth {
  return value === 'int32' || value === 'int64';
}

/**
 * Sum of sequence[start..end] (inclusive) using the given accumulator width.
 */
export function sumRange(
  sequence: Sequence,
  start: number,
  end: number,
  width: AccumulatorWidth = 'int32'
): number {
  const add = getAdder(width);
  let total = 0;
  for (let i = start; i <= end; i++) {
    total = add(total, sequence[i] ?? 0);
  }
  return total;
}
