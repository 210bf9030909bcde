/**
 * Ordered, fixed-length list of signed 32-bit integers.
 * The engine never mutates it.
 */
export type Sequence = readonly number[] | Int32Array;

/**
 * Maximum-sum contiguous range of a sequence.
 * Invariant: 0 <= startIndex <= endIndex < sequence.length
 */
export interface SubarrayResult {
  readonly maxSum: number;
  readonly startIndex: number;
  readonly endIndex: number;
}

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
