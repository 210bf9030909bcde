import fc from 'fast-check';

import { INT32_MAX, INT32_MIN } from '../../src/types/sequence.js';

export const FC_NUM_RUNS = Number.parseInt(process.env.FC_NUM_RUNS ?? '100', 10);
export const TEST_SEED = Number.parseInt(process.env.TEST_SEED ?? '424242', 10);

/**
 * Values small enough that no running sum leaves the int32 range, so both
 * accumulator widths agree exactly.
 */
export const boundedSequenceArbitrary = fc.array(
  fc.integer({ min: -1_000_000, max: 1_000_000 }),
  { minLength: 1, maxLength: 200 }
);

/** Short inputs for the quadratic brute-force comparison */
export const shortSequenceArbitrary = fc.array(
  fc.integer({ min: -1_000, max: 1_000 }),
  { minLength: 1, maxLength: 20 }
);

/** Anything a signed 32-bit element can hold */
export const fullRangeSequenceArbitrary = fc.array(
  fc.integer({ min: INT32_MIN, max: INT32_MAX }),
  { minLength: 1, maxLength: 200 }
);

export const propertyParameters = {
  numRuns: FC_NUM_RUNS,
  seed: TEST_SEED,
} as const;

/** Negative prefixes whose int32 sums wrap within two or three elements */
export const nearMinNegativeSequenceArbitrary = fc.array(
  fc.integer({ min: INT32_MIN, max: -1_000_000_000 }),
  { minLength: 1, maxLength: 20 }
);
