/**
 * Synthetic benchmark inputs.
 * Deterministic for a given seed: every generator owns a seeded Faker
 * instance, so two generators never share random state.
 */

import { Faker, en } from '@faker-js/faker';

import { ConfigError } from '../types/errors.js';

export const DISTRIBUTIONS = [
  'random',
  'sorted',
  'reverse_sorted',
  'all_positive',
  'all_negative',
  'alternating',
  'sparse_positive',
] as const;

export type Distribution = (typeof DISTRIBUTIONS)[number];

export const DEFAULT_GENERATOR_SEED = 42;

const SPARSE_POSITIVE_PROBABILITY = 0.1;

export function isDistribution(value: string): value is Distribution {
  return DISTRIBUTIONS.some((distribution) => distribution === value);
}

export class SequenceGenerator {
  private readonly faker: Faker;

  constructor(seed: number = DEFAULT_GENERATOR_SEED) {
    this.faker = new Faker({ locale: [en] });
    this.faker.seed(seed);
  }

  generate(size: number, distribution: Distribution): Int32Array {
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigError({
        message: `Sequence size must be a positive integer (got ${size})`,
        context: { setting: 'sizes', value: size },
      });
    }

    switch (distribution) {
      case 'random':
        return this.uniform(size, -100, 100);
      case 'sorted':
        return Int32Array.from({ length: size }, (_, i) => i + 1);
      case 'reverse_sorted':
        return Int32Array.from({ length: size }, (_, i) => size - i);
      case 'all_positive':
        return this.uniform(size, 1, 100);
      case 'all_negative':
        return this.uniform(size, -100, -1);
      case 'alternating':
        return Int32Array.from({ length: size }, (_, i) =>
          i % 2 === 0 ? 1 : -1
        );
      case 'sparse_positive':
        return Int32Array.from({ length: size }, () =>
          this.faker.datatype.boolean({
            probability: SPARSE_POSITIVE_PROBABILITY,
          })
            ? this.faker.number.int({ min: 1, max: 100 })
            : this.faker.number.int({ min: -15, max: -6 })
        );
    }
  }

  private uniform(size: number, min: number, max: number): Int32Array {
    return Int32Array.from({ length: size }, () =>
      this.faker.number.int({ min, max })
    );
  }
}
