import { ConfigError, InvalidInputError } from '@subarray-lab/core';
import { describe, expect, it } from 'vitest';

import {
  benchOverridesFromFlags,
  parseMaxDuration,
  parseSeed,
  parseSequenceText,
  resolveAccumulator,
  resolveScanVariant,
} from '../flags.js';

describe('CLI flag helpers', () => {
  describe('parseSequenceText', () => {
    it('accepts commas and whitespace as separators', () => {
      expect(parseSequenceText('1, -2 3\n+4')).toEqual([1, -2, 3, 4]);
    });

    it('accepts a JSON array', () => {
      expect(parseSequenceText('[-2, 1, -3]\n')).toEqual([-2, 1, -3]);
    });

    it('returns an empty list for blank input', () => {
      expect(parseSequenceText('  ')).toEqual([]);
    });

    it('names the offending token and its index', () => {
      expect(() => parseSequenceText('1,x,3')).toThrow(
        'Unparseable element "x" at index 1 in --values'
      );
      expect(() => parseSequenceText('1.5', 'numbers.txt')).toThrow(
        InvalidInputError
      );
    });
  });

  describe('resolveScanVariant', () => {
    it('defaults to baseline', () => {
      expect(resolveScanVariant(undefined)).toBe('baseline');
    });

    it('ignores case', () => {
      expect(resolveScanVariant('Optimized')).toBe('optimized');
    });

    it('rejects unknown variants', () => {
      expect(() => resolveScanVariant('quadratic')).toThrow(ConfigError);
    });
  });

  describe('resolveAccumulator', () => {
    it('leaves the width unset when the flag is absent', () => {
      expect(resolveAccumulator(undefined)).toBeUndefined();
    });

    it('parses known widths', () => {
      expect(resolveAccumulator('INT64')).toBe('int64');
      expect(() => resolveAccumulator('int128')).toThrow(
        'Unknown accumulator width "int128"'
      );
    });
  });

  describe('numeric flags', () => {
    it('parses signed integer seeds', () => {
      expect(parseSeed('-5')).toBe(-5);
      expect(() => parseSeed('1.5')).toThrow('Invalid seed "1.5"');
    });

    it('requires a positive max duration', () => {
      expect(parseMaxDuration('250')).toBe(250);
      expect(() => parseMaxDuration('0')).toThrow(ConfigError);
      expect(() => parseMaxDuration('soon')).toThrow(ConfigError);
    });
  });

  describe('benchOverridesFromFlags', () => {
    it('leaves unset flags undefined', () => {
      expect(benchOverridesFromFlags({ export: true, verify: true })).toEqual(
        {}
      );
    });

    it('maps every provided flag', () => {
      expect(
        benchOverridesFromFlags({
          sizes: '10,20',
          distributions: 'sorted',
          variants: 'baseline,optimized',
          warmup: '0',
          iterations: '2',
          accumulator: 'int64',
          seed: '9',
          outDir: 'out',
          format: 'csv',
          verify: false,
          maxDuration: '100',
        })
      ).toEqual({
        sizes: [10, 20],
        distributions: ['sorted'],
        variants: ['baseline', 'optimized'],
        warmupIterations: 0,
        iterations: 2,
        accumulator: 'int64',
        seed: 9,
        outDir: 'out',
        formats: ['csv'],
        verify: false,
        maxDurationMs: 100,
      });
    });

    it('propagates parse failures', () => {
      expect(() => benchOverridesFromFlags({ sizes: '10,abc' })).toThrow(
        'Unparseable size "abc" in sizes'
      );
    });
  });
});
