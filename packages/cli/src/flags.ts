import {
  ConfigError,
  InvalidInputError,
  isAccumulatorWidth,
  isScanVariant,
  parseDistributionList,
  parseFormatList,
  parseNonNegativeInteger,
  parseSizeList,
  parseVariantList,
  type AccumulatorWidth,
  type BenchConfigOverrides,
  type ScanVariant,
} from '@subarray-lab/core';

/**
 * Options of `subarray scan` as commander hands them over
 */
export interface ScanCliOptions {
  values?: string;
  file?: string;
  variant?: string;
  accumulator?: string;
  metrics?: boolean;
}

/**
 * Options of `subarray bench`. Commander sets export/verify to false for
 * --no-export/--no-verify and true otherwise.
 */
export interface BenchCliOptions {
  config?: string;
  sizes?: string;
  distributions?: string;
  variants?: string;
  warmup?: string;
  iterations?: string;
  accumulator?: string;
  seed?: string;
  outDir?: string;
  format?: string;
  export?: boolean;
  verify?: boolean;
  maxDuration?: string;
  verbose?: boolean;
}

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Parses integers separated by commas and/or whitespace. Surrounding
 * brackets are tolerated so a JSON array file reads the same way.
 */
export function parseSequenceText(raw: string, source = '--values'): number[] {
  const body = raw.trim().replace(/^\[/, '').replace(/\]$/, '');
  const tokens = body.split(/[\s,]+/).filter((token) => token.length > 0);
  return tokens.map((token, index) => {
    if (!INTEGER_TOKEN.test(token)) {
      throw new InvalidInputError({
        message: `Unparseable element "${token}" at index ${index} in ${source}`,
        context: { index, value: token, source },
      });
    }
    return Number.parseInt(token, 10);
  });
}

export function resolveScanVariant(raw: string | undefined): ScanVariant {
  if (raw === undefined) {
    return 'baseline';
  }
  const variant = raw.trim().toLowerCase();
  if (!isScanVariant(variant)) {
    throw new ConfigError({
      message: `Unknown scan variant "${raw}"`,
      context: { setting: 'variant', value: raw },
      suggestions: ['Use baseline or optimized'],
    });
  }
  return variant;
}

export function resolveAccumulator(
  raw: string | undefined
): AccumulatorWidth | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const width = raw.trim().toLowerCase();
  if (!isAccumulatorWidth(width)) {
    throw new ConfigError({
      message: `Unknown accumulator width "${raw}"`,
      context: { setting: 'accumulator', value: raw },
      suggestions: ['Use int32 or int64'],
    });
  }
  return width;
}

export function parseSeed(raw: string): number {
  const trimmed = raw.trim();
  const seed = Number(trimmed);
  if (!INTEGER_TOKEN.test(trimmed) || !Number.isSafeInteger(seed)) {
    throw new ConfigError({
      message: `Invalid seed "${raw}"`,
      context: { setting: 'seed', value: raw },
    });
  }
  return seed;
}

export function parseMaxDuration(raw: string): number {
  const duration = Number(raw.trim());
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new ConfigError({
      message: `Invalid max duration "${raw}"; expected milliseconds > 0`,
      context: { setting: 'maxDurationMs', value: raw },
    });
  }
  return duration;
}

/**
 * Maps bench flags onto the highest-precedence config layer. Flags left
 * unset stay undefined so lower layers show through.
 */
export function benchOverridesFromFlags(
  options: BenchCliOptions
): BenchConfigOverrides {
  return {
    sizes: mapDefined(options.sizes, (raw) => parseSizeList(raw)),
    distributions: mapDefined(options.distributions, parseDistributionList),
    variants: mapDefined(options.variants, parseVariantList),
    warmupIterations: mapDefined(options.warmup, (raw) =>
      parseNonNegativeInteger(raw, 'warmup')
    ),
    iterations: mapDefined(options.iterations, (raw) =>
      parseNonNegativeInteger(raw, 'iterations')
    ),
    accumulator: resolveAccumulator(options.accumulator),
    seed: mapDefined(options.seed, parseSeed),
    outDir: options.outDir,
    formats: mapDefined(options.format, parseFormatList),
    verify: options.verify === false ? false : undefined,
    maxDurationMs: mapDefined(options.maxDuration, parseMaxDuration),
  };
}

function mapDefined<T>(
  raw: string | undefined,
  parse: (value: string) => T
): T | undefined {
  return raw === undefined ? undefined : parse(raw);
}
