import { readFile } from 'node:fs/promises';
import { Ajv, type ErrorObject } from 'ajv';

import {
  ACCUMULATOR_WIDTHS,
  type AccumulatorWidth,
} from '../algorithm/accumulator.js';
import {
  SCAN_VARIANT_NAMES,
  isScanVariant,
  type ScanVariant,
} from '../algorithm/kadane.js';
import {
  DEFAULT_GENERATOR_SEED,
  DISTRIBUTIONS,
  isDistribution,
  type Distribution,
} from '../generators/distributions.js';
import { ConfigError } from '../types/errors.js';

export const REPORT_FORMATS = ['csv', 'json', 'markdown'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface BenchConfig {
  sizes: number[];
  distributions: Distribution[];
  warmupSizes: number[];
  warmupIterations: number;
  iterations: number;
  variants: ScanVariant[];
  accumulator: AccumulatorWidth;
  seed: number;
  formats: ReportFormat[];
  outDir: string;
  verify: boolean;
  /** Stop scheduling new runs once this much wall time has elapsed */
  maxDurationMs?: number;
}

export type BenchConfigOverrides = Partial<BenchConfig>;

export const DEFAULT_BENCH_CONFIG: Readonly<BenchConfig> =
  Object.freeze<BenchConfig>({
    sizes: [100, 1000, 10000, 100000],
    distributions: [
      'random',
      'sorted',
      'reverse_sorted',
      'all_positive',
      'all_negative',
      'alternating',
    ],
    warmupSizes: [1000, 5000, 10000],
    warmupIterations: 3,
    iterations: 5,
    variants: ['baseline'],
    accumulator: 'int32',
    seed: DEFAULT_GENERATOR_SEED,
    formats: ['csv', 'json'],
    outDir: 'bench',
    verify: true,
  });

const positiveIntegerList = {
  type: 'array',
  items: { type: 'integer', minimum: 1 },
  minItems: 1,
} as const;

export const BENCH_CONFIG_SCHEMA = {
  $id: 'subarray-lab/bench-config',
  type: 'object',
  additionalProperties: false,
  properties: {
    sizes: positiveIntegerList,
    distributions: {
      type: 'array',
      items: { enum: [...DISTRIBUTIONS] },
      minItems: 1,
    },
    warmupSizes: { type: 'array', items: { type: 'integer', minimum: 1 } },
    warmupIterations: { type: 'integer', minimum: 0 },
    iterations: { type: 'integer', minimum: 1 },
    variants: {
      type: 'array',
      items: { enum: [...SCAN_VARIANT_NAMES] },
      minItems: 1,
    },
    accumulator: { enum: [...ACCUMULATOR_WIDTHS] },
    seed: { type: 'integer' },
    formats: { type: 'array', items: { enum: [...REPORT_FORMATS] } },
    outDir: { type: 'string', minLength: 1 },
    verify: { type: 'boolean' },
    maxDurationMs: { type: 'number', exclusiveMinimum: 0 },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateConfigFile =
  ajv.compile<BenchConfigOverrides>(BENCH_CONFIG_SCHEMA);

/**
 * Validates a parsed JSON config document against BENCH_CONFIG_SCHEMA.
 */
export function parseBenchConfigFile(
  raw: unknown,
  source = '<inline>'
): BenchConfigOverrides {
  if (validateConfigFile(raw)) {
    return raw;
  }
  const issues = (validateConfigFile.errors ?? []).map(formatAjvError);
  throw new ConfigError({
    message: `Invalid bench config ${source}: ${issues.join('; ')}`,
    context: { path: source, issues },
  });
}

export async function loadBenchConfigFile(
  path: string
): Promise<BenchConfigOverrides> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read bench config ${path}`,
      context: { path },
      cause: error instanceof Error ? error : undefined,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError({
      message: `Bench config ${path} is not valid JSON`,
      context: { path },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseBenchConfigFile(raw, path);
}

export function parseSizeList(raw: string, setting = 'sizes'): number[] {
  return splitList(raw, setting).map((token) => {
    if (!/^\d+$/.test(token)) {
      throw new ConfigError({
        message: `Unparseable size "${token}" in ${setting}`,
        context: { setting, value: raw },
      });
    }
    const size = Number.parseInt(token, 10);
    if (size < 1 || !Number.isSafeInteger(size)) {
      throw new ConfigError({
        message: `Size ${token} in ${setting} must be a positive integer`,
        context: { setting, value: raw },
      });
    }
    return size;
  });
}

export function parseDistributionList(raw: string): Distribution[] {
  return splitList(raw, 'distributions').map((token) => {
    const label = token.toLowerCase();
    if (!isDistribution(label)) {
      throw new ConfigError({
        message: `Unknown distribution "${token}"`,
        context: { setting: 'distributions', value: token },
        suggestions: [`Use one of: ${DISTRIBUTIONS.join(', ')}`],
      });
    }
    return label;
  });
}

export function parseVariantList(raw: string): ScanVariant[] {
  return splitList(raw, 'variants').map((token) => {
    const label = token.toLowerCase();
    if (!isScanVariant(label)) {
      throw new ConfigError({
        message: `Unknown scan variant "${token}"`,
        context: { setting: 'variants', value: token },
        suggestions: [`Use one of: ${SCAN_VARIANT_NAMES.join(', ')}`],
      });
    }
    return label;
  });
}

export function parseFormatList(raw: string): ReportFormat[] {
  return splitList(raw, 'formats').map((token) => {
    const label = token.toLowerCase();
    const format = REPORT_FORMATS.find((candidate) => candidate === label);
    if (!format) {
      throw new ConfigError({
        message: `Unknown report format "${token}"`,
        context: { setting: 'formats', value: token },
        suggestions: [`Use one of: ${REPORT_FORMATS.join(', ')}`],
      });
    }
    return format;
  });
}

export function parseNonNegativeInteger(raw: string, setting: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError({
      message: `${setting} must be a non-negative integer (got "${raw}")`,
      context: { setting, value: raw },
    });
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Iteration overrides from the environment:
 * - SUBARRAY_BENCH_QUICK=1 → warmup 1, iterations 3
 * - SUBARRAY_BENCH_WARMUP / SUBARRAY_BENCH_ITERATIONS
 */
export function resolveIterationOverridesFromEnv(
  env: NodeJS.ProcessEnv = process.env
): BenchConfigOverrides {
  if (env.SUBARRAY_BENCH_QUICK === '1') {
    return { warmupIterations: 1, iterations: 3 };
  }

  const overrides: BenchConfigOverrides = {};
  if (env.SUBARRAY_BENCH_WARMUP !== undefined) {
    overrides.warmupIterations = parseNonNegativeInteger(
      env.SUBARRAY_BENCH_WARMUP,
      'SUBARRAY_BENCH_WARMUP'
    );
  }
  if (env.SUBARRAY_BENCH_ITERATIONS !== undefined) {
    overrides.iterations = parseNonNegativeInteger(
      env.SUBARRAY_BENCH_ITERATIONS,
      'SUBARRAY_BENCH_ITERATIONS'
    );
  }
  return overrides;
}

/**
 * Merges override layers (later layers win) over the defaults and checks
 * the result.
 */
export function resolveBenchConfig(
  ...layers: BenchConfigOverrides[]
): BenchConfig {
  const merged: BenchConfig = { ...DEFAULT_BENCH_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  requireNonEmpty(merged.sizes, 'sizes');
  requireNonEmpty(merged.distributions, 'distributions');
  requireNonEmpty(merged.variants, 'variants');
  if (!Number.isInteger(merged.iterations) || merged.iterations < 1) {
    throw new ConfigError({
      message: `iterations must be at least 1 (got ${merged.iterations})`,
      context: { setting: 'iterations', value: merged.iterations },
    });
  }
  if (
    !Number.isInteger(merged.warmupIterations) ||
    merged.warmupIterations < 0
  ) {
    throw new ConfigError({
      message: `warmupIterations must be non-negative (got ${merged.warmupIterations})`,
      context: { setting: 'warmupIterations', value: merged.warmupIterations },
    });
  }
  if (
    merged.maxDurationMs !== undefined &&
    !(Number.isFinite(merged.maxDurationMs) && merged.maxDurationMs > 0)
  ) {
    throw new ConfigError({
      message: `maxDurationMs must be a positive number (got ${merged.maxDurationMs})`,
      context: { setting: 'maxDurationMs', value: merged.maxDurationMs },
    });
  }

  return {
    ...merged,
    sizes: [...merged.sizes],
    distributions: [...merged.distributions],
    warmupSizes: [...merged.warmupSizes],
    variants: [...new Set(merged.variants)],
    formats: [...new Set(merged.formats)],
  };
}

function splitList(raw: string, setting: string): string[] {
  const tokens = raw
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
  if (tokens.length === 0) {
    throw new ConfigError({
      message: `${setting} list is empty`,
      context: { setting, value: raw },
    });
  }
  return tokens;
}

function requireNonEmpty(values: readonly unknown[], setting: string): void {
  if (values.length === 0) {
    throw new ConfigError({
      message: `${setting} must not be empty`,
      context: { setting },
    });
  }
}

function formatAjvError(error: ErrorObject): string {
  const location = error.instancePath || '/';
  return `${location} ${error.message ?? 'is invalid'}`;
}
