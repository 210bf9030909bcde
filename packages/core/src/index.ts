// @subarray-lab/core entry point
//
// - Engine: scan()/scanOptimized() over signed 32-bit sequences, with the
//   SCAN_VARIANTS registry and the extractSubarray() projection.
// - Instrumentation: MetricsCollector (OperationCounter port), RunHistory,
//   RunRecorder and the measureScan()/measureBatch() glue.
// - Statistics: summarize(), aggregate() with group key functions,
//   analyzeComplexity().
// - Benchmark inputs and configuration: SequenceGenerator, BenchConfig layers.

// Engine
export {
  scan,
  scanOptimized,
  extractSubarray,
  assertSequence,
  isScanVariant,
  SCAN_VARIANTS,
  SCAN_VARIANT_NAMES,
  type ScanFn,
  type ScanOptions,
  type ScanVariant,
  type ScanVariantEntry,
} from './algorithm/kadane.js';
export {
  ACCUMULATOR_WIDTHS,
  getAdder,
  isAccumulatorWidth,
  sumRange,
  type AccumulatorWidth,
  type AddFn,
} from './algorithm/accumulator.js';
export { bruteForceMaxSubarray, verifyResult } from './algorithm/reference.js';
export {
  INT32_MAX,
  INT32_MIN,
  type Sequence,
  type SubarrayResult,
} from './types/sequence.js';

// Instrumentation
export {
  MetricsCollector,
  NOOP_COUNTER,
  OPERATION_KINDS,
  type MetricsCollectorOptions,
  type MetricsSnapshot,
  type OperationCounter,
  type OperationKind,
} from './util/metrics.js';
export { RunHistory, type RunRecord } from './recorder/run-history.js';
export {
  RunRecorder,
  type RunRecorderOptions,
} from './recorder/run-recorder.js';
export {
  DEFAULT_INPUT_TYPE,
  measureBatch,
  measureScan,
  type MeasureOptions,
  type MeasureScanOptions,
  type MeasuredScan,
} from './recorder/measure.js';

// Statistics
export {
  calculatePercentile,
  summarize,
  type FieldStats,
} from './stats/summary.js';
export {
  AGGREGATE_FIELDS,
  aggregate,
  aggregateAll,
  byAlgorithmSizeAndType,
  bySizeAndType,
  type AggregateField,
  type AggregateStats,
  type GroupKeyFn,
} from './stats/aggregate.js';
export {
  analyzeComplexity,
  type ComplexityPoint,
} from './stats/complexity.js';

// Benchmark inputs and configuration
export {
  DEFAULT_GENERATOR_SEED,
  DISTRIBUTIONS,
  SequenceGenerator,
  isDistribution,
  type Distribution,
} from './generators/distributions.js';
export {
  BENCH_CONFIG_SCHEMA,
  DEFAULT_BENCH_CONFIG,
  REPORT_FORMATS,
  loadBenchConfigFile,
  parseBenchConfigFile,
  parseDistributionList,
  parseFormatList,
  parseNonNegativeInteger,
  parseSizeList,
  parseVariantList,
  resolveBenchConfig,
  resolveIterationOverridesFromEnv,
  type BenchConfig,
  type BenchConfigOverrides,
  type ReportFormat,
} from './config/bench-config.js';

// Errors
export { ErrorCode, EXIT_CODES, getExitCode } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  ConfigError,
  ExportError,
  InternalError,
  InvalidInputError,
  SubarrayError,
  VerificationError,
  isSubarrayError,
  type ErrorContext,
  type SerializedError,
  type SubarrayErrorParams,
} from './types/errors.js';
