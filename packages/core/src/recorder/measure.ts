import type { AccumulatorWidth } from '../algorithm/accumulator.js';
import {
  SCAN_VARIANTS,
  assertSequence,
  type ScanVariant,
} from '../algorithm/kadane.js';
import { ConfigError } from '../types/errors.js';
import type { Sequence, SubarrayResult } from '../types/sequence.js';
import type { MetricsCollector } from '../util/metrics.js';
import type { RunRecord } from './run-history.js';
import type { RunRecorder } from './run-recorder.js';

export const DEFAULT_INPUT_TYPE = 'standard';

export interface MeasureOptions {
  collector: MetricsCollector;
  recorder: RunRecorder;
  variant?: ScanVariant;
  accumulator?: AccumulatorWidth;
}

export interface MeasureScanOptions extends MeasureOptions {
  sequence: Sequence | null | undefined;
  inputType?: string;
}

export interface MeasuredScan {
  result: SubarrayResult;
  record: RunRecord;
}

/**
 * Runs one engine call with the collector attached, timer bracketing the
 * whole call, and records it. Invalid input fails before the timer starts and
 * leaves the history untouched.
 */
export function measureScan(options: MeasureScanOptions): MeasuredScan {
  const { sequence, collector, recorder } = options;
  assertSequence(sequence);
  const variant = SCAN_VARIANTS[options.variant ?? 'baseline'];

  collector.reset();
  collector.startTimer();
  let result: SubarrayResult;
  try {
    result = variant.run(sequence, {
      counter: collector,
      accumulator: options.accumulator,
    });
  } catch (error) {
    collector.reset();
    throw error;
  }
  collector.stopTimer();

  const record = recorder.record(
    collector,
    variant.label,
    sequence.length,
    options.inputType ?? DEFAULT_INPUT_TYPE
  );
  return { result, record };
}

/**
 * Measures each sequence under its matching input-type label.
 */
export function measureBatch(
  sequences: readonly Sequence[],
  inputTypes: readonly string[],
  options: MeasureOptions
): MeasuredScan[] {
  if (sequences.length !== inputTypes.length) {
    throw new ConfigError({
      message: `Batch has ${sequences.length} sequences but ${inputTypes.length} input type labels`,
      context: { setting: 'inputTypes' },
    });
  }

  return sequences.map((sequence, index) =>
    measureScan({ ...options, sequence, inputType: inputTypes[index] })
  );
}
