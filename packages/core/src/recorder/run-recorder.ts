import { InvalidInputError } from '../types/errors.js';
import type { MetricsCollector } from '../util/metrics.js';
import type { RunHistory, RunRecord } from './run-history.js';

export interface RunRecorderOptions {
  history: RunHistory;
  /** Wall clock, epoch milliseconds */
  clock?: () => number;
}

export class RunRecorder {
  private readonly history: RunHistory;
  private readonly clock: () => number;

  constructor(options: RunRecorderOptions) {
    this.history = options.history;
    this.clock = options.clock ?? (() => Date.now());
  }

  /**
   * Freezes the collector's counters and timing into a RunRecord, appends it
   * to the history and resets the collector for the next run.
   */
  record(
    metrics: MetricsCollector,
    algorithmLabel: string,
    inputSize: number,
    inputTypeLabel: string
  ): RunRecord {
    if (!Number.isInteger(inputSize) || inputSize < 0) {
      throw new InvalidInputError({
        message: `Input size must be a non-negative integer (got ${inputSize})`,
        context: { value: inputSize },
      });
    }

    const record = this.history.append({
      algorithm: algorithmLabel,
      timestamp: this.clock(),
      inputSize,
      inputType: inputTypeLabel,
      ...metrics.snapshotMetrics(),
    });
    metrics.reset();
    return record;
  }

  clear(): void {
    this.history.clear();
  }

  getHistory(): RunHistory {
    return this.history;
  }
}
