import { beforeEach, describe, expect, it } from 'vitest';

import { ConfigError, InvalidInputError } from '../../types/errors.js';
import { MetricsCollector } from '../../util/metrics.js';
import { measureBatch, measureScan } from '../measure.js';
import { RunHistory } from '../run-history.js';
import { RunRecorder } from '../run-recorder.js';

const CLASSIC = [-2, 1, -3, 4, -1, 2, 1, -5, 4];

function steppingClock(step: number): () => number {
  let current = 0;
  return () => (current += step);
}

describe('RunHistory', () => {
  it('returns snapshots that later appends do not change', () => {
    const history = new RunHistory();
    const recorder = new RunRecorder({ history, clock: () => 1 });
    const collector = new MetricsCollector({ now: () => 0 });

    recorder.record(collector, 'kadane', 3, 'standard');
    const before = history.snapshot();
    recorder.record(collector, 'kadane', 4, 'standard');

    expect(before).toHaveLength(1);
    expect(history.snapshot()).toHaveLength(2);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before[0])).toBe(true);
  });

  it('clear discards every record', () => {
    const history = new RunHistory();
    const recorder = new RunRecorder({ history });
    recorder.record(new MetricsCollector(), 'kadane', 1, 'standard');
    recorder.clear();

    expect(history.size).toBe(0);
    expect(recorder.getHistory()).toBe(history);
  });
});

describe('RunRecorder', () => {
  let history: RunHistory;
  let recorder: RunRecorder;
  let collector: MetricsCollector;

  beforeEach(() => {
    history = new RunHistory();
    recorder = new RunRecorder({ history, clock: () => 1000 });
    collector = new MetricsCollector({ now: steppingClock(4) });
  });

  it('freezes the collector state into a record and resets it', () => {
    collector.increment('comparisons', 7);
    collector.increment('elementAccesses', 4);
    collector.startTimer();
    collector.stopTimer();

    const record = recorder.record(collector, 'kadane', 4, 'sorted');

    expect(record).toEqual({
      algorithm: 'kadane',
      timestamp: 1000,
      inputSize: 4,
      inputType: 'sorted',
      comparisons: 7,
      elementAccesses: 4,
      allocations: 0,
      elapsedNanos: 4_000_000,
      elapsedMillis: 4,
    });
    expect(collector.count('comparisons')).toBe(0);
    expect(history.snapshot()).toEqual([record]);
  });

  it('rejects a negative input size', () => {
    expect(() => recorder.record(collector, 'kadane', -1, 'standard')).toThrow(
      InvalidInputError
    );
    expect(history.size).toBe(0);
  });

  describe('measureScan', () => {
    it('records one run with the engine counters', () => {
      const { result, record } = measureScan({
        sequence: CLASSIC,
        collector,
        recorder,
      });

      expect(result).toEqual({ maxSum: 6, startIndex: 3, endIndex: 6 });
      expect(record).toEqual({
        algorithm: 'kadane',
        timestamp: 1000,
        inputSize: 9,
        inputType: 'standard',
        comparisons: 16,
        elementAccesses: 9,
        allocations: 1,
        elapsedNanos: 4_000_000,
        elapsedMillis: 4,
      });
      expect(history.size).toBe(1);
    });

    it('labels runs of the optimized variant', () => {
      const { record } = measureScan({
        sequence: [-3, 5],
        variant: 'optimized',
        inputType: 'custom',
        collector,
        recorder,
      });

      expect(record).toMatchObject({
        algorithm: 'kadane-optimized',
        inputType: 'custom',
        comparisons: 2,
        elementAccesses: 2,
      });
    });

    it('records nothing for an empty sequence', () => {
      expect(() =>
        measureScan({ sequence: [], collector, recorder })
      ).toThrow(InvalidInputError);
      expect(history.size).toBe(0);
      expect(collector.isTiming()).toBe(false);
    });

    it('resets the collector when the engine rejects an element', () => {
      expect(() =>
        measureScan({ sequence: [1, 1.5], collector, recorder })
      ).toThrow(InvalidInputError);
      expect(history.size).toBe(0);
      expect(collector.isTiming()).toBe(false);
      expect(collector.count('elementAccesses')).toBe(0);
    });
  });

  describe('measureBatch', () => {
    it('pairs each sequence with its label', () => {
      const runs = measureBatch([[1, 2, 3], [-1]], ['sorted', 'all_negative'], {
        collector,
        recorder,
      });

      expect(runs.map((run) => run.result.maxSum)).toEqual([6, -1]);
      expect(history.snapshot().map((record) => record.inputType)).toEqual([
        'sorted',
        'all_negative',
      ]);
    });

    it('rejects mismatched label counts before running anything', () => {
      expect(() =>
        measureBatch([[1], [2]], ['standard'], { collector, recorder })
      ).toThrow('Batch has 2 sequences but 1 input type labels');
      expect(() =>
        measureBatch([[1]], [], { collector, recorder })
      ).toThrow(ConfigError);
      expect(history.size).toBe(0);
    });
  });
});
