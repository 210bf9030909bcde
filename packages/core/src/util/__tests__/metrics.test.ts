import { describe, expect, it } from 'vitest';

import { MetricsCollector, NOOP_COUNTER } from '../metrics.js';

function steppingClock(...readings: number[]): () => number {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)] ?? 0;
}

describe('MetricsCollector', () => {
  it('starts with zeroed counters and timing', () => {
    const collector = new MetricsCollector({ now: () => 0 });

    expect(collector.snapshotMetrics()).toEqual({
      comparisons: 0,
      elementAccesses: 0,
      allocations: 0,
      elapsedNanos: 0,
      elapsedMillis: 0,
    });
  });

  it('accumulates increments per kind', () => {
    const collector = new MetricsCollector({ now: () => 0 });
    collector.increment('comparisons');
    collector.increment('comparisons', 2);
    collector.increment('allocations');

    expect(collector.count('comparisons')).toBe(3);
    expect(collector.count('allocations')).toBe(1);
    expect(collector.count('elementAccesses')).toBe(0);
  });

  it('rejects negative and fractional increments', () => {
    const collector = new MetricsCollector({ now: () => 0 });

    expect(() => collector.increment('comparisons', -1)).toThrow(RangeError);
    expect(() => collector.increment('comparisons', 0.5)).toThrow(RangeError);
    expect(collector.count('comparisons')).toBe(0);
  });

  it('measures the interval between start and stop', () => {
    const collector = new MetricsCollector({ now: steppingClock(10, 12.5) });
    collector.startTimer();
    expect(collector.isTiming()).toBe(true);
    collector.stopTimer();

    expect(collector.isTiming()).toBe(false);
    expect(collector.snapshotMetrics()).toMatchObject({
      elapsedMillis: 2.5,
      elapsedNanos: 2_500_000,
    });
  });

  it('keeps a zero duration when stopped without starting', () => {
    const collector = new MetricsCollector({ now: steppingClock(5, 9) });
    collector.stopTimer();

    expect(collector.snapshotMetrics().elapsedMillis).toBe(0);
  });

  it('refuses to start a running timer twice', () => {
    const collector = new MetricsCollector({ now: () => 0 });
    collector.startTimer();

    expect(() => collector.startTimer()).toThrow(
      'Metrics timer already started'
    );
  });

  it('clamps a clock that runs backwards to zero', () => {
    const collector = new MetricsCollector({ now: steppingClock(10, 4) });
    collector.startTimer();
    collector.stopTimer();

    expect(collector.snapshotMetrics().elapsedMillis).toBe(0);
  });

  it('reset clears counters and an active timer', () => {
    const collector = new MetricsCollector({ now: () => 0 });
    collector.increment('elementAccesses', 4);
    collector.startTimer();
    collector.reset();

    expect(collector.count('elementAccesses')).toBe(0);
    expect(collector.isTiming()).toBe(false);
  });

  it('ignores everything while disabled', () => {
    const collector = new MetricsCollector({
      enabled: false,
      now: steppingClock(0, 100),
    });
    collector.increment('comparisons', 5);
    collector.startTimer();
    collector.stopTimer();

    expect(collector.isEnabled()).toBe(false);
    expect(collector.snapshotMetrics()).toEqual({
      comparisons: 0,
      elementAccesses: 0,
      allocations: 0,
      elapsedNanos: 0,
      elapsedMillis: 0,
    });
  });
});

describe('NOOP_COUNTER', () => {
  it('accepts increments without effect', () => {
    expect(() => NOOP_COUNTER.increment('comparisons', 3)).not.toThrow();
    expect(Object.isFrozen(NOOP_COUNTER)).toBe(true);
  });
});
