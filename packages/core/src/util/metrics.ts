import { performance } from 'node:perf_hooks';

export const OPERATION_KINDS = [
  'comparisons',
  'elementAccesses',
  'allocations',
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

/**
 * Instrumentation port driven by the engine. Implementations must never
 * influence the computed result.
 */
export interface OperationCounter {
  increment(kind: OperationKind, count?: number): void;
}

export const NOOP_COUNTER: OperationCounter = Object.freeze({
  increment(): void {},
});

export interface MetricsSnapshot {
  comparisons: number;
  elementAccesses: number;
  allocations: number;
  elapsedNanos: number;
  elapsedMillis: number;
}

interface IdleTimerState {
  elapsedMs: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  elapsedMs: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

type Counters = Record<OperationKind, number>;

const NANOS_PER_MILLI = 1_000_000;

export interface MetricsCollectorOptions {
  /** Monotonic clock in milliseconds */
  now?: () => number;
  enabled?: boolean;
}

/**
 * Per-run operation counters and timer. One instance serves one in-flight
 * engine call at a time; reset between calls.
 */
export class MetricsCollector implements OperationCounter {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private counters: Counters;
  private timer: TimerState;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.counters = createCounters();
    this.timer = { elapsedMs: 0 };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public increment(kind: OperationKind, count = 1): void {
    if (!this.enabled) {
      return;
    }
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(
        `Counter increments must be non-negative integers (got ${count})`
      );
    }
    this.counters[kind] += count;
  }

  public count(kind: OperationKind): number {
    return this.counters[kind];
  }

  public startTimer(): void {
    if (!this.enabled) {
      return;
    }
    if (isActiveTimerState(this.timer)) {
      throw new Error('Metrics timer already started');
    }
    this.timer = { elapsedMs: 0, startedAt: this.now() };
  }

  /**
   * Stops the running timer. Without a matching startTimer() the elapsed
   * duration stays at zero.
   */
  public stopTimer(): void {
    if (!this.enabled || !isActiveTimerState(this.timer)) {
      return;
    }
    const duration = this.now() - this.timer.startedAt;
    this.timer = {
      elapsedMs: Number.isFinite(duration) ? Math.max(0, duration) : 0,
    };
  }

  public isTiming(): boolean {
    return isActiveTimerState(this.timer);
  }

  public snapshotMetrics(): MetricsSnapshot {
    const elapsedMillis = this.timer.elapsedMs;
    return {
      ...this.counters,
      elapsedNanos: Math.round(elapsedMillis * NANOS_PER_MILLI),
      elapsedMillis,
    };
  }

  public reset(): void {
    this.counters = createCounters();
    this.timer = { elapsedMs: 0 };
  }
}

function createCounters(): Counters {
  return { comparisons: 0, elementAccesses: 0, allocations: 0 };
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
