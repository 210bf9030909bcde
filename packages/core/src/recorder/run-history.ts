import type { MetricsSnapshot } from '../util/metrics.js';

/**
 * Immutable snapshot of one measured engine call.
 */
export interface RunRecord extends Readonly<MetricsSnapshot> {
  readonly algorithm: string;
  /** Wall-clock time of the recording, epoch milliseconds */
  readonly timestamp: number;
  readonly inputSize: number;
  readonly inputType: string;
}

/**
 * Append-only, chronologically ordered run log. Owned by whoever drives the
 * benchmark and handed to recorders and aggregators explicitly; appends are
 * expected from one writer at a time.
 */
export class RunHistory {
  #records: RunRecord[] = [];

  append(record: RunRecord): RunRecord {
    const frozen = Object.freeze({ ...record });
    this.#records.push(frozen);
    return frozen;
  }

  /** Discards every record (e.g. after a warmup phase). */
  clear(): void {
    this.#records = [];
  }

  get size(): number {
    return this.#records.length;
  }

  /**
   * Frozen copy of the records at call time; later appends do not show up in
   * a snapshot already taken.
   */
  snapshot(): readonly RunRecord[] {
    return Object.freeze(this.#records.slice());
  }
}
