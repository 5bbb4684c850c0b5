import type { Logger } from '../utils/logger.js';
import type { MetricKey } from './key.js';

export interface CounterEntry {
  readonly key: MetricKey;
  value: number;
}

/** Monotonic counters. Addition saturates at Number.MAX_SAFE_INTEGER. */
export class CounterStore {
  private readonly entries = new Map<string, CounterEntry>();

  constructor(private readonly logger: Logger) {}

  /** Returns false (and leaves the counter untouched) when delta is rejected. */
  increment(key: MetricKey, delta = 1): boolean {
    if (!Number.isSafeInteger(delta) || delta < 0) {
      this.logger.warn({ metric: key.id, delta }, 'rejected counter delta: must be a non-negative integer');
      return false;
    }
    let e = this.entries.get(key.id);
    if (!e) {
      e = { key, value: 0 };
      this.entries.set(key.id, e);
    }
    e.value = delta > Number.MAX_SAFE_INTEGER - e.value ? Number.MAX_SAFE_INTEGER : e.value + delta;
    return true;
  }

  get(key: MetricKey): number | undefined {
    return this.entries.get(key.id)?.value;
  }

  values(): IterableIterator<Readonly<CounterEntry>> {
    return this.entries.values();
  }

  clear(): void { this.entries.clear(); }
}
