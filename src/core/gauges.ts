import { MetricsError } from './errors.js';
import type { MetricKey } from './key.js';

export interface GaugeEntry {
  readonly key: MetricKey;
  value: number;
}

/** Last-write-wins gauges. */
export class GaugeStore {
  private readonly entries = new Map<string, GaugeEntry>();

  set(key: MetricKey, value: number): void {
    if (typeof value !== 'number') throw new MetricsError('INVALID_VALUE', `gauge "${key.id}" value must be a number`);
    const e = this.entries.get(key.id);
    if (e) e.value = value;
    else this.entries.set(key.id, { key, value });
  }

  /** undefined means the gauge was never set. */
  get(key: MetricKey): number | undefined {
    return this.entries.get(key.id)?.value;
  }

  values(): IterableIterator<Readonly<GaugeEntry>> {
    return this.entries.values();
  }

  clear(): void { this.entries.clear(); }
}
