import type { Labels, MetricKey } from './key.js';
import { SampleRing, type Sample } from './ring.js';

export interface HistogramBucket {
  readonly key: MetricKey;
  readonly samples: SampleRing;
}

/** Per-series bounded sample buffers, created on first record. */
export class HistogramStore {
  private readonly buckets = new Map<string, HistogramBucket>();

  constructor(private readonly maxSamples: number) {}

  record(key: MetricKey, value: number, timestamp: number, sampleLabels?: Labels): void {
    let b = this.buckets.get(key.id);
    if (!b) {
      b = { key, samples: new SampleRing(this.maxSamples) };
      this.buckets.set(key.id, b);
    }
    const sample: Sample = sampleLabels && Object.keys(sampleLabels).length
      ? { value, timestamp, labels: Object.freeze({ ...sampleLabels }) }
      : { value, timestamp };
    b.samples.push(sample);
  }

  /** Point-in-time copy of one bucket's samples, in arrival order. */
  snapshot(key: MetricKey): Sample[] {
    return this.buckets.get(key.id)?.samples.toArray() ?? [];
  }

  values(): IterableIterator<HistogramBucket> {
    return this.buckets.values();
  }

  clear(): void { this.buckets.clear(); }
}
