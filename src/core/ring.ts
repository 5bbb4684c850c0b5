import type { Labels } from './key.js';

export interface Sample {
  readonly value: number;
  /** Epoch ms. */
  readonly timestamp: number;
  readonly labels?: Labels;
}

/**
 * Fixed-capacity FIFO of samples. push is O(1) and overwrites the oldest
 * sample once full. Arrival order is kept; out-of-order timestamps are
 * accepted and only cost a compaction pass at eviction time.
 */
export class SampleRing {
  private readonly buf: (Sample | undefined)[];
  private head = 0;
  private _size = 0;
  private newest = -Infinity;
  private unordered = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`ring capacity must be a positive integer, got ${capacity}`);
    this.buf = new Array<Sample | undefined>(capacity);
  }

  get size() { return this._size; }

  push(sample: Sample): void {
    if (this._size === this.capacity) {
      this.buf[this.head] = sample;
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.buf[(this.head + this._size) % this.capacity] = sample;
      this._size++;
    }
    if (sample.timestamp < this.newest) this.unordered = true;
    else this.newest = sample.timestamp;
  }

  /** Drops every sample with timestamp < cutoff; returns how many were removed. */
  evictOlderThan(cutoff: number): number {
    let removed = 0;
    while (this._size > 0) {
      const oldest = this.buf[this.head];
      if (!oldest || oldest.timestamp >= cutoff) break;
      this.buf[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this._size--;
      removed++;
    }
    if (this.unordered && this._size > 0) removed += this.compact(cutoff);
    if (this._size === 0) this.reset();
    return removed;
  }

  /** Copy in arrival order; mutating it never touches the ring. */
  toArray(): Sample[] {
    const out: Sample[] = [];
    for (let i = 0; i < this._size; i++) {
      const s = this.buf[(this.head + i) % this.capacity];
      if (s) out.push(s);
    }
    return out;
  }

  values(): number[] {
    return this.toArray().map((s) => s.value);
  }

  clear(): void {
    this.buf.fill(undefined);
    this.reset();
  }

  private compact(cutoff: number): number {
    const all = this.toArray();
    const kept = all.filter((s) => s.timestamp >= cutoff);
    this.buf.fill(undefined);
    this.head = 0;
    this._size = kept.length;
    this.newest = -Infinity;
    this.unordered = false;
    for (let i = 0; i < kept.length; i++) {
      this.buf[i] = kept[i];
      if (kept[i].timestamp < this.newest) this.unordered = true;
      else this.newest = kept[i].timestamp;
    }
    return all.length - kept.length;
  }

  private reset(): void {
    this.head = 0;
    this._size = 0;
    this.newest = -Infinity;
    this.unordered = false;
  }
}
