import type { Logger } from '../utils/logger.js';
import type { HistogramStore } from './histograms.js';

export interface RetentionOptions {
  windowMs: number;
  sweepIntervalMs: number;
  now: () => number;
  logger: Logger;
}

export interface SweepResult {
  /** Observation time of the sweep (epoch ms). */
  at: number;
  cutoff: number;
  removed: number;
  buckets: number;
}

/**
 * Trims histogram samples older than `now - windowMs`. A sample exactly at
 * the cutoff is kept. Buckets are emptied, never removed.
 */
export class RetentionManager {
  private timer?: NodeJS.Timeout;
  private lastSweepAt: number;
  private readonly windowMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly store: HistogramStore, opts: RetentionOptions) {
    this.windowMs = opts.windowMs;
    this.sweepIntervalMs = opts.sweepIntervalMs;
    this.now = opts.now;
    this.logger = opts.logger;
    this.lastSweepAt = this.now();
  }

  get running(): boolean { return this.timer !== undefined; }

  sweep(at: number = this.now()): SweepResult {
    const cutoff = at - this.windowMs;
    let removed = 0;
    let buckets = 0;
    // one bucket at a time; nothing here yields, so records never see a half-trimmed ring
    for (const b of this.store.values()) {
      const n = b.samples.evictOlderThan(cutoff);
      if (n > 0) {
        removed += n;
        buckets++;
      }
    }
    this.lastSweepAt = at;
    if (removed > 0) this.logger.debug({ removed, buckets, cutoff }, 'retention sweep removed stale samples');
    return { at, cutoff, removed, buckets };
  }

  /** Sweep only when the last one is at least one interval old. */
  sweepIfDue(at: number = this.now()): SweepResult | undefined {
    if (at - this.lastSweepAt < this.sweepIntervalMs) return undefined;
    return this.sweep(at);
  }

  /** (Re)starts the background loop. The timer is unref'd so it never holds the process open. */
  start(intervalMs: number = this.sweepIntervalMs): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) throw new RangeError(`sweep interval must be a positive number of ms, got ${intervalMs}`);
    this.stop();
    this.timer = setInterval(() => this.tick(), intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs, windowMs: this.windowMs }, 'retention loop started');
  }

  /** Safe to call any number of times. */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.logger.info('retention loop stopped');
  }

  private tick(): void {
    try {
      this.sweep();
    } catch (err) {
      this.logger.error({ err }, 'retention sweep failed');
    }
  }
}
