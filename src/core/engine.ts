import { createLogger, type Logger } from '../utils/logger.js';
import { resolveConfig, type EngineConfig, type EngineConfigInput } from '../utils/config.js';
import { CounterStore } from './counters.js';
import { MetricsError } from './errors.js';
import { buildSnapshot, renderPrometheusText, type ExportSource, type MetricsSnapshot } from './exporter.js';
import { GaugeStore } from './gauges.js';
import { HistogramStore } from './histograms.js';
import { metricKey, validateLabels, validateMetricName, type Labels, type MetricKey } from './key.js';
import { RetentionManager, type SweepResult } from './retention.js';
import type { Sample } from './ring.js';
import { summarize, type HistogramSummary } from './stats.js';
import type { TimingSink } from './instrument.js';

export type MetricsEngineOptions = EngineConfigInput & {
  logger?: Logger;
  /** Epoch ms clock used for sample timestamps, sweeps and snapshots. */
  now?: () => number;
};

export type MetricKind = 'counter' | 'gauge' | 'histogram';

export interface RecordOptions {
  /** Defaults to the engine clock. */
  timestamp?: number;
  /** Stored on the sample only; they do not change the series identity. */
  sampleLabels?: Labels;
}

export interface MetricsRegistry extends TimingSink {
  incrementCounter(name: string, delta?: number, labels?: Labels): boolean;
  setGauge(name: string, value: number, labels?: Labels): void;
  recordSample(name: string, value: number, labels?: Labels, opts?: RecordOptions): void;
  getSnapshot(): MetricsSnapshot;
  renderPrometheusText(): string;
  reset(): void;
}

/**
 * Counters, gauges and bounded histograms for one process. Construct one at
 * startup and hand it to whatever produces or reads metrics.
 */
export class MetricsEngine implements MetricsRegistry {
  readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly counters: CounterStore;
  private readonly gauges = new GaugeStore();
  private readonly histograms: HistogramStore;
  private readonly retention: RetentionManager;
  private readonly help = new Map<string, string>();
  private readonly kinds = new Map<string, MetricKind>();

  constructor(opts: MetricsEngineOptions = {}) {
    const { logger, now, ...config } = opts;
    this.config = resolveConfig(config);
    this.logger = logger ?? createLogger('metrics');
    this.now = now ?? Date.now;
    this.startedAt = this.now();
    this.counters = new CounterStore(this.logger);
    this.histograms = new HistogramStore(this.config.maxSamplesPerHistogram);
    this.retention = new RetentionManager(this.histograms, {
      windowMs: this.config.retentionWindowMs,
      sweepIntervalMs: this.config.sweepIntervalMs,
      now: this.now,
      logger: this.logger,
    });
  }

  incrementCounter(name: string, delta = 1, labels: Labels = {}): boolean {
    const key = this.key(name, labels);
    this.claim(key, 'counter');
    return this.counters.increment(key, delta);
  }

  getCounter(name: string, labels: Labels = {}): number | undefined {
    return this.counters.get(this.key(name, labels));
  }

  setGauge(name: string, value: number, labels: Labels = {}): void {
    const key = this.key(name, labels);
    this.claim(key, 'gauge');
    this.gauges.set(key, value);
  }

  getGauge(name: string, labels: Labels = {}): number | undefined {
    return this.gauges.get(this.key(name, labels));
  }

  recordSample(name: string, value: number, labels: Labels = {}, opts: RecordOptions = {}): void {
    const key = this.key(name, labels);
    if (typeof value !== 'number') throw new MetricsError('INVALID_VALUE', `sample for "${key.id}" must be a number`);
    if (opts.timestamp !== undefined && !Number.isFinite(opts.timestamp)) {
      this.reject(new MetricsError('INVALID_VALUE', `sample timestamp for "${key.id}" must be a finite epoch ms value`), name);
    }
    if (opts.sampleLabels) this.checkLabels(name, opts.sampleLabels);
    this.claim(key, 'histogram');
    this.histograms.record(key, value, opts.timestamp ?? this.now(), opts.sampleLabels);
  }

  /** Counts `<operation>_total` and records the duration under `<operation>_duration`. */
  recordOperation(operation: string, durationSeconds: number, sampleLabels: Labels = {}): void {
    this.recordSample(`${operation}_duration`, durationSeconds, {}, { sampleLabels });
    this.incrementCounter(`${operation}_total`);
  }

  /** Copy of the retained samples, oldest first. */
  samples(name: string, labels: Labels = {}): Sample[] {
    return this.histograms.snapshot(this.key(name, labels));
  }

  summarize(name: string, labels: Labels = {}): HistogramSummary {
    return summarize(this.samples(name, labels).map((s) => s.value));
  }

  /** Attach `# HELP` text to every series of `name`. */
  describe(name: string, help: string): void {
    validateMetricName(name);
    this.help.set(name, help);
  }

  getSnapshot(): MetricsSnapshot {
    const at = this.now();
    this.retention.sweepIfDue(at);
    return buildSnapshot(this.exportSource(), at, this.config.retentionWindowMs, this.startedAt);
  }

  renderPrometheusText(): string {
    this.retention.sweepIfDue();
    return renderPrometheusText(this.exportSource());
  }

  sweep(): SweepResult {
    return this.retention.sweep();
  }

  startRetentionLoop(intervalMs?: number): void {
    this.retention.start(intervalMs);
  }

  stopRetentionLoop(): void {
    this.retention.stop();
  }

  get retentionRunning(): boolean { return this.retention.running; }

  /** Drop every counter, gauge, histogram and help text. Meant for tests. */
  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.help.clear();
    this.kinds.clear();
    this.logger.info('metrics reset');
  }

  private exportSource(): ExportSource {
    return {
      counters: this.counters.values(),
      gauges: this.gauges.values(),
      histograms: this.histograms.values(),
      help: this.help,
      thresholds: this.config.bucketThresholds,
      namespace: this.config.namespace,
    };
  }

  private key(name: string, labels: Labels): MetricKey {
    try {
      return metricKey(name, labels);
    } catch (err) {
      if (err instanceof MetricsError) this.logger.warn({ metric: name, code: err.code }, err.message);
      throw err;
    }
  }

  /** One name, one type: a second kind would emit conflicting `# TYPE` lines. */
  private claim(key: MetricKey, kind: MetricKind): void {
    const existing = this.kinds.get(key.name);
    if (existing === undefined) this.kinds.set(key.name, kind);
    else if (existing !== kind) {
      this.reject(new MetricsError('KIND_CONFLICT', `metric "${key.name}" is already a ${existing}, cannot use it as a ${kind}`), key.name);
    }
  }

  private reject(err: MetricsError, name: string): never {
    this.logger.warn({ metric: name, code: err.code }, err.message);
    throw err;
  }

  private checkLabels(name: string, labels: Labels): void {
    try {
      validateLabels(name, labels);
    } catch (err) {
      if (err instanceof MetricsError) this.logger.warn({ metric: name, code: err.code }, err.message);
      throw err;
    }
  }
}
