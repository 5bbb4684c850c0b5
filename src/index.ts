export { MetricsEngine } from './core/engine.js';
export type { MetricsEngineOptions, MetricsRegistry, RecordOptions, MetricKind } from './core/engine.js';
export { timed, instrument } from './core/instrument.js';
export type { TimingSink } from './core/instrument.js';
export { metricKey, canonicalLabels, sameKey } from './core/key.js';
export type { Labels, MetricKey } from './core/key.js';
export { summarize, percentile, DEFAULT_PERCENTILES } from './core/stats.js';
export type { HistogramSummary, PercentileRule, PercentileName } from './core/stats.js';
export { renderPrometheusText, buildSnapshot, cumulativeBuckets, PROMETHEUS_CONTENT_TYPE } from './core/exporter.js';
export type { MetricsSnapshot, ExportSource } from './core/exporter.js';
export type { Sample } from './core/ring.js';
export type { SweepResult } from './core/retention.js';
export { MetricsError, InvalidLabelError, InvalidMetricNameError } from './core/errors.js';
export type { MetricsErrorCode } from './core/errors.js';
export { resolveConfig, loadConfigFromEnv, EngineConfigSchema, DEFAULT_BUCKETS } from './utils/config.js';
export type { EngineConfig, EngineConfigInput } from './utils/config.js';
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
