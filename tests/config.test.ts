import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, resolveConfig } from '../src/utils/config.js';
import { MetricsError } from '../src/core/errors.js';
import { createLogger } from '../src/utils/logger.js';

describe('resolveConfig', () => {
  it('fills defaults', () => {
    expect(resolveConfig()).toEqual({
      retentionWindowMs: 86_400_000,
      sweepIntervalMs: 3_600_000,
      maxSamplesPerHistogram: 1000,
      bucketThresholds: [0.1, 0.5, 1, 2, 5, 10],
    });
  });

  it('rejects thresholds that are not ascending', () => {
    expect(() => resolveConfig({ bucketThresholds: [1, 0.5] })).toThrow(MetricsError);
    expect(() => resolveConfig({ bucketThresholds: [1, 0.5] })).toThrow(/bucketThresholds: thresholds must be strictly ascending/);
  });

  it('rejects a bad namespace', () => {
    expect(() => resolveConfig({ namespace: 'my-app' })).toThrow(/namespace/);
  });
});

describe('loadConfigFromEnv', () => {
  it('reads overrides', () => {
    const cfg = loadConfigFromEnv({
      METRICS_RETENTION_WINDOW_MS: '60000',
      METRICS_MAX_SAMPLES: '50',
      METRICS_BUCKETS: '0.25, 1, 4',
      METRICS_NAMESPACE: 'vps',
    });
    expect(cfg).toEqual({
      retentionWindowMs: 60_000,
      sweepIntervalMs: 3_600_000,
      maxSamplesPerHistogram: 50,
      bucketThresholds: [0.25, 1, 4],
      namespace: 'vps',
    });
  });

  it('throws on a non-numeric value', () => {
    expect(() => loadConfigFromEnv({ METRICS_MAX_SAMPLES: 'abc' })).toThrow(MetricsError);
  });
});

describe('createLogger', () => {
  it('honours an explicit level', () => {
    expect(createLogger('test', 'debug').level).toBe('debug');
  });
});
