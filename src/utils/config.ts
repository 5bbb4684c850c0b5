import { z } from 'zod';
import { MetricsError } from '../core/errors.js';

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_BUCKETS: readonly number[] = [0.1, 0.5, 1, 2, 5, 10];

export const EngineConfigSchema = z.object({
  retentionWindowMs: z.number().int().positive().default(24 * HOUR_MS),
  sweepIntervalMs: z.number().int().positive().default(HOUR_MS),
  maxSamplesPerHistogram: z.number().int().positive().default(1000),
  bucketThresholds: z
    .array(z.number().finite())
    .min(1)
    .refine((xs) => xs.every((x, i) => i === 0 || x > xs[i - 1]), { message: 'thresholds must be strictly ascending' })
    .default([...DEFAULT_BUCKETS]),
  namespace: z.string().regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/).optional(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/** Validate and fill defaults. Throws MetricsError('INVALID_CONFIG'). */
export function resolveConfig(input: EngineConfigInput = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new MetricsError('INVALID_CONFIG', `invalid metrics config: ${issues}`);
  }
  return parsed.data;
}

const num = (raw: string | undefined) => (raw === undefined || raw.trim() === '' ? undefined : Number(raw));

/**
 * METRICS_RETENTION_WINDOW_MS, METRICS_SWEEP_INTERVAL_MS, METRICS_MAX_SAMPLES,
 * METRICS_BUCKETS (comma separated), METRICS_NAMESPACE. Unset vars take defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const buckets = env.METRICS_BUCKETS?.trim();
  return resolveConfig({
    retentionWindowMs: num(env.METRICS_RETENTION_WINDOW_MS),
    sweepIntervalMs: num(env.METRICS_SWEEP_INTERVAL_MS),
    maxSamplesPerHistogram: num(env.METRICS_MAX_SAMPLES),
    bucketThresholds: buckets ? buckets.split(',').map((s) => Number(s.trim())) : undefined,
    namespace: env.METRICS_NAMESPACE || undefined,
  });
}
