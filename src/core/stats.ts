export type PercentileName = 'p50' | 'p90' | 'p95' | 'p99';

export interface HistogramSummary {
  /** All samples, finite or not. */
  count: number;
  sum?: number;
  avg?: number;
  min?: number;
  max?: number;
  p50?: number;
  p90?: number;
  p95?: number;
  p99?: number;
  /** Present only when NaN or infinite samples were left out of the other fields. */
  nonFinite?: number;
}

export interface PercentileRule {
  name: PercentileName;
  q: number;
  /** Below this many samples the percentile reports the maximum. */
  minSamples: number;
}

export const DEFAULT_PERCENTILES: readonly PercentileRule[] = [
  { name: 'p50', q: 0.5, minSamples: 1 },
  { name: 'p90', q: 0.9, minSamples: 10 },
  { name: 'p95', q: 0.95, minSamples: 20 },
  { name: 'p99', q: 0.99, minSamples: 100 },
];

/**
 * Value at index floor(n * q) of an ascending array, clamped to the last
 * index. Not an interpolated estimator: small buckets collapse toward max.
 */
export function percentile(sorted: readonly number[], q: number, minSamples = 1): number | undefined {
  const n = sorted.length;
  if (n === 0) return undefined;
  if (n < minSamples) return sorted[n - 1];
  return sorted[Math.min(Math.floor(n * q), n - 1)];
}

export function summarize(values: readonly number[], rules: readonly PercentileRule[] = DEFAULT_PERCENTILES): HistogramSummary {
  const count = values.length;
  if (count === 0) return { count: 0 };

  // sorted copy; stored order is never touched
  const sorted = values.filter(Number.isFinite).sort((a, b) => a - b);
  const nonFinite = count - sorted.length;
  if (sorted.length === 0) return { count, nonFinite };

  let sum = 0;
  for (const v of sorted) sum += v;

  const out: HistogramSummary = {
    count,
    sum,
    avg: sum / sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
  };
  for (const r of rules) out[r.name] = percentile(sorted, r.q, r.minSamples);
  if (nonFinite > 0) out.nonFinite = nonFinite;
  return out;
}
