import type { CounterEntry } from './counters.js';
import type { GaugeEntry } from './gauges.js';
import type { HistogramBucket } from './histograms.js';
import { canonicalLabels, renderLabels, type MetricKey } from './key.js';
import { summarize, type HistogramSummary, type PercentileRule } from './stats.js';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export interface MetricsSnapshot {
  /** ISO-8601 time the snapshot was taken. */
  timestamp: string;
  windowMs: number;
  uptimeMs: number;
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

export interface ExportSource {
  counters: Iterable<Readonly<CounterEntry>>;
  gauges: Iterable<Readonly<GaugeEntry>>;
  histograms: Iterable<HistogramBucket>;
  help: ReadonlyMap<string, string>;
  /** Ascending, finite. +Inf is appended on export. */
  thresholds: readonly number[];
  percentiles?: readonly PercentileRule[];
  namespace?: string;
}

export function buildSnapshot(src: ExportSource, at: number, windowMs: number, startedAt: number): MetricsSnapshot {
  const counters: Record<string, number> = {};
  for (const c of src.counters) counters[c.key.id] = c.value;
  const gauges: Record<string, number> = {};
  for (const g of src.gauges) gauges[g.key.id] = g.value;
  const histograms: Record<string, HistogramSummary> = {};
  for (const h of src.histograms) histograms[h.key.id] = summarize(h.samples.values(), src.percentiles);
  return {
    timestamp: new Date(at).toISOString(),
    windowMs,
    uptimeMs: at - startedAt,
    counters,
    gauges,
    histograms,
  };
}

export function formatValue(v: number): string {
  if (Number.isNaN(v)) return 'NaN';
  if (v === Infinity) return '+Inf';
  if (v === -Infinity) return '-Inf';
  return String(v);
}

/** Cumulative counts per threshold plus a final +Inf entry equal to values.length. */
export function cumulativeBuckets(values: readonly number[], thresholds: readonly number[]): number[] {
  const counts = new Array<number>(thresholds.length + 1).fill(0);
  for (const v of values) {
    let i = 0;
    if (Number.isNaN(v)) i = thresholds.length;
    else while (i < thresholds.length && v > thresholds[i]) i++;
    counts[i]++;
  }
  let cum = 0;
  return counts.map((c) => (cum += c));
}

function groupByName<T extends { readonly key: MetricKey }>(entries: Iterable<T>): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const e of entries) {
    const g = groups.get(e.key.name);
    if (g) g.push(e);
    else groups.set(e.key.name, [e]);
  }
  return groups;
}

/** Prometheus text exposition (0.0.4) of every counter, gauge and non-empty histogram. */
export function renderPrometheusText(src: ExportSource): string {
  const ns = src.namespace ? src.namespace + '_' : '';
  const lines: string[] = [];

  const header = (base: string, exposed: string, type: string) => {
    const help = src.help.get(base);
    if (help !== undefined) lines.push(`# HELP ${exposed} ${help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n')}`);
    lines.push(`# TYPE ${exposed} ${type}`);
  };

  const scalar = (entries: Iterable<Readonly<CounterEntry | GaugeEntry>>, type: 'counter' | 'gauge') => {
    for (const [name, series] of groupByName(entries)) {
      const exposed = ns + name;
      header(name, exposed, type);
      for (const s of series) lines.push(`${exposed}${renderLabels(canonicalLabels(s.key.labels))} ${formatValue(s.value)}`);
    }
  };

  scalar(src.counters, 'counter');
  scalar(src.gauges, 'gauge');

  for (const [name, series] of groupByName(src.histograms)) {
    const live = series.filter((h) => h.samples.size > 0);
    if (live.length === 0) continue;
    const exposed = `${ns}${name}_histogram`;
    header(name, exposed, 'histogram');
    for (const h of live) {
      const pairs = canonicalLabels(h.key.labels);
      const lbl = renderLabels(pairs);
      const values = h.samples.values();
      lines.push(`${exposed}_count${lbl} ${values.length}`);
      lines.push(`${exposed}_sum${lbl} ${formatValue(summarize(values, []).sum ?? 0)}`);
      const cum = cumulativeBuckets(values, src.thresholds);
      src.thresholds.forEach((t, i) => {
        lines.push(`${exposed}_bucket${renderLabels([...pairs, ['le', String(t)]])} ${cum[i]}`);
      });
      lines.push(`${exposed}_bucket${renderLabels([...pairs, ['le', '+Inf']])} ${cum[src.thresholds.length]}`);
    }
  }

  return lines.length ? lines.join('\n') + '\n' : '';
}
