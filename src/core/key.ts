import { InvalidLabelError, InvalidMetricNameError } from './errors.js';

export type Labels = Readonly<Record<string, string>>;

/** Identity of one series: metric name plus its label set. */
export interface MetricKey {
  readonly name: string;
  readonly labels: Labels;
  /** Canonical series id, e.g. `http_seconds{op="GET"}`. Equal keys have equal ids. */
  readonly id: string;
}

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const RESERVED_LABELS = new Set(['le']);

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

/** Labels as sorted [name, value] pairs; insertion order never matters. */
export function canonicalLabels(labels: Labels): [string, string][] {
  return Object.keys(labels).sort().map((k) => [k, labels[k]]);
}

/** Render `{a="1",b="2"}`, or '' for an empty set. */
export function renderLabels(pairs: readonly (readonly [string, string])[]): string {
  if (pairs.length === 0) return '';
  return '{' + pairs.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(',') + '}';
}

export function validateMetricName(name: string): void {
  if (typeof name !== 'string' || !METRIC_NAME.test(name)) throw new InvalidMetricNameError(String(name));
}

export function validateLabels(metric: string, labels: Labels): void {
  for (const [k, v] of Object.entries(labels)) {
    if (!LABEL_NAME.test(k)) throw new InvalidLabelError(metric, k, 'must match [a-zA-Z_][a-zA-Z0-9_]*');
    if (k.startsWith('__')) throw new InvalidLabelError(metric, k, 'names starting with "__" are reserved');
    if (RESERVED_LABELS.has(k)) throw new InvalidLabelError(metric, k, 'reserved for histogram buckets');
    if (typeof v !== 'string') throw new InvalidLabelError(metric, k, 'value must be a string');
  }
}

/** Validate and build a key. Throws InvalidMetricNameError / InvalidLabelError. */
export function metricKey(name: string, labels: Labels = {}): MetricKey {
  validateMetricName(name);
  validateLabels(name, labels);
  const pairs = canonicalLabels(labels);
  return {
    name,
    labels: Object.freeze(Object.fromEntries(pairs)),
    id: name + renderLabels(pairs),
  };
}

export function sameKey(a: MetricKey, b: MetricKey): boolean {
  return a.id === b.id;
}
