import { metricKey, type Labels } from './key.js';

/** The slice of the engine the timing helpers write to. */
export interface TimingSink {
  recordSample(name: string, value: number, labels?: Labels): void;
  incrementCounter(name: string, delta?: number, labels?: Labels): boolean;
}

function elapsedSeconds(t0: bigint): number {
  return Number(process.hrtime.bigint() - t0) / 1e9;
}

/**
 * Run `operation`, recording its duration in seconds under
 * `<name>_processing_time`. On failure the duration is still recorded,
 * `<name>_error_total` is incremented, and the original error is rethrown.
 */
export async function timed<T>(sink: TimingSink, name: string, operation: () => Promise<T> | T, labels: Labels = {}): Promise<Awaited<T>> {
  const timeMetric = `${name}_processing_time`;
  const errorMetric = `${name}_error_total`;
  // names are checked before the operation runs; recording afterwards cannot throw
  metricKey(timeMetric, labels);
  metricKey(errorMetric, labels);

  const t0 = process.hrtime.bigint();
  let result: Awaited<T>;
  try {
    result = await operation();
  } catch (err) {
    sink.recordSample(timeMetric, elapsedSeconds(t0), labels);
    sink.incrementCounter(errorMetric, 1, labels);
    throw err;
  }
  sink.recordSample(timeMetric, elapsedSeconds(t0), labels);
  return result;
}

/** Wrap `fn` so every call is timed like {@link timed}. */
export function instrument<A extends unknown[], R>(
  sink: TimingSink,
  name: string,
  fn: (...args: A) => R,
  labels: Labels = {},
): (...args: A) => Promise<Awaited<R>> {
  return (...args: A) => timed(sink, name, () => fn(...args), labels);
}
