/**
 * Call-site helpers. Each builds a key and records through the installed
 * global recorder.
 *
 * @example
 * ```typescript
 * counter('jobs.completed', 42);
 * gauge('queue.depth', -3, { queue: 'emails' });
 *
 * const start = process.hrtime.bigint();
 * await handle(request);
 * timingBetween('request.processed', start, process.hrtime.bigint(), { route: '/users' });
 *
 * value('client.rows_read', rows.length);
 * ```
 */

import { ValidationError } from '../errors/index.js';
import { Key, type IntoLabels } from '../key/index.js';
import { logError } from '../observability/logging.js';
import type { CounterValue, GaugeValue, Recorder } from '../types.js';
import { getFacadeLogger, getRecorder } from './global-recorder.js';

/**
 * `process.hrtime()` tuple: whole seconds and remaining nanoseconds.
 */
export type HrTime = readonly [seconds: number, nanoseconds: number];

/**
 * A duration or instant in nanoseconds: a plain integer, a bigint
 * (`process.hrtime.bigint()`), or an `HrTime` tuple.
 */
export type Nanoseconds = number | bigint | HrTime;

/**
 * Converts a nanosecond value to a plain number.
 */
export function asNanoseconds(value: Nanoseconds): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  const [seconds, nanoseconds] = value;
  return seconds * 1e9 + nanoseconds;
}

function buildKey(name: string, labels: IntoLabels | undefined): Key {
  return labels === undefined ? Key.fromName(name) : Key.fromNameAndLabels(name, labels);
}

function dispatch(operation: string, name: string, record: (recorder: Recorder) => void): void {
  try {
    record(getRecorder());
  } catch (error) {
    logError(getFacadeLogger(), error, `${operation} ${name}`);
    throw error;
  }
}

/**
 * Records a counter.
 */
export function counter(name: string, count: CounterValue, labels?: IntoLabels): void {
  dispatch('counter', name, (recorder) => recorder.recordCounter(buildKey(name, labels), count));
}

/**
 * Records a gauge.
 */
export function gauge(name: string, level: GaugeValue, labels?: IntoLabels): void {
  dispatch('gauge', name, (recorder) => recorder.recordGauge(buildKey(name, labels), level));
}

/**
 * Records a duration, in nanoseconds, as a histogram observation.
 */
export function timing(name: string, delta: Nanoseconds, labels?: IntoLabels): void {
  dispatch('timing', name, (recorder) =>
    recorder.recordHistogram(buildKey(name, labels), [asNanoseconds(delta)])
  );
}

/**
 * Records the span between two instants as a histogram observation.
 *
 * @throws ValidationError if `end` is before `start`
 */
export function timingBetween(
  name: string,
  start: Nanoseconds,
  end: Nanoseconds,
  labels?: IntoLabels
): void {
  const startNs = asNanoseconds(start);
  const endNs = asNanoseconds(end);
  if (endNs < startNs) {
    throw new ValidationError(`Timing "${name}" ends (${endNs}) before it starts (${startNs})`, {
      metricName: name,
    });
  }
  timing(name, endNs - startNs, labels);
}

/**
 * Records an arbitrary value, such as a row count, as a histogram observation.
 */
export function value(name: string, observed: number, labels?: IntoLabels): void {
  dispatch('value', name, (recorder) => recorder.recordHistogram(buildKey(name, labels), [observed]));
}
