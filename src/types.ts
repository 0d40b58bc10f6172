/**
 * Core type definitions shared by recorders, snapshots and the renderer.
 */

import type { Key } from './key/index.js';

/**
 * Unsigned 64-bit counter value. Numbers must be safe integers; use a bigint
 * beyond `Number.MAX_SAFE_INTEGER`.
 */
export type CounterValue = number | bigint;

/**
 * Signed 64-bit gauge value.
 */
export type GaugeValue = number | bigint;

/**
 * Kinds of measurement a recorder accepts
 */
export type MetricKind = 'counter' | 'gauge' | 'histogram';

/**
 * A value that records metrics.
 *
 * From a recorder's point of view, counters and gauges are both a single
 * value tied to a key; exporters treat them differently, so both are
 * provided.
 */
export interface Recorder {
  /**
   * Records a counter. Each call is an independent increment the caller has
   * already summed; recorders do not add same-key calls together.
   */
  recordCounter(key: Key, value: CounterValue): void;

  /**
   * Records a gauge.
   */
  recordGauge(key: Key, value: GaugeValue): void;

  /**
   * Records histogram observations. Recorders tally their own histogram
   * views and may be called many times for the same key; N calls must behave
   * like one call with all the values.
   */
  recordHistogram(key: Key, values: readonly number[]): void;
}

/**
 * One recorded measurement, as stored by snapshots and capturing recorders.
 */
export type Measurement =
  | { readonly kind: 'counter'; readonly key: Key; readonly value: CounterValue }
  | { readonly kind: 'gauge'; readonly key: Key; readonly value: GaugeValue }
  | { readonly kind: 'histogram'; readonly key: Key; readonly values: readonly number[] };

/**
 * A point-in-time view of collected metrics.
 */
export interface Snapshot {
  /**
   * Records the snapshot into the given recorder.
   */
  record(recorder: Recorder): void;
}

/**
 * A value that can provide snapshots on demand.
 */
export interface SnapshotProvider<S extends Snapshot = Snapshot> {
  getSnapshot(): S;
}

/**
 * A value that can provide snapshots asynchronously.
 */
export interface AsyncSnapshotProvider<S extends Snapshot = Snapshot> {
  getSnapshotAsync(): Promise<S>;
}

/**
 * Source of the payload header timestamp, in seconds since the Unix epoch.
 */
export type Clock = () => number;
