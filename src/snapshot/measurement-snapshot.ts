/**
 * Point-in-time views of recorded measurements.
 *
 * A snapshot replays its measurements into any Recorder, which is how
 * measurements move between owners: producers record into their own buffer,
 * and the owner of a renderer replays the drained snapshots into it.
 */

import type { Key } from '../key/index.js';
import { PrometheusRenderer, type PrometheusRendererOptions } from '../renderer/index.js';
import type {
  AsyncSnapshotProvider,
  CounterValue,
  GaugeValue,
  Measurement,
  Recorder,
  Snapshot,
  SnapshotProvider,
} from '../types.js';

/**
 * Replays one measurement into a recorder.
 */
export function replayMeasurement(recorder: Recorder, measurement: Measurement): void {
  switch (measurement.kind) {
    case 'counter':
      recorder.recordCounter(measurement.key, measurement.value);
      break;
    case 'gauge':
      recorder.recordGauge(measurement.key, measurement.value);
      break;
    case 'histogram':
      recorder.recordHistogram(measurement.key, measurement.values);
      break;
  }
}

/**
 * Immutable, ordered list of measurements.
 */
export class MeasurementSnapshot implements Snapshot {
  private readonly measurements: readonly Measurement[];

  constructor(measurements: Iterable<Measurement> = []) {
    this.measurements = Object.freeze([...measurements]);
  }

  get size(): number {
    return this.measurements.length;
  }

  entries(): readonly Measurement[] {
    return this.measurements;
  }

  /**
   * Records every measurement, in the order it was captured.
   */
  record(recorder: Recorder): void {
    for (const measurement of this.measurements) {
      replayMeasurement(recorder, measurement);
    }
  }
}

/**
 * Recorder that keeps what it is given and hands it out as snapshots.
 * Values are stored as given; validation happens in the recorder a snapshot
 * is replayed into.
 */
export class MeasurementBuffer implements Recorder, SnapshotProvider<MeasurementSnapshot> {
  protected measurements: Measurement[] = [];

  recordCounter(key: Key, value: CounterValue): void {
    this.measurements.push({ kind: 'counter', key, value });
  }

  recordGauge(key: Key, value: GaugeValue): void {
    this.measurements.push({ kind: 'gauge', key, value });
  }

  recordHistogram(key: Key, values: readonly number[]): void {
    this.measurements.push({ kind: 'histogram', key, values: Object.freeze([...values]) });
  }

  /**
   * Snapshot of everything recorded so far; the buffer keeps its contents.
   */
  getSnapshot(): MeasurementSnapshot {
    return new MeasurementSnapshot(this.measurements);
  }

  /**
   * Snapshot of everything recorded so far; the buffer is emptied.
   */
  drain(): MeasurementSnapshot {
    const snapshot = new MeasurementSnapshot(this.measurements);
    this.measurements = [];
    return snapshot;
  }

  get size(): number {
    return this.measurements.length;
  }
}

/**
 * Renders snapshots into one payload with a fresh renderer.
 * Histograms with the same key across snapshots are aggregated.
 */
export function renderSnapshots(
  snapshots: Iterable<Snapshot>,
  options: PrometheusRendererOptions = {}
): string {
  const renderer = new PrometheusRenderer(options);
  for (const snapshot of snapshots) {
    snapshot.record(renderer);
  }
  return renderer.finalize();
}

/**
 * Fetches a snapshot from an async provider and renders it.
 */
export async function renderFromProvider(
  provider: AsyncSnapshotProvider,
  options: PrometheusRendererOptions = {}
): Promise<string> {
  const snapshot = await provider.getSnapshotAsync();
  return renderSnapshots([snapshot], options);
}
