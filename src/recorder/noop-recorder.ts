import type { Key } from '../key/index.js';
import type { CounterValue, GaugeValue, Recorder } from '../types.js';

/**
 * Recorder that discards everything. Stands in when no recorder is installed.
 */
export class NoopRecorder implements Recorder {
  recordCounter(_key: Key, _value: CounterValue): void {}
  recordGauge(_key: Key, _value: GaugeValue): void {}
  recordHistogram(_key: Key, _values: readonly number[]): void {}
}
