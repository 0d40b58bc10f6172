/**
 * Prometheus Renderer
 *
 * Records metrics straight into the Prometheus text exposition format.
 * Counters and gauges are appended to the payload as they arrive; histogram
 * observations are folded into one sketch per key and written out as
 * summaries when the renderer is finalized.
 *
 * A renderer has a single owner. It is not synchronized; concurrent
 * producers should each own one (see `clone`) or serialize access.
 */

import { RendererConfig, type RendererConfigOptions } from '../config/index.js';
import { RendererStateError, formatError } from '../errors/index.js';
import type { Key } from '../key/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { parseQuantiles, type Quantile } from '../quantiles/index.js';
import { validateCounterValue, validateGaugeValue } from '../recorder/index.js';
import {
  escapeMetricName,
  formatHeader,
  formatLabelPairs,
  formatSampleLine,
  formatTypeLine,
  renderLabeledName,
  type ExpositionType,
} from '../serialization/index.js';
import { HistogramSketch } from '../sketch/index.js';
import type { Clock, CounterValue, GaugeValue, Recorder } from '../types.js';

/**
 * Wall clock in whole seconds since the Unix epoch.
 */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface PrometheusRendererOptions extends RendererConfigOptions {
  /** Prebuilt configuration; takes precedence over the individual fields */
  config?: RendererConfig;
  /** Header timestamp source (default: system clock) */
  clock?: Clock;
  logger?: Logger;
}

interface HistogramEntry {
  readonly key: Key;
  sum: bigint;
  readonly sketch: HistogramSketch;
}

/**
 * Records metrics in the Prometheus exposition format.
 *
 * @example
 * ```typescript
 * const renderer = new PrometheusRenderer({ quantiles: [0.5, 0.99] });
 * renderer.recordCounter(Key.fromName('requests'), 42);
 * renderer.recordHistogram(Key.fromName('db.query_ms'), [3, 5, 8]);
 * const payload = renderer.finalize();
 * ```
 */
export class PrometheusRenderer implements Recorder {
  readonly config: RendererConfig;
  readonly quantiles: readonly Quantile[];

  private readonly clock: Clock;
  private readonly logger: Logger;
  private output: string;
  private readonly histograms = new Map<string, HistogramEntry>();
  private finalized = false;

  /**
   * @throws ConfigurationError for invalid quantiles or sketch settings
   */
  constructor(options: PrometheusRendererOptions = {}) {
    this.config = options.config ?? RendererConfig.create(options);
    this.quantiles = Object.freeze(parseQuantiles(this.config.quantiles));
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
    this.output = formatHeader(this.readTimestamp());
  }

  /**
   * Creates a renderer for the given quantiles and default sketch settings.
   */
  static withQuantiles(
    quantiles: readonly number[],
    options: Omit<PrometheusRendererOptions, 'quantiles' | 'config'> = {}
  ): PrometheusRenderer {
    return new PrometheusRenderer({ ...options, quantiles });
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Number of distinct histogram keys recorded so far.
   */
  get histogramCount(): number {
    return this.histograms.size;
  }

  recordCounter(key: Key, value: CounterValue): void {
    this.assertAccumulating('recordCounter');
    validateCounterValue(key.name(), value);
    this.append(key, 'counter', value);
  }

  recordGauge(key: Key, value: GaugeValue): void {
    this.assertAccumulating('recordGauge');
    validateGaugeValue(key.name(), value);
    this.append(key, 'gauge', value);
  }

  /**
   * Adds observations to the key's sketch and running sum.
   *
   * The whole batch is checked before anything is recorded, so a rejected
   * batch leaves the renderer unchanged.
   *
   * @throws RecordingError if any value is outside the sketch's range
   */
  recordHistogram(key: Key, values: readonly number[]): void {
    this.assertAccumulating('recordHistogram');

    const existing = this.histograms.get(key.id);
    const sketch = existing?.sketch ?? new HistogramSketch(this.config.sketchOptions());
    for (const value of values) {
      sketch.validate(value);
    }

    const entry = existing ?? { key, sum: 0n, sketch };
    if (existing === undefined) {
      this.histograms.set(key.id, entry);
    }

    for (const value of values) {
      entry.sketch.record(value);
      entry.sum += BigInt(value);
    }
  }

  /**
   * Drains the renderer into the exposition payload.
   *
   * Histograms are written as summaries, in the order their keys were first
   * recorded. The renderer cannot be used afterwards.
   *
   * @throws RendererStateError if the renderer was already finalized
   */
  finalize(): string {
    this.assertAccumulating('finalize');
    this.finalized = true;

    let output = this.output;
    for (const entry of this.histograms.values()) {
      output += this.renderSummary(entry);
    }

    this.logger.debug('Rendered exposition payload', {
      histograms: this.histograms.size,
      bytes: output.length,
    });

    this.output = '';
    this.histograms.clear();
    return output;
  }

  /**
   * Same configuration, blank slate: a new header timestamp, no text and no
   * histograms.
   */
  clone(): PrometheusRenderer {
    return new PrometheusRenderer({ config: this.config, clock: this.clock, logger: this.logger });
  }

  private append(key: Key, type: ExpositionType, value: CounterValue | GaugeValue): void {
    const name = escapeMetricName(key.name());
    const labeledName = renderLabeledName(name, formatLabelPairs(key.labels()));
    this.output += formatTypeLine(name, type) + formatSampleLine(labeledName, value);
  }

  private renderSummary(entry: HistogramEntry): string {
    const name = escapeMetricName(entry.key.name());
    const pairs = formatLabelPairs(entry.key.labels());

    let text = formatTypeLine(name, 'summary');
    for (const quantile of this.quantiles) {
      const labeledName = renderLabeledName(name, [...pairs, `quantile="${quantile.label}"`]);
      text += formatSampleLine(labeledName, entry.sketch.valueAtQuantile(quantile.value));
    }
    text += formatSampleLine(renderLabeledName(`${name}_sum`, pairs), entry.sum);
    text += formatSampleLine(renderLabeledName(`${name}_count`, pairs), entry.sketch.len());
    return text;
  }

  private assertAccumulating(operation: string): void {
    if (this.finalized) {
      throw new RendererStateError(
        `Cannot ${operation}: renderer has already been finalized; use clone() for a fresh one`
      );
    }
  }

  /**
   * A clock that throws or returns a negative or non-finite value yields 0.
   */
  private readTimestamp(): number {
    let seconds: number;
    try {
      seconds = this.clock();
    } catch (error) {
      this.logger.warn('Clock unavailable, using header timestamp 0', { error: formatError(error) });
      return 0;
    }

    if (!Number.isFinite(seconds) || seconds < 0) {
      this.logger.warn('Clock returned an invalid timestamp, using header timestamp 0', {
        timestamp: seconds,
      });
      return 0;
    }
    return Math.floor(seconds);
  }
}
