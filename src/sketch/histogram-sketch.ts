/**
 * Histogram Sketch
 *
 * A log-linear sketch in the style of HdrHistogram. Values below
 * `2^ceil(log2(2 * 10^d))` (d = significant figures) each get their own
 * bucket. Above that, every power-of-two range is split into the same number
 * of linear sub-buckets, so a reported value is within a relative error of
 * `10^-d` of the observed one.
 *
 * Memory grows with the magnitude of the largest observed value, not with the
 * number of observations.
 */

import { ConfigurationError, RecordingError, ValidationError } from '../errors/index.js';

export const DEFAULT_SIGNIFICANT_FIGURES = 3;
export const DEFAULT_HIGHEST_TRACKABLE_VALUE = Number.MAX_SAFE_INTEGER;

export const MIN_SIGNIFICANT_FIGURES = 1;
export const MAX_SIGNIFICANT_FIGURES = 5;

export interface SketchOptions {
  /** Decimal digits of precision kept for every value (1-5, default: 3) */
  significantFigures?: number;
  /** Largest value `record` accepts (default: Number.MAX_SAFE_INTEGER) */
  highestTrackableValue?: number;
}

/**
 * Number of bits needed to represent a non-negative safe integer.
 */
function bitLength(value: number): number {
  if (value >= 2 ** 32) {
    return 32 + bitLength(Math.floor(value / 2 ** 32));
  }
  return 32 - Math.clz32(value);
}

/**
 * Approximate, mergeable summary of a stream of non-negative integers.
 *
 * @example
 * ```typescript
 * const sketch = new HistogramSketch({ significantFigures: 3 });
 * for (const latency of [12, 15, 11, 240]) {
 *   sketch.record(latency);
 * }
 * sketch.valueAtQuantile(0.5); // 12
 * sketch.valueAtQuantile(1);   // 240
 * sketch.len();                // 4
 * ```
 */
export class HistogramSketch {
  readonly significantFigures: number;
  readonly highestTrackableValue: number;

  private readonly subBucketMagnitude: number;
  private readonly subBucketHalfCount: number;
  private readonly maxIndex: number;

  private counts: Float64Array;
  private totalCount = 0;
  private minValue = 0;
  private maxValue = 0;

  /**
   * @throws ConfigurationError for a degenerate precision or range
   */
  constructor(options: SketchOptions = {}) {
    const significantFigures = options.significantFigures ?? DEFAULT_SIGNIFICANT_FIGURES;
    const highestTrackableValue = options.highestTrackableValue ?? DEFAULT_HIGHEST_TRACKABLE_VALUE;

    if (
      !Number.isInteger(significantFigures) ||
      significantFigures < MIN_SIGNIFICANT_FIGURES ||
      significantFigures > MAX_SIGNIFICANT_FIGURES
    ) {
      throw new ConfigurationError(
        `significantFigures must be an integer between ${MIN_SIGNIFICANT_FIGURES} and ` +
          `${MAX_SIGNIFICANT_FIGURES}, got ${significantFigures}`,
        { field: 'significantFigures' }
      );
    }

    if (!Number.isSafeInteger(highestTrackableValue) || highestTrackableValue < 2) {
      throw new ConfigurationError(
        `highestTrackableValue must be a safe integer of at least 2, got ${highestTrackableValue}`,
        { field: 'highestTrackableValue' }
      );
    }

    this.significantFigures = significantFigures;
    this.highestTrackableValue = highestTrackableValue;
    this.subBucketMagnitude = Math.ceil(Math.log2(2 * 10 ** significantFigures));
    this.subBucketHalfCount = 2 ** (this.subBucketMagnitude - 1);
    this.maxIndex = this.indexOf(highestTrackableValue);
    this.counts = new Float64Array(Math.min(2 * this.subBucketHalfCount, this.maxIndex + 1));
  }

  /**
   * Options that produce an empty sketch with the same configuration.
   */
  get options(): Required<SketchOptions> {
    return {
      significantFigures: this.significantFigures,
      highestTrackableValue: this.highestTrackableValue,
    };
  }

  /**
   * Checks that a value can be recorded, without recording it.
   *
   * @throws RecordingError if the value is negative, fractional, unsafe or
   *   above `highestTrackableValue`
   */
  validate(value: number): void {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RecordingError(`Histogram value must be a non-negative safe integer, got ${value}`, {
        value,
        highestTrackableValue: this.highestTrackableValue,
      });
    }
    if (value > this.highestTrackableValue) {
      throw new RecordingError(
        `Histogram value ${value} exceeds the highest trackable value ${this.highestTrackableValue}`,
        { value, highestTrackableValue: this.highestTrackableValue }
      );
    }
  }

  /**
   * Records one observation.
   *
   * @throws RecordingError if the value is outside the representable range
   */
  record(value: number): void {
    this.recordCount(value, 1);
  }

  /**
   * Records `count` observations of the same value.
   */
  recordCount(value: number, count: number): void {
    this.validate(value);
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new ValidationError(`Observation count must be a non-negative safe integer, got ${count}`);
    }
    if (count === 0) {
      return;
    }

    this.addToBucket(this.indexOf(value), count);
    if (this.totalCount === count || value < this.minValue) {
      this.minValue = value;
    }
    if (value > this.maxValue) {
      this.maxValue = value;
    }
  }

  /**
   * Adds every observation of another sketch to this one.
   * Both sketches keep exact extrema; bucket counts are exact when the
   * precisions match and approximate otherwise.
   *
   * @throws RecordingError if the other sketch holds values above this
   *   sketch's range; nothing is merged in that case
   */
  merge(other: HistogramSketch): void {
    if (other.totalCount === 0) {
      return;
    }
    this.validate(other.maxValue);

    const wasEmpty = this.totalCount === 0;
    for (let index = 0; index < other.counts.length; index++) {
      const count = other.counts[index] ?? 0;
      if (count > 0) {
        this.addToBucket(this.indexOf(other.valueFromIndex(index)), count);
      }
    }

    this.minValue = wasEmpty ? other.minValue : Math.min(this.minValue, other.minValue);
    this.maxValue = wasEmpty ? other.maxValue : Math.max(this.maxValue, other.maxValue);
  }

  /**
   * Approximate value at quantile `q`.
   *
   * `q` is clamped to [0, 1]; 0 yields the minimum and 1 the maximum observed
   * value. Non-decreasing in `q`. An empty sketch yields 0.
   */
  valueAtQuantile(q: number): number {
    if (Number.isNaN(q)) {
      throw new ValidationError('Quantile must be a number, got NaN');
    }
    if (this.totalCount === 0) {
      return 0;
    }

    const quantile = Math.min(Math.max(q, 0), 1);
    if (quantile === 0) {
      return this.minValue;
    }
    if (quantile === 1) {
      return this.maxValue;
    }

    const rank = Math.max(1, Math.ceil(quantile * this.totalCount));
    let seen = 0;
    for (let index = 0; index < this.counts.length; index++) {
      seen += this.counts[index] ?? 0;
      if (seen >= rank) {
        return Math.min(Math.max(this.highestEquivalentValue(index), this.minValue), this.maxValue);
      }
    }
    return this.maxValue;
  }

  /**
   * Total number of recorded observations.
   */
  len(): number {
    return this.totalCount;
  }

  isEmpty(): boolean {
    return this.totalCount === 0;
  }

  /** Smallest observed value, 0 when empty. */
  min(): number {
    return this.minValue;
  }

  /** Largest observed value, 0 when empty. */
  max(): number {
    return this.maxValue;
  }

  reset(): void {
    this.counts.fill(0);
    this.totalCount = 0;
    this.minValue = 0;
    this.maxValue = 0;
  }

  private addToBucket(index: number, count: number): void {
    if (index >= this.counts.length) {
      const grown = new Float64Array(Math.min(Math.max(index + 1, this.counts.length * 2), this.maxIndex + 1));
      grown.set(this.counts);
      this.counts = grown;
    }
    this.counts[index] = (this.counts[index] ?? 0) + count;
    this.totalCount += count;
  }

  private indexOf(value: number): number {
    const shift = Math.max(0, bitLength(value) - this.subBucketMagnitude);
    if (shift === 0) {
      return value;
    }
    return shift * this.subBucketHalfCount + Math.floor(value / 2 ** shift);
  }

  /** Lowest value that maps to the bucket at `index`. */
  private valueFromIndex(index: number): number {
    const bucket = Math.floor(index / this.subBucketHalfCount) - 1;
    const subBucket = (index % this.subBucketHalfCount) + this.subBucketHalfCount;
    if (bucket < 0) {
      return subBucket - this.subBucketHalfCount;
    }
    return subBucket * 2 ** bucket;
  }

  private highestEquivalentValue(index: number): number {
    const bucket = Math.max(0, Math.floor(index / this.subBucketHalfCount) - 1);
    return this.valueFromIndex(index) + 2 ** bucket - 1;
  }
}
