/**
 * Quantile parsing and display labels for summary output.
 */

import { ConfigurationError } from '../errors/index.js';

/**
 * Quantiles rendered when none are configured.
 */
export const DEFAULT_QUANTILES: readonly number[] = Object.freeze([0.0, 0.5, 0.9, 0.95, 0.99, 0.999, 1.0]);

/**
 * A validated quantile in [0, 1] with its precomputed `quantile="..."` label.
 */
export class Quantile {
  readonly value: number;
  readonly label: string;

  private constructor(value: number) {
    this.value = value;
    this.label = formatQuantileLabel(value);
    Object.freeze(this);
  }

  /**
   * @throws ConfigurationError if the value is not a finite number in [0, 1]
   */
  static of(value: number): Quantile {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(`Quantile must be a number between 0 and 1, got ${value}`, {
        field: 'quantiles',
      });
    }
    return new Quantile(value);
  }

  toString(): string {
    return this.label;
  }
}

/**
 * Renders a quantile as the shortest plain decimal without trailing zeros:
 * 1 -> "1", 0.9 -> "0.9", 0.999 -> "0.999", 1e-7 -> "0.0000001".
 */
export function formatQuantileLabel(value: number): string {
  const shortest = String(value);
  if (!/e/i.test(shortest)) {
    return shortest;
  }

  // Only tiny magnitudes reach exponent notation in [0, 1].
  const [mantissa = '', exponentText = '0'] = shortest.split(/e/i);
  const exponent = Number.parseInt(exponentText, 10);
  const digits = mantissa.replace('.', '');
  const pointOffset = mantissa.includes('.') ? mantissa.indexOf('.') : mantissa.length;
  const leadingZeros = -(pointOffset + exponent);
  return `0.${'0'.repeat(leadingZeros)}${digits}`.replace(/0+$/, '');
}

/**
 * Validates raw quantiles and computes their display labels.
 *
 * Values outside [0, 1] (or NaN) are rejected, not clamped. Input order is
 * kept and duplicates are not removed: the caller gets one summary line per
 * entry, in the order given.
 *
 * @throws ConfigurationError naming the offending index
 */
export function parseQuantiles(raw: readonly number[]): Quantile[] {
  return raw.map((value, index) => {
    try {
      return Quantile.of(value);
    } catch (error) {
      throw new ConfigurationError(`Invalid quantile at index ${index}: ${value}`, {
        field: `quantiles.${index}`,
        cause: error,
      });
    }
  });
}
