/**
 * Integer domain checks for counter and gauge values.
 */

import { ValidationError } from '../errors/index.js';
import type { CounterValue, GaugeValue } from '../types.js';

const U64_MAX = 2n ** 64n - 1n;
const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

function describe(value: number | bigint): string {
  return typeof value === 'bigint' ? `${value}n` : String(value);
}

/**
 * @throws ValidationError unless the value is an integer in [0, 2^64 - 1]
 */
export function validateCounterValue(name: string, value: CounterValue): void {
  const valid =
    typeof value === 'bigint'
      ? value >= 0n && value <= U64_MAX
      : Number.isSafeInteger(value) && value >= 0;

  if (!valid) {
    throw new ValidationError(
      `Counter "${name}" value must be an unsigned 64-bit integer, got ${describe(value)}`,
      { metricName: name }
    );
  }
}

/**
 * @throws ValidationError unless the value is an integer in [-2^63, 2^63 - 1]
 */
export function validateGaugeValue(name: string, value: GaugeValue): void {
  const valid =
    typeof value === 'bigint' ? value >= I64_MIN && value <= I64_MAX : Number.isSafeInteger(value);

  if (!valid) {
    throw new ValidationError(
      `Gauge "${name}" value must be a signed 64-bit integer, got ${describe(value)}`,
      { metricName: name }
    );
  }
}
