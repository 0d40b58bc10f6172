/**
 * Test assertion helpers for exposition payloads.
 */

import { parseExposition, type ExpositionSample } from './exposition-parser.js';

function labelsMatch(actual: Array<[string, string]>, expected: Array<[string, string]>): boolean {
  return (
    actual.length === expected.length &&
    actual.every(([key, value], i) => expected[i]?.[0] === key && expected[i]?.[1] === value)
  );
}

/**
 * Find the samples with a given name and, when given, exactly these labels
 * in this order.
 */
export function findSamples(
  text: string,
  name: string,
  labels?: Array<[string, string]>
): ExpositionSample[] {
  return parseExposition(text).samples.filter(
    (s) => s.name === name && (labels === undefined || labelsMatch(s.labels, labels))
  );
}

/**
 * Assert that exactly one sample matches and has the expected value.
 */
export function assertSampleValue(
  text: string,
  name: string,
  expected: number | bigint | string,
  labels?: Array<[string, string]>
): void {
  const matches = findSamples(text, name, labels);
  const labelStr = labels ? ` with labels ${JSON.stringify(labels)}` : '';

  if (matches.length !== 1) {
    throw new Error(`Expected one sample ${name}${labelStr}, found ${matches.length}`);
  }

  const actual = matches[0]?.value;
  if (actual !== expected.toString()) {
    throw new Error(`Sample ${name}${labelStr} expected ${expected.toString()} but was ${actual}`);
  }
}

/**
 * Assert that a metric was declared with the given type.
 */
export function assertTypeDeclared(text: string, name: string, type: string): void {
  const declared = parseExposition(text).types.some((t) => t.name === name && t.type === type);
  if (!declared) {
    throw new Error(`Expected "# TYPE ${name} ${type}" to be declared`);
  }
}

/**
 * Assert that the summary for `name` has the expected sum and count.
 */
export function assertSummary(
  text: string,
  name: string,
  expected: { sum: number | bigint; count: number },
  labels?: Array<[string, string]>
): void {
  assertTypeDeclared(text, name, 'summary');
  assertSampleValue(text, `${name}_sum`, expected.sum, labels);
  assertSampleValue(text, `${name}_count`, expected.count, labels);
}
