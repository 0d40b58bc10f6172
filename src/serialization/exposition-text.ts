/**
 * Building blocks of the Prometheus text exposition format.
 * See: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import type { Label } from '../key/index.js';

/**
 * Kinds of metric block this package writes.
 */
export type ExpositionType = 'counter' | 'gauge' | 'summary';

/**
 * Escape a metric name. Prometheus metric names disallow dots, so every `.`
 * becomes `_`; other characters pass through unchanged.
 *
 * @example
 * ```typescript
 * escapeMetricName('service.latency'); // 'service_latency'
 * ```
 */
export function escapeMetricName(name: string): string {
  return name.replace(/\./g, '_');
}

/**
 * Escape label value according to Prometheus format.
 * Backslashes, quotes, and newlines must be escaped.
 */
export function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

/**
 * Render labels as `key="value"` pairs, keeping their order.
 */
export function formatLabelPairs(labels: readonly Label[]): string[] {
  return labels.map((label) => `${label.key}="${escapeLabelValue(label.value)}"`);
}

/**
 * Append a rendered label block to a name. No pairs means no braces.
 *
 * @example
 * ```typescript
 * renderLabeledName('temp', ['room="kitchen"']); // 'temp{room="kitchen"}'
 * renderLabeledName('temp', []);                 // 'temp'
 * ```
 */
export function renderLabeledName(name: string, pairs: readonly string[]): string {
  if (pairs.length === 0) {
    return name;
  }
  return `${name}{${pairs.join(',')}}`;
}

/**
 * A metric block declaration. Every block is preceded by a blank line.
 */
export function formatTypeLine(name: string, type: ExpositionType): string {
  return `\n# TYPE ${name} ${type}\n`;
}

export function formatSampleLine(labeledName: string, value: number | bigint): string {
  return `${labeledName} ${value.toString()}\n`;
}

/**
 * First line of every payload.
 */
export function formatHeader(timestampSeconds: number): string {
  return `# metrics snapshot (ts=${timestampSeconds}) (prometheus exposition format)\n`;
}
