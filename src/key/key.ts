/**
 * Metric identity: a name plus an optional ordered label list.
 */

import { Label, intoLabels, type IntoLabels } from './label.js';

const NO_LABELS: readonly Label[] = Object.freeze([]);

/**
 * A metric key.
 *
 * A key always includes a name and may include labels that further describe
 * the metric. An empty label list is normalized to "no labels", so
 * `Key.fromNameAndLabels('x', [])` and `Key.fromName('x')` are equal.
 *
 * @example
 * ```typescript
 * const key = Key.fromNameAndLabels('http.requests', { method: 'GET' });
 * key.toString();                      // 'Key(http.requests, [method = GET])'
 * key.mapName((n) => `api.${n}`).name(); // 'api.http.requests'
 * ```
 */
export class Key {
  private readonly metricName: string;
  private readonly labelList: readonly Label[] | undefined;

  /** Canonical identity string, equal for equal keys. */
  readonly id: string;

  private constructor(name: string, labels: readonly Label[] | undefined) {
    this.metricName = name;
    this.labelList = labels !== undefined && labels.length > 0 ? Object.freeze([...labels]) : undefined;
    this.id = JSON.stringify([
      this.metricName,
      (this.labelList ?? NO_LABELS).map((label) => [label.key, label.value]),
    ]);
    Object.freeze(this);
  }

  /**
   * Creates a key from a name.
   */
  static fromName(name: string): Key {
    return new Key(name, undefined);
  }

  /**
   * Creates a key from a name and an ordered list of labels.
   */
  static fromNameAndLabels(name: string, labels: IntoLabels): Key {
    return new Key(name, intoLabels(labels));
  }

  name(): string {
    return this.metricName;
  }

  /**
   * Labels in the order they were given; empty when the key has none.
   */
  labels(): readonly Label[] {
    return this.labelList ?? NO_LABELS;
  }

  hasLabels(): boolean {
    return this.labelList !== undefined;
  }

  /**
   * Returns a new key whose name is `f(name)`, with the same labels.
   */
  mapName(f: (name: string) => string): Key {
    return new Key(f(this.metricName), this.labelList);
  }

  /**
   * Order-sensitive structural equality.
   */
  equals(other: Key): boolean {
    return this.id === other.id;
  }

  toString(): string {
    if (this.labelList === undefined) {
      return `Key(${this.metricName})`;
    }
    const pairs = this.labelList.map((label) => label.toString());
    return `Key(${this.metricName}, [${pairs.join(', ')}])`;
  }
}

/**
 * Anything that can be turned into a key: a key, a bare name, or a
 * `[name, labels]` tuple.
 */
export type IntoKey = Key | string | readonly [string, IntoLabels];

export function intoKey(input: IntoKey): Key {
  if (input instanceof Key) {
    return input;
  }
  if (typeof input === 'string') {
    return Key.fromName(input);
  }
  return Key.fromNameAndLabels(input[0], input[1]);
}
