/**
 * A key/value pair used to further describe a metric.
 */
export class Label {
  readonly key: string;
  readonly value: string;

  private constructor(key: string, value: string) {
    this.key = key;
    this.value = value;
    Object.freeze(this);
  }

  /**
   * Creates a label from a key and value.
   */
  static fromParts(key: string, value: string): Label {
    return new Label(key, value);
  }

  /**
   * Structural equality: both key and value must match.
   */
  equals(other: Label): boolean {
    return this.key === other.key && this.value === other.value;
  }

  intoParts(): [string, string] {
    return [this.key, this.value];
  }

  toString(): string {
    return `${this.key} = ${this.value}`;
  }
}

/**
 * Anything that can be turned into an ordered list of labels.
 *
 * Plain records keep their insertion order, except that JavaScript moves
 * integer-like keys ("0", "42") to the front. Use a tuple list when such keys
 * must keep their position.
 */
export type IntoLabels =
  | Iterable<Label | readonly [string, string]>
  | Readonly<Record<string, string>>;

function isIterable(input: IntoLabels): input is Iterable<Label | readonly [string, string]> {
  return Symbol.iterator in input;
}

/**
 * Converts a label input into an ordered label list.
 */
export function intoLabels(input: IntoLabels): Label[] {
  const labels: Label[] = [];

  if (isIterable(input)) {
    for (const item of input) {
      labels.push(item instanceof Label ? item : Label.fromParts(item[0], item[1]));
    }
    return labels;
  }

  for (const [key, value] of Object.entries(input)) {
    labels.push(Label.fromParts(key, value));
  }
  return labels;
}
