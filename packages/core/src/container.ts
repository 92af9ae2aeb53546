export type Compare<T> = (a: T, b: T) => number;

const natural = <T>(a: T, b: T): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Generic ordered container with a comparison sort.
 * Without a comparator, values are ordered with `<`, so numbers sort numerically.
 */
export class Container<T> {
  private readonly values: T[] = [];

  add(value: T): void {
    this.values.push(value);
  }

  /** Stable sort in place. */
  sort(compare: Compare<T> = natural): void {
    this.values.sort(compare);
  }

  *display(): Generator<string, void, undefined> {
    for (const v of this.values) yield String(v);
  }

  toArray(): T[] {
    return [...this.values];
  }
}
