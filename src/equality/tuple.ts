/**
 * A fixed-arity, positionally compared group of values.
 *
 * Plain arrays are compared as collections; wrap values with `tuple(...)` when
 * arity is part of the value's identity.
 */
export class Tuple<T extends readonly unknown[] = readonly unknown[]> {
  readonly items: T;

  constructor(items: T) {
    this.items = items;
    Object.freeze(this);
  }

  get arity(): number {
    return this.items.length;
  }

  toString(): string {
    return `(${this.items.map(String).join(', ')})`;
  }
}

export function tuple<T extends unknown[]>(...items: T): Tuple<T> {
  return new Tuple(items);
}
