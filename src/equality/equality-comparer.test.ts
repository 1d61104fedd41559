import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { ConfigurationError } from "../errors.js";
import { Tolerance } from "../tolerance/tolerance.js";
import { structuralEquals, type StructurallyEquatable } from "./comparers/structural.js";
import { ComparisonAdapter, EqualityComparer } from "./equality-comparer.js";
import { tuple } from "./tuple.js";

const areEqual = (x: unknown, y: unknown, tolerance?: Tolerance) =>
  new EqualityComparer().areEqual(x, y, tolerance);

class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}
}

class Money {
  constructor(
    readonly cents: number,
    readonly label: string
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Money && other.cents === this.cents;
  }
}

class Lenient implements StructurallyEquatable {
  constructor(readonly value: number) {}

  [structuralEquals](): boolean {
    return true;
  }
}

class Picky implements StructurallyEquatable {
  [structuralEquals](): boolean {
    return false;
  }
}

describe("EqualityComparer", () => {
  describe("null handling", () => {
    it("treats identical nullish values as equal", () => {
      expect(areEqual(null, null)).toBe(true);
      expect(areEqual(undefined, undefined)).toBe(true);
    });

    it("treats one nullish side as unequal", () => {
      expect(areEqual(null, undefined)).toBe(false);
      expect(areEqual(0, null)).toBe(false);
      expect(areEqual(undefined, {})).toBe(false);
    });
  });

  describe("reflexivity", () => {
    it("holds for a container that contains itself", () => {
      const list: unknown[] = [1];
      list.push(list);
      expect(areEqual(list, list)).toBe(true);
    });

    it("treats two isomorphic cycles as equal", () => {
      const a: unknown[] = [1];
      a.push(a);
      const b: unknown[] = [1];
      b.push(b);
      expect(areEqual(a, b)).toBe(true);
    });

    it("still finds differences next to a cycle", () => {
      const a: { self?: unknown; n: number } = { n: 1 };
      a.self = a;
      const b: { self?: unknown; n: number } = { n: 2 };
      b.self = b;
      expect(areEqual(a, b)).toBe(false);
    });
  });

  describe("numbers", () => {
    it("applies a linear tolerance around the expected value", () => {
      expect(areEqual(10.4, 10, new Tolerance(0.5))).toBe(true);
      expect(areEqual(10.6, 10, new Tolerance(0.5))).toBe(false);
    });

    it("treats NaN as equal to NaN", () => {
      expect(areEqual(Number.NaN, Number.NaN)).toBe(true);
    });

    it("compares bigints with numbers numerically", () => {
      expect(areEqual(5n, 5)).toBe(true);
      expect(areEqual(5n, 6)).toBe(false);
    });

    it("compares bigints with whole numbers exactly beyond 2^53", () => {
      expect(areEqual(2n ** 53n + 1n, 2 ** 53)).toBe(false);
      expect(areEqual(2 ** 53, 2n ** 53n + 1n)).toBe(false);
      expect(areEqual(2n ** 53n, 2 ** 53)).toBe(true);
      expect(areEqual(2n ** 53n + 1n, 2 ** 53, new Tolerance(1))).toBe(true);
    });

    it("compares bigints with fractional numbers as doubles", () => {
      expect(areEqual(10n, 10.5, new Tolerance(1))).toBe(true);
      expect(areEqual(10n, 10.5)).toBe(false);
    });

    it("substitutes the default tolerance for non-integral values only", () => {
      const lenient = new EqualityComparer({ defaultTolerance: new Tolerance(0.01) });
      expect(lenient.areEqual(0.1 + 0.2, 0.3)).toBe(true);
      expect(lenient.areEqual(10, 11)).toBe(false);
      expect(areEqual(0.1 + 0.2, 0.3)).toBe(false);
    });

    it("matches the linear window for any integers", () => {
      fc.assert(
        fc.property(
          fc.integer({ min: -1_000_000, max: 1_000_000 }),
          fc.integer({ min: -1_000_000, max: 1_000_000 }),
          fc.integer({ min: 0, max: 1_000 }),
          (a, b, t) => areEqual(a, b, new Tolerance(t)) === (b - t <= a && a <= b + t)
        )
      );
    });
  });

  describe("dates", () => {
    it("compares instants", () => {
      expect(areEqual(new Date(1000), new Date(1000))).toBe(true);
      expect(areEqual(new Date(1000), new Date(1001))).toBe(false);
    });

    it("applies a time span tolerance", () => {
      expect(areEqual(new Date(1400), new Date(1000), Tolerance.timeSpan(500))).toBe(true);
      expect(areEqual(new Date(1600), new Date(1000), Tolerance.timeSpan(500))).toBe(false);
    });
  });

  describe("strings", () => {
    it("honours ignoreCase at any depth", () => {
      const comparer = new EqualityComparer({ ignoreCase: true });
      expect(comparer.areEqual(["Hello", { k: "WORLD" }], ["hello", { k: "world" }])).toBe(true);
      expect(areEqual("Hello", "hello")).toBe(false);
    });
  });

  describe("collections", () => {
    it("compares arrays in order", () => {
      expect(areEqual([1, 2, 3], [1, 2, 3])).toBe(true);
      expect(areEqual([1, 2, 3], [3, 2, 1])).toBe(false);
    });

    it("ignores order in unordered mode", () => {
      const comparer = new EqualityComparer({ unordered: true });
      expect(comparer.areEqual([1, 2, 3], [3, 2, 1])).toBe(true);
      expect(comparer.areEqual([1, 1, 2], [1, 2, 2])).toBe(false);
    });

    it("finds a one-to-one pairing that first-fit matching would miss", () => {
      const comparer = new EqualityComparer({ unordered: true });
      expect(comparer.areEqual([1.0, 1.2], [1.1, 1.0], new Tolerance(0.15))).toBe(true);
      expect(comparer.areEqual([1.0, 1.0], [1.1, 1.3], new Tolerance(0.15))).toBe(false);
    });

    it("ignores order for sets", () => {
      expect(areEqual(new Set([1, 2, 3]), new Set([3, 2, 1]))).toBe(true);
    });

    it("reports a cardinality mismatch as unequal in every mode", () => {
      expect(areEqual([1, 2], [1, 2, 3])).toBe(false);
      expect(new EqualityComparer({ unordered: true }).areEqual([1, 2], [1, 2, 3])).toBe(false);
      expect(areEqual(new Set([1, 2]), new Set([1, 2, 3]))).toBe(false);
    });

    it("records where the top-level collections differ", () => {
      const comparer = new EqualityComparer();
      expect(comparer.areEqual([1, 2, 3], [1, 5, 3])).toBe(false);
      expect(comparer.failurePoints).toEqual([
        { position: 1, actualHasData: true, expectedHasData: true, actualValue: 2, expectedValue: 5 },
      ]);

      expect(comparer.areEqual([1, 2], [1, 2, 3])).toBe(false);
      expect(comparer.failurePoints).toHaveLength(1);
      expect(comparer.failurePoints[0]).toMatchObject({
        position: 2,
        actualHasData: false,
        expectedHasData: true,
        expectedValue: 3,
      });
    });

    it("compares maps by key and value", () => {
      expect(areEqual(new Map([["a", 1]]), new Map([["a", 1]]))).toBe(true);
      expect(areEqual(new Map([["a", 1]]), new Map([["a", 2]]))).toBe(false);
      expect(areEqual(new Map([["a", 1]]), new Map([["b", 1]]))).toBe(false);
    });
  });

  describe("tuples", () => {
    it("compares positionally", () => {
      expect(areEqual(tuple(1, "a"), tuple(1, "a"))).toBe(true);
      expect(areEqual(tuple(1, "a"), tuple(1, "b"))).toBe(false);
    });

    it("treats different arity as unequal", () => {
      expect(areEqual(tuple(1), tuple(1, 2))).toBe(false);
    });
  });

  describe("objects", () => {
    it("compares members of the same class", () => {
      expect(areEqual(new Point(1, 2), new Point(1, 2))).toBe(true);
      expect(areEqual(new Point(1, 2), new Point(1, 3))).toBe(false);
    });

    it("requires the same prototype unless comparing as collection", () => {
      expect(areEqual(new Point(1, 2), { x: 1, y: 2 })).toBe(false);
      expect(new EqualityComparer({ compareAsCollection: true }).areEqual(new Point(1, 2), { x: 1, y: 2 })).toBe(true);
    });

    it("compares error name and message", () => {
      expect(areEqual(new Error("a"), new Error("a"))).toBe(true);
      expect(areEqual(new Error("a"), new Error("b"))).toBe(false);
      expect(areEqual(new TypeError("a"), new Error("a"))).toBe(false);
    });

    it("compares functions by reference", () => {
      const f = () => 1;
      const g = () => 1;
      expect(areEqual(f, f)).toBe(true);
      expect(areEqual(f, g)).toBe(false);
    });

    it("uses an equals method when the other value is the same class", () => {
      expect(areEqual(new Money(100, "a"), new Money(100, "b"))).toBe(true);
      expect(areEqual(new Money(100, "a"), new Money(200, "a"))).toBe(false);
    });
  });

  describe("structural equality", () => {
    it("applies when both sides are structurally equatable", () => {
      expect(areEqual(new Lenient(1), new Lenient(2))).toBe(true);
      expect(areEqual(new Picky(), new Picky())).toBe(false);
    });

    it("accepts if either side accepts", () => {
      expect(areEqual(new Lenient(1), new Picky())).toBe(true);
      expect(areEqual(new Picky(), new Lenient(1))).toBe(true);
    });

    it("leaves a one-sided pair to the rest of the chain", () => {
      expect(areEqual(new Lenient(1), {})).toBe(false);
      expect(areEqual({ value: 1 }, new Lenient(1))).toBe(false);
    });

    it("is skipped at the top level when comparing as collection", () => {
      const comparer = new EqualityComparer({ compareAsCollection: true });
      expect(comparer.areEqual(new Lenient(1), new Lenient(2))).toBe(false);
      expect(comparer.areEqual(new Lenient(1), new Lenient(1))).toBe(true);
    });
  });

  describe("external comparers", () => {
    it("are consulted before the chain", () => {
      const comparer = new EqualityComparer({
        externalComparers: [(x, y) => (typeof x === "string" && typeof y === "string" ? x.trim() === y.trim() : undefined)],
      });
      expect(comparer.areEqual(" a ", "a")).toBe(true);
      expect(comparer.areEqual(1, 1)).toBe(true);
    });
  });
});

describe("ComparisonAdapter", () => {
  const adapter = new ComparisonAdapter();

  it("orders numbers, strings and dates", () => {
    expect(adapter.compare(1, 2)).toBe(-1);
    expect(adapter.compare(3n, 2)).toBe(1);
    expect(adapter.compare("b", "a")).toBe(1);
    expect(adapter.compare(new Date(5), new Date(5))).toBe(0);
  });

  it("rejects values without an ordering", () => {
    expect(() => adapter.compare({}, {})).toThrow(ConfigurationError);
  });

  it("orders NaN below every other number", () => {
    expect(adapter.compare(Number.NaN, 1)).toBe(-1);
    expect(adapter.compare(Number.NEGATIVE_INFINITY, Number.NaN)).toBe(1);
    expect(adapter.compare(Number.NaN, Number.NaN)).toBe(0);
    expect(adapter.compare(Number.NaN, 1n)).toBe(-1);
  });

  it("orders bigints and whole numbers exactly", () => {
    expect(adapter.compare(2n ** 53n + 1n, 2 ** 53)).toBe(1);
    expect(adapter.compare(2 ** 53, 2n ** 53n + 1n)).toBe(-1);
    expect(adapter.compare(2n, 2.5)).toBe(-1);
  });

  it("defers to a supplied ordering", () => {
    const byLength = new ComparisonAdapter((x, y) => String(x).length - String(y).length);
    expect(byLength.compare("aaa", "b")).toBe(2);
  });
});
