import { describe, it, expect } from "vitest";
import { tuple } from "../equality/tuple.js";
import { clip, createValueFormatter, defaultValueFormatter } from "./value.js";

class Point {
  x = 1;
  y = 2;
}

describe("defaultValueFormatter", () => {
  it("formats primitives", () => {
    expect(defaultValueFormatter("abc")).toBe('"abc"');
    expect(defaultValueFormatter(10n)).toBe("10n");
    expect(defaultValueFormatter(-0)).toBe("-0");
    expect(defaultValueFormatter(null)).toBe("null");
    expect(defaultValueFormatter(undefined)).toBe("undefined");
    expect(defaultValueFormatter(function named() {})).toBe("[Function named]");
  });

  it("formats dates, errors and regular expressions", () => {
    expect(defaultValueFormatter(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
    expect(defaultValueFormatter(new Date(Number.NaN))).toBe("Invalid Date");
    expect(defaultValueFormatter(new TypeError("bad"))).toBe("TypeError: bad");
    expect(defaultValueFormatter(/a+/g)).toBe("/a+/g");
  });

  it("formats collections", () => {
    expect(defaultValueFormatter([1, "a"])).toBe('[1, "a"]');
    expect(defaultValueFormatter(new Set([1, 2]))).toBe("Set {1, 2}");
    expect(defaultValueFormatter(new Map([["a", 1]]))).toBe('Map {"a" => 1}');
    expect(defaultValueFormatter(new Uint8Array([1, 2]))).toBe("Uint8Array [1, 2]");
    expect(defaultValueFormatter(tuple(1, "a"))).toBe('(1, "a")');
  });

  it("formats objects with their class name", () => {
    expect(defaultValueFormatter({})).toBe("{}");
    expect(defaultValueFormatter({ a: 1 })).toBe("{ a: 1 }");
    expect(defaultValueFormatter(new Point())).toBe("Point { x: 1, y: 2 }");
  });

  it("marks circular references", () => {
    const node: { self?: unknown } = {};
    node.self = node;
    expect(defaultValueFormatter(node)).toBe("{ self: [Circular] }");
  });

  it("prints a repeated, non-circular reference in full", () => {
    const shared = { a: 1 };
    expect(defaultValueFormatter([shared, shared])).toBe("[{ a: 1 }, { a: 1 }]");
  });

  it("stops at the maximum depth", () => {
    expect(defaultValueFormatter([1, [2, [3, [4]]]])).toBe("[1, [2, [3, [Array]]]]");
  });
});

describe("createValueFormatter", () => {
  it("clips long strings", () => {
    expect(createValueFormatter({ maxStringLength: 3 })("abcdef")).toBe('"abc..."');
  });

  it("elides items past the limit", () => {
    expect(createValueFormatter({ maxItems: 2 })([1, 2, 3])).toBe("[1, 2, ...]");
  });
});

describe("clip", () => {
  it("leaves short text alone", () => {
    expect(clip("abc", 3)).toBe("abc");
    expect(clip("abcd", 3)).toBe("abc...");
  });
});
