import { describe, it, expect } from "vitest";
import { Tolerance } from "../tolerance/tolerance.js";
import type { Case, CaseFile } from "../types/index.js";
import { mergeCaseSettings, toTolerance } from "./merge.js";

const file = (overrides: Partial<CaseFile> = {}): CaseFile => ({
  version: "1",
  name: "file",
  cases: [],
  ...overrides,
});

const testCase = (overrides: Partial<Case> = {}): Case => ({
  name: "case",
  actual: 1,
  expect: { equal_to: 1 },
  ...overrides,
});

describe("mergeCaseSettings", () => {
  describe("tolerance inheritance", () => {
    it("defaults to the no-tolerance marker", () => {
      const result = mergeCaseSettings(undefined, undefined, undefined);
      expect(result.tolerance).toBe(Tolerance.default);
    });

    it("uses config tolerance when no overrides", () => {
      const result = mergeCaseSettings(
        { version: "1.0", tolerance: { amount: 0.5, mode: "linear" } },
        file(),
        testCase()
      );
      expect(result.tolerance.equals(Tolerance.linear(0.5))).toBe(true);
    });

    it("file level overrides config level", () => {
      const result = mergeCaseSettings(
        { version: "1.0", tolerance: { amount: 0.5, mode: "linear" } },
        file({ tolerance: { amount: 2, mode: "percent" } }),
        testCase()
      );
      expect(result.tolerance.equals(Tolerance.percent(2))).toBe(true);
    });

    it("case level overrides file level", () => {
      const result = mergeCaseSettings(
        undefined,
        file({ tolerance: { amount: 2, mode: "percent" } }),
        testCase({ tolerance: { amount: 4, mode: "ulps" } })
      );
      expect(result.tolerance.equals(Tolerance.ulps(4))).toBe(true);
    });
  });

  describe("format inheritance", () => {
    it("overrides field by field", () => {
      const result = mergeCaseSettings(
        { version: "1.0", format: { max_string_length: 40, max_items: 5 } },
        file({ format: { max_items: 3 } }),
        undefined
      );
      expect(result.format).toEqual({ maxStringLength: 40, maxItems: 3 });
    });

    it("is empty when nothing is set", () => {
      expect(mergeCaseSettings(undefined, undefined, undefined).format).toEqual({});
    });
  });
});

describe("toTolerance", () => {
  it("maps each mode", () => {
    expect(toTolerance({ amount: 1, mode: "linear" }).mode).toBe("linear");
    expect(toTolerance({ amount: 1, mode: "percent" }).mode).toBe("percent");
    expect(toTolerance({ amount: 1, mode: "ulps" }).mode).toBe("ulps");
  });
});
