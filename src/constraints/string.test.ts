import { describe, it, expect } from "vitest";
import { parsePattern } from "./string.js";
import { Contains, Does, Is } from "./syntax.js";

describe("string constraints", () => {
  it("match prefixes, suffixes and substrings", () => {
    expect(Does.startWith("ab").applyTo("abc").isSuccess).toBe(true);
    expect(Does.endWith("bc").applyTo("abc").isSuccess).toBe(true);
    expect(Does.contain("b").applyTo("abc").isSuccess).toBe(true);
    expect(Contains.substring("x").applyTo("abc").isSuccess).toBe(false);
  });

  it("ignore case on request", () => {
    const constraint = Does.startWith("AB").ignoreCase;
    expect(constraint.applyTo("abc").isSuccess).toBe(true);
    expect(constraint.description).toBe('String starting with "AB", ignoring case');
    expect(Does.startWith("AB").applyTo("abc").isSuccess).toBe(false);
  });

  it("describe ignoreCase added after the description was read", () => {
    const constraint = Does.contain("b");
    expect(constraint.description).toBe('String containing "b"');
    expect(constraint.ignoreCase.description).toBe('String containing "b", ignoring case');
  });

  it("fail for non-string actual values", () => {
    expect(Does.contain("1").applyTo(123).isSuccess).toBe(false);
    expect(Does.endWith("").applyTo(null).isSuccess).toBe(false);
  });

  it("describe themselves", () => {
    expect(Does.endWith("a").description).toBe('String ending with "a"');
    expect(Does.contain("a").description).toBe('String containing "a"');
  });

  describe("RegexConstraint", () => {
    it("accepts a /pattern/flags string", () => {
      const constraint = Does.match("/^a.c$/i");
      expect(constraint.applyTo("AbC").isSuccess).toBe(true);
      expect(constraint.description).toBe("String matching /^a.c$/i");
    });

    it("accepts a RegExp and ignores case on request", () => {
      expect(Does.match(/^abc$/).ignoreCase.applyTo("ABC").isSuccess).toBe(true);
      expect(Does.match(/^abc$/).applyTo("ABC").isSuccess).toBe(false);
    });

    it("is unaffected by a global flag's last index", () => {
      const constraint = Does.match(/a/g);
      expect(constraint.applyTo("a").isSuccess).toBe(true);
      expect(constraint.applyTo("a").isSuccess).toBe(true);
    });
  });

  describe("parsePattern", () => {
    it("treats a bare string as the pattern source", () => {
      expect(parsePattern("a+b").source).toBe("a+b");
      expect(parsePattern("a+b").flags).toBe("");
    });
  });
});

describe("path constraints", () => {
  it("compare canonical paths", () => {
    const constraint = Is.samePath("a/b/../c").respectCase;
    expect(constraint.applyTo("a\\c").isSuccess).toBe(true);
    expect(constraint.applyTo("a/c/").isSuccess).toBe(true);
    expect(constraint.description).toBe('Path matching "a/b/../c"');
  });

  it("respect or ignore case on request", () => {
    expect(Is.samePath("/A/B").ignoreCase.applyTo("/a/b/").isSuccess).toBe(true);
    expect(Is.samePath("/A").respectCase.applyTo("/a").isSuccess).toBe(false);
  });

  it("accept only strict children as subpaths", () => {
    const constraint = Is.subPathOf("/usr").respectCase;
    expect(constraint.applyTo("/usr/lib").isSuccess).toBe(true);
    expect(constraint.applyTo("/usr/./lib/..").isSuccess).toBe(false);
    expect(constraint.applyTo("/usrlib").isSuccess).toBe(false);
    expect(constraint.description).toBe('Subpath of "/usr"');
  });

  it("fail for non-string actual values", () => {
    expect(Is.samePath("a").applyTo(1).isSuccess).toBe(false);
  });
});
