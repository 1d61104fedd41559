import { describe, it, expect } from "vitest";
import { Attribute, annotate, getAttributes, isAttributeType } from "./attributes.js";

class Owner extends Attribute {
  constructor(readonly name: string) {
    super();
  }
}

class Reviewer extends Owner {}

class Category extends Attribute {}

class Base {}
annotate(Base, new Owner("base"));

class Derived extends Base {}
annotate(Derived, new Owner("derived"), new Category());

const names = (owners: Owner[]) => owners.map((owner) => owner.name);

describe("attributes", () => {
  it("returns the target from annotate", () => {
    const target = {};
    expect(annotate(target, new Category())).toBe(target);
  });

  it("finds attributes on a class and its parents, own first", () => {
    expect(names(getAttributes(Derived, Owner))).toEqual(["derived", "base"]);
    expect(names(getAttributes(Base, Owner))).toEqual(["base"]);
  });

  it("finds class attributes through an instance", () => {
    expect(names(getAttributes(new Derived(), Owner))).toEqual(["derived", "base"]);
    expect(getAttributes(new Derived(), Category)).toHaveLength(1);
  });

  it("matches subclasses of the requested type", () => {
    const target = annotate({}, new Reviewer("r"));
    expect(names(getAttributes(target, Owner))).toEqual(["r"]);
    expect(getAttributes(target, Category)).toEqual([]);
  });

  it("recognises attribute types", () => {
    expect(isAttributeType(Owner)).toBe(true);
    expect(isAttributeType(Reviewer)).toBe(true);
    expect(isAttributeType(Base)).toBe(false);
    expect(isAttributeType("Owner")).toBe(false);
  });
});
