import type { AttributeType } from '../metadata/attributes.js';
import { ConstraintExpression } from './expression.js';

const start = (): ConstraintExpression => new ConstraintExpression();

type Ctor = abstract new (...args: never[]) => unknown;

/** Entry point for most constraints: `Is.equalTo(5)`, `Is.not.null`. */
export const Is = {
  get not() {
    return start().not;
  },
  get all() {
    return start().all;
  },
  get null() {
    return start().null;
  },
  get undefined() {
    return start().undefined;
  },
  get true() {
    return start().true;
  },
  get false() {
    return start().false;
  },
  get empty() {
    return start().empty;
  },
  equalTo: (expected: unknown) => start().equalTo(expected),
  greaterThan: (expected: unknown) => start().greaterThan(expected),
  greaterThanOrEqualTo: (expected: unknown) => start().greaterThanOrEqualTo(expected),
  lessThan: (expected: unknown) => start().lessThan(expected),
  lessThanOrEqualTo: (expected: unknown) => start().lessThanOrEqualTo(expected),
  inRange: (from: unknown, to: unknown) => start().inRange(from, to),
  samePath: (expected: string) => start().samePath(expected),
  subPathOf: (expected: string) => start().subPathOf(expected),
  anyOf: (...expected: unknown[]) => start().anyOf(...expected),
  sameAs: (expected: unknown) => start().sameAs(expected),
  instanceOf: (type: Ctor) => start().instanceOf(type),
};

/** Entry point for constraints on members: `Has.property('name')`, `Has.some`. */
export const Has = {
  get no() {
    return start().none;
  },
  get all() {
    return start().all;
  },
  get some() {
    return start().some;
  },
  get none() {
    return start().none;
  },
  property: (name: string) => start().property(name),
  attribute: (type: AttributeType) => start().attribute(type),
  member: (expected: unknown) => start().member(expected),
};

/** Entry point for string constraints: `Does.startWith('a')`. */
export const Does = {
  get not() {
    return start().not;
  },
  startWith: (expected: string) => start().startsWith(expected),
  endWith: (expected: string) => start().endsWith(expected),
  contain: (expected: string) => start().containsSubstring(expected),
  match: (pattern: string | RegExp) => start().matches(pattern),
};

export const Contains = {
  item: (expected: unknown) => start().member(expected),
  substring: (expected: string) => start().containsSubstring(expected),
};
