import type { AttributeType } from '../metadata/attributes.js';
import { NullConstraint, UndefinedConstraint, TrueConstraint, FalseConstraint, SameAsConstraint, InstanceOfConstraint } from './basic.js';
import { ConstraintBuilder } from './builder.js';
import { AnyOfConstraint, CollectionContainsConstraint, EmptyConstraint } from './collection.js';
import {
  GreaterThanConstraint,
  GreaterThanOrEqualConstraint,
  LessThanConstraint,
  LessThanOrEqualConstraint,
  RangeConstraint,
} from './comparison.js';
import { setContinuation, type Constraint, type Resolvable } from './constraint.js';
import { EqualConstraint } from './equal.js';
import {
  AllOperator,
  AndOperator,
  AttributeOperator,
  NoneOperator,
  NotOperator,
  OrOperator,
  PropertyOperator,
  SomeOperator,
  type ConstraintOperator,
} from './operators.js';
import { SamePathConstraint, SubPathConstraint } from './path.js';
import { EndsWithConstraint, RegexConstraint, StartsWithConstraint, SubstringConstraint } from './string.js';

/**
 * A fluent, partially built constraint. Operators return the expression so the
 * chain can continue; leaf methods return the appended constraint so its
 * modifiers (`within`, `ignoreCase`, ...) stay reachable.
 */
export class ConstraintExpression implements Resolvable {
  constructor(readonly builder: ConstraintBuilder = new ConstraintBuilder()) {}

  private appendOperator(op: ConstraintOperator): this {
    this.builder.append(op);
    return this;
  }

  append<T extends Constraint>(constraint: T): T {
    this.builder.append(constraint);
    return constraint;
  }

  resolve(): Constraint {
    return this.builder.resolve();
  }

  // Operators

  get not(): ConstraintExpression {
    return this.appendOperator(new NotOperator());
  }

  get all(): ConstraintExpression {
    return this.appendOperator(new AllOperator());
  }

  get some(): ConstraintExpression {
    return this.appendOperator(new SomeOperator());
  }

  get none(): ConstraintExpression {
    return this.appendOperator(new NoneOperator());
  }

  get and(): ConstraintExpression {
    return this.appendOperator(new AndOperator());
  }

  get or(): ConstraintExpression {
    return this.appendOperator(new OrOperator());
  }

  /** Applies what follows to the named property, or checks it exists. */
  property(name: string): ConstraintExpression {
    return this.appendOperator(new PropertyOperator(name));
  }

  attribute(type: AttributeType): ConstraintExpression {
    return this.appendOperator(new AttributeOperator(type));
  }

  // Constraints

  equalTo(expected: unknown): EqualConstraint {
    return this.append(new EqualConstraint(expected));
  }

  greaterThan(expected: unknown): GreaterThanConstraint {
    return this.append(new GreaterThanConstraint(expected));
  }

  greaterThanOrEqualTo(expected: unknown): GreaterThanOrEqualConstraint {
    return this.append(new GreaterThanOrEqualConstraint(expected));
  }

  lessThan(expected: unknown): LessThanConstraint {
    return this.append(new LessThanConstraint(expected));
  }

  lessThanOrEqualTo(expected: unknown): LessThanOrEqualConstraint {
    return this.append(new LessThanOrEqualConstraint(expected));
  }

  inRange(from: unknown, to: unknown): RangeConstraint {
    return this.append(new RangeConstraint(from, to));
  }

  startsWith(expected: string): StartsWithConstraint {
    return this.append(new StartsWithConstraint(expected));
  }

  endsWith(expected: string): EndsWithConstraint {
    return this.append(new EndsWithConstraint(expected));
  }

  containsSubstring(expected: string): SubstringConstraint {
    return this.append(new SubstringConstraint(expected));
  }

  matches(pattern: string | RegExp): RegexConstraint {
    return this.append(new RegexConstraint(pattern));
  }

  samePath(expected: string): SamePathConstraint {
    return this.append(new SamePathConstraint(expected));
  }

  subPathOf(expected: string): SubPathConstraint {
    return this.append(new SubPathConstraint(expected));
  }

  member(expected: unknown): CollectionContainsConstraint {
    return this.append(new CollectionContainsConstraint(expected));
  }

  anyOf(...expected: unknown[]): AnyOfConstraint {
    return this.append(new AnyOfConstraint(expected));
  }

  sameAs(expected: unknown): SameAsConstraint {
    return this.append(new SameAsConstraint(expected));
  }

  instanceOf(type: abstract new (...args: never[]) => unknown): InstanceOfConstraint {
    return this.append(new InstanceOfConstraint(type));
  }

  get empty(): EmptyConstraint {
    return this.append(new EmptyConstraint());
  }

  get null(): NullConstraint {
    return this.append(new NullConstraint());
  }

  get undefined(): UndefinedConstraint {
    return this.append(new UndefinedConstraint());
  }

  get true(): TrueConstraint {
    return this.append(new TrueConstraint());
  }

  get false(): FalseConstraint {
    return this.append(new FalseConstraint());
  }
}

setContinuation((constraint, operator) => {
  const builder = constraint.builder ?? new ConstraintBuilder();
  if (!constraint.builder) builder.append(constraint);
  const expression = new ConstraintExpression(builder);
  return operator === 'and' ? expression.and : expression.or;
});
