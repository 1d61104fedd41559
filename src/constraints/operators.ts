import { ConfigurationError } from '../errors.js';
import type { AttributeType } from '../metadata/attributes.js';
import { AndConstraint, OrConstraint } from './binary.js';
import type { Constraint } from './constraint.js';
import {
  AllItemsConstraint,
  AttributeConstraint,
  AttributeExistsConstraint,
  NoItemConstraint,
  NotConstraint,
  PropertyConstraint,
  PropertyExistsConstraint,
  SomeItemsConstraint,
  requireAttributeType,
} from './prefix.js';

export type ExpressionElement = Constraint | ConstraintOperator;

export function popConstraint(stack: Constraint[]): Constraint {
  const top = stack.pop();
  if (!top) {
    throw new ConfigurationError('Constraint expression is missing an operand');
  }
  return top;
}

/**
 * An operator in a fluent constraint expression. Precedence numbers are
 * inverted: the lower the number, the tighter the binding.
 */
export abstract class ConstraintOperator {
  protected leftPrecedenceValue = 0;
  protected rightPrecedenceValue = 0;

  /** The element preceding this operator in the expression. */
  leftContext: ExpressionElement | undefined;
  /** The element following this operator, once known. */
  rightContext: ExpressionElement | undefined;

  /** Precedence when this operator is being compared with the one to its left. */
  get leftPrecedence(): number {
    return this.leftPrecedenceValue;
  }

  /** Precedence when an operator to the right is being compared with this one. */
  get rightPrecedence(): number {
    return this.rightPrecedenceValue;
  }

  abstract reduce(stack: Constraint[]): void;
}

export abstract class PrefixOperator extends ConstraintOperator {
  reduce(stack: Constraint[]): void {
    stack.push(this.applyPrefix(popConstraint(stack)));
  }

  abstract applyPrefix(constraint: Constraint): Constraint;
}

export class NotOperator extends PrefixOperator {
  constructor() {
    super();
    this.leftPrecedenceValue = this.rightPrecedenceValue = 1;
  }

  applyPrefix(constraint: Constraint): Constraint {
    return new NotConstraint(constraint);
  }
}

/**
 * Collection operators bind loosely to their right so that the whole
 * following expression applies to each item.
 */
export abstract class CollectionOperator extends PrefixOperator {
  constructor() {
    super();
    this.leftPrecedenceValue = 1;
    this.rightPrecedenceValue = 10;
  }
}

export class AllOperator extends CollectionOperator {
  applyPrefix(constraint: Constraint): Constraint {
    return new AllItemsConstraint(constraint);
  }
}

export class SomeOperator extends CollectionOperator {
  applyPrefix(constraint: Constraint): Constraint {
    return new SomeItemsConstraint(constraint);
  }
}

export class NoneOperator extends CollectionOperator {
  applyPrefix(constraint: Constraint): Constraint {
    return new NoItemConstraint(constraint);
  }
}

/**
 * An operator that yields a constraint on its own when nothing follows it.
 */
export abstract class SelfResolvingOperator extends ConstraintOperator {
  protected endsExpression(): boolean {
    return this.rightContext === undefined || this.rightContext instanceof BinaryOperator;
  }
}

export class PropertyOperator extends SelfResolvingOperator {
  constructor(readonly name: string) {
    super();
    this.leftPrecedenceValue = this.rightPrecedenceValue = 1;
  }

  reduce(stack: Constraint[]): void {
    stack.push(
      this.endsExpression()
        ? new PropertyExistsConstraint(this.name)
        : new PropertyConstraint(this.name, popConstraint(stack))
    );
  }
}

export class AttributeOperator extends SelfResolvingOperator {
  readonly type: AttributeType;

  constructor(type: AttributeType) {
    super();
    this.type = requireAttributeType(type);
    this.leftPrecedenceValue = this.rightPrecedenceValue = 1;
  }

  reduce(stack: Constraint[]): void {
    stack.push(
      this.endsExpression()
        ? new AttributeExistsConstraint(this.type)
        : new AttributeConstraint(this.type, popConstraint(stack))
    );
  }
}

export abstract class BinaryOperator extends ConstraintOperator {
  // Followed by a collection operator, the binary operator must wait for the
  // whole collection expression on its right.
  get leftPrecedence(): number {
    return this.rightContext instanceof CollectionOperator ? super.leftPrecedence + 10 : super.leftPrecedence;
  }

  get rightPrecedence(): number {
    return this.rightContext instanceof CollectionOperator ? super.rightPrecedence + 10 : super.rightPrecedence;
  }

  reduce(stack: Constraint[]): void {
    const right = popConstraint(stack);
    const left = popConstraint(stack);
    stack.push(this.applyOperator(left, right));
  }

  abstract applyOperator(left: Constraint, right: Constraint): Constraint;
}

export class AndOperator extends BinaryOperator {
  constructor() {
    super();
    this.leftPrecedenceValue = this.rightPrecedenceValue = 2;
  }

  applyOperator(left: Constraint, right: Constraint): Constraint {
    return new AndConstraint(left, right);
  }
}

export class OrOperator extends BinaryOperator {
  constructor() {
    super();
    this.leftPrecedenceValue = this.rightPrecedenceValue = 3;
  }

  applyOperator(left: Constraint, right: Constraint): Constraint {
    return new OrConstraint(left, right);
  }
}
