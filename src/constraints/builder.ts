import { ConfigurationError } from '../errors.js';
import { Constraint } from './constraint.js';
import {
  SelfResolvingOperator,
  popConstraint,
  type ConstraintOperator,
  type ExpressionElement,
} from './operators.js';

/**
 * Assembles constraints and operators, appended left to right, into a single
 * constraint tree by operator precedence.
 */
export class ConstraintBuilder {
  private readonly ops: ConstraintOperator[] = [];
  private readonly constraints: Constraint[] = [];
  private lastPushed: ExpressionElement | undefined;
  private resolved: Constraint | undefined;

  append(element: ExpressionElement): void {
    this.resolved = undefined;
    if (element instanceof Constraint) {
      this.appendConstraint(element);
    } else {
      this.appendOperator(element);
    }
  }

  private appendOperator(op: ConstraintOperator): void {
    op.leftContext = this.lastPushed;
    if (this.lastPushed !== undefined && !(this.lastPushed instanceof Constraint)) {
      this.setTopOperatorRightContext(op);
    }

    // Anything already stacked that binds tighter than the new operator can be
    // combined now.
    this.reduceOperatorStack(op.leftPrecedence);

    this.ops.push(op);
    this.lastPushed = op;
  }

  private appendConstraint(constraint: Constraint): void {
    if (this.lastPushed !== undefined && !(this.lastPushed instanceof Constraint)) {
      this.setTopOperatorRightContext(constraint);
    }
    this.constraints.push(constraint);
    this.lastPushed = constraint;
    constraint.builder = this;
  }

  private setTopOperatorRightContext(rightContext: ExpressionElement): void {
    const top = this.ops.at(-1);
    if (!top) return;

    const oldPrecedence = top.leftPrecedence;
    top.rightContext = rightContext;

    // If the precedence increased, the region of the stack below the operator
    // may now be reducible.
    if (top.leftPrecedence > oldPrecedence) {
      this.ops.pop();
      this.reduceOperatorStack(top.leftPrecedence);
      this.ops.push(top);
    }
  }

  private reduceOperatorStack(targetPrecedence: number): void {
    for (let top = this.ops.at(-1); top && top.rightPrecedence < targetPrecedence; top = this.ops.at(-1)) {
      this.ops.pop();
      top.reduce(this.constraints);
    }
  }

  get isResolvable(): boolean {
    return this.lastPushed instanceof Constraint || this.lastPushed instanceof SelfResolvingOperator;
  }

  resolve(): Constraint {
    if (this.resolved) return this.resolved;
    if (!this.isResolvable) {
      throw new ConfigurationError('A partial expression may not be resolved');
    }

    const ops = [...this.ops];
    const stack = [...this.constraints];
    for (let op = ops.pop(); op; op = ops.pop()) {
      op.reduce(stack);
    }
    const result = popConstraint(stack);
    if (stack.length > 0) {
      throw new ConfigurationError('Constraint expression has unconsumed operands');
    }
    this.resolved = result;
    return result;
  }
}
