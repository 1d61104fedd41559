import { Constraint, type EvaluationEnvironment } from './constraint.js';
import type { MessageWriter } from './message-writer.js';
import { ConstraintResult } from './result.js';

export abstract class BinaryConstraint extends Constraint {
  constructor(
    readonly left: Constraint,
    readonly right: Constraint
  ) {
    super();
  }
}

/**
 * Both sides must succeed. The right side is not evaluated when the left fails.
 */
export class AndConstraint extends BinaryConstraint {
  protected describe(): string {
    return `${this.left.description} and ${this.right.description}`;
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const leftResult = this.left.applyTo(actual, env);
    if (!leftResult.isSuccess) {
      return new AndConstraintResult(this, actual, leftResult);
    }
    const rightResult = this.right.applyTo(actual, env);
    return new AndConstraintResult(this, actual, rightResult.isSuccess ? undefined : rightResult);
  }
}

class AndConstraintResult extends ConstraintResult {
  constructor(
    constraint: AndConstraint,
    actual: unknown,
    private readonly failed: ConstraintResult | undefined
  ) {
    super(constraint, actual, failed === undefined);
  }

  writeActualValueTo(writer: MessageWriter): void {
    if (this.failed) {
      this.failed.writeActualValueTo(writer);
    } else {
      super.writeActualValueTo(writer);
    }
  }

  writeAdditionalLinesTo(writer: MessageWriter): void {
    if (!this.failed) return;
    writer.writeLine(`Failed: ${this.failed.description}`);
    this.failed.writeAdditionalLinesTo(writer);
  }
}

/**
 * Either side may succeed. The right side is not evaluated when the left
 * succeeds; on failure the left side's detail is reported.
 */
export class OrConstraint extends BinaryConstraint {
  protected describe(): string {
    return `${this.left.description} or ${this.right.description}`;
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const leftResult = this.left.applyTo(actual, env);
    if (leftResult.isSuccess) {
      return new OrConstraintResult(this, actual, true, leftResult);
    }
    const rightResult = this.right.applyTo(actual, env);
    return new OrConstraintResult(this, actual, rightResult.isSuccess, leftResult);
  }
}

class OrConstraintResult extends ConstraintResult {
  constructor(
    constraint: OrConstraint,
    actual: unknown,
    isSuccess: boolean,
    private readonly leftResult: ConstraintResult
  ) {
    super(constraint, actual, isSuccess);
  }

  writeActualValueTo(writer: MessageWriter): void {
    this.leftResult.writeActualValueTo(writer);
  }

  writeAdditionalLinesTo(writer: MessageWriter): void {
    if (!this.isSuccess) this.leftResult.writeAdditionalLinesTo(writer);
  }
}
