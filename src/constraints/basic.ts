import { defaultValueFormatter } from '../format/value.js';
import { Constraint } from './constraint.js';
import { ConstraintResult } from './result.js';

export class NullConstraint extends Constraint {
  protected describe(): string {
    return 'null';
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, actual === null);
  }
}

export class UndefinedConstraint extends Constraint {
  protected describe(): string {
    return 'undefined';
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, actual === undefined);
  }
}

export class TrueConstraint extends Constraint {
  protected describe(): string {
    return 'true';
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, actual === true);
  }
}

export class FalseConstraint extends Constraint {
  protected describe(): string {
    return 'false';
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, actual === false);
  }
}

/** Reference identity. */
export class SameAsConstraint extends Constraint {
  constructor(readonly expected: unknown) {
    super();
  }

  protected describe(): string {
    return `same as ${defaultValueFormatter(this.expected)}`;
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, Object.is(actual, this.expected));
  }
}

export class InstanceOfConstraint extends Constraint {
  constructor(readonly expectedType: abstract new (...args: never[]) => unknown) {
    super();
  }

  protected describe(): string {
    return `instance of <${this.expectedType.name}>`;
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, actual instanceof this.expectedType);
  }
}
