import { ConfigurationError } from '../errors.js';
import type { Tolerance } from '../tolerance/tolerance.js';
import type { ConstraintBuilder } from './builder.js';
import type { ConstraintExpression } from './expression.js';
import type { ConstraintResult } from './result.js';

/** Ambient settings a constraint may consult while evaluating. */
export interface EvaluationEnvironment {
  /** Replaces `Tolerance.default` when comparing non-integral numbers. */
  defaultTolerance?: Tolerance;
}

export interface Resolvable {
  resolve(): Constraint;
}

type Continuation = (constraint: Constraint, operator: 'and' | 'or') => ConstraintExpression;

let continuation: Continuation | undefined;

/**
 * Installed by the expression module so that `constraint.and` / `constraint.or`
 * can continue a fluent expression without this module depending on every
 * constraint class.
 */
export function setContinuation(fn: Continuation): void {
  continuation = fn;
}

export abstract class Constraint implements Resolvable {
  /** Set when the constraint was appended to a fluent expression. */
  builder: ConstraintBuilder | undefined;

  private cachedDescription: string | undefined;

  get displayName(): string {
    const name = this.constructor.name;
    return name.endsWith('Constraint') ? name.slice(0, -'Constraint'.length) : name;
  }

  /** Computed on first access, then reused. */
  get description(): string {
    if (this.cachedDescription === undefined) {
      this.cachedDescription = this.describe();
    }
    return this.cachedDescription;
  }

  protected abstract describe(): string;

  /** Modifiers end with this so the next read of `description` sees them. */
  protected modified(): this {
    this.cachedDescription = undefined;
    return this;
  }

  abstract applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult;

  get and(): ConstraintExpression {
    return this.continueWith('and');
  }

  get or(): ConstraintExpression {
    return this.continueWith('or');
  }

  private continueWith(operator: 'and' | 'or'): ConstraintExpression {
    if (!continuation) {
      throw new ConfigurationError(
        `Cannot continue an expression with "${operator}": the fluent syntax module is not loaded`
      );
    }
    return continuation(this, operator);
  }

  resolve(): Constraint {
    return this.builder ? this.builder.resolve() : this;
  }

  toString(): string {
    return `<${this.displayName.toLowerCase()} ${this.description}>`;
  }
}
