import type { ExternalComparer } from '../equality/chain.js';
import { isEnumerable } from '../equality/comparers/enumerable.js';
import { EqualityComparer } from '../equality/equality-comparer.js';
import { ConfigurationError } from '../errors.js';
import { defaultValueFormatter } from '../format/value.js';
import { Tolerance } from '../tolerance/tolerance.js';
import { Constraint, type EvaluationEnvironment } from './constraint.js';
import { ConstraintResult } from './result.js';

/**
 * Base for constraints that test membership with the equality comparer.
 */
abstract class MembershipConstraint extends Constraint {
  protected caseInsensitive = false;
  protected readonly externalComparers: ExternalComparer[] = [];

  get ignoreCase(): this {
    this.caseInsensitive = true;
    return this.modified();
  }

  using(comparer: ExternalComparer): this {
    this.externalComparers.push(comparer);
    return this.modified();
  }

  protected createComparer(env?: EvaluationEnvironment): EqualityComparer {
    return new EqualityComparer({
      ignoreCase: this.caseInsensitive,
      externalComparers: this.externalComparers,
      defaultTolerance: env?.defaultTolerance,
    });
  }
}

/**
 * The actual collection holds at least one item equal to the expected one.
 */
export class CollectionContainsConstraint extends MembershipConstraint {
  constructor(readonly expected: unknown) {
    super();
  }

  protected describe(): string {
    return `collection containing ${defaultValueFormatter(this.expected)}`;
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    if (typeof actual === 'string' || !isEnumerable(actual)) {
      throw new ConfigurationError(
        `The actual value must be a collection, got ${defaultValueFormatter(actual)}`
      );
    }
    const comparer = this.createComparer(env);
    const items = actual instanceof Map ? actual.values() : actual;
    for (const item of items) {
      if (comparer.areEqual(item, this.expected, Tolerance.default)) {
        return new ConstraintResult(this, actual, true);
      }
    }
    return new ConstraintResult(this, actual, false);
  }
}

/**
 * The actual value equals one of the expected values.
 */
export class AnyOfConstraint extends MembershipConstraint {
  constructor(readonly expected: readonly unknown[]) {
    super();
    if (expected.length === 0) {
      throw new ConfigurationError('AnyOf requires at least one expected value');
    }
  }

  protected describe(): string {
    return `any of ${defaultValueFormatter(this.expected)}`;
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const comparer = this.createComparer(env);
    const found = this.expected.some((candidate) => comparer.areEqual(actual, candidate));
    return new ConstraintResult(this, actual, found);
  }
}

export class EmptyConstraint extends Constraint {
  protected describe(): string {
    return '<empty>';
  }

  applyTo(actual: unknown): ConstraintResult {
    return new ConstraintResult(this, actual, isEmpty(actual));
  }
}

function isEmpty(actual: unknown): boolean {
  if (typeof actual === 'string') return actual.length === 0;
  if (actual instanceof Map || actual instanceof Set) return actual.size === 0;
  if (Array.isArray(actual)) return actual.length === 0;
  if (isEnumerable(actual)) return actual[Symbol.iterator]().next().done === true;
  if (typeof actual === 'object' && actual !== null) return Object.keys(actual).length === 0;
  throw new ConfigurationError(
    `The actual value must be a string, collection or object, got ${defaultValueFormatter(actual)}`
  );
}
