import type { OrderingComparer } from '../equality/chain.js';
import { ComparisonAdapter } from '../equality/equality-comparer.js';
import { ConfigurationError } from '../errors.js';
import { defaultValueFormatter } from '../format/value.js';
import { Tolerance, type ToleranceRange } from '../tolerance/tolerance.js';
import { Constraint } from './constraint.js';
import { ConstraintResult } from './result.js';

/**
 * Base for ordering constraints. The tolerance widens the expected value
 * before comparing, never the actual one.
 */
export abstract class ComparisonConstraint extends Constraint {
  protected tolerance: Tolerance = Tolerance.exact;
  protected comparer = new ComparisonAdapter();

  constructor(readonly expected: unknown) {
    super();
  }

  within(amount: number | Tolerance): this {
    if (!this.tolerance.isNone) {
      throw new ConfigurationError('Within modifier may appear only once in a constraint expression');
    }
    this.tolerance = amount instanceof Tolerance ? amount : new Tolerance(amount);
    return this.modified();
  }

  get percent(): this {
    this.tolerance = this.tolerance.percent;
    return this.modified();
  }

  using(ordering: OrderingComparer): this {
    this.comparer = new ComparisonAdapter(ordering);
    return this.modified();
  }

  protected abstract readonly comparisonText: string;

  protected abstract performComparison(actual: unknown, bounds: ToleranceRange<unknown>): boolean;

  protected describe(): string {
    const text = `${this.comparisonText} ${defaultValueFormatter(this.expected)}`;
    return this.tolerance.isNone ? text : `${text} ${this.tolerance}`;
  }

  applyTo(actual: unknown): ConstraintResult {
    if (actual === null || actual === undefined) {
      return new ConstraintResult(this, actual, false);
    }
    const bounds = this.tolerance.applyTo(this.expected);
    return new ConstraintResult(this, actual, this.performComparison(actual, bounds));
  }
}

export class GreaterThanConstraint extends ComparisonConstraint {
  protected readonly comparisonText = 'greater than';

  protected performComparison(actual: unknown, bounds: ToleranceRange<unknown>): boolean {
    return this.comparer.compare(actual, bounds.lowerBound) > 0;
  }
}

export class GreaterThanOrEqualConstraint extends ComparisonConstraint {
  protected readonly comparisonText = 'greater than or equal to';

  protected performComparison(actual: unknown, bounds: ToleranceRange<unknown>): boolean {
    return this.comparer.compare(actual, bounds.lowerBound) >= 0;
  }
}

export class LessThanConstraint extends ComparisonConstraint {
  protected readonly comparisonText = 'less than';

  protected performComparison(actual: unknown, bounds: ToleranceRange<unknown>): boolean {
    return this.comparer.compare(actual, bounds.upperBound) < 0;
  }
}

export class LessThanOrEqualConstraint extends ComparisonConstraint {
  protected readonly comparisonText = 'less than or equal to';

  protected performComparison(actual: unknown, bounds: ToleranceRange<unknown>): boolean {
    return this.comparer.compare(actual, bounds.upperBound) <= 0;
  }
}

/**
 * Inclusive range check.
 */
export class RangeConstraint extends Constraint {
  private comparer = new ComparisonAdapter();

  constructor(
    readonly from: unknown,
    readonly to: unknown
  ) {
    super();
    if (this.comparer.compare(from, to) > 0) {
      throw new ConfigurationError(
        `The from value ${defaultValueFormatter(from)} must be less than or equal to the to value ${defaultValueFormatter(to)}`
      );
    }
  }

  using(ordering: OrderingComparer): this {
    this.comparer = new ComparisonAdapter(ordering);
    return this.modified();
  }

  protected describe(): string {
    return `in range (${defaultValueFormatter(this.from)},${defaultValueFormatter(this.to)})`;
  }

  applyTo(actual: unknown): ConstraintResult {
    if (actual === null || actual === undefined) {
      return new ConstraintResult(this, actual, false);
    }
    const inRange =
      this.comparer.compare(this.from, actual) <= 0 && this.comparer.compare(actual, this.to) <= 0;
    return new ConstraintResult(this, actual, inRange);
  }
}
