import type { ExternalComparer, FailurePoint } from '../equality/chain.js';
import { isEnumerable } from '../equality/comparers/enumerable.js';
import { EqualityComparer } from '../equality/equality-comparer.js';
import { ConfigurationError } from '../errors.js';
import { defaultValueFormatter } from '../format/value.js';
import { Tolerance } from '../tolerance/tolerance.js';
import { Constraint, type EvaluationEnvironment } from './constraint.js';
import type { MessageWriter } from './message-writer.js';
import { ConstraintResult } from './result.js';

/**
 * Deep equality against an expected value, optionally within a tolerance.
 */
export class EqualConstraint extends Constraint {
  private tolerance: Tolerance = Tolerance.default;
  private caseInsensitive = false;
  private compareAsCollection = false;
  private anyOrder = false;
  private readonly externalComparers: ExternalComparer[] = [];

  constructor(readonly expected: unknown) {
    super();
  }

  within(amount: number | Tolerance): this {
    if (!this.tolerance.isDefault) {
      throw new ConfigurationError('Within modifier may appear only once in a constraint expression');
    }
    this.tolerance = amount instanceof Tolerance ? amount : new Tolerance(amount);
    return this.modified();
  }

  get percent(): this {
    this.tolerance = this.tolerance.percent;
    return this.modified();
  }

  get ulps(): this {
    this.tolerance = this.tolerance.ulps;
    return this.modified();
  }

  get milliseconds(): this {
    this.tolerance = this.tolerance.milliseconds;
    return this.modified();
  }

  get seconds(): this {
    this.tolerance = this.tolerance.seconds;
    return this.modified();
  }

  get minutes(): this {
    this.tolerance = this.tolerance.minutes;
    return this.modified();
  }

  get hours(): this {
    this.tolerance = this.tolerance.hours;
    return this.modified();
  }

  get days(): this {
    this.tolerance = this.tolerance.days;
    return this.modified();
  }

  get ignoreCase(): this {
    this.caseInsensitive = true;
    return this.modified();
  }

  get asCollection(): this {
    this.compareAsCollection = true;
    return this.modified();
  }

  get unordered(): this {
    this.anyOrder = true;
    return this.modified();
  }

  using(comparer: ExternalComparer): this {
    this.externalComparers.push(comparer);
    return this.modified();
  }

  protected describe(): string {
    let text = defaultValueFormatter(this.expected);
    if (!this.tolerance.isNone) text += ` ${this.tolerance}`;
    if (this.caseInsensitive) text += ', ignoring case';
    if (this.compareAsCollection) text += ', as collection';
    if (this.anyOrder) text += ', in any order';
    return text;
  }

  applyTo(actual: unknown, env?: EvaluationEnvironment): ConstraintResult {
    const comparer = new EqualityComparer({
      compareAsCollection: this.compareAsCollection,
      unordered: this.anyOrder,
      ignoreCase: this.caseInsensitive,
      externalComparers: this.externalComparers,
      defaultTolerance: env?.defaultTolerance,
    });
    const equal = comparer.areEqual(actual, this.expected, this.tolerance);
    return new EqualConstraintResult(this, actual, equal, comparer.failurePoints, this.caseInsensitive);
  }
}

class EqualConstraintResult extends ConstraintResult {
  constructor(
    private readonly equalConstraint: EqualConstraint,
    actual: unknown,
    isSuccess: boolean,
    private readonly failurePoints: readonly FailurePoint[],
    private readonly caseInsensitive: boolean
  ) {
    super(equalConstraint, actual, isSuccess);
  }

  writeAdditionalLinesTo(writer: MessageWriter): void {
    if (this.isSuccess) return;

    const expected = this.equalConstraint.expected;
    const actual = this.actualValue;

    if (typeof expected === 'string' && typeof actual === 'string') {
      writeStringDifferences(writer, expected, actual, this.caseInsensitive);
      return;
    }

    const [point] = this.failurePoints;
    if (!point || !isEnumerable(expected) || !isEnumerable(actual)) return;

    if (point.actualHasData && point.expectedHasData) {
      writer.writeLine(`Values differ at index [${point.position}]`);
      writer.writeLine(`Expected item: ${writer.formatValue(point.expectedValue)}`);
      writer.writeLine(`Actual item:   ${writer.formatValue(point.actualValue)}`);
    } else if (point.expectedHasData) {
      writer.writeLine(`Missing item at index [${point.position}]: ${writer.formatValue(point.expectedValue)}`);
    } else {
      writer.writeLine(`Extra item at index [${point.position}]: ${writer.formatValue(point.actualValue)}`);
    }
  }
}

function writeStringDifferences(
  writer: MessageWriter,
  expected: string,
  actual: string,
  caseInsensitive: boolean
): void {
  const e = caseInsensitive ? expected.toLowerCase() : expected;
  const a = caseInsensitive ? actual.toLowerCase() : actual;
  let index = 0;
  while (index < e.length && index < a.length && e[index] === a[index]) index++;

  const lengths =
    expected.length === actual.length
      ? `String lengths are both ${expected.length}.`
      : `Expected string length ${expected.length} but was ${actual.length}.`;
  writer.writeLine(`${lengths} Strings differ at index ${index}.`);
}
