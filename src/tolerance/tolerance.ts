import { ConfigurationError } from '../errors.js';
import { stepUlps } from './ulps.js';

export type ToleranceMode = 'none' | 'linear' | 'percent' | 'ulps' | 'timespan';

export interface ToleranceRange<T> {
  lowerBound: T;
  upperBound: T;
}

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * A permitted deviation window for numeric and date equality.
 *
 * Tolerances are immutable: the unit modifiers (`percent`, `ulps`, `seconds`,
 * ...) return a new instance and may only be applied to a plain linear amount.
 */
export class Tolerance {
  /** Exact comparison. */
  static readonly exact = new Tolerance(0, 'none');

  /**
   * No tolerance was given by the caller. Behaves like `exact`, except that the
   * equality comparer substitutes the context's default floating-point
   * tolerance when comparing non-integral numbers.
   */
  static readonly default = new Tolerance(0, 'none');

  readonly amount: number;
  readonly mode: ToleranceMode;

  constructor(amount: number, mode: ToleranceMode = 'linear') {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ConfigurationError(
        `Tolerance amount must be a non-negative finite number, got ${amount}`
      );
    }
    if (mode === 'ulps' && !Number.isInteger(amount)) {
      throw new ConfigurationError(
        `Ulps tolerance must be a whole number of units, got ${amount}`
      );
    }
    this.amount = amount;
    this.mode = mode;
  }

  static linear(amount: number): Tolerance {
    return new Tolerance(amount, 'linear');
  }

  static percent(amount: number): Tolerance {
    return new Tolerance(amount, 'percent');
  }

  static ulps(amount: number): Tolerance {
    return new Tolerance(amount, 'ulps');
  }

  static timeSpan(milliseconds: number): Tolerance {
    return new Tolerance(milliseconds, 'timespan');
  }

  get isDefault(): boolean {
    return this === Tolerance.default;
  }

  get isNone(): boolean {
    return this.mode === 'none';
  }

  get percent(): Tolerance {
    return this.convert('percent', 1);
  }

  get ulps(): Tolerance {
    return this.convert('ulps', 1);
  }

  get milliseconds(): Tolerance {
    return this.convert('timespan', 1);
  }

  get seconds(): Tolerance {
    return this.convert('timespan', MS_PER_SECOND);
  }

  get minutes(): Tolerance {
    return this.convert('timespan', MS_PER_MINUTE);
  }

  get hours(): Tolerance {
    return this.convert('timespan', MS_PER_HOUR);
  }

  get days(): Tolerance {
    return this.convert('timespan', MS_PER_DAY);
  }

  private convert(mode: ToleranceMode, factor: number): Tolerance {
    if (this.mode !== 'linear') {
      throw new ConfigurationError(
        `Tried to use multiple tolerance modes at the same time (${this.mode} then ${mode})`
      );
    }
    return new Tolerance(this.amount * factor, mode);
  }

  /**
   * Derive the inclusive window around `expected`.
   */
  applyTo(expected: number): ToleranceRange<number>;
  applyTo(expected: bigint): ToleranceRange<bigint>;
  applyTo(expected: Date): ToleranceRange<Date>;
  applyTo(expected: unknown): ToleranceRange<unknown>;
  applyTo(expected: unknown): ToleranceRange<unknown> {
    switch (this.mode) {
      case 'none':
        return { lowerBound: expected, upperBound: expected };

      case 'linear':
        if (typeof expected === 'number') {
          return { lowerBound: expected - this.amount, upperBound: expected + this.amount };
        }
        if (typeof expected === 'bigint') {
          const delta = this.bigintAmount();
          return { lowerBound: expected - delta, upperBound: expected + delta };
        }
        break;

      case 'percent':
        if (typeof expected === 'number') {
          const delta = (this.amount / 100) * Math.abs(expected);
          return { lowerBound: expected - delta, upperBound: expected + delta };
        }
        if (typeof expected === 'bigint') {
          const magnitude = expected < 0n ? -expected : expected;
          const delta = (magnitude * this.bigintAmount()) / 100n;
          return { lowerBound: expected - delta, upperBound: expected + delta };
        }
        break;

      case 'ulps':
        if (typeof expected === 'number') {
          return {
            lowerBound: stepUlps(expected, -this.amount),
            upperBound: stepUlps(expected, this.amount),
          };
        }
        break;

      case 'timespan':
        if (expected instanceof Date) {
          const t = expected.getTime();
          return { lowerBound: new Date(t - this.amount), upperBound: new Date(t + this.amount) };
        }
        break;
    }

    throw new ConfigurationError(
      `Cannot apply a ${this.mode} tolerance to ${describeType(expected)}`
    );
  }

  private bigintAmount(): bigint {
    if (!Number.isInteger(this.amount)) {
      throw new ConfigurationError(
        `A fractional tolerance (${this.amount}) cannot be applied to a bigint`
      );
    }
    return BigInt(this.amount);
  }

  equals(other: Tolerance): boolean {
    return this.mode === other.mode && this.amount === other.amount;
  }

  toString(): string {
    switch (this.mode) {
      case 'none':
        return '';
      case 'linear':
        return `+/- ${this.amount}`;
      case 'percent':
        return `+/- ${this.amount}%`;
      case 'ulps':
        return `+/- ${this.amount} ulps`;
      case 'timespan':
        return `+/- ${this.amount}ms`;
    }
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'a Date';
  if (typeof value === 'object') return `an instance of ${value.constructor?.name ?? 'Object'}`;
  return `a value of type ${typeof value}`;
}
