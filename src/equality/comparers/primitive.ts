import type { Tolerance } from '../../tolerance/tolerance.js';
import { abstain, decided, type ChainComparer, type ChainOutcome } from '../chain.js';
import type { EqualityComparer } from '../equality-comparer.js';
import { isIntegral, isNumeric, numericEquals } from '../numerics.js';

function isPrimitive(value: unknown): boolean {
  return (typeof value !== 'object' && typeof value !== 'function') || value === null;
}

/**
 * Numbers, bigints, strings, booleans, symbols and Dates.
 */
export class PrimitiveComparer implements ChainComparer {
  readonly name = 'primitive';

  constructor(private readonly comparer: EqualityComparer) {}

  equal(x: unknown, y: unknown, tolerance: Tolerance): ChainOutcome {
    if (isNumeric(x) && isNumeric(y)) {
      const effective =
        tolerance.isDefault && !(isIntegral(x) && isIntegral(y))
          ? this.comparer.defaultTolerance
          : tolerance;
      return decided(numericEquals(x, y, effective));
    }

    if (x instanceof Date && y instanceof Date) {
      return decided(this.datesEqual(x, y, tolerance));
    }

    if (typeof x === 'string' && typeof y === 'string') {
      return decided(this.comparer.ignoreCase ? x.toLowerCase() === y.toLowerCase() : x === y);
    }

    if (isPrimitive(x) || isPrimitive(y)) {
      return decided(Object.is(x, y));
    }

    return abstain;
  }

  private datesEqual(x: Date, y: Date, tolerance: Tolerance): boolean {
    const actual = x.getTime();
    const expected = y.getTime();
    if (Number.isNaN(actual) || Number.isNaN(expected)) {
      return Number.isNaN(actual) && Number.isNaN(expected);
    }
    if (tolerance.isNone) return actual === expected;
    const { lowerBound, upperBound } = tolerance.applyTo(y);
    return lowerBound.getTime() <= actual && actual <= upperBound.getTime();
  }
}
