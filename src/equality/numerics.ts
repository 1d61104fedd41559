import type { Tolerance } from '../tolerance/tolerance.js';

export type Numeric = number | bigint;

export function isNumeric(value: unknown): value is Numeric {
  return typeof value === 'number' || typeof value === 'bigint';
}

export function isIntegral(value: Numeric): boolean {
  return typeof value === 'bigint' || Number.isInteger(value);
}

/**
 * Equality of two numerics within a tolerance. The window is derived from the
 * expected operand only.
 */
export function numericEquals(actual: Numeric, expected: Numeric, tolerance: Tolerance): boolean {
  if (typeof actual === 'number' && typeof expected === 'number') {
    if (Number.isNaN(actual) || Number.isNaN(expected)) {
      return Number.isNaN(actual) && Number.isNaN(expected);
    }
    if (actual === expected) return true;
    if (tolerance.isNone) return false;
    const { lowerBound, upperBound } = tolerance.applyTo(expected);
    return lowerBound <= actual && actual <= upperBound;
  }

  if (typeof actual === 'bigint' && typeof expected === 'bigint') {
    if (actual === expected) return true;
    if (tolerance.isNone) return false;
    const { lowerBound, upperBound } = tolerance.applyTo(expected);
    return lowerBound <= actual && actual <= upperBound;
  }

  // A bigint against a whole number compares exactly, beyond 2^53 too.
  const number = typeof actual === 'number' ? actual : expected;
  if (Number.isInteger(number) && windowFitsBigint(tolerance)) {
    return numericEquals(toBigint(actual), toBigint(expected), tolerance);
  }
  return numericEquals(Number(actual), Number(expected), tolerance);
}

function windowFitsBigint(tolerance: Tolerance): boolean {
  if (tolerance.isNone) return true;
  return (tolerance.mode === 'linear' || tolerance.mode === 'percent') && Number.isInteger(tolerance.amount);
}

function toBigint(value: Numeric): bigint {
  return typeof value === 'bigint' ? value : BigInt(value);
}

/** NaN orders below every other value and equal to itself. */
export function compareNumeric(x: Numeric, y: Numeric): number {
  const xNaN = typeof x === 'number' && Number.isNaN(x);
  const yNaN = typeof y === 'number' && Number.isNaN(y);
  if (xNaN || yNaN) return xNaN && yNaN ? 0 : xNaN ? -1 : 1;

  if (typeof x !== typeof y && Number.isInteger(typeof x === 'number' ? x : y)) {
    return order(toBigint(x), toBigint(y));
  }
  return order(x, y);
}

function order(x: Numeric, y: Numeric): number {
  return x < y ? -1 : x > y ? 1 : 0;
}
