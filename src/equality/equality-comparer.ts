import { ConfigurationError } from '../errors.js';
import { Tolerance } from '../tolerance/tolerance.js';
import type {
  ChainComparer,
  ExternalComparer,
  FailurePoint,
  OrderingComparer,
} from './chain.js';
import { ComparisonState } from './comparison-state.js';
import { DictionaryComparer } from './comparers/dictionary.js';
import { EnumerableComparer } from './comparers/enumerable.js';
import { EquatableComparer } from './comparers/equatable.js';
import { MemberComparer } from './comparers/member.js';
import { PrimitiveComparer } from './comparers/primitive.js';
import { StructuralComparer } from './comparers/structural.js';
import { TupleComparer } from './comparers/tuple.js';
import { compareNumeric, isNumeric } from './numerics.js';

export interface EqualityComparerOptions {
  /** Ignore container types at the top level and compare contents only. */
  compareAsCollection?: boolean;
  /** Compare collections without regard to order. */
  unordered?: boolean;
  /** Compare strings case-insensitively, at any depth. */
  ignoreCase?: boolean;
  /** Consulted before the built-in chain. */
  externalComparers?: readonly ExternalComparer[];
  /** Used in place of `Tolerance.default` for non-integral numbers. */
  defaultTolerance?: Tolerance;
}

/**
 * Deep, cycle-safe equality over an ordered chain of type-specific comparers.
 */
export class EqualityComparer {
  readonly compareAsCollection: boolean;
  readonly unordered: boolean;
  readonly ignoreCase: boolean;
  readonly defaultTolerance: Tolerance;
  private readonly externalComparers: readonly ExternalComparer[];
  private readonly chain: readonly ChainComparer[];
  private failurePointList: FailurePoint[] = [];

  constructor(options: EqualityComparerOptions = {}) {
    this.compareAsCollection = options.compareAsCollection ?? false;
    this.unordered = options.unordered ?? false;
    this.ignoreCase = options.ignoreCase ?? false;
    this.defaultTolerance = options.defaultTolerance ?? Tolerance.exact;
    this.externalComparers = options.externalComparers ?? [];

    // Order matters: specific shapes before generic collections, and the
    // member comparer last since it always decides.
    this.chain = [
      new PrimitiveComparer(this),
      new TupleComparer(this),
      new StructuralComparer(this),
      new EquatableComparer(),
      new DictionaryComparer(this),
      new EnumerableComparer(this),
      new MemberComparer(this),
    ];
  }

  /** Points at which the last top-level comparison found collections to differ. */
  get failurePoints(): readonly FailurePoint[] {
    return this.failurePointList;
  }

  recordFailurePoint(point: FailurePoint): void {
    this.failurePointList.push(point);
  }

  areEqual(x: unknown, y: unknown, tolerance: Tolerance = Tolerance.default): boolean {
    this.failurePointList = [];
    return this.equal(x, y, tolerance, ComparisonState.initial);
  }

  equal(x: unknown, y: unknown, tolerance: Tolerance, state: ComparisonState): boolean {
    if (x === null || x === undefined || y === null || y === undefined) {
      return x === y;
    }

    for (const external of this.externalComparers) {
      const result = external(x, y);
      if (result !== undefined) return result;
    }

    if (typeof x === 'object' || typeof x === 'function') {
      if (x === y) return true;
      // A structure that contains itself is treated as consistent with itself.
      if (state.didCompare(x, y)) return true;
    }

    // Comparers that recurse push (x, y) onto the state they pass down.
    for (const comparer of this.chain) {
      const outcome = comparer.equal(x, y, tolerance, state);
      if (outcome.kind === 'decided') return outcome.equal;
    }
    return false;
  }
}

/**
 * Ordering for comparison constraints: numerics, strings and Dates, or any
 * values when a custom ordering is given.
 */
export class ComparisonAdapter {
  constructor(private readonly ordering?: OrderingComparer) {}

  compare(x: unknown, y: unknown): number {
    if (this.ordering) return this.ordering(x, y);

    if (isNumeric(x) && isNumeric(y)) return compareNumeric(x, y);
    if (typeof x === 'string' && typeof y === 'string') {
      return x < y ? -1 : x > y ? 1 : 0;
    }
    if (x instanceof Date && y instanceof Date) {
      return compareNumeric(x.getTime(), y.getTime());
    }

    throw new ConfigurationError(
      `Values of types ${typeName(x)} and ${typeName(y)} cannot be ordered; supply a comparer with using()`
    );
  }
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'Date';
  if (typeof value === 'object') return value.constructor?.name ?? 'Object';
  return typeof value;
}
