import type { Tolerance } from '../../tolerance/tolerance.js';
import { abstain, decided, type ChainComparer, type ChainOutcome } from '../chain.js';
import type { ComparisonState } from '../comparison-state.js';
import type { EqualityComparer } from '../equality-comparer.js';

export function isEnumerable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  );
}

/**
 * Arrays, typed arrays, Sets and any other non-string iterable.
 *
 * Elements are compared in enumeration order unless the comparer is in
 * unordered mode or either side is a Set, in which case the elements must pair
 * up one to one.
 */
export class EnumerableComparer implements ChainComparer {
  readonly name = 'enumerable';

  constructor(private readonly comparer: EqualityComparer) {}

  equal(x: unknown, y: unknown, tolerance: Tolerance, state: ComparisonState): ChainOutcome {
    if (!isEnumerable(x) || !isEnumerable(y)) return abstain;

    const actual = Array.from(x);
    const expected = Array.from(y);

    const inner = state.push(x, y);
    if (this.comparer.unordered || x instanceof Set || y instanceof Set) {
      return decided(this.unorderedEqual(actual, expected, tolerance, inner));
    }
    return decided(this.orderedEqual(actual, expected, tolerance, inner, state.isTopLevel));
  }

  private orderedEqual(
    actual: unknown[],
    expected: unknown[],
    tolerance: Tolerance,
    state: ComparisonState,
    topLevel: boolean
  ): boolean {
    const n = Math.min(actual.length, expected.length);
    for (let i = 0; i < n; i++) {
      if (!this.comparer.equal(actual[i], expected[i], tolerance, state)) {
        if (topLevel) this.comparer.recordFailurePoint({
          position: i,
          actualHasData: true,
          expectedHasData: true,
          actualValue: actual[i],
          expectedValue: expected[i],
        });
        return false;
      }
    }

    if (actual.length === expected.length) return true;

    // Only the outermost collection's difference is reported.
    if (topLevel) this.comparer.recordFailurePoint({
      position: n,
      actualHasData: actual.length > n,
      expectedHasData: expected.length > n,
      actualValue: actual[n],
      expectedValue: expected[n],
    });
    return false;
  }

  /**
   * Bipartite matching by augmenting paths: an actual element may take an
   * expected element already held by another if that one can move elsewhere.
   */
  private unorderedEqual(
    actual: unknown[],
    expected: unknown[],
    tolerance: Tolerance,
    state: ComparisonState
  ): boolean {
    if (actual.length !== expected.length) return false;

    const cache = new Map<number, boolean>();
    const matches = (i: number, j: number): boolean => {
      const key = i * expected.length + j;
      let result = cache.get(key);
      if (result === undefined) {
        result = this.comparer.equal(actual[i], expected[j], tolerance, state);
        cache.set(key, result);
      }
      return result;
    };

    // holder[j] is the actual index currently matched to expected[j]
    const holder: (number | undefined)[] = new Array<number | undefined>(expected.length).fill(undefined);
    const assign = (i: number, visited: boolean[]): boolean => {
      for (let j = 0; j < expected.length; j++) {
        if (visited[j] || !matches(i, j)) continue;
        visited[j] = true;
        const current = holder[j];
        if (current === undefined || assign(current, visited)) {
          holder[j] = i;
          return true;
        }
      }
      return false;
    };

    for (let i = 0; i < actual.length; i++) {
      if (!assign(i, new Array<boolean>(expected.length).fill(false))) return false;
    }
    return true;
  }
}
