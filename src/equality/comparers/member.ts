import type { Tolerance } from '../../tolerance/tolerance.js';
import { decided, type ChainComparer, type ChainOutcome } from '../chain.js';
import type { ComparisonState } from '../comparison-state.js';
import type { EqualityComparer } from '../equality-comparer.js';

/**
 * Fallback: member-by-member comparison of own enumerable properties.
 * Always decides.
 */
export class MemberComparer implements ChainComparer {
  readonly name = 'member';

  constructor(private readonly comparer: EqualityComparer) {}

  equal(x: unknown, y: unknown, tolerance: Tolerance, state: ComparisonState): ChainOutcome {
    if (typeof x === 'function' || typeof y === 'function') {
      return decided(x === y);
    }
    if (typeof x !== 'object' || typeof y !== 'object' || x === null || y === null) {
      return decided(Object.is(x, y));
    }

    if (!this.comparer.compareAsCollection && Object.getPrototypeOf(x) !== Object.getPrototypeOf(y)) {
      return decided(false);
    }

    if (x instanceof Error && y instanceof Error) {
      if (x.name !== y.name || x.message !== y.message) return decided(false);
    }

    const xKeys = Object.keys(x);
    const yKeys = Object.keys(y);
    if (xKeys.length !== yKeys.length) return decided(false);

    const inner = state.push(x, y);
    for (const key of xKeys) {
      if (!Object.prototype.hasOwnProperty.call(y, key)) return decided(false);
      if (!this.comparer.equal(Reflect.get(x, key), Reflect.get(y, key), tolerance, inner)) {
        return decided(false);
      }
    }
    return decided(true);
  }
}
