import type { Tolerance } from '../../tolerance/tolerance.js';
import { abstain, decided, type ChainComparer, type ChainOutcome } from '../chain.js';
import type { ComparisonState } from '../comparison-state.js';
import type { EqualityComparer } from '../equality-comparer.js';

/**
 * Maps are equal when they hold the same keys (by identity) with equal values.
 */
export class DictionaryComparer implements ChainComparer {
  readonly name = 'dictionary';

  constructor(private readonly comparer: EqualityComparer) {}

  equal(x: unknown, y: unknown, tolerance: Tolerance, state: ComparisonState): ChainOutcome {
    if (!(x instanceof Map) || !(y instanceof Map)) return abstain;

    if (x.size !== y.size) return decided(false);

    const inner = state.push(x, y);
    for (const [key, value] of x) {
      if (!y.has(key)) return decided(false);
      if (!this.comparer.equal(value, y.get(key), tolerance, inner)) {
        return decided(false);
      }
    }
    return decided(true);
  }
}
