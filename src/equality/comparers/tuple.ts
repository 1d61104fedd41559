import type { Tolerance } from '../../tolerance/tolerance.js';
import { abstain, decided, type ChainComparer, type ChainOutcome } from '../chain.js';
import type { ComparisonState } from '../comparison-state.js';
import type { EqualityComparer } from '../equality-comparer.js';
import { Tuple } from '../tuple.js';

export class TupleComparer implements ChainComparer {
  readonly name = 'tuple';

  constructor(private readonly comparer: EqualityComparer) {}

  equal(x: unknown, y: unknown, tolerance: Tolerance, state: ComparisonState): ChainOutcome {
    if (!(x instanceof Tuple) || !(y instanceof Tuple)) return abstain;

    if (x.arity !== y.arity) return decided(false);

    const inner = state.push(x, y);
    for (let i = 0; i < x.arity; i++) {
      if (!this.comparer.equal(x.items[i], y.items[i], tolerance, inner)) {
        return decided(false);
      }
    }
    return decided(true);
  }
}
