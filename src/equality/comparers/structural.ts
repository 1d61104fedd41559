import type { Tolerance } from '../../tolerance/tolerance.js';
import { abstain, decided, type ChainComparer, type ChainOutcome } from '../chain.js';
import type { ComparisonState } from '../comparison-state.js';
import type { EqualityComparer } from '../equality-comparer.js';

/**
 * Method key for types that know how to compare themselves structurally,
 * delegating element comparison back to the caller's comparer.
 */
export const structuralEquals: unique symbol = Symbol.for('tenet.structuralEquals');

export interface EqualityComparison {
  equals(x: unknown, y: unknown): boolean;
}

export interface StructurallyEquatable {
  [structuralEquals](other: unknown, comparison: EqualityComparison): boolean;
}

export function isStructurallyEquatable(value: unknown): value is StructurallyEquatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, structuralEquals) === 'function'
  );
}

export class StructuralComparer implements ChainComparer {
  readonly name = 'structural';

  constructor(private readonly comparer: EqualityComparer) {}

  equal(x: unknown, y: unknown, tolerance: Tolerance, state: ComparisonState): ChainOutcome {
    if (this.comparer.compareAsCollection && state.isTopLevel) return abstain;

    if (!isStructurallyEquatable(x) || !isStructurallyEquatable(y)) return abstain;

    const inner = state.push(x, y);
    const comparison: EqualityComparison = {
      equals: (a, b) => this.comparer.equal(a, b, tolerance, inner),
    };

    return decided(x[structuralEquals](y, comparison) || y[structuralEquals](x, comparison));
  }
}
