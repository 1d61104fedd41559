import { abstain, decided, type ChainComparer, type ChainOutcome } from '../chain.js';

export interface Equatable {
  equals(other: unknown): boolean;
}

export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'equals') === 'function'
  );
}

/**
 * Objects exposing an `equals(other)` method, when `y` is an instance of the
 * same class.
 */
export class EquatableComparer implements ChainComparer {
  readonly name = 'equatable';

  equal(x: unknown, y: unknown): ChainOutcome {
    if (!isEquatable(x) || typeof y !== 'object' || y === null) return abstain;
    if (!(y instanceof x.constructor)) return abstain;
    return decided(Boolean(x.equals(y)));
  }
}
