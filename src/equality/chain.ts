import type { Tolerance } from '../tolerance/tolerance.js';
import type { ComparisonState } from './comparison-state.js';

export type ChainOutcome =
  | { kind: 'decided'; equal: boolean }
  | { kind: 'abstain' };

export const abstain: ChainOutcome = { kind: 'abstain' };

const EQUAL: ChainOutcome = { kind: 'decided', equal: true };
const UNEQUAL: ChainOutcome = { kind: 'decided', equal: false };

export function decided(equal: boolean): ChainOutcome {
  return equal ? EQUAL : UNEQUAL;
}

/**
 * One type-specific equality strategy. Comparers are tried in a fixed order
 * and the first one that decides wins.
 */
export interface ChainComparer {
  readonly name: string;
  equal(x: unknown, y: unknown, tolerance: Tolerance, state: ComparisonState): ChainOutcome;
}

/**
 * A caller-supplied equality function. Returning `undefined` abstains so the
 * built-in chain decides.
 */
export type ExternalComparer = (x: unknown, y: unknown) => boolean | undefined;

/** A caller-supplied ordering function for comparison constraints. */
export type OrderingComparer = (x: unknown, y: unknown) => number;

export interface FailurePoint {
  position: number;
  actualHasData: boolean;
  expectedHasData: boolean;
  actualValue?: unknown;
  expectedValue?: unknown;
}
