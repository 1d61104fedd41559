import type { Resolvable } from '../constraints/constraint.js';
import { ExecutionContext } from '../context/execution-context.js';
import { Asserter, thatArguments } from './asserter.js';

const ambient = (): Asserter => new Asserter(ExecutionContext.current);

/**
 * Assertions against the current execution context of the calling async
 * flow. Use `Asserter` to bind a context explicitly.
 */
export class Assert {
  private constructor() {}

  static that(condition: boolean, message?: string): void;
  static that(actual: unknown, constraint: Resolvable, message?: string): void;
  static that(actual: unknown, second?: Resolvable | string, message?: string): void {
    const [constraint, text] = thatArguments(second, message);
    ambient().assertConstraint(actual, constraint, text);
  }

  static contains(item: unknown, collection: unknown, message?: string): void {
    ambient().contains(item, collection, message);
  }

  static areEqual(expected: unknown, actual: unknown, message?: string): void {
    ambient().areEqual(expected, actual, message);
  }

  static multiple(body: () => void): void {
    ambient().multiple(body);
  }

  static multipleAsync(body: () => Promise<void>): Promise<void> {
    return ambient().multipleAsync(body);
  }

  static pass(message?: string, ...args: unknown[]): void {
    ambient().pass(message, ...args);
  }

  static fail(message?: string, ...args: unknown[]): void {
    ambient().fail(message, ...args);
  }

  static warn(message: string, ...args: unknown[]): void {
    ambient().warn(message, ...args);
  }

  static ignore(message?: string, ...args: unknown[]): void {
    ambient().ignore(message, ...args);
  }

  static inconclusive(message?: string, ...args: unknown[]): void {
    ambient().inconclusive(message, ...args);
  }
}
