import type { Resolvable } from '../constraints/constraint.js';
import { MessageWriter } from '../constraints/message-writer.js';
import { Has, Is } from '../constraints/syntax.js';
import type { ExecutionContext } from '../context/execution-context.js';
import {
  AssertionError,
  ConfigurationError,
  IgnoreSignal,
  InconclusiveSignal,
  MultipleAssertError,
  SuccessSignal,
  type DeferredEntry,
} from '../errors.js';
import { formatMessage } from './format-message.js';

function isThenable(value: unknown): boolean {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

/** Splits the two `that` overloads into a constraint and a message. */
export function thatArguments(
  second: Resolvable | string | undefined,
  message: string | undefined
): [Resolvable, string | undefined] {
  if (second === undefined || typeof second === 'string') {
    return [Is.true, second];
  }
  return [second, message];
}

/**
 * Assertions bound to one execution context.
 *
 * Outside a Multiple block, failures and the pass, ignore and inconclusive
 * outcomes unwind by throwing. Inside one they are recorded on the context's
 * accumulator and raised together when the outermost block exits.
 */
export class Asserter {
  constructor(readonly context: ExecutionContext) {}

  that(condition: boolean, message?: string): void;
  that(actual: unknown, constraint: Resolvable, message?: string): void;
  that(actual: unknown, second?: Resolvable | string, message?: string): void {
    const [constraint, text] = thatArguments(second, message);
    this.assertConstraint(actual, constraint, text);
  }

  assertConstraint(actual: unknown, expression: Resolvable, message?: string): void {
    const constraint = expression.resolve();
    this.context.incrementAssertCount();

    const result = constraint.applyTo(actual, {
      defaultTolerance: this.context.defaultFloatingPointTolerance,
    });
    if (result.isSuccess) return;

    const writer = new MessageWriter(this.context.currentValueFormatter, message);
    result.writeMessageTo(writer);
    this.reportFailure(writer.toString(), result.description, actual);
  }

  contains(item: unknown, collection: unknown, message?: string): void {
    this.assertConstraint(collection, Has.member(item), message);
  }

  areEqual(expected: unknown, actual: unknown, message?: string): void {
    this.assertConstraint(actual, Is.equalTo(expected), message);
  }

  pass(message = '', ...args: unknown[]): void {
    this.report('pass', formatMessage(message, args));
  }

  fail(message = '', ...args: unknown[]): void {
    this.reportFailure(formatMessage(message, args));
  }

  /** Records a warning and carries on, at any Multiple depth. */
  warn(message: string, ...args: unknown[]): void {
    const text = formatMessage(message, args);
    this.context.logger.warn(text);
    this.context.currentResult.record({ kind: 'warning', message: text });
  }

  ignore(message = '', ...args: unknown[]): void {
    this.report('ignore', formatMessage(message, args));
  }

  inconclusive(message = '', ...args: unknown[]): void {
    this.report('inconclusive', formatMessage(message, args));
  }

  multiple(body: () => void): void {
    const mark = this.enterMultiple();
    try {
      const returned: unknown = body();
      if (isThenable(returned)) {
        throw new ConfigurationError('Multiple was given an async body; use multipleAsync to await it');
      }
    } finally {
      this.context.multipleAssertLevel--;
    }
    this.exitMultiple(mark);
  }

  /** The nesting level drops only once `body` has settled. */
  async multipleAsync(body: () => Promise<void>): Promise<void> {
    const mark = this.enterMultiple();
    try {
      await body();
    } finally {
      this.context.multipleAssertLevel--;
    }
    this.exitMultiple(mark);
  }

  private get deferring(): boolean {
    return this.context.multipleAssertLevel > 0;
  }

  private enterMultiple(): number {
    this.context.multipleAssertLevel++;
    return this.context.currentResult.size;
  }

  private exitMultiple(mark: number): void {
    if (this.deferring) return;

    const entries = this.context.currentResult.since(mark);
    if (entries.some((e) => e.kind === 'failure')) {
      throw new MultipleAssertError(entries);
    }

    const find = (kind: DeferredEntry['kind']) => entries.find((e) => e.kind === kind);
    const ignored = find('ignore');
    if (ignored) throw new IgnoreSignal(ignored.message);
    const inconclusive = find('inconclusive');
    if (inconclusive) throw new InconclusiveSignal(inconclusive.message);
    const passed = find('pass');
    if (passed) throw new SuccessSignal(passed.message);
  }

  private reportFailure(message: string, expected?: string, actual?: unknown): void {
    if (this.deferring) {
      this.context.currentResult.record({ kind: 'failure', message });
      return;
    }
    throw new AssertionError(message, { expected, actual });
  }

  private report(kind: 'pass' | 'ignore' | 'inconclusive', message: string): void {
    if (this.deferring) {
      this.context.currentResult.record({ kind, message });
      return;
    }
    switch (kind) {
      case 'pass':
        throw new SuccessSignal(message);
      case 'ignore':
        throw new IgnoreSignal(message);
      case 'inconclusive':
        throw new InconclusiveSignal(message);
    }
  }
}
