import { AsyncLocalStorage } from 'node:async_hooks';
import type { ValueFormatter, ValueFormatterFactory } from '../format/value.js';
import { defaultValueFormatter } from '../format/value.js';
import { nullLogger, type Logger } from '../logging/logger.js';
import { Tolerance } from '../tolerance/tolerance.js';
import type { TestInfo, TestResult } from '../types/result.js';
import { NullListener, type TestListener } from './listener.js';
import { OutcomeAccumulator } from './outcomes.js';

const storage = new AsyncLocalStorage<ExecutionContext>();

/**
 * Per-flow state for assertions: counter, Multiple depth, formatter, default
 * tolerance, logger and listener.
 *
 * The current context follows async continuations through AsyncLocalStorage.
 * Entering an isolated scope makes a child current for the duration of the
 * callback only; the previous context is current again however it exits.
 */
export class ExecutionContext {
  /** The context this one was copied from, kept only for restoration. */
  readonly priorContext: ExecutionContext | undefined;

  listener: TestListener;
  currentValueFormatter: ValueFormatter;
  defaultFloatingPointTolerance: Tolerance;
  logger: Logger;
  currentResult: OutcomeAccumulator;
  currentTest: TestInfo | undefined;
  multipleAssertLevel: number;

  private readonly counter = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

  constructor(prior?: ExecutionContext) {
    this.priorContext = prior;
    this.listener = prior?.listener ?? NullListener.instance;
    this.currentValueFormatter = prior?.currentValueFormatter ?? defaultValueFormatter;
    this.defaultFloatingPointTolerance = prior?.defaultFloatingPointTolerance ?? Tolerance.default;
    this.logger = prior?.logger ?? nullLogger;
    this.currentResult = prior?.currentResult ?? new OutcomeAccumulator();
    this.currentTest = prior?.currentTest;
    this.multipleAssertLevel = prior?.multipleAssertLevel ?? 0;
  }

  /**
   * The context of the active async flow. A flow that has none gets its own
   * ad-hoc context, bound to it for the rest of the flow.
   */
  static get current(): ExecutionContext {
    const existing = storage.getStore();
    if (existing) return existing;
    const adhoc = new ExecutionContext();
    storage.enterWith(adhoc);
    return adhoc;
  }

  get assertCount(): number {
    return Atomics.load(this.counter, 0);
  }

  incrementAssertCount(count = 1): void {
    Atomics.add(this.counter, 0, count);
  }

  /** Run `fn` with this context current on its async flow. */
  establishExecutionEnvironment<T>(fn: () => T): T {
    return storage.run(this, fn);
  }

  /** Run `fn` in a fresh child context. */
  runIsolated<T>(fn: (context: ExecutionContext) => T): T {
    const child = new ExecutionContext(this);
    return child.establishExecutionEnvironment(() => fn(child));
  }

  addFormatter(factory: ValueFormatterFactory): void {
    this.currentValueFormatter = factory(this.currentValueFormatter);
  }

  testStarted(test: TestInfo): void {
    this.currentTest = test;
    this.logger.debug(`started ${test.name}`);
    this.listener.testStarted(test);
  }

  testFinished(result: TestResult): void {
    this.logger.debug(`finished ${result.test.name}: ${result.status}`);
    this.listener.testFinished(result);
  }
}
