import { Asserter } from "../assert/asserter.js";
import { ExecutionContext } from "../context/execution-context.js";
import type { TestListener } from "../context/listener.js";
import { OutcomeAccumulator } from "../context/outcomes.js";
import {
  AssertionError,
  IgnoreSignal,
  InconclusiveSignal,
  MultipleAssertError,
  SuccessSignal,
} from "../errors.js";
import type { TestInfo, TestResult, TestStatus } from "../types/index.js";

export type TestBody = (assert: Asserter, context: ExecutionContext) => void | Promise<void>;

export interface RunTestOptions {
  name: string;
  /** Defaults to the name. */
  id?: string;
  body: TestBody;
  /** Parent of the isolated context the body runs in. Defaults to the current one. */
  context?: ExecutionContext;
  listener?: TestListener;
  /** Adjusts the test's context before the body runs. */
  setup?: (context: ExecutionContext) => void;
}

interface Outcome {
  status: TestStatus;
  message?: string;
}

function classify(err: unknown): Outcome {
  if (err instanceof AssertionError || err instanceof MultipleAssertError) {
    return { status: "failed", message: err.message };
  }
  if (err instanceof SuccessSignal) {
    return { status: "passed", message: err.message || undefined };
  }
  if (err instanceof IgnoreSignal) {
    return { status: "skipped", message: err.message || undefined };
  }
  if (err instanceof InconclusiveSignal) {
    return { status: "inconclusive", message: err.message || undefined };
  }
  const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  return { status: "error", message };
}

/**
 * Run a single test body in its own isolated context
 */
export async function runTest(options: RunTestOptions): Promise<TestResult> {
  const { name, body, listener, setup } = options;
  const test: TestInfo = { id: options.id ?? name, name };
  const parent = options.context ?? ExecutionContext.current;

  return parent.runIsolated(async (context) => {
    if (listener) context.listener = listener;
    context.currentResult = new OutcomeAccumulator();
    context.multipleAssertLevel = 0;
    setup?.(context);

    context.testStarted(test);
    const startTs = Date.now();

    let outcome: Outcome;
    try {
      await body(new Asserter(context), context);
      outcome = { status: context.currentResult.hasWarnings ? "warning" : "passed" };
    } catch (err) {
      outcome = classify(err);
    }

    const result: TestResult = {
      test,
      ...outcome,
      assertCount: context.assertCount,
      durationMs: Date.now() - startTs,
      entries: [...context.currentResult.entries],
    };
    context.testFinished(result);
    return result;
  });
}
