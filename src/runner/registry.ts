import type { ExecutionContext } from "../context/execution-context.js";
import type { TestListener } from "../context/listener.js";
import { ConfigurationError } from "../errors.js";
import type { TestResult } from "../types/index.js";
import { runTest, type TestBody } from "./test.js";

export interface RegisteredTest {
  id: string;
  name: string;
  body: TestBody;
  setup?: (context: ExecutionContext) => void;
}

export interface RunAllOptions {
  context?: ExecutionContext;
  listener?: TestListener;
}

/**
 * Explicit mapping from test id to the closure that runs it
 */
export class TestRegistry {
  private readonly tests = new Map<string, RegisteredTest>();

  register(test: RegisteredTest): void {
    if (this.tests.has(test.id)) {
      throw new ConfigurationError(`Test "${test.id}" is already registered`);
    }
    this.tests.set(test.id, test);
  }

  get(id: string): RegisteredTest | undefined {
    return this.tests.get(id);
  }

  get ids(): string[] {
    return [...this.tests.keys()];
  }

  get size(): number {
    return this.tests.size;
  }

  /**
   * Run one registered test
   */
  async run(id: string, options: RunAllOptions = {}): Promise<TestResult> {
    const test = this.tests.get(id);
    if (!test) {
      throw new ConfigurationError(`No test registered as "${id}"`);
    }
    return runTest({ ...test, ...options });
  }

  /**
   * Run every registered test in registration order, one at a time
   */
  async runAll(options: RunAllOptions = {}): Promise<TestResult[]> {
    const results: TestResult[] = [];
    for (const id of this.tests.keys()) {
      results.push(await this.run(id, options));
    }
    return results;
  }
}
