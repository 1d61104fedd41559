import type { TestInfo, TestResult } from '../types/result.js';

export interface TestListener {
  testStarted(test: TestInfo): void;
  testFinished(result: TestResult): void;
}

export class NullListener implements TestListener {
  static readonly instance = new NullListener();

  testStarted(): void {}

  testFinished(): void {}
}
