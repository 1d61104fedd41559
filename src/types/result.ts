import type { DeferredEntry } from "../errors.js";

export type TestStatus = "passed" | "failed" | "skipped" | "inconclusive" | "warning" | "error";

export interface TestInfo {
  id: string;
  name: string;
}

export interface TestResult {
  test: TestInfo;
  status: TestStatus;
  message?: string;
  assertCount: number;
  durationMs: number;
  /** Every outcome recorded while the test ran, in order. */
  entries: DeferredEntry[];
}
