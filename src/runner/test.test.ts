import { describe, it, expect } from "vitest";
import { Assert } from "../assert/assert.js";
import { Is } from "../constraints/syntax.js";
import { ExecutionContext } from "../context/execution-context.js";
import type { TestListener } from "../context/listener.js";
import { Tolerance } from "../tolerance/tolerance.js";
import type { TestInfo, TestResult } from "../types/index.js";
import { runTest } from "./test.js";

describe("runTest", () => {
  it("passes a body whose assertions hold", async () => {
    const result = await runTest({
      name: "sums",
      body: (assert) => {
        assert.that(1 + 1, Is.equalTo(2));
        assert.that(3, Is.greaterThan(2));
      },
    });
    expect(result).toMatchObject({
      test: { id: "sums", name: "sums" },
      status: "passed",
      assertCount: 2,
      entries: [],
    });
    expect(result.message).toBeUndefined();
  });

  it("fails with the assertion message", async () => {
    const result = await runTest({
      name: "broken",
      id: "suite > broken",
      body: (assert) => assert.that(1, Is.equalTo(2)),
    });
    expect(result.test.id).toBe("suite > broken");
    expect(result.status).toBe("failed");
    expect(result.message).toBe("  Expected: 2\n  But was:  1");
  });

  it("reports warnings without failing", async () => {
    const result = await runTest({ name: "warned", body: (assert) => assert.warn("slow") });
    expect(result.status).toBe("warning");
    expect(result.entries).toEqual([{ kind: "warning", message: "slow" }]);
  });

  it("maps outcome signals to statuses", async () => {
    const skipped = await runTest({ name: "a", body: (assert) => assert.ignore("later") });
    const unsure = await runTest({ name: "b", body: (assert) => assert.inconclusive() });
    const passed = await runTest({ name: "c", body: (assert) => assert.pass("done") });
    expect(skipped).toMatchObject({ status: "skipped", message: "later" });
    expect(unsure.status).toBe("inconclusive");
    expect(unsure.message).toBeUndefined();
    expect(passed).toMatchObject({ status: "passed", message: "done" });
  });

  it("reports unexpected exceptions as errors", async () => {
    const result = await runTest({
      name: "throws",
      body: () => {
        throw new TypeError("oops");
      },
    });
    expect(result).toMatchObject({ status: "error", message: "TypeError: oops" });
  });

  it("runs async bodies in their own isolated context", async () => {
    const parent = new ExecutionContext();
    let seen: ExecutionContext | undefined;
    const result = await runTest({
      name: "async",
      context: parent,
      body: async (_assert, context) => {
        await Promise.resolve();
        seen = ExecutionContext.current;
        expect(context.priorContext).toBe(parent);
        Assert.that(true);
      },
    });
    expect(seen).not.toBe(parent);
    expect(seen?.priorContext).toBe(parent);
    expect(result.assertCount).toBe(1);
    expect(parent.assertCount).toBe(0);
  });

  it("keeps the parent's outcomes and Multiple level untouched", async () => {
    const parent = new ExecutionContext();
    parent.multipleAssertLevel = 1;
    const result = await runTest({
      name: "inside",
      context: parent,
      body: (assert) => assert.fail("nope"),
    });
    expect(result.status).toBe("failed");
    expect(parent.currentResult.size).toBe(0);
    expect(parent.multipleAssertLevel).toBe(1);
  });

  it("applies setup before the body", async () => {
    const result = await runTest({
      name: "tolerant",
      setup: (context) => {
        context.defaultFloatingPointTolerance = new Tolerance(0.1);
      },
      body: (assert) => assert.that(1.05, Is.equalTo(1)),
    });
    expect(result.status).toBe("passed");
  });

  it("notifies the listener", async () => {
    const events: string[] = [];
    const listener: TestListener = {
      testStarted: (test: TestInfo) => events.push(`start ${test.name}`),
      testFinished: (result: TestResult) => events.push(`finish ${result.test.name} ${result.status}`),
    };
    await runTest({ name: "observed", listener, body: () => undefined });
    expect(events).toEqual(["start observed", "finish observed passed"]);
  });
});
