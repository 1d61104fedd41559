import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { LogSink } from "../../logging/logger.js";
import { executeCheck } from "./check.js";

const CASES = [
  "version: '1'",
  "name: demo",
  "cases:",
  "  - name: ok",
  "    actual: 2",
  "    expect:",
  "      equal_to: 2",
  "  - name: bad",
  "    actual: 1",
  "    expect:",
  "      equal_to: 2",
  "",
].join("\n");

let root: string;
let lines: string[];
let logLines: string[];
const sink: LogSink = {
  write: (chunk: string) => logLines.push(chunk),
};

function io() {
  return { cwd: root, out: (line: string) => lines.push(line), err: sink };
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "tenet-check-"));
  lines = [];
  logLines = [];
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("executeCheck", () => {
  it("prints each result and a summary", async () => {
    writeFileSync(join(root, "demo.yaml"), CASES);
    const summary = await executeCheck(["demo.yaml"], {}, io());

    expect(summary.exitCode).toBe(1);
    expect(summary.results.map((r) => r.status)).toEqual(["passed", "failed"]);
    expect(lines[0]).toMatch(/^ {2}✓ PASS demo > ok \(\d+ms\)$/);
    expect(lines[1]).toMatch(/^ {2}✗ FAIL demo > bad \(\d+ms\)$/);
    expect(lines.slice(2)).toEqual([
      "      Expected: 2",
      "      But was:  1",
      "─".repeat(40),
      "Results: 1 passed 1 failed",
    ]);
  });

  it("prints JSON on request", async () => {
    writeFileSync(join(root, "demo.yaml"), CASES);
    const summary = await executeCheck(["demo.yaml"], { json: true }, io());

    expect(summary.exitCode).toBe(1);
    expect(lines).toHaveLength(1);
    const report: unknown = JSON.parse(lines[0] ?? "");
    expect(report).toMatchObject({
      tests: [
        { id: "demo > ok", status: "passed", assertions: 1 },
        { id: "demo > bad", status: "failed", assertions: 1, message: "  Expected: 2\n  But was:  1" },
      ],
      passed: 1,
      failed: 1,
      total: 2,
    });
  });

  it("exits cleanly when every case passes", async () => {
    writeFileSync(join(root, "tenet.config.yaml"), "tolerance:\n  amount: 0.001\n");
    writeFileSync(
      join(root, "close.yaml"),
      "version: '1'\nname: close\ncases:\n  - name: near\n    actual: 1.0005\n    expect:\n      equal_to: 1\n"
    );
    const summary = await executeCheck(["close.yaml"], {}, io());
    expect(summary.exitCode).toBe(0);
    expect(lines.at(-1)).toBe("Results: 1 passed 0 failed");
  });

  it("logs progress in verbose mode", async () => {
    writeFileSync(join(root, "demo.yaml"), CASES);
    await executeCheck(["demo.yaml"], { verbose: true }, io());

    expect(lines[0]).toBe("Running: demo > ok");
    expect(logLines.map((line) => line.slice(13))).toEqual([
      "DEBUG [tenet] No config file found, using defaults\n",
      `DEBUG [tenet] Registered 2 case(s) from ${join(root, "demo.yaml")}\n`,
      "DEBUG [tenet] started ok\n",
      "DEBUG [tenet] finished ok: passed\n",
      "DEBUG [tenet] started bad\n",
      "DEBUG [tenet] finished bad: failed\n",
    ]);
  });

  it("reports a missing case file", async () => {
    const summary = await executeCheck(["missing.yaml"], {}, io());
    expect(summary).toEqual({ exitCode: 1, results: [] });
    expect(lines).toEqual([`Error: Case file not found: ${join(root, "missing.yaml")}`]);
  });

  it("reports load errors as JSON", async () => {
    const summary = await executeCheck(["missing.yaml"], { json: true }, io());
    expect(summary.exitCode).toBe(1);
    expect(JSON.parse(lines[0] ?? "")).toEqual({
      error: `Case file not found: ${join(root, "missing.yaml")}`,
    });
  });
});
