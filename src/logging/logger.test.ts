import { describe, it, expect } from "vitest";
import { createLogger, nullLogger, type LogSink } from "./logger.js";

function collector(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write(chunk: string) {
      lines.push(chunk);
      return true;
    },
  };
}

const now = () => new Date(2024, 0, 1, 9, 5, 3, 7);

describe("createLogger", () => {
  it("writes timestamped, tagged lines", () => {
    const sink = collector();
    const logger = createLogger({ name: "tenet", write: sink, now });
    logger.info("hello");
    logger.error("bad");
    expect(sink.lines).toEqual([
      "09:05:03.007 INFO  [tenet] hello\n",
      "09:05:03.007 ERROR [tenet] bad\n",
    ]);
  });

  it("drops messages below the level", () => {
    const sink = collector();
    const logger = createLogger({ name: "tenet", level: "warn", write: sink, now });
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    expect(sink.lines).toEqual(["09:05:03.007 WARN  [tenet] shown\n"]);
  });

  it("writes nothing when silent", () => {
    const sink = collector();
    createLogger({ name: "tenet", level: "silent", write: sink, now }).error("x");
    expect(sink.lines).toEqual([]);
  });

  it("names children after their parent", () => {
    const sink = collector();
    const child = createLogger({ name: "tenet", level: "debug", write: sink, now }).child("runner");
    child.debug("step");
    expect(child.name).toBe("tenet:runner");
    expect(child.level).toBe("debug");
    expect(sink.lines).toEqual(["09:05:03.007 DEBUG [tenet:runner] step\n"]);
  });

  it("colours the level tag on request", () => {
    const sink = collector();
    createLogger({ name: "tenet", write: sink, now, color: true }).error("bad");
    expect(sink.lines).toEqual(["09:05:03.007 \u001b[31mERROR\u001b[39m [tenet] bad\n"]);
  });

  it("provides a silent logger", () => {
    expect(nullLogger.level).toBe("silent");
    expect(() => nullLogger.error("ignored")).not.toThrow();
  });
});
