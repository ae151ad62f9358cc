import { describe, it } from "node:test";
import assert from "node:assert";
import { Logger } from "../../src/util/logger.js";

function capture(level: "debug" | "info" | "warn" | "error"): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  return { logger: new Logger(level, (line) => lines.push(line)), lines };
}

describe("Logger", () => {
  it("should drop messages below the configured level", () => {
    const { logger, lines } = capture("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");

    assert.deepStrictEqual(lines, ["[WARN] shown", "[ERROR] shown too"]);
  });

  it("should append metadata as JSON", () => {
    const { logger, lines } = capture("debug");
    logger.debug("storage.allocate", { blockId: 3, capacity: 8 });

    assert.deepStrictEqual(lines, [
      '[DEBUG] storage.allocate {"blockId":3,"capacity":8}',
    ]);
  });

  it("should expand Error values into message and stack", () => {
    const { logger, lines } = capture("info");
    const error = new Error("boom");
    error.stack = "Error: boom\n    at test";
    logger.warn("failed", { error });

    assert.strictEqual(
      lines[0],
      '[WARN] failed {"error":"boom","errorStack":"Error: boom\\n    at test"}',
    );
  });

  it("should tolerate circular metadata", () => {
    const { logger, lines } = capture("info");
    const meta: Record<string, unknown> = {};
    meta.self = meta;
    logger.info("loop", meta);

    assert.strictEqual(lines[0], "[INFO] loop [circular or unstringifiable]");
  });

  it("should switch level and sink at runtime", () => {
    const { logger, lines } = capture("error");
    logger.setLevel("info");
    logger.info("now visible");
    assert.strictEqual(logger.getLevel(), "info");

    const other: string[] = [];
    const previous = logger.setSink((line) => other.push(line));
    logger.info("redirected");
    logger.setSink(previous);
    logger.info("back");

    assert.deepStrictEqual(lines, ["[INFO] now visible", "[INFO] back"]);
    assert.deepStrictEqual(other, ["[INFO] redirected"]);
  });
});
