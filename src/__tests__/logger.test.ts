import { describe, it, expect, afterEach } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { createLogger } from "../logging/logger.js";
import { FileSink, RingBufferSink } from "../logging/sinks.js";
import { tempDir } from "./helpers.js";

describe("Logger", () => {
  it("writes entries above level", () => {
    const sink = new RingBufferSink(10);
    const logger = createLogger({ level: "info", sinks: [sink] });
    logger.debug("skip");
    logger.info("hello", { a: 1 });
    expect(sink.messages()).toEqual(["hello"]);
    expect(sink.entries()[0].context).toEqual({ a: 1 });
  });

  it("redacts sensitive fields", () => {
    const sink = new RingBufferSink(10);
    const logger = createLogger({
      level: "trace",
      sinks: [sink],
      redact: (k, v) => (k === "apiKey" ? "[redacted]" : v)
    });
    logger.info("test", { apiKey: "test-secret", keep: 1 });
    const e = sink.entries()[0];
    expect(e.context?.apiKey).toBe("[redacted]");
    expect(e.context?.keep).toBe(1);
  });

  it("child loggers carry component context and share sinks", () => {
    const sink = new RingBufferSink(10);
    const logger = createLogger({ level: "info", sinks: [sink], context: { service: "svc" } });
    logger.child({ component: "store" }).warn("store.persist.failed", { failures: 1 });
    expect(sink.entries()[0].context).toEqual({ service: "svc", component: "store", failures: 1 });
  });

  it("serializes errors to name and message", () => {
    const sink = new RingBufferSink(10);
    const logger = createLogger({ level: "info", sinks: [sink] });
    logger.error("boom", { error: new TypeError("bad input") });
    expect(sink.entries()[0].context?.error).toEqual({ name: "TypeError", message: "bad input" });
  });

  it("ring buffer keeps the newest entries", () => {
    const sink = new RingBufferSink(2);
    const logger = createLogger({ level: "info", sinks: [sink] });
    logger.info("one");
    logger.info("two");
    logger.info("three");
    expect(sink.messages()).toEqual(["two", "three"]);
  });
});

describe("FileSink", () => {
  let cleanup: (() => Promise<void>) | undefined;
  afterEach(async () => {
    await cleanup?.();
    cleanup = undefined;
  });

  it("appends JSON lines", async () => {
    const tmp = await tempDir();
    cleanup = tmp.cleanup;
    const path = join(tmp.dir, "logs", "app.log");
    const logger = createLogger({ level: "info", sinks: [new FileSink(path)] });
    logger.info("ingest.done", { chunks: 3 });
    const lines = readFileSync(path, "utf8").trim().split("\n");
    expect(lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(lines[0]);
    expect(parsed).toMatchObject({ level: "info", msg: "ingest.done", context: { chunks: 3 } });
  });

  it("rotates past maxBytes and keeps backupCount files", async () => {
    const tmp = await tempDir();
    cleanup = tmp.cleanup;
    const path = join(tmp.dir, "app.log");
    const logger = createLogger({ level: "info", sinks: [new FileSink(path, { maxBytes: 200, backupCount: 2 })] });
    for (let i = 0; i < 20; i++) logger.info("line", { i });
    expect(existsSync(path)).toBe(true);
    expect(existsSync(`${path}.1`)).toBe(true);
    expect(existsSync(`${path}.2`)).toBe(true);
    expect(existsSync(`${path}.3`)).toBe(false);
    const current = readFileSync(path, "utf8").trim().split("\n");
    const last: unknown = JSON.parse(current[current.length - 1]);
    expect(last).toMatchObject({ context: { i: 19 } });
  });
});
