import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { HistoryStore } from "../history/historyStore.js";
import { captureLogger, tempDir } from "./helpers.js";

describe("HistoryStore", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  beforeEach(async () => {
    ({ dir, cleanup } = await tempDir());
  });
  afterEach(async () => {
    await cleanup();
  });

  const now = () => new Date(2024, 4, 6, 7, 8, 9);

  it("reads a missing file as empty history", async () => {
    const history = new HistoryStore(join(dir, "none.json"));
    expect(await history.read()).toEqual({ uploads: [], queries: [] });
  });

  it("reads an invalid file as empty history", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, JSON.stringify({ uploads: [{ nope: true }] }), "utf8");
    const { logger, sink } = captureLogger();
    const history = new HistoryStore(path, { logger });
    expect(await history.read()).toEqual({ uploads: [], queries: [] });
    expect(sink.messages()).toEqual(["history.invalid"]);
  });

  it("records uploads and queries newest first", async () => {
    const path = join(dir, "nested", "metadata.json");
    const history = new HistoryStore(path, { now });
    await history.addUpload({ documentId: "text:1", title: "first", sourceKind: "text", chunkCount: 1 });
    await history.addUpload({ documentId: "pdf:a.pdf", title: "a.pdf", sourceKind: "pdf", chunkCount: 4 });
    await history.addQuery("What is the capital of France?");

    const data = await history.read();
    expect(data.uploads).toEqual([
      { time: "2024-05-06 07:08:09", type: "pdf", title: "a.pdf", docId: "pdf:a.pdf", chunks: 4 },
      { time: "2024-05-06 07:08:09", type: "text", title: "first", docId: "text:1", chunks: 1 }
    ]);
    expect(data.queries).toEqual([{ time: "2024-05-06 07:08:09", question: "What is the capital of France?" }]);

    const onDisk: unknown = JSON.parse(await readFile(path, "utf8"));
    expect(onDisk).toEqual(data);
  });

  it("serializes concurrent writes", async () => {
    const history = new HistoryStore(join(dir, "h.json"), { now });
    await Promise.all(Array.from({ length: 10 }, (_, i) => history.addQuery(`q${i}`)));
    const { queries } = await history.read();
    expect(queries.map((q) => q.question)).toEqual(Array.from({ length: 10 }, (_, i) => `q${9 - i}`));
  });

  it("caps each list and clears them independently", async () => {
    const history = new HistoryStore(join(dir, "h.json"), { now, maxEntries: 2 });
    for (const q of ["a", "b", "c"]) await history.addQuery(q);
    await history.addUpload({ documentId: "text:1", title: "t", sourceKind: "text", chunkCount: 1 });
    expect((await history.read()).queries.map((q) => q.question)).toEqual(["c", "b"]);

    await history.clearQueries();
    expect(await history.read()).toMatchObject({ queries: [], uploads: [{ docId: "text:1" }] });
    await history.clearUploads();
    expect(await history.read()).toEqual({ uploads: [], queries: [] });
  });
});
