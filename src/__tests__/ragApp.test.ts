import { describe, it, expect, afterEach } from "vitest";
import { join } from "node:path";
import { loadSettings } from "../config/settings.js";
import { createRagApp } from "../app/ragApp.js";
import { MemoryStorePersistence } from "../rag/store/storePersistence.js";
import { captureLogger, tempDir } from "./helpers.js";

describe("RagApp", () => {
  let cleanup: (() => Promise<void>) | undefined;
  afterEach(async () => {
    await cleanup?.();
    cleanup = undefined;
  });

  async function app() {
    const tmp = await tempDir();
    cleanup = tmp.cleanup;
    const settings = loadSettings({ RAG_HISTORY_FILE: join(tmp.dir, "metadata.json") }, {});
    return createRagApp(settings, {
      logger: captureLogger().logger,
      persistence: new MemoryStorePersistence(),
      now: () => new Date(2024, 0, 2, 3, 4, 5)
    });
  }

  it("gives texts pasted in the same second distinct document ids", async () => {
    const rag = await app();
    const a = await rag.ingest({ kind: "text", text: "Paris is the capital of France.", title: "A" });
    const b = await rag.ingest({ kind: "text", text: "Bananas are yellow.", title: "B" });
    expect(a.documentId).not.toBe(b.documentId);

    expect(await rag.ask("Are bananas yellow in France?", { docIds: [a.documentId] })).toEqual({
      answer: "Paris is the capital of France.",
      sources: ["Source: A (chunk 0)"],
      path: "extractive"
    });
    expect(await rag.ask("Are bananas yellow in France?", { docIds: [b.documentId] })).toEqual({
      answer: "Bananas are yellow.",
      sources: ["Source: B (chunk 0)"],
      path: "extractive"
    });
  });

  it("records uploads with the derived id", async () => {
    const rag = await app();
    const receipt = await rag.ingest({ kind: "text", text: "Bananas are yellow." });
    const { uploads } = await rag.history.read();
    expect(uploads).toEqual([
      { time: "2024-01-02 03:04:05", type: "text", title: "pasted text", docId: receipt.documentId, chunks: 1 }
    ]);
  });
});
