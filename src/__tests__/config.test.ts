import { describe, it, expect } from "vitest";
import { Config } from "../config/config.js";
import { loadSettings } from "../config/settings.js";
import { ConfigurationError } from "../rag/errors.js";

describe("Config", () => {
  it("merge and freeze", () => {
    const c = new Config();
    c.merge({ A: 1 });
    expect(c.get("A")).toBe(1);
    c.freeze();
    expect(() => c.merge({ B: 2 })).toThrow(/frozen/);
  });

  it("loads only listed, non-blank env keys", () => {
    const c = new Config().loadEnv(["A", "B", "C"], { A: "1", B: "  ", D: "4" });
    expect(c.all()).toEqual({ A: "1" });
    expect(c.has("B")).toBe(false);
  });
});

describe("loadSettings", () => {
  it("applies defaults", () => {
    const s = loadSettings({}, {});
    expect(s).toEqual({
      chunkSize: 500,
      chunkOverlap: 50,
      topK: 4,
      apiKey: undefined,
      llmModel: "gpt-4o-mini",
      embeddingModel: "text-embedding-3-small",
      embeddingDimensions: undefined,
      localEmbeddingDimensions: 384,
      storeDir: "data/vector_store",
      historyFile: "data/metadata.json",
      logFile: "data/rag_app.log",
      requestTimeoutMs: 30_000,
      logLevel: "info",
      port: 8080
    });
  });

  it("coerces env strings and lets overrides win", () => {
    const s = loadSettings(
      { RAG_TOP_K: 2 },
      { RAG_CHUNK_SIZE: "800", RAG_TOP_K: "6", RAG_REQUEST_TIMEOUT: "2m", OPENAI_API_KEY: "test-secret", LOG_LEVEL: "debug" }
    );
    expect(s.chunkSize).toBe(800);
    expect(s.topK).toBe(2);
    expect(s.requestTimeoutMs).toBe(120_000);
    expect(s.apiKey).toBe("test-secret");
    expect(s.logLevel).toBe("debug");
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadSettings({}, { RAG_CHUNK_SIZE: "100", RAG_CHUNK_OVERLAP: "100" })).toThrow(ConfigurationError);
    expect(() => loadSettings({}, { RAG_CHUNK_SIZE: "100", RAG_CHUNK_OVERLAP: "100" })).toThrow(
      "Invalid configuration: RAG_CHUNK_OVERLAP: must be smaller than RAG_CHUNK_SIZE (100)"
    );
  });

  it("rejects malformed durations and levels", () => {
    expect(() => loadSettings({}, { RAG_REQUEST_TIMEOUT: "soon" })).toThrow(/RAG_REQUEST_TIMEOUT/);
    expect(() => loadSettings({}, { LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});
