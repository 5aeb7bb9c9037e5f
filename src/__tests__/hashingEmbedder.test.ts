import { describe, it, expect } from "vitest";
import { HashingEmbeddingProvider } from "../rag/embeddings/hashingEmbedder.js";
import { selectEmbeddingProvider } from "../rag/embeddings/selectProvider.js";
import { cosineSimilarity } from "../rag/store/vectorMath.js";
import { captureLogger } from "./helpers.js";

function norm(v: number[]) {
  return Math.sqrt(v.reduce((s, x) => s + x * x, 0));
}

describe("HashingEmbeddingProvider", () => {
  const provider = new HashingEmbeddingProvider(384);

  it("exposes id and dimension without embedding anything", () => {
    expect(provider.id).toBe("local:hashing-384");
    expect(provider.dimension).toBe(384);
  });

  it("produces deterministic unit vectors", async () => {
    const a = await provider.embed("The capital of France");
    const b = await provider.embed("the CAPITAL of france!");
    expect(a).toHaveLength(384);
    expect(a).toEqual(b);
    expect(norm(a)).toBeCloseTo(1, 10);
  });

  it("maps text without words to the zero vector", async () => {
    const v = await provider.embed("  ... ");
    expect(v.every((x) => x === 0)).toBe(true);
  });

  it("places texts with shared vocabulary closer together", async () => {
    const [q, near, far] = await provider.embedMany(["capital of france", "the capital of france", "bananas yellow fruit"]);
    expect(cosineSimilarity(q, near)).toBeGreaterThan(cosineSimilarity(q, far));
  });

  it("rejects a non-positive dimension", () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow(/positive integer/);
  });
});

describe("selectEmbeddingProvider", () => {
  const base = {
    embeddingModel: "text-embedding-3-small",
    localEmbeddingDimensions: 64,
    requestTimeoutMs: 1000
  };

  it("uses the local backend without a credential", () => {
    const { logger, sink } = captureLogger();
    const provider = selectEmbeddingProvider(base, logger);
    expect(provider.id).toBe("local:hashing-64");
    expect(sink.entries()[0]).toMatchObject({ msg: "embeddings.selected", context: { backend: "local:hashing-64", dimension: 64 } });
  });

  it("uses the hosted backend with a credential", () => {
    const provider = selectEmbeddingProvider({ ...base, apiKey: "test-secret" });
    expect(provider.id).toBe("openai:text-embedding-3-small");
    expect(provider.dimension).toBe(1536);
  });

  it("honours a shortened hosted dimension", () => {
    const provider = selectEmbeddingProvider({ ...base, apiKey: "test-secret", embeddingDimensions: 256 });
    expect(provider.dimension).toBe(256);
  });

  it("needs a dimension for unknown hosted models", () => {
    expect(() => selectEmbeddingProvider({ ...base, apiKey: "test-secret", embeddingModel: "custom-embed" })).toThrow(
      /RAG_EMBEDDING_DIMENSIONS/
    );
  });
});
