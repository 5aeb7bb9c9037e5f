import { describe, it, expect } from "vitest";
import { HealthRegistry, vectorStoreReadiness } from "../health/health.js";
import { HashingEmbeddingProvider } from "../rag/embeddings/hashingEmbedder.js";
import { MemoryStorePersistence } from "../rag/store/storePersistence.js";
import { VectorStoreManager } from "../rag/store/vectorStoreManager.js";
import { chunk } from "./helpers.js";

describe("HealthRegistry", () => {
  it("aggregates checks and reports thrown errors", async () => {
    const health = new HealthRegistry()
      .registerLiveness("ok", () => ({ ok: true }))
      .registerLiveness("broken", () => {
        throw new Error("no heartbeat");
      });
    expect(await health.checkLiveness()).toEqual({
      ok: false,
      details: { ok: { ok: true }, broken: { ok: false, message: "no heartbeat" } }
    });
    expect(await health.checkReadiness()).toEqual({ ok: true, details: {} });
  });
});

describe("vectorStoreReadiness", () => {
  it("is ready for a compatible store", async () => {
    const store = new VectorStoreManager(new HashingEmbeddingProvider(16));
    const result = await vectorStoreReadiness(store)();
    expect(result).toEqual({
      ok: true,
      message: undefined,
      details: { entries: 0, backend: "local:hashing-16", dimension: 16, persistFailures: 0, dirty: false }
    });
  });

  it("is not ready when the store belongs to another backend", async () => {
    const persistence = new MemoryStorePersistence();
    await new VectorStoreManager(new HashingEmbeddingProvider(8), { persistence }).add([chunk("old")]);
    const store = new VectorStoreManager(new HashingEmbeddingProvider(16), { persistence });
    const result = await vectorStoreReadiness(store)();
    expect(result.ok).toBe(false);
    expect(result.message).toBe("store backend local:hashing-8 does not match local:hashing-16");
  });
});
