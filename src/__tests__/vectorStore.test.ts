import { describe, it, expect } from "vitest";
import { cosineSimilarity, l2Distance, maximalMarginalRelevance } from "../rag/store/vectorMath.js";
import { VectorStore } from "../rag/store/vectorStore.js";
import { chunk } from "./helpers.js";

describe("vector math", () => {
  it("computes L2 distance and cosine similarity", () => {
    expect(l2Distance([0, 0], [3, 4])).toBe(5);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it("prefers a diverse second pick over a duplicate", () => {
    const query = [0.8, 0.6];
    const candidates = [[1, 0], [1, 0], [0, 1]];
    expect(maximalMarginalRelevance(query, candidates, 2, 0.5)).toEqual([0, 2]);
    expect(maximalMarginalRelevance(query, candidates, 2, 1)).toEqual([0, 1]);
  });

  it("never picks more than it has", () => {
    expect(maximalMarginalRelevance([1, 0], [[1, 0]], 4)).toEqual([0]);
    expect(maximalMarginalRelevance([1, 0], [], 4)).toEqual([]);
  });
});

describe("VectorStore", () => {
  const tag = { backend: "test", dimension: 2 };

  it("appends with copy-on-write snapshots and bumps the generation", () => {
    const store = new VectorStore(tag);
    const before = store.snapshot();
    const added = store.append([chunk("a"), chunk("b")], [[1, 0], [0, 1]]);
    expect(added.map((e) => e.chunk.text)).toEqual(["a", "b"]);
    expect(new Set(added.map((e) => e.id)).size).toBe(2);
    expect(before).toHaveLength(0);
    expect(store.size).toBe(2);
    expect(store.generation).toBe(1);
    store.append([], []);
    expect(store.generation).toBe(1);
  });

  it("returns nearest entries by ascending distance", () => {
    const store = new VectorStore(tag);
    store.append([chunk("far"), chunk("near"), chunk("mid")], [[-1, 0], [1, 0], [0, 1]]);
    const result = store.nearest([1, 0.1], 2);
    expect(result.map((n) => n.entry.chunk.text)).toEqual(["near", "mid"]);
    expect(result[0].distance).toBeCloseTo(0.1, 10);
  });

  it("rejects vectors of the wrong dimension", () => {
    const store = new VectorStore(tag);
    expect(() => store.append([chunk("a")], [[1, 0, 0]])).toThrow(/3 dimensions/);
    expect(() => store.append([chunk("a")], [])).toThrow(/0 vectors for 1 chunks/);
    expect(() => store.nearest([1], 1)).toThrow(/expects 2/);
  });
});
