import { randomUUID } from "node:crypto";
import type { Chunk, StoreTag } from "../types.js";
import { l2Distance } from "./vectorMath.js";

export type IndexEntry = {
  readonly id: string;
  readonly vector: readonly number[];
  readonly chunk: Chunk;
};

export type Neighbor = {
  entry: IndexEntry;
  distance: number;
};

/**
 * Flat L2 index with its docstore. Every entry pairs exactly one vector with
 * one chunk, so the two can never diverge. Appends replace the entry array,
 * which lets readers keep searching a snapshot taken before the write.
 */
export class VectorStore {
  private entries: readonly IndexEntry[];
  private gen: number;

  constructor(readonly tag: StoreTag, entries: readonly IndexEntry[] = [], generation = 0) {
    for (const e of entries) this.assertDimension(e.vector);
    this.entries = entries;
    this.gen = generation;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Bumped on every append; written to both halves of the durable layout. */
  get generation(): number {
    return this.gen;
  }

  snapshot(): readonly IndexEntry[] {
    return this.entries;
  }

  append(chunks: readonly Chunk[], vectors: readonly (readonly number[])[]): IndexEntry[] {
    if (chunks.length !== vectors.length) {
      throw new Error(`Got ${vectors.length} vectors for ${chunks.length} chunks`);
    }
    vectors.forEach((v) => this.assertDimension(v));
    const added = chunks.map((chunk, i) => ({ id: randomUUID(), vector: vectors[i], chunk }));
    if (added.length) {
      this.entries = [...this.entries, ...added];
      this.gen++;
    }
    return added;
  }

  /** `k` nearest entries by ascending L2 distance; ties keep insertion order. */
  nearest(query: readonly number[], k: number, entries: readonly IndexEntry[] = this.entries): Neighbor[] {
    this.assertDimension(query);
    if (k <= 0) return [];
    return entries
      .map((entry) => ({ entry, distance: l2Distance(query, entry.vector) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, k);
  }

  private assertDimension(vector: readonly number[]) {
    if (vector.length !== this.tag.dimension) {
      throw new Error(`Vector has ${vector.length} dimensions, store expects ${this.tag.dimension}`);
    }
  }
}
