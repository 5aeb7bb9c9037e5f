import type { EmbeddingProvider } from "../types.js";
import { wordTokens } from "../tokenize.js";
import { fnv1a32 } from "../../util/hash.js";

export const DEFAULT_LOCAL_DIMENSION = 384;

/**
 * Local embedding backend: a signed feature-hashed bag of words, L2
 * normalized. Deterministic and offline, so texts sharing vocabulary land
 * close together; it has no notion of synonyms.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;

  constructor(readonly dimension: number = DEFAULT_LOCAL_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`HashingEmbeddingProvider.dimension must be a positive integer, got ${dimension}`);
    }
    this.id = `local:hashing-${dimension}`;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vectorize(t));
  }

  private vectorize(text: string): number[] {
    const v = new Array<number>(this.dimension).fill(0);
    for (const token of wordTokens(text)) {
      const bucket = fnv1a32(token) % this.dimension;
      const sign = fnv1a32("±" + token) & 1 ? 1 : -1;
      v[bucket] += sign;
    }
    return normalize(v);
  }
}

export function normalize(v: number[]): number[] {
  let norm = 0;
  for (const x of v) norm += x * x;
  if (norm === 0) return v;
  const scale = 1 / Math.sqrt(norm);
  return v.map((x) => x * scale);
}
