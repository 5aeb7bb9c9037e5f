import type { Chunk } from "../types.js";

/**
 * Keeps the chunks of the requested documents. Without a scope (or with an
 * empty one) the answer sticks to the document of the top-ranked chunk, so
 * unrelated sources are not blended unless the caller asks for it.
 */
export function scopeChunks(chunks: readonly Chunk[], docIds?: readonly string[]): Chunk[] {
  if (chunks.length === 0) return [];
  if (docIds && docIds.length > 0) {
    const scope = new Set(docIds);
    return chunks.filter((c) => scope.has(c.metadata.documentId));
  }
  const top = chunks[0].metadata.documentId;
  return chunks.filter((c) => c.metadata.documentId === top);
}
