import type { Chunk } from "../types.js";

export function formatCitation(chunk: Chunk): string {
  const { title, sourceKind, chunkIndex } = chunk.metadata;
  const label = title || sourceKind || "unknown";
  const index = Number.isInteger(chunkIndex) ? String(chunkIndex) : "N/A";
  return `Source: ${label} (chunk ${index})`;
}

/** One citation per distinct chunk, in first-use order. */
export function citationsFor(chunks: readonly Chunk[]): string[] {
  const seen = new Set<Chunk>();
  const out: string[] = [];
  for (const c of chunks) {
    if (seen.has(c)) continue;
    seen.add(c);
    out.push(formatCitation(c));
  }
  return out;
}
