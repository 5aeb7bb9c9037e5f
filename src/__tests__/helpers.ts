import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, type Logger } from "../logging/logger.js";
import { RingBufferSink } from "../logging/sinks.js";
import type { Chunk, SourceKind } from "../rag/types.js";

export function captureLogger(level: "trace" | "debug" | "info" = "debug"): { logger: Logger; sink: RingBufferSink } {
  const sink = new RingBufferSink(200);
  return { logger: createLogger({ level, sinks: [sink] }), sink };
}

export function chunk(text: string, documentId = "doc-1", chunkIndex = 0, title = "doc", sourceKind: SourceKind = "text"): Chunk {
  return { text, metadata: { title, sourceKind, documentId, chunkIndex } };
}

export async function tempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "doc-qa-rag-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
