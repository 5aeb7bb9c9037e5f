import { randomUUID } from "node:crypto";
import type { Chunk, SourceKind } from "../types.js";
import type { Chunker } from "../chunking/textChunker.js";
import type { VectorStoreManager } from "../store/vectorStoreManager.js";
import { IngestionError } from "../errors.js";
import { silentLogger, type Logger } from "../../logging/logger.js";
import { compactTimestamp } from "../../util/time.js";

export type IngestionRequest = {
  title: string;
  text: string;
  sourceKind: SourceKind;
  /** Caller-assigned id; derived from kind + locator/title/time when absent. */
  documentId?: string;
  /** File name or URL the text came from. */
  locator?: string;
};

/** What an upload history record needs. */
export type IngestionReceipt = {
  documentId: string;
  title: string;
  sourceKind: SourceKind;
  chunkCount: number;
};

export type IngestionPipelineOptions = {
  logger?: Logger;
  now?: () => Date;
};

/**
 * `<kind>:<locator>` for fetched or uploaded content,
 * `text:<yyyyMMddHHmmss>-<8 hex>` for pasted text, `<kind>:<title>` otherwise.
 * Pasted texts get a fresh id on every call.
 */
export function deriveDocumentId(
  sourceKind: SourceKind,
  ref: { title: string; locator?: string },
  now: Date = new Date()
): string {
  if (ref.locator) return `${sourceKind}:${ref.locator}`;
  if (sourceKind === "text") return `text:${compactTimestamp(now)}-${randomUUID().slice(0, 8)}`;
  return `${sourceKind}:${ref.title}`;
}

export class IngestionPipeline {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly chunker: Chunker,
    private readonly store: VectorStoreManager,
    opts: IngestionPipelineOptions = {}
  ) {
    this.logger = (opts.logger ?? silentLogger()).child({ component: "ingestion" });
    this.now = opts.now ?? (() => new Date());
  }

  /** Number of chunks written; 0 when the text held nothing to index. */
  async ingest(title: string, text: string, sourceKind: SourceKind = "text", documentId?: string): Promise<number> {
    const receipt = await this.ingestDocument({ title, text, sourceKind, documentId });
    return receipt.chunkCount;
  }

  async ingestDocument(request: IngestionRequest): Promise<IngestionReceipt> {
    const { title, text, sourceKind } = request;
    const documentId = request.documentId ?? deriveDocumentId(sourceKind, request, this.now());
    try {
      const pieces = await this.chunker.split(text);
      if (pieces.length === 0) {
        this.logger.warn("ingest.empty", { title, documentId });
        return { documentId, title, sourceKind, chunkCount: 0 };
      }
      const chunks: Chunk[] = pieces.map((piece, chunkIndex) => ({
        text: piece,
        metadata: { title, sourceKind, documentId, chunkIndex }
      }));
      await this.store.add(chunks);
      this.logger.info("ingest.done", { title, documentId, chunks: chunks.length });
      return { documentId, title, sourceKind, chunkCount: chunks.length };
    } catch (e) {
      this.logger.error("ingest.failed", { title, documentId, error: e });
      throw new IngestionError(title, e);
    }
  }
}
