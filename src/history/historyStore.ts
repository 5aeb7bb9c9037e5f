import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { SOURCE_KINDS } from "../rag/types.js";
import type { IngestionReceipt } from "../rag/ingestion/ingestionPipeline.js";
import { WriteLock } from "../locks/writeLock.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { displayTimestamp } from "../util/time.js";

const uploadSchema = z.object({
  time: z.string(),
  type: z.enum(SOURCE_KINDS),
  title: z.string(),
  docId: z.string(),
  chunks: z.number().int().nonnegative().optional()
});

const querySchema = z.object({
  time: z.string(),
  question: z.string()
});

const historySchema = z.object({
  uploads: z.array(uploadSchema).default([]),
  queries: z.array(querySchema).default([])
});

export type UploadRecord = z.infer<typeof uploadSchema>;
export type QueryRecord = z.infer<typeof querySchema>;
export type HistoryData = { uploads: UploadRecord[]; queries: QueryRecord[] };

export type HistoryStoreOptions = {
  now?: () => Date;
  /** Per list; oldest records are dropped first. */
  maxEntries?: number;
  logger?: Logger;
};

/**
 * Upload and query history in one JSON file, newest first. A missing or
 * unreadable file reads as empty history.
 */
export class HistoryStore {
  private readonly lock = new WriteLock();
  private readonly now: () => Date;
  private readonly maxEntries: number;
  private readonly logger: Logger;

  constructor(readonly path: string, opts: HistoryStoreOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.maxEntries = opts.maxEntries ?? 500;
    this.logger = (opts.logger ?? silentLogger()).child({ component: "history" });
  }

  async read(): Promise<HistoryData> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (e) {
      if (!isNotFound(e)) this.logger.warn("history.unreadable", { path: this.path, error: e });
      return { uploads: [], queries: [] };
    }
    try {
      return historySchema.parse(JSON.parse(raw));
    } catch (e) {
      this.logger.warn("history.invalid", { path: this.path, error: e });
      return { uploads: [], queries: [] };
    }
  }

  addUpload(receipt: IngestionReceipt): Promise<HistoryData> {
    const record: UploadRecord = {
      time: displayTimestamp(this.now()),
      type: receipt.sourceKind,
      title: receipt.title,
      docId: receipt.documentId,
      chunks: receipt.chunkCount
    };
    return this.update((h) => ({ ...h, uploads: [record, ...h.uploads].slice(0, this.maxEntries) }));
  }

  addQuery(question: string): Promise<HistoryData> {
    const record: QueryRecord = { time: displayTimestamp(this.now()), question };
    return this.update((h) => ({ ...h, queries: [record, ...h.queries].slice(0, this.maxEntries) }));
  }

  clearUploads(): Promise<HistoryData> {
    return this.update((h) => ({ ...h, uploads: [] }));
  }

  clearQueries(): Promise<HistoryData> {
    return this.update((h) => ({ ...h, queries: [] }));
  }

  private update(fn: (h: HistoryData) => HistoryData): Promise<HistoryData> {
    return this.lock.run(async () => {
      const next = fn(await this.read());
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(next, null, 2), "utf8");
      return next;
    });
  }
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
