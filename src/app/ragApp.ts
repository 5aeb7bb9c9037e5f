import type { RagSettings } from "../config/settings.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { ConsoleSink, FileSink } from "../logging/sinks.js";
import { HealthRegistry, vectorStoreReadiness } from "../health/health.js";
import { HistoryStore } from "../history/historyStore.js";
import { ChatSessions } from "../session/chatMemory.js";
import { TextChunker } from "../rag/chunking/textChunker.js";
import { selectEmbeddingProvider } from "../rag/embeddings/selectProvider.js";
import { DirectoryStorePersistence, type StorePersistence } from "../rag/store/storePersistence.js";
import { VectorStoreManager } from "../rag/store/vectorStoreManager.js";
import { IngestionPipeline, type IngestionReceipt } from "../rag/ingestion/ingestionPipeline.js";
import { AnswerEngine } from "../rag/answer/answerEngine.js";
import { createOpenAiSynthesizer } from "../rag/answer/llmSynthesizer.js";
import { ContentLoader, type ContentLoaderOptions, type LoadRequest } from "../rag/loaders/contentLoader.js";
import type { AnswerResult, AnswerSynthesizer, EmbeddingProvider } from "../rag/types.js";

export type RagAppDeps = {
  logger?: Logger;
  embeddings?: EmbeddingProvider;
  synthesizer?: AnswerSynthesizer;
  persistence?: StorePersistence;
  loader?: Omit<ContentLoaderOptions, "timeoutMs" | "logger">;
  now?: () => Date;
};

export type AskOptions = {
  docIds?: string[];
  /** Turns of this session feed the LLM prompt; the answer is saved back. */
  sessionId?: string;
};

/**
 * Wires the core components from settings. One vector store per app;
 * history bookkeeping never fails a request.
 */
export class RagApp {
  readonly logger: Logger;
  readonly embeddings: EmbeddingProvider;
  readonly store: VectorStoreManager;
  readonly pipeline: IngestionPipeline;
  readonly engine: AnswerEngine;
  readonly loader: ContentLoader;
  readonly history: HistoryStore;
  readonly sessions = new ChatSessions();
  readonly health = new HealthRegistry();

  constructor(readonly settings: RagSettings, deps: RagAppDeps = {}) {
    this.logger = deps.logger ?? defaultLogger(settings);
    this.embeddings = deps.embeddings ?? selectEmbeddingProvider(settings, this.logger);
    this.store = new VectorStoreManager(this.embeddings, {
      persistence: deps.persistence ?? new DirectoryStorePersistence(settings.storeDir),
      logger: this.logger
    });
    this.pipeline = new IngestionPipeline(
      new TextChunker({ chunkSize: settings.chunkSize, chunkOverlap: settings.chunkOverlap }),
      this.store,
      { logger: this.logger, now: deps.now }
    );
    const synthesizer =
      deps.synthesizer ??
      (settings.apiKey
        ? createOpenAiSynthesizer({
            apiKey: settings.apiKey,
            llmModel: settings.llmModel,
            requestTimeoutMs: settings.requestTimeoutMs
          })
        : undefined);
    this.engine = new AnswerEngine(this.store, { topK: settings.topK, synthesizer, logger: this.logger });
    this.loader = new ContentLoader({ ...deps.loader, timeoutMs: settings.requestTimeoutMs, logger: this.logger });
    this.history = new HistoryStore(settings.historyFile, { now: deps.now, logger: this.logger });

    this.health.registerLiveness("process", () => ({ ok: true }));
    this.health.registerReadiness("vectorStore", vectorStoreReadiness(this.store));
    this.logger.info("app.ready", { synthesizer: synthesizer?.model ?? "none", embeddings: this.embeddings.id });
  }

  /** Loads, chunks and indexes one source; throws `LoadError` or `IngestionError`. */
  async ingest(request: LoadRequest): Promise<IngestionReceipt> {
    const loaded = await this.loader.load(request);
    const receipt = await this.pipeline.ingestDocument({
      title: loaded.title,
      text: loaded.text,
      sourceKind: loaded.sourceKind,
      locator: loaded.locator
    });
    if (receipt.chunkCount > 0) {
      await this.record(() => this.history.addUpload(receipt));
    }
    return receipt;
  }

  async ask(question: string, opts: AskOptions = {}): Promise<AnswerResult> {
    const memory = opts.sessionId ? this.sessions.get(opts.sessionId) : undefined;
    const result = await this.engine.answer(question, { docIds: opts.docIds, history: memory?.turns() });
    memory?.save(question, result.answer);
    await this.record(() => this.history.addQuery(question));
    return result;
  }

  async close(): Promise<void> {
    const flushed = await this.store.flush();
    if (!flushed) this.logger.error("app.close.unflushed", { ...this.store.stats() });
    this.logger.flush();
  }

  private async record(write: () => Promise<unknown>) {
    try {
      await write();
    } catch (e) {
      this.logger.warn("history.write.failed", { error: e });
    }
  }
}

export function createRagApp(settings: RagSettings, deps: RagAppDeps = {}): RagApp {
  return new RagApp(settings, deps);
}

function defaultLogger(settings: RagSettings): Logger {
  return createLogger({
    level: settings.logLevel,
    sinks: [new ConsoleSink(), new FileSink(settings.logFile)],
    context: { service: "doc-qa-rag" },
    redact: (key, value) => (/key|secret|token/i.test(key) ? "[redacted]" : value)
  });
}
