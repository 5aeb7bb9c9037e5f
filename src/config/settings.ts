import { z } from "zod";
import type { LogLevel } from "../types.js";
import { LOG_LEVELS } from "../logging/logger.js";
import { ConfigurationError, errorMessage } from "../rag/errors.js";
import { ms } from "../util/time.js";
import { Config } from "./config.js";

export const RAG_ENV_KEYS = [
  "RAG_CHUNK_SIZE",
  "RAG_CHUNK_OVERLAP",
  "RAG_TOP_K",
  "OPENAI_API_KEY",
  "RAG_LLM_MODEL",
  "RAG_EMBEDDING_MODEL",
  "RAG_EMBEDDING_DIMENSIONS",
  "RAG_LOCAL_EMBEDDING_DIMENSIONS",
  "RAG_STORE_DIR",
  "RAG_HISTORY_FILE",
  "RAG_LOG_FILE",
  "RAG_REQUEST_TIMEOUT",
  "LOG_LEVEL",
  "PORT"
] as const;

export type RagSettings = {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  /** Presence selects hosted embeddings and LLM synthesis. */
  apiKey?: string;
  llmModel: string;
  embeddingModel: string;
  embeddingDimensions?: number;
  localEmbeddingDimensions: number;
  storeDir: string;
  historyFile: string;
  logFile: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  port: number;
};

const duration = z.union([
  z.number().int().positive(),
  z.string().transform((value, ctx) => {
    try {
      return ms(value);
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(e) });
      return z.NEVER;
    }
  })
]);

const positiveInt = z.coerce.number().int().positive();

const settingsSchema = z
  .object({
    RAG_CHUNK_SIZE: positiveInt.default(500),
    RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
    RAG_TOP_K: positiveInt.default(4),
    OPENAI_API_KEY: z.string().min(1).optional(),
    RAG_LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
    RAG_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    RAG_EMBEDDING_DIMENSIONS: positiveInt.optional(),
    RAG_LOCAL_EMBEDDING_DIMENSIONS: positiveInt.default(384),
    RAG_STORE_DIR: z.string().min(1).default("data/vector_store"),
    RAG_HISTORY_FILE: z.string().min(1).default("data/metadata.json"),
    RAG_LOG_FILE: z.string().min(1).default("data/rag_app.log"),
    RAG_REQUEST_TIMEOUT: duration.default("30s"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080)
  })
  .superRefine((s, ctx) => {
    if (s.RAG_CHUNK_OVERLAP >= s.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RAG_CHUNK_OVERLAP"],
        message: `must be smaller than RAG_CHUNK_SIZE (${s.RAG_CHUNK_SIZE})`
      });
    }
  })
  .transform((s): RagSettings => ({
    chunkSize: s.RAG_CHUNK_SIZE,
    chunkOverlap: s.RAG_CHUNK_OVERLAP,
    topK: s.RAG_TOP_K,
    apiKey: s.OPENAI_API_KEY,
    llmModel: s.RAG_LLM_MODEL,
    embeddingModel: s.RAG_EMBEDDING_MODEL,
    embeddingDimensions: s.RAG_EMBEDDING_DIMENSIONS,
    localEmbeddingDimensions: s.RAG_LOCAL_EMBEDDING_DIMENSIONS,
    storeDir: s.RAG_STORE_DIR,
    historyFile: s.RAG_HISTORY_FILE,
    logFile: s.RAG_LOG_FILE,
    requestTimeoutMs: s.RAG_REQUEST_TIMEOUT,
    logLevel: s.LOG_LEVEL,
    port: s.PORT
  }));

export function resolveSettings(config: Config): RagSettings {
  const parsed = settingsSchema.safeParse(config.all());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
    throw new ConfigurationError("Invalid configuration: " + issues.join("; "));
  }
  return parsed.data;
}

/** Settings from the environment, with `overrides` applied on top. */
export function loadSettings(overrides: Record<string, unknown> = {}, env: NodeJS.ProcessEnv = process.env): RagSettings {
  const config = new Config().loadEnv(RAG_ENV_KEYS, env).merge(overrides).freeze();
  return resolveSettings(config);
}
