import { createOpenAI } from "@ai-sdk/openai";
import { embed, embedMany, type EmbeddingModel } from "ai";
import type { EmbeddingProvider } from "../types.js";
import { ConfigurationError } from "../errors.js";

/** Native output sizes of the hosted embedding models we know about. */
const OPENAI_EMBEDDING_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536
};

/** Models that accept a `dimensions` request option. */
const SHORTENABLE = new Set(["text-embedding-3-small", "text-embedding-3-large"]);

export type AiSdkEmbeddingOptions = {
  model: EmbeddingModel<string>;
  id: string;
  dimension: number;
  timeoutMs: number;
  maxRetries?: number;
  /** Forwarded as `providerOptions.openai.dimensions` when set. */
  requestDimensions?: number;
};

/**
 * Hosted embedding backend over the AI SDK. Every call is bounded by
 * `timeoutMs`; returned vectors are checked against `dimension`.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  readonly dimension: number;

  constructor(private opts: AiSdkEmbeddingOptions) {
    this.id = opts.id;
    this.dimension = opts.dimension;
  }

  async embed(text: string): Promise<number[]> {
    const { embedding } = await embed({
      model: this.opts.model,
      value: text,
      maxRetries: this.opts.maxRetries ?? 1,
      abortSignal: AbortSignal.timeout(this.opts.timeoutMs),
      providerOptions: this.providerOptions()
    });
    return this.checked(embedding);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const { embeddings } = await embedMany({
      model: this.opts.model,
      values: texts,
      maxRetries: this.opts.maxRetries ?? 1,
      abortSignal: AbortSignal.timeout(this.opts.timeoutMs),
      providerOptions: this.providerOptions()
    });
    return embeddings.map((e) => this.checked(e));
  }

  private providerOptions() {
    return this.opts.requestDimensions ? { openai: { dimensions: this.opts.requestDimensions } } : undefined;
  }

  private checked(vector: number[]): number[] {
    if (vector.length !== this.dimension) {
      throw new Error(`${this.id} returned ${vector.length} dimensions, expected ${this.dimension}`);
    }
    return vector;
  }
}

export type OpenAiEmbeddingSettings = {
  apiKey: string;
  embeddingModel: string;
  embeddingDimensions?: number;
  requestTimeoutMs: number;
};

export function createOpenAiEmbeddingProvider(settings: OpenAiEmbeddingSettings): AiSdkEmbeddingProvider {
  const modelId = settings.embeddingModel;
  const native = OPENAI_EMBEDDING_DIMENSIONS[modelId];
  const dimension = settings.embeddingDimensions ?? native;
  if (dimension === undefined) {
    throw new ConfigurationError(
      `Unknown output size for embedding model "${modelId}"; set RAG_EMBEDDING_DIMENSIONS`
    );
  }
  const shortened = native !== undefined && dimension !== native;
  if (shortened && !SHORTENABLE.has(modelId)) {
    throw new ConfigurationError(`Embedding model "${modelId}" only produces ${native} dimensions`);
  }
  const provider = createOpenAI({ apiKey: settings.apiKey });
  return new AiSdkEmbeddingProvider({
    model: provider.textEmbeddingModel(modelId),
    id: `openai:${modelId}`,
    dimension,
    timeoutMs: settings.requestTimeoutMs,
    requestDimensions: shortened ? dimension : undefined
  });
}
