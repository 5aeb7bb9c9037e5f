import type { RagSettings } from "../../config/settings.js";
import type { Logger } from "../../logging/logger.js";
import type { EmbeddingProvider } from "../types.js";
import { HashingEmbeddingProvider } from "./hashingEmbedder.js";
import { createOpenAiEmbeddingProvider } from "./aiSdkEmbedder.js";

type SelectionSettings = Pick<
  RagSettings,
  "apiKey" | "embeddingModel" | "embeddingDimensions" | "localEmbeddingDimensions" | "requestTimeoutMs"
>;

/**
 * Hosted embeddings when a credential is configured, the local backend
 * otherwise. Call once per store lifetime and hold on to the result.
 */
export function selectEmbeddingProvider(settings: SelectionSettings, logger?: Logger): EmbeddingProvider {
  const provider = settings.apiKey
    ? createOpenAiEmbeddingProvider({
        apiKey: settings.apiKey,
        embeddingModel: settings.embeddingModel,
        embeddingDimensions: settings.embeddingDimensions,
        requestTimeoutMs: settings.requestTimeoutMs
      })
    : new HashingEmbeddingProvider(settings.localEmbeddingDimensions);
  logger?.info("embeddings.selected", { backend: provider.id, dimension: provider.dimension });
  return provider;
}
