export const SOURCE_KINDS = ["pdf", "webpage", "youtube", "text"] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export type ChunkMetadata = {
  title: string;
  sourceKind: SourceKind;
  /** Stable id assigned at ingestion; scopes retrieval to one ingested item. */
  documentId: string;
  /** Zero-based position in the parent document. Cited, never ranked on. */
  chunkIndex: number;
};

export type Chunk = {
  readonly text: string;
  readonly metadata: Readonly<ChunkMetadata>;
};

export type ScoredChunk = {
  chunk: Chunk;
  /** L2 distance to the query; smaller is closer. */
  distance: number;
};

/** Identifies the embedding backend a store was built with. */
export type StoreTag = {
  backend: string;
  dimension: number;
};

export interface EmbeddingProvider {
  /** Backend identifier persisted with the store, e.g. `openai:text-embedding-3-small`. */
  readonly id: string;
  /** Output length, known without embedding anything. */
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

/** The one retrieval capability the answer engine depends on. */
export interface Retriever {
  retrieve(query: string, k: number): Promise<Chunk[]>;
}

export type ChatTurn = {
  question: string;
  answer: string;
};

export type SynthesisRequest = {
  question: string;
  chunks: readonly Chunk[];
  history?: readonly ChatTurn[];
};

export interface AnswerSynthesizer {
  readonly model: string;
  synthesize(request: SynthesisRequest): Promise<string>;
}

export type AnswerPath = "llm" | "extractive" | "empty" | "error";

export type AnswerResult = {
  answer: string;
  sources: string[];
  path: AnswerPath;
};

export type AnswerOptions = {
  /** Restrict the answer to these documents; without it the top chunk's document is used. */
  docIds?: readonly string[];
  history?: readonly ChatTurn[];
};
