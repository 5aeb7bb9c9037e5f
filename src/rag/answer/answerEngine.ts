import type { AnswerOptions, AnswerResult, AnswerSynthesizer, Chunk, Retriever } from "../types.js";
import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../../logging/logger.js";
import { scopeChunks } from "./scopeFilter.js";
import { citationsFor } from "./citations.js";
import { ExtractiveScorer } from "./extractive/extractiveScorer.js";

export const NO_DOCUMENTS_ANSWER = "No documents found. Ingest data first.";
export const RETRIEVAL_ERROR_ANSWER = "Error retrieving relevant documents. Please try again.";
export const FALLBACK_ERROR_ANSWER = "An error occurred while retrieving documents.";

export type AnswerEngineOptions = {
  topK: number;
  /** Absent when no LLM credential is configured. */
  synthesizer?: AnswerSynthesizer;
  scorer?: ExtractiveScorer;
  /** Chat turns passed to the LLM as advisory context. */
  historyTurns?: number;
  logger?: Logger;
};

type FallbackReason = "no_synthesizer" | "synthesis_failed";

type EngineState =
  | { name: "retrieve" }
  | { name: "llm_synthesize"; chunks: Chunk[] }
  | { name: "extractive_fallback"; chunks: Chunk[]; reason: FallbackReason }
  | { name: "done"; result: AnswerResult };

/**
 * retrieve → llm_synthesize → done, dropping to extractive_fallback when
 * there is no synthesizer or it fails. Every failure below this class turns
 * into a textual answer; `answer` never rejects.
 */
export class AnswerEngine {
  private readonly logger: Logger;
  private readonly scorer: ExtractiveScorer;

  constructor(
    private readonly retriever: Retriever,
    private readonly opts: AnswerEngineOptions
  ) {
    this.logger = (opts.logger ?? silentLogger()).child({ component: "answer" });
    this.scorer = opts.scorer ?? new ExtractiveScorer();
  }

  get hasSynthesizer(): boolean {
    return this.opts.synthesizer !== undefined;
  }

  async answer(question: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    try {
      let state: EngineState = { name: "retrieve" };
      while (state.name !== "done") {
        const next: EngineState = await this.step(state, question, options);
        this.logger.debug("answer.transition", { from: state.name, to: next.name });
        state = next;
      }
      return state.result;
    } catch (e) {
      this.logger.error("answer.unexpected", { error: e });
      return { answer: `An unexpected error occurred: ${errorMessage(e)}`, sources: [], path: "error" };
    }
  }

  private step(state: Exclude<EngineState, { name: "done" }>, question: string, options: AnswerOptions): Promise<EngineState> {
    switch (state.name) {
      case "retrieve":
        return this.retrieve(question, options);
      case "llm_synthesize":
        return this.synthesize(question, state.chunks, options);
      case "extractive_fallback":
        return Promise.resolve(this.extract(question, state.chunks, state.reason));
    }
  }

  private async retrieve(question: string, options: AnswerOptions): Promise<EngineState> {
    let retrieved: Chunk[];
    try {
      retrieved = await this.retriever.retrieve(question, this.opts.topK);
    } catch (e) {
      this.logger.warn("answer.retrieve.failed", { error: e });
      return done({ answer: RETRIEVAL_ERROR_ANSWER, sources: [], path: "error" });
    }
    const chunks = scopeChunks(retrieved, options.docIds);
    if (chunks.length === 0) {
      this.logger.info("answer.no_content", { retrieved: retrieved.length, scoped: options.docIds?.length ?? 0 });
      return done({ answer: NO_DOCUMENTS_ANSWER, sources: [], path: "empty" });
    }
    return this.opts.synthesizer
      ? { name: "llm_synthesize", chunks }
      : { name: "extractive_fallback", chunks, reason: "no_synthesizer" };
  }

  private async synthesize(question: string, chunks: Chunk[], options: AnswerOptions): Promise<EngineState> {
    const synthesizer = this.opts.synthesizer;
    if (!synthesizer) return { name: "extractive_fallback", chunks, reason: "no_synthesizer" };
    const turns = this.opts.historyTurns ?? 3;
    const history = turns > 0 ? options.history?.slice(-turns) : undefined;
    try {
      const text = (await synthesizer.synthesize({ question, chunks, history })).trim();
      if (!text) throw new Error("LLM returned an empty answer");
      return done({ answer: text, sources: citationsFor(chunks), path: "llm" });
    } catch (e) {
      this.logger.warn("answer.llm.failed", { model: synthesizer.model, error: e });
      return { name: "extractive_fallback", chunks, reason: "synthesis_failed" };
    }
  }

  private extract(question: string, chunks: Chunk[], reason: FallbackReason): EngineState {
    try {
      const { answer, selected } = this.scorer.answer(question, chunks);
      this.logger.debug("answer.extractive", { reason, sentences: selected.length });
      return done({ answer, sources: citationsFor(selected.map((s) => s.chunk)), path: "extractive" });
    } catch (e) {
      this.logger.error("answer.extractive.failed", { error: e });
      return done({ answer: FALLBACK_ERROR_ANSWER, sources: [], path: "error" });
    }
  }
}

function done(result: AnswerResult): EngineState {
  return { name: "done", result };
}
