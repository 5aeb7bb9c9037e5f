import type { Chunk } from "../../types.js";

export type Sentence = {
  text: string;
  /** Lower-cased text, for substring checks. */
  lower: string;
  tokens: Set<string>;
  chunk: Chunk;
  /** Position among all sentences of the retrieved chunks. */
  order: number;
};

/** Question-specific view of a scoring strategy. */
export interface SentenceMatcher {
  bonus(sentence: Sentence): number;
  /** When any sentence is on topic, ranking only considers on-topic sentences. */
  onTopic?(sentence: Sentence): boolean;
}

/**
 * Pluggable extra scoring on top of token overlap. Returns `undefined` for
 * questions the strategy has nothing to say about.
 */
export interface ScoringStrategy {
  readonly name: string;
  analyze(question: string): SentenceMatcher | undefined;
}
