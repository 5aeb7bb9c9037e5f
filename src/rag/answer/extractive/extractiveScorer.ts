import type { Chunk } from "../../types.js";
import { tokenSet } from "../../tokenize.js";
import { FactoidBoostStrategy } from "./factoidBoost.js";
import type { ScoringStrategy, Sentence, SentenceMatcher } from "./types.js";

export const NO_MATCH_ANSWER = "No exact match found in the retrieved documents.";

export type ScoredSentence = Sentence & {
  score: number;
  bonus: number;
};

export type ExtractiveAnswer = {
  answer: string;
  /** Sentences the answer is made of, best first; empty on no match. */
  selected: ScoredSentence[];
};

export function splitSentences(chunks: readonly Chunk[]): Sentence[] {
  const seen = new Set<string>();
  const out: Sentence[] = [];
  for (const chunk of chunks) {
    const flat = chunk.text.replace(/\s+/g, " ").trim();
    for (const raw of flat.split(/(?<=[.!?])\s+/)) {
      const text = raw.trim();
      // overlapping chunks repeat sentences
      if (!text || seen.has(text)) continue;
      seen.add(text);
      out.push({ text, lower: text.toLowerCase(), tokens: tokenSet(text), chunk, order: out.length });
    }
  }
  return out;
}

/**
 * Ranks sentences of the retrieved chunks by how many question tokens they
 * contain, plus strategy bonuses. Ties go to the shorter sentence, then to
 * the earlier one, so the same input always yields the same answer.
 */
export class ExtractiveScorer {
  constructor(private readonly strategies: readonly ScoringStrategy[] = [new FactoidBoostStrategy()]) {}

  answer(question: string, chunks: readonly Chunk[]): ExtractiveAnswer {
    const questionTokens = tokenSet(question);
    const matchers = this.strategies
      .map((s) => s.analyze(question))
      .filter((m): m is SentenceMatcher => m !== undefined);

    let sentences = splitSentences(chunks);
    const onTopic = sentences.filter((s) => matchers.some((m) => m.onTopic?.(s) ?? false));
    if (onTopic.length > 0) sentences = onTopic;

    const ranked: ScoredSentence[] = sentences
      .map((s) => {
        let overlap = 0;
        for (const t of questionTokens) if (s.tokens.has(t)) overlap++;
        const bonus = matchers.reduce((sum, m) => sum + m.bonus(s), 0);
        return { ...s, score: overlap + bonus, bonus };
      })
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score || a.text.length - b.text.length || a.order - b.order);

    if (ranked.length === 0) return { answer: NO_MATCH_ANSWER, selected: [] };
    const selected = ranked[0].bonus > 0 ? ranked.slice(0, 1) : ranked.slice(0, 2);
    return { answer: selected.map((s) => s.text).join(" "), selected };
  }
}
