import type { ScoringStrategy, Sentence, SentenceMatcher } from "./types.js";

export const DEFAULT_RELATION_KEYWORDS = [
  "capital",
  "president",
  "prime minister",
  "king",
  "queen",
  "leader",
  "mayor",
  "ceo",
  "founder",
  "author",
  "inventor",
  "director",
  "creator",
  "owner",
  "population",
  "currency",
  "language",
  "birthplace"
];

export const FACTOID_BONUS = 10;

/**
 * "X of Y" factoids: a question naming a relation keyword followed by
 * `of <Entity>` ("What is the capital of France?") boosts sentences that
 * mention both, so the answer is the one precise sentence. Everything else
 * falls through to plain token overlap.
 */
export class FactoidBoostStrategy implements ScoringStrategy {
  readonly name = "factoid-boost";
  private readonly pattern: RegExp;

  constructor(
    keywords: readonly string[] = DEFAULT_RELATION_KEYWORDS,
    private readonly bonus = FACTOID_BONUS
  ) {
    const alternatives = [...keywords]
      .sort((a, b) => b.length - a.length)
      .map((k) => k.replace(/[.*+?^${}()|[\]\\]/g, "\\$&").replace(/\s+/g, "\\s+"))
      .join("|");
    this.pattern = new RegExp(`\\b(${alternatives})\\s+of\\s+(?:the\\s+)?([^?.!,;:]+)`, "iu");
  }

  analyze(question: string): SentenceMatcher | undefined {
    const m = this.pattern.exec(question);
    if (!m) return undefined;
    const relation = m[1].toLowerCase().replace(/\s+/g, " ");
    const entity = m[2].trim().toLowerCase();
    if (!entity) return undefined;
    const bonus = this.bonus;
    return {
      bonus: (s: Sentence) => (s.lower.includes(relation) && s.lower.includes(entity) ? bonus : 0),
      onTopic: (s: Sentence) => s.lower.includes(entity)
    };
  }
}
