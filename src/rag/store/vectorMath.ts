export function l2Distance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  return magA && magB ? dot / (Math.sqrt(magA) * Math.sqrt(magB)) : 0;
}

/**
 * Maximal marginal relevance: greedily picks `k` candidate indices, trading
 * similarity to the query (weight `lambda`) against the highest similarity
 * to anything already picked. The first pick is the candidate closest to the
 * query; ties go to the earlier candidate.
 */
export function maximalMarginalRelevance(
  query: readonly number[],
  candidates: readonly (readonly number[])[],
  k: number,
  lambda = 0.5
): number[] {
  const limit = Math.min(k, candidates.length);
  if (limit <= 0) return [];

  const toQuery = candidates.map((c) => cosineSimilarity(query, c));
  const selected: number[] = [];
  // running max similarity of each candidate to the selected set
  const toSelected = new Array<number>(candidates.length).fill(-Infinity);

  while (selected.length < limit) {
    let bestIndex = -1;
    let bestScore = -Infinity;
    for (let i = 0; i < candidates.length; i++) {
      if (selected.includes(i)) continue;
      const redundancy = selected.length === 0 ? 0 : toSelected[i];
      const score = selected.length === 0 ? toQuery[i] : lambda * toQuery[i] - (1 - lambda) * redundancy;
      if (score > bestScore) {
        bestScore = score;
        bestIndex = i;
      }
    }
    selected.push(bestIndex);
    const picked = candidates[bestIndex];
    for (let i = 0; i < candidates.length; i++) {
      toSelected[i] = Math.max(toSelected[i], cosineSimilarity(candidates[i], picked));
    }
  }
  return selected;
}
