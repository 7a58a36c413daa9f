/**
 * Maximal Marginal Relevance
 *
 *   mmr(d) = λ · sim(d, q) − (1 − λ) · max_{s ∈ S} sim(d, s)
 *
 * λ = 1 is pure relevance, λ = 0 pure diversity.
 */

export interface MmrCandidate {
  /** Similarity to the query */
  score: number;
  vector: number[];
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Greedy MMR selection. Returns pool indices in selection order;
 * ties go to the lower index.
 */
export function selectByMmr(
  candidates: MmrCandidate[],
  k: number,
  lambda: number,
): number[] {
  const limit = Math.min(k, candidates.length);
  const selected: number[] = [];
  const remaining = new Set(candidates.map((_, i) => i));
  // Highest similarity to anything already selected, per candidate
  const redundancy = new Array<number>(candidates.length).fill(-Infinity);

  while (selected.length < limit) {
    let best = -1;
    let bestScore = -Infinity;

    for (const i of remaining) {
      const penalty = selected.length === 0 ? 0 : redundancy[i];
      const score = lambda * candidates[i].score - (1 - lambda) * penalty;
      if (score > bestScore) {
        best = i;
        bestScore = score;
      }
    }

    if (best === -1) {
      break;
    }

    selected.push(best);
    remaining.delete(best);
    for (const i of remaining) {
      redundancy[i] = Math.max(
        redundancy[i],
        cosineSimilarity(candidates[i].vector, candidates[best].vector),
      );
    }
  }

  return selected;
}
