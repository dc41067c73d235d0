/**
 * Similarity Metrics
 * Token-level similarity strategies for normalized homily text.
 *
 * Every metric must be symmetric, score identical texts 1, stay within
 * [0, 1], and fall as the texts drift apart.
 */

export interface SimilarityMetric {
  readonly name: string;
  score(a: readonly string[], b: readonly string[]): number;
}

function bothEmpty(a: readonly string[], b: readonly string[]): boolean {
  return a.length === 0 && b.length === 0;
}

/**
 * Longest common subsequence length over tokens. O(n·m) time, O(min(n, m)) memory.
 */
export function lcsLength(a: readonly string[], b: readonly string[]): number {
  const [longer, shorter] = a.length >= b.length ? [a, b] : [b, a];
  let previous = new Uint32Array(shorter.length + 1);
  let current = new Uint32Array(shorter.length + 1);

  for (let i = 1; i <= longer.length; i++) {
    for (let j = 1; j <= shorter.length; j++) {
      current[j] =
        longer[i - 1] === shorter[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[shorter.length];
}

/** 2·LCS / (|a| + |b|): rewards shared wording in the same order. */
export const lcsRatio: SimilarityMetric = {
  name: "lcs_ratio",
  score(a, b) {
    if (bothEmpty(a, b)) return 1;
    return (2 * lcsLength(a, b)) / (a.length + b.length);
  },
};

/** |A ∩ B| / |A ∪ B| over distinct tokens: ignores order and repetition. */
export const tokenJaccard: SimilarityMetric = {
  name: "token_jaccard",
  score(a, b) {
    if (bothEmpty(a, b)) return 1;
    const setA = new Set(a);
    const setB = new Set(b);
    let shared = 0;
    for (const token of setA) {
      if (setB.has(token)) shared++;
    }
    return shared / (setA.size + setB.size - shared);
  },
};

export const SIMILARITY_METRICS = {
  lcs_ratio: lcsRatio,
  token_jaccard: tokenJaccard,
} as const satisfies Record<string, SimilarityMetric>;

export type SimilarityMetricName = keyof typeof SIMILARITY_METRICS;
