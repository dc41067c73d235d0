import { describe, it, expect } from "vitest";
import {
  createDeviationScorer,
  createDeviationScorerFromConfig,
  toPairKey,
  type ScorableHomily,
} from "../../src/services/business/deviationScorer.js";
import { lcsLength, lcsRatio, tokenJaccard } from "../../src/services/business/similarityMetrics.js";
import { buildHomilyConfig } from "../../src/config/homily.js";
import { InvalidComparisonScopeError } from "../../src/utils/errors.js";

function homily(recordingId: string, text: string, weekend = "2026-10-18"): ScorableHomily {
  return { recording_id: recordingId, weekend_group_id: weekend, normalized_text: text };
}

describe("similarity metrics", () => {
  it("computes the longest common token subsequence", () => {
    expect(lcsLength(["a", "b", "c", "d"], ["b", "d"])).toBe(2);
    expect(lcsLength(["a", "b"], [])).toBe(0);
  });

  it("scores lcs_ratio as 2·LCS over total length", () => {
    // LCS "a c" = 2, total 3 + 3
    expect(lcsRatio.score(["a", "b", "c"], ["a", "x", "c"])).toBeCloseTo(2 / 3, 10);
    expect(lcsRatio.score([], [])).toBe(1);
  });

  it("scores token_jaccard over distinct tokens", () => {
    // {a,b,c} vs {b,c,d}: 2 shared of 4
    expect(tokenJaccard.score(["a", "b", "c", "c"], ["b", "c", "d"])).toBe(0.5);
    expect(tokenJaccard.score([], [])).toBe(1);
  });
});

describe("createDeviationScorer", () => {
  const scorer = createDeviationScorer({ metric: lcsRatio, deviationThreshold: 0.6 });

  it("scores identical homilies 1 and does not flag them", () => {
    const text = "brothers and sisters today we hear the parable of the sower";
    const result = scorer.score(homily("b", text), homily("a", text));

    expect(result).toEqual({
      weekend_group_id: "2026-10-18",
      recording_id_a: "a",
      recording_id_b: "b",
      similarity_score: 1,
      deviation_flagged: false,
      metric: "lcs_ratio",
    });
  });

  it("is symmetric", () => {
    const a = homily("rec-a", "the kingdom of god is like a mustard seed");
    const b = homily("rec-b", "the kingdom is like yeast that a woman took");
    expect(scorer.score(a, b)).toEqual(scorer.score(b, a));
  });

  it("flags homilies with disjoint content", () => {
    const result = scorer.score(
      homily("rec-a", "mercy forgiveness prodigal son father"),
      homily("rec-b", "stewardship budget parking lot renovation")
    );
    expect(result.similarity_score).toBe(0);
    expect(result.deviation_flagged).toBe(true);
  });

  it("flags exactly below the threshold", () => {
    // LCS 3 of 5 + 5 tokens = 0.6
    const atThreshold = scorer.score(homily("a", "a b c d e"), homily("b", "a b c x y"));
    expect(atThreshold.similarity_score).toBeCloseTo(0.6, 10);
    expect(atThreshold.deviation_flagged).toBe(false);

    const below = scorer.score(homily("a", "a b c d e"), homily("b", "a b x y z"));
    expect(below.similarity_score).toBeCloseTo(0.4, 10);
    expect(below.deviation_flagged).toBe(true);
  });

  it("rejects recordings from different weekends", () => {
    expect(() => scorer.score(homily("a", "x", "2026-10-18"), homily("b", "x", "2026-10-25"))).toThrow(
      InvalidComparisonScopeError
    );
  });

  it("rejects comparing a recording with itself", () => {
    expect(() => scorer.score(homily("a", "x"), homily("a", "x"))).toThrow("cannot compare a recording with itself");
  });
});

describe("score as wording drifts", () => {
  const base = ["the", "sower", "went", "out", "to", "sow", "his", "seed", "along", "path"];
  const replacements = ["harvest", "vineyard", "shepherd", "lamp", "mustard", "pearl", "talents", "leaven", "fig", "net"];

  function withReplaced(count: number): string {
    return base.map((token, i) => (i < count ? replacements[i] : token)).join(" ");
  }

  it.each([lcsRatio, tokenJaccard])("never rises as more tokens change under $name", (metric) => {
    const scorer = createDeviationScorer({ metric, deviationThreshold: 0.6 });
    const scores = base.map((_, count) =>
      scorer.score(homily("a", withReplaced(0)), homily("b", withReplaced(count + 1))).similarity_score
    );

    let previous = 1;
    for (const score of scores) {
      expect(score).toBeLessThan(previous);
      previous = score;
    }
    expect(scores[scores.length - 1]).toBe(0);
  });

  it("follows the edit count exactly for lcs_ratio", () => {
    const scorer = createDeviationScorer({ metric: lcsRatio, deviationThreshold: 0.6 });
    const scores = [1, 2, 3].map(
      (count) => scorer.score(homily("a", withReplaced(0)), homily("b", withReplaced(count))).similarity_score
    );
    expect(scores).toEqual([0.9, 0.8, 0.7]);
  });
});

describe("createDeviationScorerFromConfig", () => {
  it("uses the configured metric and threshold", () => {
    const scorer = createDeviationScorerFromConfig(
      buildHomilyConfig({ similarity_metric: "token_jaccard", deviation_threshold: 0.75 })
    );
    expect(scorer.metric.name).toBe("token_jaccard");
    expect(scorer.threshold).toBe(0.75);
  });
});

describe("toPairKey", () => {
  it("orders the pair canonically", () => {
    expect(toPairKey("2026-10-18", "rec-b", "rec-a")).toEqual({
      weekend_group_id: "2026-10-18",
      recording_id_a: "rec-a",
      recording_id_b: "rec-b",
    });
  });
});
