/**
 * Deviation Scorer
 * Scores content similarity between two homilies of the same weekend and
 * flags the pair when it falls below the configured threshold.
 */

import type { HomilyConfig } from "../../config/homily.js";
import type { PairKey } from "../../types/homily.js";
import { InvalidComparisonScopeError } from "../../utils/errors.js";
import { SIMILARITY_METRICS, type SimilarityMetric } from "./similarityMetrics.js";

export interface ScorableHomily {
  recording_id: string;
  weekend_group_id: string;
  normalized_text: string;
}

export interface DeviationScore extends PairKey {
  similarity_score: number;
  deviation_flagged: boolean;
  metric: string;
}

export interface DeviationScorer {
  readonly metric: SimilarityMetric;
  readonly threshold: number;
  score(a: ScorableHomily, b: ScorableHomily): DeviationScore;
}

/**
 * Canonical key for an unordered pair: the lexicographically smaller id is `a`.
 */
export function toPairKey(weekendGroupId: string, recordingId1: string, recordingId2: string): PairKey {
  const [a, b] = recordingId1 < recordingId2 ? [recordingId1, recordingId2] : [recordingId2, recordingId1];
  return { weekend_group_id: weekendGroupId, recording_id_a: a, recording_id_b: b };
}

export function pairKeyString(key: PairKey): string {
  return `${key.weekend_group_id}:${key.recording_id_a}:${key.recording_id_b}`;
}

/**
 * Rejects pairs that are not two distinct recordings of one weekend group.
 */
export function assertComparable(a: ScorableHomily, b: ScorableHomily): void {
  if (a.weekend_group_id !== b.weekend_group_id) {
    throw new InvalidComparisonScopeError(
      a.recording_id,
      `cannot compare with ${b.recording_id}: weekend group ${a.weekend_group_id} differs from ${b.weekend_group_id}`
    );
  }
  if (a.recording_id === b.recording_id) {
    throw new InvalidComparisonScopeError(a.recording_id, "cannot compare a recording with itself");
  }
}

function tokens(normalizedText: string): string[] {
  return normalizedText.split(" ").filter((token) => token.length > 0);
}

export function createDeviationScorer(options: {
  metric: SimilarityMetric;
  deviationThreshold: number;
}): DeviationScorer {
  const { metric, deviationThreshold } = options;

  return {
    metric,
    threshold: deviationThreshold,
    score(a, b) {
      assertComparable(a, b);

      const key = toPairKey(a.weekend_group_id, a.recording_id, b.recording_id);
      // Score in canonical order so (A, B) and (B, A) give bit-identical values
      const [first, second] = key.recording_id_a === a.recording_id ? [a, b] : [b, a];
      const raw = metric.score(tokens(first.normalized_text), tokens(second.normalized_text));
      const similarity = Math.min(1, Math.max(0, raw));

      return {
        ...key,
        similarity_score: similarity,
        deviation_flagged: similarity < deviationThreshold,
        metric: metric.name,
      };
    },
  };
}

export function createDeviationScorerFromConfig(config: HomilyConfig): DeviationScorer {
  return createDeviationScorer({
    metric: SIMILARITY_METRICS[config.similarity_metric],
    deviationThreshold: config.deviation_threshold,
  });
}
