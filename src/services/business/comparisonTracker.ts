/**
 * Comparison State Tracker
 * Makes pair scoring idempotent: each unordered pair of a weekend group is
 * scored at most once, and later runs get the stored result back.
 *
 * The check-then-insert runs under a pair-scoped lock in this process and
 * relies on the store's atomic insert-if-absent across processes.
 */

import type { ComparisonStore } from "../../repositories/types.js";
import type { ComparisonResult, PairKey } from "../../types/homily.js";
import { NotFoundError } from "../../utils/errors.js";
import { KeyedLock } from "../../utils/keyedLock.js";
import {
  assertComparable,
  pairKeyString,
  toPairKey,
  type DeviationScorer,
  type ScorableHomily,
} from "./deviationScorer.js";

export interface TrackedComparison {
  result: ComparisonResult;
  /** True when the result was already stored and not recomputed. */
  cached: boolean;
}

export interface ComparisonTracker {
  compareOnce(a: ScorableHomily, b: ScorableHomily): Promise<TrackedComparison>;
  listPendingNotifications(weekendGroupId?: string): Promise<ComparisonResult[]>;
  markNotified(key: PairKey): Promise<ComparisonResult>;
  hasComparedAll(weekendGroupId: string, recordingId: string, siblingIds: readonly string[]): Promise<boolean>;
}

export interface ComparisonTrackerDeps {
  store: ComparisonStore;
  scorer: DeviationScorer;
  lock?: KeyedLock;
  now?: () => Date;
}

export function createComparisonTracker(deps: ComparisonTrackerDeps): ComparisonTracker {
  const { store, scorer } = deps;
  const lock = deps.lock ?? new KeyedLock();
  const now = deps.now ?? (() => new Date());

  return {
    async compareOnce(a, b) {
      assertComparable(a, b);
      const key = toPairKey(a.weekend_group_id, a.recording_id, b.recording_id);

      return lock.run(pairKeyString(key), async () => {
        const existing = await store.find(key);
        if (existing) {
          return { result: existing, cached: true };
        }

        const scored = scorer.score(a, b);
        const outcome = await store.insertIfAbsent({
          ...scored,
          notified: false,
          compared_at: now().toISOString(),
        });

        if (outcome.inserted) {
          const flag = outcome.result.deviation_flagged ? "⚠️ DEVIATION" : "consistent";
          console.log(
            `[compare] ${pairKeyString(key)} ${scored.metric}=${outcome.result.similarity_score.toFixed(3)} (${flag})`
          );
        }
        return { result: outcome.result, cached: !outcome.inserted };
      });
    },

    async listPendingNotifications(weekendGroupId) {
      return store.findPendingNotifications(weekendGroupId);
    },

    async markNotified(key) {
      const canonical = toPairKey(key.weekend_group_id, key.recording_id_a, key.recording_id_b);
      const updated = await store.markNotified(canonical);
      if (!updated) {
        throw new NotFoundError("Comparison", pairKeyString(canonical));
      }
      return updated;
    },

    async hasComparedAll(weekendGroupId, recordingId, siblingIds) {
      const compared = new Set(
        (await store.findByWeekendGroup(weekendGroupId)).map((result) => pairKeyString(result))
      );
      return siblingIds
        .filter((siblingId) => siblingId !== recordingId)
        .every((siblingId) => compared.has(pairKeyString(toPairKey(weekendGroupId, recordingId, siblingId))));
    },
  };
}
