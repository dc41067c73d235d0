/**
 * Comparison Service
 * Read side of weekend comparisons for the notification service.
 */

import type { HomilyConfig } from "../../config/homily.js";
import { comparisonRepository } from "../../repositories/comparisonRepository.js";
import type { ComparisonResult, PairKey } from "../../types/homily.js";
import { createComparisonTracker, type ComparisonTracker } from "./comparisonTracker.js";
import { createDeviationScorerFromConfig } from "./deviationScorer.js";

function trackerFor(config: HomilyConfig): ComparisonTracker {
  return createComparisonTracker({
    store: comparisonRepository,
    scorer: createDeviationScorerFromConfig(config),
  });
}

export async function listPendingDeviations(
  config: HomilyConfig,
  weekendGroupId?: string
): Promise<ComparisonResult[]> {
  return trackerFor(config).listPendingNotifications(weekendGroupId);
}

/**
 * Records that an alert went out for the pair. Pair order does not matter.
 */
export async function markDeviationNotified(config: HomilyConfig, key: PairKey): Promise<ComparisonResult> {
  const result = await trackerFor(config).markNotified(key);
  console.log(`[comparisons] ✓ Marked ${key.weekend_group_id} ${result.recording_id_a}/${result.recording_id_b} notified`);
  return result;
}

export async function listWeekendComparisons(weekendGroupId: string): Promise<ComparisonResult[]> {
  return comparisonRepository.findByWeekendGroup(weekendGroupId);
}
