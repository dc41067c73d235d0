/**
 * Comparison Repository
 * Database access layer for comparison_results table.
 * The unique (weekend_group_id, recording_id_a, recording_id_b) constraint
 * keeps one row per pair even when runs race.
 */

import { z } from "zod";
import { supabase } from "../config/supabase.js";
import type { ComparisonResult, PairKey } from "../types/homily.js";
import type { ComparisonStore, InsertOutcome } from "./types.js";

const PAIR_CONFLICT_TARGET = "weekend_group_id,recording_id_a,recording_id_b";

const ComparisonRowSchema: z.ZodType<ComparisonResult> = z.object({
  weekend_group_id: z.string(),
  recording_id_a: z.string(),
  recording_id_b: z.string(),
  similarity_score: z.number().min(0).max(1),
  deviation_flagged: z.boolean(),
  notified: z.boolean(),
  metric: z.string(),
  compared_at: z.string(),
});

/**
 * Finds the stored result for a pair.
 */
export async function findComparison(key: PairKey): Promise<ComparisonResult | null> {
  const { data, error } = await supabase
    .from("comparison_results")
    .select()
    .eq("weekend_group_id", key.weekend_group_id)
    .eq("recording_id_a", key.recording_id_a)
    .eq("recording_id_b", key.recording_id_b)
    .single();

  if (error && error.code !== "PGRST116") {
    throw new Error(`Failed to find comparison: ${error.message}`);
  }

  return data ? ComparisonRowSchema.parse(data) : null;
}

/**
 * Inserts a result with ON CONFLICT DO NOTHING.
 * An empty returning set means another run already stored the pair.
 */
export async function insertComparisonIfAbsent(result: ComparisonResult): Promise<InsertOutcome> {
  const { data, error } = await supabase
    .from("comparison_results")
    .upsert(result, { onConflict: PAIR_CONFLICT_TARGET, ignoreDuplicates: true })
    .select();

  if (error) {
    throw new Error(`Failed to insert comparison: ${error.message}`);
  }

  const inserted = z.array(ComparisonRowSchema).parse(data || []);
  if (inserted.length > 0) {
    return { result: inserted[0], inserted: true };
  }

  const existing = await findComparison(result);
  if (!existing) {
    throw new Error(
      `Comparison for ${result.recording_id_a}/${result.recording_id_b} neither inserted nor found`
    );
  }
  return { result: existing, inserted: false };
}

/**
 * Finds all results of a weekend group.
 */
export async function findComparisonsByWeekendGroup(weekendGroupId: string): Promise<ComparisonResult[]> {
  const { data, error } = await supabase
    .from("comparison_results")
    .select()
    .eq("weekend_group_id", weekendGroupId);

  if (error) {
    throw new Error(`Failed to fetch comparisons: ${error.message}`);
  }

  return z.array(ComparisonRowSchema).parse(data || []);
}

/**
 * Flagged results not yet delivered to the notification service, oldest first.
 */
export async function findPendingNotifications(weekendGroupId?: string): Promise<ComparisonResult[]> {
  let query = supabase
    .from("comparison_results")
    .select()
    .eq("deviation_flagged", true)
    .eq("notified", false);

  if (weekendGroupId) {
    query = query.eq("weekend_group_id", weekendGroupId);
  }

  const { data, error } = await query.order("compared_at", { ascending: true });

  if (error) {
    throw new Error(`Failed to fetch pending notifications: ${error.message}`);
  }

  return z.array(ComparisonRowSchema).parse(data || []);
}

/**
 * Marks a result as delivered. Returns null when the pair has no result.
 */
export async function markComparisonNotified(key: PairKey): Promise<ComparisonResult | null> {
  const { data, error } = await supabase
    .from("comparison_results")
    .update({ notified: true, notified_at: new Date().toISOString() })
    .eq("weekend_group_id", key.weekend_group_id)
    .eq("recording_id_a", key.recording_id_a)
    .eq("recording_id_b", key.recording_id_b)
    .select()
    .single();

  if (error && error.code !== "PGRST116") {
    throw new Error(`Failed to mark comparison notified: ${error.message}`);
  }

  return data ? ComparisonRowSchema.parse(data) : null;
}

export const comparisonRepository: ComparisonStore = {
  find: findComparison,
  insertIfAbsent: insertComparisonIfAbsent,
  findByWeekendGroup: findComparisonsByWeekendGroup,
  findPendingNotifications,
  markNotified: markComparisonNotified,
};
