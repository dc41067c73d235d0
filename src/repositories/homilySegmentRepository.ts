/**
 * Homily Segment Repository
 * Database access layer for homily_segments table (one row per recording).
 */

import { z } from "zod";
import { supabase } from "../config/supabase.js";
import type { HomilySegment } from "../types/homily.js";
import type { HomilySegmentStore } from "./types.js";

const HomilySegmentRowSchema: z.ZodType<HomilySegment> = z.object({
  recording_id: z.string(),
  weekend_group_id: z.string(),
  start_time: z.number(),
  end_time: z.number(),
  raw_text: z.string(),
  normalized_text: z.string(),
  audio_path: z.string(),
  boundary_source: z.enum(["markers", "fallback"]),
});

/**
 * Inserts the segment, replacing any earlier one for the same recording.
 */
export async function upsertSegment(segment: HomilySegment): Promise<HomilySegment> {
  const { data, error } = await supabase
    .from("homily_segments")
    .upsert(
      { ...segment, updated_at: new Date().toISOString() },
      { onConflict: "recording_id" }
    )
    .select()
    .single();

  if (error) {
    throw new Error(`Failed to upsert homily segment: ${error.message}`);
  }

  return HomilySegmentRowSchema.parse(data);
}

/**
 * Finds the segment of a recording.
 */
export async function findByRecordingId(recordingId: string): Promise<HomilySegment | null> {
  const { data, error } = await supabase
    .from("homily_segments")
    .select()
    .eq("recording_id", recordingId)
    .single();

  if (error && error.code !== "PGRST116") {
    throw new Error(`Failed to find homily segment: ${error.message}`);
  }

  return data ? HomilySegmentRowSchema.parse(data) : null;
}

/**
 * Finds all segments of a weekend group.
 */
export async function findByWeekendGroup(weekendGroupId: string): Promise<HomilySegment[]> {
  const { data, error } = await supabase
    .from("homily_segments")
    .select()
    .eq("weekend_group_id", weekendGroupId);

  if (error) {
    throw new Error(`Failed to fetch homily segments: ${error.message}`);
  }

  return z.array(HomilySegmentRowSchema).parse(data || []);
}

export const homilySegmentRepository: HomilySegmentStore = {
  upsert: upsertSegment,
  findByRecordingId,
  findByWeekendGroup,
};
