/**
 * Recording Repository
 * Database access layer for recordings table.
 */

import { z } from "zod";
import { supabase } from "../config/supabase.js";
import type { Recording, RecordingStatus } from "../types/homily.js";
import type { RecordingStore } from "./types.js";

export const RECORDING_STATUSES = [
  "ingested",
  "transcribed",
  "boundary_detected",
  "boundary_failed",
  "extracted",
  "normalized",
  "scored",
  "finalized",
] as const satisfies readonly RecordingStatus[];

const RecordingRowSchema: z.ZodType<Recording> = z.object({
  id: z.string(),
  weekend_group_id: z.string(),
  service_timestamp: z.string(),
  audio_path: z.string(),
  transcript_path: z.string().nullable(),
  status: z.enum(RECORDING_STATUSES),
  error_message: z.string().nullable(),
});

export interface CreateRecordingInput {
  weekend_group_id: string;
  service_timestamp: string;
  audio_path: string;
  transcript_path?: string;
  status?: RecordingStatus;
}

/**
 * Creates a recording record.
 */
export async function createRecording(input: CreateRecordingInput): Promise<Recording> {
  const { data, error } = await supabase
    .from("recordings")
    .insert({
      weekend_group_id: input.weekend_group_id,
      service_timestamp: input.service_timestamp,
      audio_path: input.audio_path,
      transcript_path: input.transcript_path || null,
      status: input.status ?? (input.transcript_path ? "transcribed" : "ingested"),
    })
    .select()
    .single();

  if (error) {
    throw new Error(`Failed to create recording: ${error.message}`);
  }

  return RecordingRowSchema.parse(data);
}

/**
 * Finds a recording by ID.
 */
export async function findById(id: string): Promise<Recording | null> {
  const { data, error } = await supabase
    .from("recordings")
    .select()
    .eq("id", id)
    .single();

  if (error && error.code !== "PGRST116") {
    // PGRST116 = no rows
    throw new Error(`Failed to find recording: ${error.message}`);
  }

  return data ? RecordingRowSchema.parse(data) : null;
}

/**
 * Updates recording status and optionally sets error message.
 */
export async function updateStatus(
  id: string,
  status: RecordingStatus,
  errorMessage?: string | null
): Promise<Recording> {
  const { data, error } = await supabase
    .from("recordings")
    .update({
      status,
      error_message: errorMessage || null,
      updated_at: new Date().toISOString(),
    })
    .eq("id", id)
    .select()
    .single();

  if (error) {
    throw new Error(`Failed to update recording status: ${error.message}`);
  }

  return RecordingRowSchema.parse(data);
}

/**
 * Finds recordings of a weekend group, oldest service first.
 */
export async function findByWeekendGroup(weekendGroupId: string): Promise<Recording[]> {
  const { data, error } = await supabase
    .from("recordings")
    .select()
    .eq("weekend_group_id", weekendGroupId)
    .order("service_timestamp", { ascending: true });

  if (error) {
    throw new Error(`Failed to fetch recordings: ${error.message}`);
  }

  return z.array(RecordingRowSchema).parse(data || []);
}

export const recordingRepository: RecordingStore = {
  findById,
  updateStatus,
};
