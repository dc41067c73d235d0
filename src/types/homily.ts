/**
 * Homily Domain Types
 * Shared shapes for recordings, transcript cues, extracted homilies and comparisons.
 * Times are seconds from the start of the recording.
 */

/** One timed line of transcript text. */
export interface Cue {
  readonly start_time: number;
  readonly end_time: number;
  readonly text: string;
}

export type RecordingStatus =
  | "ingested"
  | "transcribed"
  | "boundary_detected"
  | "boundary_failed"
  | "extracted"
  | "normalized"
  | "scored"
  | "finalized";

export interface Recording {
  id: string;
  weekend_group_id: string;
  service_timestamp: string;
  audio_path: string;
  transcript_path: string | null;
  status: RecordingStatus;
  error_message: string | null;
}

/** How the homily range was obtained: liturgical markers, or the configured fallback window. */
export type BoundarySource = "markers" | "fallback";

export interface HomilySegment {
  recording_id: string;
  weekend_group_id: string;
  start_time: number;
  end_time: number;
  raw_text: string;
  normalized_text: string;
  audio_path: string;
  boundary_source: BoundarySource;
}

/**
 * Identifies an unordered recording pair within a weekend group.
 * Stored canonically with recording_id_a < recording_id_b.
 */
export interface PairKey {
  weekend_group_id: string;
  recording_id_a: string;
  recording_id_b: string;
}

export interface ComparisonResult extends PairKey {
  similarity_score: number;
  deviation_flagged: boolean;
  notified: boolean;
  metric: string;
  compared_at: string;
}
